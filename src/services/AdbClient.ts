import { Device } from '../types/Device.js';
import { getConfig } from '../config/index.js';
import { CommandOutput, CommandRunner, DEFAULT_COMMAND_TIMEOUT_MS, clampTimerDelay, runCommand } from '../utils/exec.js';
import { commandFailedError, invalidInputError, parseError } from '../utils/errors.js';
import {
  CONNECT_PHRASES,
  DISCONNECT_PHRASES,
  OutputPhrases,
  PAIR_PHRASES,
  TCPIP_PHRASES,
  classifyOutput,
  parseDeviceList,
} from '../utils/adbOutput.js';

export interface AdbClientOptions {
  adbPath: string;
  timeoutMs: number;
}

const MAX_PORT = 65535;

/** Runs adb subcommands and turns their human-readable output into results */
export class AdbClient {
  private readonly adbPath: string;
  private readonly timeoutMs: number;

  constructor(
    options: Partial<AdbClientOptions> = {},
    private readonly run: CommandRunner = runCommand
  ) {
    this.adbPath = options.adbPath || 'adb';
    this.timeoutMs = clampTimerDelay(options.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS);
  }

  async listDevices(): Promise<Device[]> {
    const { stdout, stderr } = await this.exec(['devices']);
    return parseDeviceList(stdout, stderr, this.label('devices'));
  }

  async pair(address: string, port: number, code: string): Promise<void> {
    const host = address.trim();
    const pairingCode = code.trim();
    if (!host || !isValidPort(port) || !pairingCode) {
      throw invalidInputError('pair requires address, port, and code');
    }
    await this.expect(['pair', formatEndpoint(host, port), pairingCode], PAIR_PHRASES);
  }

  async connect(address: string, port: number): Promise<void> {
    const host = address.trim();
    if (!host || !isValidPort(port)) {
      throw invalidInputError('connect requires address and port');
    }
    await this.expect(['connect', formatEndpoint(host, port)], CONNECT_PHRASES);
  }

  /** Restarts adbd on the USB-attached device in TCP mode on the given port */
  async enableWireless(port: number): Promise<void> {
    if (!isValidPort(port)) {
      throw invalidInputError('tcpip requires a port');
    }
    await this.expect(['tcpip', String(port)], TCPIP_PHRASES);
  }

  async disconnect(address: string, port: number): Promise<void> {
    const host = address.trim();
    if (!host || !isValidPort(port)) {
      throw invalidInputError('disconnect requires address and port');
    }
    await this.expect(['disconnect', formatEndpoint(host, port)], DISCONNECT_PHRASES);
  }

  private async expect(args: string[], phrases: OutputPhrases): Promise<void> {
    const { stdout, stderr } = await this.exec(args);
    const command = this.label(args[0]);

    switch (classifyOutput(stdout, phrases)) {
      case 'success':
        return;
      case 'failure':
        throw commandFailedError(command, stdout, stderr, 0, new Error(`${args[0]} failed`));
      case 'unrecognized':
        throw parseError(command, stdout, stderr, new Error('unexpected output'));
    }
  }

  private exec(args: string[]): Promise<CommandOutput> {
    return this.run(this.adbPath, args, { timeoutMs: this.timeoutMs, label: this.label(args[0]) });
  }

  private label(subcommand: string): string {
    return `${this.adbPath} ${subcommand}`;
  }
}

export function formatEndpoint(address: string, port: number): string {
  return `${address}:${port}`;
}

function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port > 0 && port <= MAX_PORT;
}

export const adbClient = new AdbClient({
  adbPath: getConfig().tools.adbPath,
  timeoutMs: getConfig().tools.adbTimeoutMs,
});
