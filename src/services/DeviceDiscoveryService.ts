import { Device } from '../types/Device.js';
import { AdbClient, adbClient } from './AdbClient.js';
import { OrchestratorError, isOrchestratorError, OrchestratorErrorPayload } from '../utils/errors.js';

type DevicesCallback = (devices: Device[]) => void;

export class DeviceDiscoveryService {
  private devices: Device[] = [];
  private lastError: OrchestratorErrorPayload | null = null;
  private pollInterval: NodeJS.Timeout | null = null;
  private listeners: Set<DevicesCallback> = new Set();
  private startedSeq = 0;
  private appliedSeq = 0;

  constructor(private readonly client: AdbClient = adbClient) {}

  /**
   * Polling and request-driven refreshes may overlap; a result older than
   * the one already applied is returned to its caller but not cached.
   */
  async refresh(): Promise<Device[]> {
    const seq = ++this.startedSeq;
    let discovered: Device[];
    try {
      discovered = await this.client.listDevices();
    } catch (err) {
      if (this.claim(seq)) {
        this.lastError = isOrchestratorError(err)
          ? err.toJSON()
          : new OrchestratorError('command_failed', 'device discovery failed', { cause: err }).toJSON();
      }
      throw err;
    }

    if (!this.claim(seq)) {
      return discovered;
    }

    this.lastError = null;
    const changed = !sameDevices(this.devices, discovered);
    this.devices = discovered;

    if (changed) {
      this.notifyListeners();
    }

    return discovered;
  }

  startPolling(intervalMs: number = 3000): void {
    if (this.pollInterval) return;

    const poll = () => {
      this.refresh().catch((err) => {
        console.error('[DeviceDiscovery] Refresh failed:', err instanceof Error ? err.message : err);
      });
    };

    this.pollInterval = setInterval(poll, intervalMs);

    // Initial refresh
    poll();
  }

  stopPolling(): void {
    if (this.pollInterval) {
      clearInterval(this.pollInterval);
      this.pollInterval = null;
    }
  }

  isPolling(): boolean {
    return this.pollInterval !== null;
  }

  onDevicesChange(listener: DevicesCallback): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  getDevices(): Device[] {
    return [...this.devices];
  }

  getLastError(): OrchestratorErrorPayload | null {
    return this.lastError;
  }

  private claim(seq: number): boolean {
    if (seq < this.appliedSeq) return false;
    this.appliedSeq = seq;
    return true;
  }

  private notifyListeners(): void {
    const devices = this.getDevices();
    for (const listener of this.listeners) {
      try {
        listener(devices);
      } catch (err) {
        console.error('[DeviceDiscovery] Listener failed:', err);
      }
    }
  }
}

function sameDevices(a: Device[], b: Device[]): boolean {
  if (a.length !== b.length) return false;
  return a.every((device, i) => device.id === b[i].id && device.state === b[i].state);
}

export const deviceDiscoveryService = new DeviceDiscoveryService();
