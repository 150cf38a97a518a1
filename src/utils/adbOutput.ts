import { Device } from '../types/Device.js';
import { parseError } from './errors.js';

export const DEVICE_LIST_HEADER = 'List of devices attached';

/** Phrase groups a bridge operation recognises in its stdout */
export interface OutputPhrases {
  success: readonly string[];
  failure: readonly string[];
}

export type OutputVerdict = 'success' | 'failure' | 'unrecognized';

export const PAIR_PHRASES: OutputPhrases = {
  success: ['successfully paired', 'already paired'],
  failure: ['failed', 'error'],
};

export const CONNECT_PHRASES: OutputPhrases = {
  success: ['connected to', 'already connected'],
  failure: ['failed', 'unable'],
};

export const TCPIP_PHRASES: OutputPhrases = {
  success: ['restarting in tcp mode', 'already in tcp'],
  failure: ['error', 'failed'],
};

// adb prints "error: no such device" for an endpoint that is already gone
export const DISCONNECT_PHRASES: OutputPhrases = {
  success: ['disconnected', 'no such device'],
  failure: ['error', 'failed'],
};

export function containsAny(haystack: string, needles: readonly string[]): boolean {
  const lower = haystack.toLowerCase();
  return needles.some(needle => lower.includes(needle.toLowerCase()));
}

/** Success phrases win over failure phrases; anything else is unrecognized */
export function classifyOutput(stdout: string, phrases: OutputPhrases): OutputVerdict {
  if (containsAny(stdout, phrases.success)) return 'success';
  if (containsAny(stdout, phrases.failure)) return 'failure';
  return 'unrecognized';
}

/**
 * Parses `adb devices` output. Blank lines, the header and daemon status
 * lines ("* daemon started successfully") are skipped; a line with fewer
 * than two fields fails the whole listing.
 */
export function parseDeviceList(stdout: string, stderr: string, command: string): Device[] {
  const devices: Device[] = [];

  for (const rawLine of stdout.split('\n')) {
    const line = rawLine.trim();
    if (!line || line.startsWith(DEVICE_LIST_HEADER) || line.startsWith('*')) continue;

    const fields = line.split(/\s+/);
    if (fields.length < 2) {
      throw parseError(command, stdout, stderr, new Error(`unexpected device line: ${JSON.stringify(line)}`));
    }
    devices.push({ id: fields[0], state: fields[1] });
  }

  return devices;
}
