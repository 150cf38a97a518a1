import { MirrorOptions } from '../types/Mirror.js';

export function buildScrcpyArgs(deviceId: string, options: MirrorOptions): string[] {
  const args: string[] = [];

  if (deviceId) args.push('-s', deviceId);
  if (options.bitRate) args.push('--bit-rate', options.bitRate);
  if (options.maxSize && options.maxSize > 0) args.push('--max-size', String(options.maxSize));
  if (options.maxFps && options.maxFps > 0) args.push('--max-fps', String(options.maxFps));
  if (options.turnScreenOff) args.push('--turn-screen-off');
  if (options.fullscreen) args.push('--fullscreen');
  if (options.stayAwake) args.push('--stay-awake');
  if (options.record) args.push('--record', options.record);
  if (options.windowTitle) args.push('--window-title', options.windowTitle);
  if (options.extraArgs && options.extraArgs.length > 0) args.push(...options.extraArgs);

  return args;
}

/** Copy that later changes by the caller cannot reach */
export function freezeOptions(options: MirrorOptions): Readonly<MirrorOptions> {
  return Object.freeze({
    ...options,
    extraArgs: options.extraArgs ? Object.freeze([...options.extraArgs]) : undefined,
  });
}

/** Reads mirror options from untrusted JSON, dropping fields of the wrong type */
export function parseMirrorOptions(value: unknown): MirrorOptions {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return {};
  const raw: Record<string, unknown> = { ...value };
  const options: MirrorOptions = {};

  if (typeof raw.bitRate === 'string') options.bitRate = raw.bitRate;
  if (typeof raw.maxSize === 'number') options.maxSize = raw.maxSize;
  if (typeof raw.maxFps === 'number') options.maxFps = raw.maxFps;
  if (typeof raw.turnScreenOff === 'boolean') options.turnScreenOff = raw.turnScreenOff;
  if (typeof raw.fullscreen === 'boolean') options.fullscreen = raw.fullscreen;
  if (typeof raw.stayAwake === 'boolean') options.stayAwake = raw.stayAwake;
  if (typeof raw.record === 'string') options.record = raw.record;
  if (typeof raw.windowTitle === 'string') options.windowTitle = raw.windowTitle;
  if (Array.isArray(raw.extraArgs)) {
    options.extraArgs = raw.extraArgs.filter((arg): arg is string => typeof arg === 'string');
  }

  return options;
}
