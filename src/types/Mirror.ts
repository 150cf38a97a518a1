/** Options for one scrcpy launch. Empty, zero and false values are left off the command line. */
export interface MirrorOptions {
  /** Video bit rate as scrcpy takes it, e.g. "8M" */
  bitRate?: string;
  maxSize?: number;
  maxFps?: number;
  turnScreenOff?: boolean;
  fullscreen?: boolean;
  stayAwake?: boolean;
  /** File to record the session to */
  record?: string;
  windowTitle?: string;
  /** Appended verbatim after the generated flags */
  extraArgs?: readonly string[];
}

/** Snapshot of the mirroring session handed to callers */
export interface MirrorSessionStatus {
  running: boolean;
  deviceId: string | null;
  pid: number | null;
  startedAt: string | null;
  options: Readonly<MirrorOptions> | null;
}

/** How the last session ended, reported once its process has exited */
export interface MirrorExitInfo {
  deviceId: string | null;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  endedAt: string;
}

export interface StartMirrorRequest {
  deviceId?: string;
  options?: MirrorOptions;
}
