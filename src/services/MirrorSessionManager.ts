import { spawn } from 'child_process';
import { getConfig } from '../config/index.js';
import { MirrorExitInfo, MirrorOptions, MirrorSessionStatus } from '../types/Mirror.js';
import { SpawnFn, SpawnedProcess, clampTimerDelay } from '../utils/exec.js';
import { AsyncMutex } from '../utils/mutex.js';
import { buildScrcpyArgs, freezeOptions } from '../utils/scrcpy.js';
import { commandFailedError, isOrchestratorError, notRunningError, timeoutError } from '../utils/errors.js';

export interface MirrorSessionManagerOptions {
  scrcpyPath: string;
  /** Ceiling after which a session is cancelled regardless of the user */
  timeoutMs: number;
  stopGraceMs: number;
}

interface MirrorSession {
  process: SpawnedProcess;
  controller: AbortController;
  ceilingTimer: NodeJS.Timeout;
  exited: Promise<MirrorExitInfo>;
  deviceId: string | null;
  options: Readonly<MirrorOptions>;
  startedAt: Date;
}

type StateCallback = (status: MirrorSessionStatus, exit?: MirrorExitInfo) => void;

const DEFAULT_TIMEOUT_MS = 24 * 60 * 60 * 1000;
const DEFAULT_STOP_GRACE_MS = 5000;

/**
 * Supervises the single scrcpy process. The stored session is the whole
 * state: present means Running, absent means Idle. It is only read or
 * written inside the mutex, and the mutex is never held while waiting for
 * the process to exit.
 */
export class MirrorSessionManager {
  private readonly scrcpyPath: string;
  private readonly timeoutMs: number;
  private readonly stopGraceMs: number;
  private readonly mutex = new AsyncMutex();
  private session: MirrorSession | null = null;
  private lastExit: MirrorExitInfo | null = null;
  private listeners: Set<StateCallback> = new Set();

  constructor(
    options: Partial<MirrorSessionManagerOptions> = {},
    private readonly spawnFn: SpawnFn = spawn
  ) {
    this.scrcpyPath = options.scrcpyPath || 'scrcpy';
    this.timeoutMs = clampTimerDelay(options.timeoutMs ?? DEFAULT_TIMEOUT_MS);
    this.stopGraceMs = clampTimerDelay(options.stopGraceMs ?? DEFAULT_STOP_GRACE_MS);
  }

  async start(deviceId: string, options: MirrorOptions = {}): Promise<MirrorSessionStatus> {
    const session = await this.mutex.runExclusive(async () => {
      if (this.session) {
        throw commandFailedError(this.scrcpyPath, '', '', null, new Error('scrcpy already running'));
      }
      const launched = await this.launch(deviceId.trim(), options);
      this.session = launched;
      return launched;
    });

    console.log(`[MirrorSessionManager] scrcpy started (pid ${session.process.pid ?? 'unknown'}, device ${session.deviceId ?? 'default'})`);

    this.watch(session).catch((err) => {
      console.error('[MirrorSessionManager] Exit watcher failed:', err);
    });
    this.notify();

    return this.getStatus();
  }

  async stop(): Promise<void> {
    const session = await this.mutex.runExclusive(() => this.session);
    if (!session) {
      throw notRunningError('scrcpy is not running');
    }

    session.controller.abort();

    let graceTimer: NodeJS.Timeout | undefined;
    const graceElapsed = new Promise<'grace-elapsed'>((resolve) => {
      graceTimer = setTimeout(() => resolve('grace-elapsed'), this.stopGraceMs);
    });
    const outcome = await Promise.race([session.exited.then(() => 'exited' as const), graceElapsed]);
    clearTimeout(graceTimer);

    if (outcome === 'grace-elapsed') {
      console.warn(`[MirrorSessionManager] scrcpy ignored termination for ${this.stopGraceMs}ms, killing it`);
      session.process.kill('SIGKILL');
      throw timeoutError(this.scrcpyPath, new Error(`scrcpy did not exit within ${this.stopGraceMs}ms`));
    }
  }

  /** Stops a running session during service shutdown; Idle is not an error here */
  async shutdown(): Promise<void> {
    try {
      await this.stop();
    } catch (err) {
      if (!isOrchestratorError(err, 'not_running')) throw err;
    }
  }

  getStatus(): MirrorSessionStatus {
    const session = this.session;
    if (!session) {
      return { running: false, deviceId: null, pid: null, startedAt: null, options: null };
    }
    return {
      running: true,
      deviceId: session.deviceId,
      pid: session.process.pid ?? null,
      startedAt: session.startedAt.toISOString(),
      options: session.options,
    };
  }

  getLastExit(): MirrorExitInfo | null {
    return this.lastExit;
  }

  onStateChange(listener: StateCallback): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  private async launch(deviceId: string, options: MirrorOptions): Promise<MirrorSession> {
    const frozen = freezeOptions(options);
    const args = buildScrcpyArgs(deviceId, frozen);
    const controller = new AbortController();
    const ceilingTimer = setTimeout(() => {
      console.warn('[MirrorSessionManager] Session ceiling reached, cancelling scrcpy');
      controller.abort();
    }, this.timeoutMs);
    ceilingTimer.unref();

    let child: SpawnedProcess;
    let exited: Promise<MirrorExitInfo>;
    try {
      child = this.spawnFn(this.scrcpyPath, args, {
        stdio: 'ignore',
        signal: controller.signal,
        windowsHide: true,
      });
      // Aborting makes Node emit an AbortError after the kill; it is expected.
      child.on('error', (err: Error) => {
        if (err.name !== 'AbortError') {
          console.error('[MirrorSessionManager] scrcpy process error:', err.message);
        }
      });
      exited = waitForExit(child, deviceId);
      await waitForSpawn(child);
    } catch (err) {
      clearTimeout(ceilingTimer);
      controller.abort();
      throw commandFailedError(this.scrcpyPath, '', '', null, err);
    }

    return {
      process: child,
      controller,
      ceilingTimer,
      exited,
      deviceId: deviceId || null,
      options: frozen,
      startedAt: new Date(),
    };
  }

  private async watch(session: MirrorSession): Promise<void> {
    const exit = await session.exited;

    await this.mutex.runExclusive(() => {
      clearTimeout(session.ceilingTimer);
      // Only clear the slot if it still holds the session this watcher belongs to
      if (this.session === session) {
        this.session = null;
      }
      this.lastExit = exit;
    });

    console.log(`[MirrorSessionManager] scrcpy exited (code ${exit.exitCode}, signal ${exit.signal ?? 'none'})`);
    this.notify(exit);
  }

  private notify(exit?: MirrorExitInfo): void {
    const status = this.getStatus();
    for (const listener of this.listeners) {
      try {
        listener(status, exit);
      } catch (err) {
        console.error('[MirrorSessionManager] State listener failed:', err);
      }
    }
  }
}

function waitForSpawn(child: SpawnedProcess): Promise<void> {
  return new Promise((resolve, reject) => {
    const onSpawn = () => {
      child.off('error', onError);
      resolve();
    };
    const onError = (err: Error) => {
      child.off('spawn', onSpawn);
      reject(err);
    };
    child.once('spawn', onSpawn);
    child.once('error', onError);
  });
}

function waitForExit(child: SpawnedProcess, deviceId: string): Promise<MirrorExitInfo> {
  return new Promise((resolve) => {
    child.once('exit', (code: number | null, signal: NodeJS.Signals | null) => {
      resolve({
        deviceId: deviceId || null,
        exitCode: code,
        signal,
        endedAt: new Date().toISOString(),
      });
    });
  });
}

export const mirrorSessionManager = new MirrorSessionManager({
  scrcpyPath: getConfig().tools.scrcpyPath,
  timeoutMs: getConfig().tools.scrcpyTimeoutMs,
  stopGraceMs: getConfig().tools.stopGraceMs,
});
