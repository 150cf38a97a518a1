import { spawn, SpawnOptions } from 'child_process';
import { EventEmitter } from 'events';
import { Readable } from 'stream';
import { OrchestratorError, commandFailedError, timeoutError } from './errors.js';

export const DEFAULT_COMMAND_TIMEOUT_MS = 10_000;

/** Largest delay setTimeout honours; anything above fires after 1ms */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export function clampTimerDelay(ms: number): number {
  return Math.min(ms, MAX_TIMER_DELAY_MS);
}

/** The slice of ChildProcess the runner and the session manager rely on */
export interface SpawnedProcess extends EventEmitter {
  readonly pid?: number | undefined;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type SpawnFn = (command: string, args: readonly string[], options: SpawnOptions) => SpawnedProcess;

export interface CommandOutput {
  stdout: string;
  stderr: string;
}

export interface RunCommandOptions {
  timeoutMs: number;
  /** Aborting this is reported the same way as deadline expiry */
  signal?: AbortSignal;
  /** Name used in error messages, defaults to the executable */
  label?: string;
}

export type CommandRunner = (
  command: string,
  args: readonly string[],
  options: RunCommandOptions
) => Promise<CommandOutput>;

export function createCommandRunner(spawnFn: SpawnFn = spawn): CommandRunner {
  return (command, args, options) =>
    new Promise<CommandOutput>((resolve, reject) => {
      const label = options.label ?? command;
      const stdoutChunks: Buffer[] = [];
      const stderrChunks: Buffer[] = [];
      let settled = false;
      let timer: NodeJS.Timeout | undefined;

      const collect = (): CommandOutput => ({
        stdout: Buffer.concat(stdoutChunks).toString('utf-8').trim(),
        stderr: Buffer.concat(stderrChunks).toString('utf-8').trim(),
      });

      const settle = (err: OrchestratorError | null): void => {
        if (settled) return;
        settled = true;
        if (timer) clearTimeout(timer);
        options.signal?.removeEventListener('abort', onAbort);
        if (err) {
          reject(err);
        } else {
          resolve(collect());
        }
      };

      if (options.signal?.aborted) {
        reject(timeoutError(label, options.signal.reason));
        return;
      }

      let child: SpawnedProcess;
      try {
        child = spawnFn(command, args, { stdio: ['ignore', 'pipe', 'pipe'], windowsHide: true });
      } catch (err) {
        reject(commandFailedError(label, '', '', null, err));
        return;
      }

      // Past the deadline the child is detached from our buffers and killed;
      // the caller gets its answer without waiting for the exit.
      const expire = (cause: unknown): void => {
        if (settled) return;
        child.stdout?.removeAllListeners('data');
        child.stderr?.removeAllListeners('data');
        child.stdout?.destroy();
        child.stderr?.destroy();
        child.kill('SIGKILL');
        settle(timeoutError(label, cause));
      };

      function onAbort(): void {
        expire(options.signal?.reason);
      }

      child.stdout?.on('data', (chunk: Buffer | string) => {
        stdoutChunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
      });
      child.stderr?.on('data', (chunk: Buffer | string) => {
        stderrChunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
      });

      child.on('error', (err: Error) => {
        const { stdout, stderr } = collect();
        settle(commandFailedError(label, stdout, stderr, null, err));
      });

      child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
        const { stdout, stderr } = collect();
        if (code === 0) {
          settle(null);
          return;
        }
        const reason = signal ? `terminated by ${signal}` : `exit status ${code}`;
        settle(commandFailedError(label, stdout, stderr, code, new Error(reason)));
      });

      timer = setTimeout(() => {
        expire(new Error(`deadline of ${options.timeoutMs}ms exceeded`));
      }, clampTimerDelay(options.timeoutMs));
      options.signal?.addEventListener('abort', onAbort, { once: true });
    });
}

/** Runs a short-lived command under a deadline and returns its trimmed output */
export const runCommand: CommandRunner = createCommandRunner();
