import { EventEmitter, once } from 'events';
import { PassThrough } from 'stream';
import { CommandOutput, CommandRunner, SpawnFn, SpawnedProcess } from '../utils/exec.js';

/** Stands in for a short-lived child whose output the test scripts */
export class FakeChildProcess extends EventEmitter implements SpawnedProcess {
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly killSignals: Array<NodeJS.Signals | number | undefined> = [];

  constructor(readonly pid: number = 4242) {
    super();
  }

  kill(signal?: NodeJS.Signals | number): boolean {
    this.killSignals.push(signal);
    return true;
  }

  /** Writes the output, lets the streams drain, then reports the exit */
  async complete(stdout: string, stderr: string, code: number | null, signal: NodeJS.Signals | null = null): Promise<void> {
    const drained = Promise.all([once(this.stdout, 'end'), once(this.stderr, 'end')]);
    this.stdout.end(stdout);
    this.stderr.end(stderr);
    await drained;
    this.emit('close', code, signal);
  }
}

export type AbortBehaviour = 'exit' | 'ignore';

/** Stands in for a scrcpy process: exits on abort unless told to ignore it */
export class FakeMirrorProcess extends EventEmitter implements SpawnedProcess {
  readonly stdout = null;
  readonly stderr = null;
  readonly killSignals: Array<NodeJS.Signals | number | undefined> = [];
  private exited = false;

  constructor(readonly pid: number, signal: AbortSignal | undefined, behaviour: AbortBehaviour) {
    super();
    signal?.addEventListener('abort', () => {
      if (behaviour === 'exit') this.exit(null, 'SIGTERM');
    });
  }

  kill(signal?: NodeJS.Signals | number): boolean {
    this.killSignals.push(signal);
    if (signal === 'SIGKILL') this.exit(null, 'SIGKILL');
    return true;
  }

  exit(code: number | null, signal: NodeJS.Signals | null): void {
    if (this.exited) return;
    this.exited = true;
    setImmediate(() => this.emit('exit', code, signal));
  }
}

export interface SpawnRecord {
  command: string;
  args: readonly string[];
  process: FakeMirrorProcess;
}

export function fakeMirrorSpawner(behaviour: AbortBehaviour = 'exit', failWith?: Error) {
  const spawned: SpawnRecord[] = [];
  let nextPid = 1000;

  const spawnFn: SpawnFn = (command, args, options) => {
    const child = new FakeMirrorProcess(nextPid++, options.signal, behaviour);
    spawned.push({ command, args, process: child });
    setImmediate(() => {
      if (failWith) {
        child.emit('error', failWith);
      } else {
        child.emit('spawn');
      }
    });
    return child;
  };

  return { spawnFn, spawned };
}

/** Runner answering each adb subcommand with canned stdout */
export function fakeAdbRunner(outputs: Record<string, string>) {
  const calls: Array<{ command: string; args: readonly string[] }> = [];

  const run: CommandRunner = async (command, args): Promise<CommandOutput> => {
    calls.push({ command, args });
    return { stdout: outputs[args[0]] ?? '', stderr: '' };
  };

  return { run, calls };
}
