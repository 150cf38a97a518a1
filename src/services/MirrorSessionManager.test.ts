import { describe, expect, it, vi } from 'vitest';
import { MirrorSessionManager } from './MirrorSessionManager.js';
import { MirrorExitInfo, MirrorOptions, MirrorSessionStatus } from '../types/Mirror.js';
import { OrchestratorError } from '../utils/errors.js';
import { AbortBehaviour, fakeMirrorSpawner } from '../test-utils/fakeProcess.js';

function setup(behaviour: AbortBehaviour = 'exit', stopGraceMs = 1000, failWith?: Error) {
  const { spawnFn, spawned } = fakeMirrorSpawner(behaviour, failWith);
  const manager = new MirrorSessionManager({ scrcpyPath: 'scrcpy-test', stopGraceMs }, spawnFn);
  return { manager, spawned };
}

async function waitForIdle(manager: MirrorSessionManager): Promise<void> {
  await vi.waitFor(() => {
    expect(manager.getStatus().running).toBe(false);
  });
}

describe('MirrorSessionManager', () => {
  it('starts scrcpy with arguments built from the options', async () => {
    const { manager, spawned } = setup();

    const status = await manager.start('abc123', { maxSize: 1024, stayAwake: true, fullscreen: false });

    expect(spawned).toHaveLength(1);
    expect(spawned[0].command).toBe('scrcpy-test');
    expect(spawned[0].args).toEqual(['-s', 'abc123', '--max-size', '1024', '--stay-awake']);
    expect(status).toMatchObject({ running: true, deviceId: 'abc123', pid: 1000 });
    expect(manager.getStatus().running).toBe(true);

    await manager.shutdown();
  });

  it('omits the device selector when no device id is given', async () => {
    const { manager, spawned } = setup();

    const status = await manager.start('', {});

    expect(spawned[0].args).toEqual([]);
    expect(status.deviceId).toBeNull();

    await manager.shutdown();
  });

  it('lets exactly one of two concurrent starts succeed', async () => {
    const { manager, spawned } = setup();

    const results = await Promise.allSettled([manager.start('abc123'), manager.start('def456')]);

    const fulfilled = results.filter((r) => r.status === 'fulfilled');
    const rejected = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected');
    expect(fulfilled).toHaveLength(1);
    expect(rejected).toHaveLength(1);
    expect(rejected[0].reason).toMatchObject({ kind: 'command_failed', command: 'scrcpy-test' });
    expect(spawned).toHaveLength(1);

    await manager.shutdown();
  });

  it('fails stop with not_running when idle', async () => {
    const { manager } = setup();

    await expect(manager.stop()).rejects.toMatchObject({ kind: 'not_running' });
  });

  it('stops a session that honours cancellation', async () => {
    const { manager, spawned } = setup();
    await manager.start('abc123');

    await expect(manager.stop()).resolves.toBeUndefined();
    await waitForIdle(manager);

    expect(spawned[0].process.killSignals).toEqual([]);
    expect(manager.getLastExit()).toMatchObject({ deviceId: 'abc123', exitCode: null, signal: 'SIGTERM' });
  });

  it('kills a session that ignores cancellation and reports timeout', async () => {
    const { manager, spawned } = setup('ignore', 20);
    await manager.start('abc123');

    await expect(manager.stop()).rejects.toMatchObject({ kind: 'timeout', command: 'scrcpy-test' });
    expect(spawned[0].process.killSignals).toEqual(['SIGKILL']);

    await waitForIdle(manager);
    expect(manager.getLastExit()?.signal).toBe('SIGKILL');
  });

  it('returns to idle when scrcpy exits on its own', async () => {
    const { manager, spawned } = setup();
    await manager.start('abc123');

    spawned[0].process.exit(1, null);
    await waitForIdle(manager);
    expect(manager.getLastExit()?.exitCode).toBe(1);

    await expect(manager.start('abc123')).resolves.toMatchObject({ running: true, pid: 1001 });
    expect(spawned).toHaveLength(2);

    await manager.shutdown();
  });

  it('reports spawn failures as command_failed and stays idle', async () => {
    const spawnError = new Error('spawn scrcpy-test ENOENT');
    const { manager } = setup('exit', 1000, spawnError);

    const err = await manager.start('abc123').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(OrchestratorError);
    expect(err).toMatchObject({ kind: 'command_failed', exitCode: null });
    expect(err instanceof OrchestratorError && err.unwrap()).toBe(spawnError);
    expect(manager.getStatus().running).toBe(false);
    await expect(manager.stop()).rejects.toMatchObject({ kind: 'not_running' });
  });

  it('keeps the options it was started with', async () => {
    const { manager } = setup();
    const options: MirrorOptions = { maxFps: 30, extraArgs: ['--no-audio'] };

    await manager.start('abc123', options);
    options.maxFps = 120;
    options.extraArgs = [];

    expect(manager.getStatus().options).toMatchObject({ maxFps: 30, extraArgs: ['--no-audio'] });

    await manager.shutdown();
  });

  it('notifies listeners when a session starts and ends', async () => {
    const { manager, spawned } = setup();
    const events: Array<{ status: MirrorSessionStatus; exit?: MirrorExitInfo }> = [];
    const unsubscribe = manager.onStateChange((status, exit) => events.push({ status, exit }));

    await manager.start('abc123');
    spawned[0].process.exit(0, null);
    await waitForIdle(manager);
    await vi.waitFor(() => expect(events).toHaveLength(2));

    expect(events[0].status.running).toBe(true);
    expect(events[0].exit).toBeUndefined();
    expect(events[1].status.running).toBe(false);
    expect(events[1].exit).toMatchObject({ deviceId: 'abc123', exitCode: 0 });

    unsubscribe();
    await manager.start('abc123');
    expect(events).toHaveLength(2);

    await manager.shutdown();
  });

  it('keeps running under a session ceiling longer than a timer can hold', async () => {
    const { spawnFn } = fakeMirrorSpawner();
    const manager = new MirrorSessionManager({ timeoutMs: 30 * 24 * 60 * 60 * 1000 }, spawnFn);

    await manager.start('abc123');
    await new Promise((resolve) => setTimeout(resolve, 50));

    expect(manager.getStatus().running).toBe(true);
    expect(manager.getLastExit()).toBeNull();

    await manager.shutdown();
  });

  it('starts even when a state listener throws', async () => {
    const { manager } = setup();
    const logged = vi.spyOn(console, 'error').mockImplementation(() => {});
    const calls: boolean[] = [];
    manager.onStateChange(() => {
      throw new Error('listener broke');
    });
    manager.onStateChange((status) => calls.push(status.running));

    await expect(manager.start('abc123')).resolves.toMatchObject({ running: true });

    expect(calls).toEqual([true]);
    expect(logged).toHaveBeenCalledWith('[MirrorSessionManager] State listener failed:', expect.any(Error));

    await manager.shutdown();
    logged.mockRestore();
  });

  it('treats shutdown while idle as a no-op', async () => {
    const { manager } = setup();

    await expect(manager.shutdown()).resolves.toBeUndefined();
  });
});
