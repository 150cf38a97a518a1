import { describe, expect, it, vi } from 'vitest';
import { ClientSocket, MessageHandler, parseClientMessage } from './MessageHandler.js';
import { AdbClient } from '../services/AdbClient.js';
import { DeviceDiscoveryService } from '../services/DeviceDiscoveryService.js';
import { MirrorSessionManager } from '../services/MirrorSessionManager.js';
import { ServerMessage } from '../types/Protocol.js';
import { fakeAdbRunner, fakeMirrorSpawner } from '../test-utils/fakeProcess.js';

const LIST = 'List of devices attached\nR58M123\tdevice\n';

function fakeSocket(readyState = 1) {
  const send = vi.fn<(data: string) => void>();
  const socket: ClientSocket = { readyState, send };
  const messages = (): ServerMessage[] => send.mock.calls.map(([data]) => JSON.parse(data));
  return { socket, send, messages };
}

function setup() {
  const { run } = fakeAdbRunner({ devices: LIST });
  const discovery = new DeviceDiscoveryService(new AdbClient({}, run));
  const { spawnFn, spawned } = fakeMirrorSpawner();
  const mirror = new MirrorSessionManager({ stopGraceMs: 1000 }, spawnFn);
  const handler = new MessageHandler({ discovery, mirror });
  return { handler, discovery, mirror, spawned };
}

describe('MessageHandler', () => {
  it('sends the device list and session status on connect', () => {
    const { handler } = setup();
    const client = fakeSocket();

    handler.handleConnection(client.socket, 'client-1');

    expect(handler.getClientCount()).toBe(1);
    expect(client.messages()).toEqual([
      { type: 'devices', devices: [], error: null },
      {
        type: 'mirror-session',
        session: { running: false, deviceId: null, pid: null, startedAt: null, options: null },
      },
    ]);
  });

  it('broadcasts device changes to every client', async () => {
    const { handler } = setup();
    const first = fakeSocket();
    const second = fakeSocket();
    handler.handleConnection(first.socket, 'client-1');
    handler.handleConnection(second.socket, 'client-2');
    first.send.mockClear();
    second.send.mockClear();

    await handler.handleMessage(first.socket, { type: 'list-devices' });

    const broadcast = { type: 'devices', devices: [{ id: 'R58M123', state: 'device' }], error: null };
    expect(first.messages()).toEqual([broadcast, broadcast]);
    expect(second.messages()).toEqual([broadcast]);
  });

  it('skips sockets that are not open', () => {
    const { handler } = setup();
    const closing = fakeSocket(2);

    handler.handleConnection(closing.socket, 'client-1');

    expect(closing.send).not.toHaveBeenCalled();
  });

  it('reports orchestrator errors with their kind', async () => {
    const { handler } = setup();
    const client = fakeSocket();
    handler.handleConnection(client.socket, 'client-1');
    client.send.mockClear();

    await handler.handleMessage(client.socket, { type: 'stop-mirror' });

    expect(client.messages()).toEqual([
      {
        type: 'error',
        message: 'scrcpy is not running',
        code: 'not_running',
        error: {
          kind: 'not_running',
          message: 'scrcpy is not running',
          command: '',
          stdout: '',
          stderr: '',
          exitCode: null,
        },
      },
    ]);
  });

  it('broadcasts session changes after start-mirror', async () => {
    const { handler, mirror, spawned } = setup();
    const client = fakeSocket();
    handler.handleConnection(client.socket, 'client-1');
    client.send.mockClear();

    await handler.handleMessage(client.socket, { type: 'start-mirror', deviceId: 'R58M123', options: { maxFps: 30 } });

    expect(spawned[0].args).toEqual(['-s', 'R58M123', '--max-fps', '30']);
    expect(client.messages()[0]).toMatchObject({
      type: 'mirror-session',
      session: { running: true, deviceId: 'R58M123', pid: 1000 },
    });

    await mirror.shutdown();
  });

  it('stops broadcasting after dispose', async () => {
    const { handler, discovery } = setup();
    const client = fakeSocket();
    handler.handleConnection(client.socket, 'client-1');
    client.send.mockClear();

    handler.dispose();
    await discovery.refresh();

    expect(client.send).not.toHaveBeenCalled();
    expect(handler.getClientCount()).toBe(0);
  });
});

describe('parseClientMessage', () => {
  it('accepts known message types', () => {
    expect(parseClientMessage('{"type":"list-devices"}')).toEqual({ type: 'list-devices' });
    expect(parseClientMessage('{"type":"stop-mirror","extra":true}')).toEqual({ type: 'stop-mirror' });
  });

  it('keeps only well-typed start-mirror fields', () => {
    const message = parseClientMessage(JSON.stringify({
      type: 'start-mirror',
      deviceId: 42,
      options: { maxSize: 800, fullscreen: 'yes' },
    }));

    expect(message).toEqual({ type: 'start-mirror', deviceId: undefined, options: { maxSize: 800 } });
  });

  it('rejects malformed or unknown frames', () => {
    expect(parseClientMessage('not json')).toBeNull();
    expect(parseClientMessage('[]')).toBeNull();
    expect(parseClientMessage('{"type":"reboot"}')).toBeNull();
  });
});
