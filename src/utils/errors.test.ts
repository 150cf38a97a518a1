import { describe, expect, it } from 'vitest';
import {
  OrchestratorError,
  commandFailedError,
  invalidInputError,
  isOrchestratorError,
  notRunningError,
  parseError,
  timeoutError,
} from './errors.js';

describe('OrchestratorError', () => {
  it('carries command output and exit code on command failures', () => {
    const cause = new Error('exit status 1');
    const err = commandFailedError('adb connect', 'out', 'err', 1, cause);

    expect(err.kind).toBe('command_failed');
    expect(err.message).toBe('command failed: adb connect');
    expect(err.command).toBe('adb connect');
    expect(err.stdout).toBe('out');
    expect(err.stderr).toBe('err');
    expect(err.exitCode).toBe(1);
    expect(err.unwrap()).toBe(cause);
    expect(err.cause).toBe(cause);
  });

  it('builds messages for each kind', () => {
    expect(invalidInputError('connect requires address and port').message).toBe('connect requires address and port');
    expect(notRunningError('scrcpy is not running').kind).toBe('not_running');
    expect(timeoutError('adb pair').message).toBe('timeout while running adb pair');
    expect(parseError('adb devices', 'x', '').message).toBe('unexpected output from adb devices');
  });

  it('falls back to the kind and command when no message is given', () => {
    expect(new OrchestratorError('parse', '', { command: 'adb tcpip' }).message).toBe('parse: adb tcpip');
    expect(new OrchestratorError('timeout', '').message).toBe('timeout');
  });

  it('has no exit code unless one is given', () => {
    expect(invalidInputError('bad').exitCode).toBeNull();
    expect(invalidInputError('bad').unwrap()).toBeUndefined();
  });

  it('returns a sentinel message for a missing error', () => {
    expect(OrchestratorError.messageOf(null)).toBe('<nil>');
    expect(OrchestratorError.messageOf(undefined)).toBe('<nil>');
    expect(OrchestratorError.messageOf(notRunningError('idle'))).toBe('idle');
  });

  it('serializes to the wire shape', () => {
    const err = commandFailedError('scrcpy', '', '', null, new Error('spawn scrcpy ENOENT'));
    expect(JSON.parse(JSON.stringify(err))).toEqual({
      kind: 'command_failed',
      message: 'command failed: scrcpy',
      command: 'scrcpy',
      stdout: '',
      stderr: '',
      exitCode: null,
    });
  });

  it('narrows by kind', () => {
    const err: unknown = timeoutError('adb devices');
    expect(isOrchestratorError(err)).toBe(true);
    expect(isOrchestratorError(err, 'timeout')).toBe(true);
    expect(isOrchestratorError(err, 'parse')).toBe(false);
    expect(isOrchestratorError(new Error('plain'))).toBe(false);
  });
});
