/** Failure categories every orchestrator operation reports */
export type ErrorKind =
  | 'timeout'
  | 'command_failed'
  | 'parse'
  | 'invalid_input'
  | 'not_running';

export interface OrchestratorErrorDetails {
  command?: string;
  stdout?: string;
  stderr?: string;
  /** null when the process produced no exit status (spawn failure, timeout, signal) */
  exitCode?: number | null;
  cause?: unknown;
}

/** Wire shape sent to HTTP and WebSocket clients */
export interface OrchestratorErrorPayload {
  kind: ErrorKind;
  message: string;
  command: string;
  stdout: string;
  stderr: string;
  exitCode: number | null;
}

export class OrchestratorError extends Error {
  readonly kind: ErrorKind;
  readonly command: string;
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number | null;

  constructor(kind: ErrorKind, message: string, details: OrchestratorErrorDetails = {}) {
    const command = details.command ?? '';
    super(message || fallbackMessage(kind, command), { cause: details.cause });
    this.name = 'OrchestratorError';
    this.kind = kind;
    this.command = command;
    this.stdout = details.stdout ?? '';
    this.stderr = details.stderr ?? '';
    this.exitCode = details.exitCode === undefined ? null : details.exitCode;
  }

  /** Lower-level failure this error wraps, if any */
  unwrap(): unknown {
    return this.cause;
  }

  toJSON(): OrchestratorErrorPayload {
    return {
      kind: this.kind,
      message: this.message,
      command: this.command,
      stdout: this.stdout,
      stderr: this.stderr,
      exitCode: this.exitCode,
    };
  }

  static messageOf(err: OrchestratorError | null | undefined): string {
    return err ? err.message : '<nil>';
  }
}

function fallbackMessage(kind: ErrorKind, command: string): string {
  return command ? `${kind}: ${command}` : kind;
}

export function isOrchestratorError(value: unknown, kind?: ErrorKind): value is OrchestratorError {
  return value instanceof OrchestratorError && (kind === undefined || value.kind === kind);
}

export function invalidInputError(message: string): OrchestratorError {
  return new OrchestratorError('invalid_input', message);
}

export function notRunningError(message: string): OrchestratorError {
  return new OrchestratorError('not_running', message);
}

export function timeoutError(command: string, cause?: unknown): OrchestratorError {
  return new OrchestratorError('timeout', `timeout while running ${command}`, { command, cause });
}

export function commandFailedError(
  command: string,
  stdout: string,
  stderr: string,
  exitCode: number | null,
  cause?: unknown
): OrchestratorError {
  return new OrchestratorError('command_failed', `command failed: ${command}`, {
    command,
    stdout,
    stderr,
    exitCode,
    cause,
  });
}

export function parseError(command: string, stdout: string, stderr: string, cause?: unknown): OrchestratorError {
  return new OrchestratorError('parse', `unexpected output from ${command}`, {
    command,
    stdout,
    stderr,
    cause,
  });
}
