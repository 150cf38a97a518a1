import { Device } from './Device.js';
import { MirrorExitInfo, MirrorOptions, MirrorSessionStatus } from './Mirror.js';
import { OrchestratorErrorPayload } from '../utils/errors.js';

// Client -> Server messages
export interface ListDevicesMessage {
  type: 'list-devices';
}

export interface MirrorStatusMessage {
  type: 'mirror-status';
}

export interface StartMirrorMessage {
  type: 'start-mirror';
  deviceId?: string;
  options?: MirrorOptions;
}

export interface StopMirrorMessage {
  type: 'stop-mirror';
}

export type ClientMessage =
  | ListDevicesMessage
  | MirrorStatusMessage
  | StartMirrorMessage
  | StopMirrorMessage;

// Server -> Client messages
export interface DevicesMessage {
  type: 'devices';
  devices: Device[];
  error: OrchestratorErrorPayload | null;
}

export interface MirrorSessionMessage {
  type: 'mirror-session';
  session: MirrorSessionStatus;
  /** Present when the message reports a session that just ended */
  exit?: MirrorExitInfo;
}

export interface ErrorMessage {
  type: 'error';
  message: string;
  code?: string;
  error?: OrchestratorErrorPayload;
}

export type ServerMessage =
  | DevicesMessage
  | MirrorSessionMessage
  | ErrorMessage;
