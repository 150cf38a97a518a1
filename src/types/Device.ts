/**
 * State word reported by `adb devices`. Known values are listed for
 * completion, but adb may report others (recovery, sideload, ...).
 */
export type DeviceState =
  | 'device'
  | 'offline'
  | 'unauthorized'
  | 'authorizing'
  | 'connecting'
  | (string & {});

/** A device as seen by the bridge tool */
export interface Device {
  /** Serial number, or host:port for wireless devices */
  id: string;
  state: DeviceState;
}

export interface PairRequest {
  address: string;
  port: number;
  code: string;
}

export interface EndpointRequest {
  address: string;
  port: number;
}

export interface WirelessRequest {
  port: number;
}
