export type ServerState = 'uninitialized' | 'starting' | 'started' | 'stopping' | 'stopped';

export const ClientType = {
  Unknown: 'UNKNOWN',
  BrowserExtension: 'BROWSER_EXTENSION'
} as const;

export type ClientType = string;

export interface ClientMetadata {
  clientType: ClientType;
  clientUid?: string;
  connectedAt: number;
  registeredAt?: number;
}

export type HeartbeatUnit = 'milliseconds' | 'seconds' | 'minutes';

export interface HeartbeatConfig {
  /** 0 disables the transport's liveness sweep. */
  connectionLostTimeoutSeconds: number;
  heartbeatEnabled: boolean;
  heartbeatIntervalUnit: HeartbeatUnit;
  heartbeatIntervalValue: number;
  heartbeatToleranceFactor: number;
}

export interface ClientView extends ClientMetadata {
  connectionId: string;
  remoteAddress: string;
}

export interface RelayMetrics {
  state: ServerState;
  wsConnections: number;
  clientsRegistered: number;
  permitsInUse: number;
  permitsPending: number;
}
