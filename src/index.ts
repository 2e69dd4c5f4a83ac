export { HolePunchingSource, BaseHolePunchingSource } from './lib/hole-punch';
export type { HolePunchingSourceOptions } from './lib/hole-punch';

export {
  HolePunchStatus,
  HOLE_PUNCH_CONSTANTS,
  resolveSourceConfig,
  loadSourceConfigFromEnv,
  ResultSlot,
  isForwardedEndpointsMessage,
  SourceConnectionAuthenticator,
  ControlChannel,
  ConnectionListener,
  HolePuncher
} from './lib/hole-punch';
export type {
  ConnectedOutcome,
  PunchOutcome,
  PunchVia,
  HolePunchConfig,
  ConnectionAuthenticator,
  GetSocketOptions,
  HolePuncherEvents
} from './lib/hole-punch';

export { TcpTransport } from './lib/transport';
export type { Transport, TransportListener, ConnectOptions } from './lib/transport';

export * as protocol from './lib/protocol';
export { MessageCodec } from './lib/protocol';

export { HolePunchError, isHolePunchError, describeError } from './lib/errors';
export type { HolePunchErrorCode } from './lib/errors';

export { parseEndpoint, formatEndpoint } from './lib/utils/endpoint';
export type { Endpoint } from './lib/types';
