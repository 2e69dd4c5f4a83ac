/**
 * Hole Punching Implementation
 *
 * Source side of mediated TCP hole punching.
 */

export * from './types';
export { HOLE_PUNCH_CONSTANTS } from './constants';
export { resolveSourceConfig, loadSourceConfigFromEnv } from './config';
export { ResultSlot } from './result-slot';
export { isForwardedEndpointsMessage } from './validation';
export { SourceConnectionAuthenticator, tokensEqual } from './authenticator';
export { ControlChannel } from './control-channel';
export { ConnectionListener, type ListenerHandlers } from './connection-listener';
export { HolePuncher } from './hole-puncher';
export { BaseHolePunchingSource, HolePunchingSource, type HolePunchingSourceOptions } from './source';
