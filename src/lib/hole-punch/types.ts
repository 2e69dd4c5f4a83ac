/**
 * Hole Punching Types
 */

import type { Duplex } from 'stream';
import type { Endpoint } from '../types';

/**
 * Hole punching engine status
 */
export enum HolePunchStatus {
  IDLE = 'idle',
  RACING = 'racing',
  SUCCEEDED = 'succeeded',
  FAILED = 'failed'
}

/**
 * Which actor produced a connection: the listener or an outbound dial
 */
export type PunchVia = 'passive' | 'active';

export interface ConnectedOutcome<S extends Duplex> {
  kind: 'connected';
  socket: S;
  via: PunchVia;
  remote?: Endpoint;
}

/**
 * What the race's single result slot can hold
 */
export type PunchOutcome<S extends Duplex> = ConnectedOutcome<S> | { kind: 'timed-out' } | { kind: 'cancelled' };

/**
 * Timing and binding settings for one source
 */
export interface HolePunchConfig {
  /** Overall deadline of the connection race */
  deadlineMs: number;
  /** Pause between two outbound attempts to the same endpoint */
  retryIntervalMs: number;
  connectTimeoutMs: number;
  /** Bound on one authentication handshake */
  authTimeoutMs: number;
  /** Bound on connecting to and reading from the mediator */
  controlTimeoutMs: number;
  /** Bind outbound attempts to the control channel's local endpoint */
  bindOutbound: boolean;
}

/**
 * Proves that a freshly connected socket reaches the intended peer
 */
export interface ConnectionAuthenticator {
  authenticate(socket: Duplex): Promise<boolean>;
}

export interface GetSocketOptions {
  signal?: AbortSignal;
}

/**
 * Hole puncher events
 */
export interface HolePuncherEvents<S extends Duplex> {
  status: (status: HolePunchStatus) => void;
  attempt: (endpoint: Endpoint, attempt: number) => void;
  rejected: (via: PunchVia, endpoint?: Endpoint) => void;
  connected: (outcome: ConnectedOutcome<S>) => void;
}
