/**
 * Transport Types
 *
 * The seam between the hole punching logic and the sockets it runs on.
 */

import type { Duplex } from 'stream';
import type { Endpoint } from '../types';

export interface ConnectOptions {
  /** Bind the outgoing socket to this local endpoint before connecting */
  localEndpoint?: Endpoint;
  /**
   * Bind explicitly before connecting so the local port can be shared with a
   * listener later on (SO_REUSEADDR)
   */
  reuseAddress?: boolean;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface TransportListener {
  readonly endpoint: Endpoint;
  /** Stop accepting connections */
  close(): void;
}

export interface Transport<S extends Duplex> {
  connect(remote: Endpoint, options?: ConnectOptions): Promise<S>;
  listen(local: Endpoint, onConnection: (socket: S) => void): Promise<TransportListener>;
  localEndpointOf(socket: S): Endpoint | undefined;
  remoteEndpointOf(socket: S): Endpoint | undefined;
}
