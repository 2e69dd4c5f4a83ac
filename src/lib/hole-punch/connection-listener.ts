/**
 * Connection Listener
 *
 * Passive side of the race: accepts inbound connections on the local
 * endpoint the mediator connection uses and authenticates each of them.
 */

import type { Duplex } from 'stream';
import Debug from 'debug';
import type { Transport, TransportListener } from '../transport/types';
import { formatEndpoint } from '../utils/endpoint';
import { toError } from '../errors';
import type { Endpoint } from '../types';
import type { ConnectionAuthenticator } from './types';

const debug = Debug('holepunch-source:connection-listener');

export interface ListenerHandlers<S extends Duplex> {
  /** Returns false when the race is already decided */
  onAuthenticated(socket: S): boolean;
  onRejected?(remote?: Endpoint): void;
}

export class ConnectionListener<S extends Duplex> {
  private readonly transport: Transport<S>;
  readonly localEndpoint: Endpoint;
  private listener?: TransportListener;
  private pending = new Set<S>();
  private stopped = false;

  constructor(transport: Transport<S>, localEndpoint: Endpoint) {
    this.transport = transport;
    this.localEndpoint = localEndpoint;
  }

  get isListening(): boolean {
    return this.listener !== undefined && !this.stopped;
  }

  /**
   * Start accepting. Authenticated sockets the handlers refuse are closed.
   * Never rejects: a listener that cannot bind leaves the race to the
   * outbound attempts.
   */
  async start(authenticator: ConnectionAuthenticator, handlers: ListenerHandlers<S>): Promise<void> {
    if (this.stopped || this.listener) return;

    try {
      const listener = await this.transport.listen(this.localEndpoint, (socket) => {
        void this.handleConnection(socket, authenticator, handlers);
      });
      if (this.stopped) {
        listener.close();
        return;
      }
      this.listener = listener;
      debug(`Listening on ${formatEndpoint(listener.endpoint)}`);
    } catch (err) {
      debug(`Could not listen on ${formatEndpoint(this.localEndpoint)}: ${toError(err).message}`);
    }
  }

  private async handleConnection(
    socket: S,
    authenticator: ConnectionAuthenticator,
    handlers: ListenerHandlers<S>
  ): Promise<void> {
    if (this.stopped) {
      socket.destroy();
      return;
    }

    const remote = this.transport.remoteEndpointOf(socket);
    debug(`Inbound connection from ${remote ? formatEndpoint(remote) : 'unknown'}`);

    this.pending.add(socket);
    const accepted = await authenticator.authenticate(socket);
    this.pending.delete(socket);

    if (!accepted) {
      debug('Inbound connection failed authentication');
      socket.destroy();
      handlers.onRejected?.(remote);
      return;
    }
    if (this.stopped || !handlers.onAuthenticated(socket)) {
      socket.destroy();
    }
  }

  /**
   * Stop accepting and close every connection still authenticating
   */
  shutdown(): void {
    if (this.stopped) return;
    this.stopped = true;

    this.listener?.close();
    this.listener = undefined;

    for (const socket of this.pending) {
      socket.destroy();
    }
    this.pending.clear();
    debug('Connection listener shut down');
  }
}
