/**
 * Hole Puncher
 *
 * Races inbound and outbound connections to a target. The connection
 * listener accepts on the local endpoint while outbound attempts dial both
 * candidate endpoints over and over; the first socket that authenticates
 * takes the result slot. A deadline offers a timed-out outcome so the waiter
 * always gets an answer.
 */

import type { Duplex } from 'stream';
import { EventEmitter } from 'events';
import Debug from 'debug';
import type { Transport } from '../transport/types';
import { formatEndpoint } from '../utils/endpoint';
import { toError } from '../errors';
import type { Endpoint } from '../types';
import { HolePunchStatus } from './types';
import type {
  ConnectionAuthenticator,
  HolePunchConfig,
  HolePuncherEvents,
  PunchOutcome
} from './types';
import type { ConnectionListener } from './connection-listener';
import type { ResultSlot } from './result-slot';

const debug = Debug('holepunch-source:hole-puncher');

function isAddressInUse(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'EADDRINUSE';
}

export class HolePuncher<S extends Duplex> extends EventEmitter {
  private readonly transport: Transport<S>;
  private readonly connectionListener: ConnectionListener<S>;
  private readonly slot: ResultSlot<PunchOutcome<S>>;
  private readonly config: HolePunchConfig;
  private readonly abortController = new AbortController();
  private readonly inFlight = new Set<S>();
  private _status: HolePunchStatus = HolePunchStatus.IDLE;
  private deadlineTimer?: NodeJS.Timeout;
  private stopped = false;
  private attempts = 0;

  constructor(
    transport: Transport<S>,
    connectionListener: ConnectionListener<S>,
    slot: ResultSlot<PunchOutcome<S>>,
    config: HolePunchConfig
  ) {
    super();
    this.transport = transport;
    this.connectionListener = connectionListener;
    this.slot = slot;
    this.config = config;
  }

  public get status(): HolePunchStatus {
    return this._status;
  }

  /**
   * Outbound connection attempts made so far
   */
  public get attemptCount(): number {
    return this.attempts;
  }

  private setStatus(status: HolePunchStatus): void {
    this._status = status;
    this.emit('status', status);
  }

  // Type-safe event emitter methods
  public on<K extends keyof HolePuncherEvents<S>>(event: K, listener: HolePuncherEvents<S>[K]): this {
    return super.on(event, listener);
  }

  public off<K extends keyof HolePuncherEvents<S>>(event: K, listener: HolePuncherEvents<S>[K]): this {
    return super.off(event, listener);
  }

  public emit<K extends keyof HolePuncherEvents<S>>(
    event: K,
    ...args: Parameters<HolePuncherEvents<S>[K]>
  ): boolean {
    return super.emit(event, ...args);
  }

  /**
   * Start the race against two candidate endpoints. Returns immediately; the
   * outcome arrives in the result slot.
   */
  public establishHolePunchingConnection(
    first: Endpoint,
    second: Endpoint,
    authenticator: ConnectionAuthenticator
  ): void {
    if (this._status !== HolePunchStatus.IDLE || this.stopped) {
      throw new Error('Hole puncher already started');
    }

    this.setStatus(HolePunchStatus.RACING);
    debug(`Racing ${formatEndpoint(first)} and ${formatEndpoint(second)} for ${this.config.deadlineMs}ms`);

    this.deadlineTimer = setTimeout(() => {
      debug('Deadline reached without an authenticated connection');
      this.deliver({ kind: 'timed-out' });
    }, this.config.deadlineMs);

    void this.connectionListener.start(authenticator, {
      onAuthenticated: (socket) =>
        this.deliver({
          kind: 'connected',
          socket,
          via: 'passive',
          remote: this.transport.remoteEndpointOf(socket)
        }),
      onRejected: (remote) => {
        if (!this.stopped) this.emit('rejected', 'passive', remote);
      }
    });

    void this.punch(first, authenticator);
    void this.punch(second, authenticator);
  }

  /**
   * Dial one endpoint until an attempt authenticates or the race ends
   */
  private async punch(endpoint: Endpoint, authenticator: ConnectionAuthenticator): Promise<void> {
    let localEndpoint = this.config.bindOutbound ? this.connectionListener.localEndpoint : undefined;

    while (!this.stopped) {
      this.attempts++;
      this.emit('attempt', endpoint, this.attempts);

      let socket: S | undefined;
      try {
        socket = await this.transport.connect(endpoint, {
          localEndpoint,
          timeoutMs: this.config.connectTimeoutMs,
          signal: this.abortController.signal
        });
      } catch (err) {
        if (localEndpoint && isAddressInUse(err)) {
          // The listener holds the port; dial from an ephemeral one instead
          debug(`Cannot bind ${formatEndpoint(localEndpoint)} for ${formatEndpoint(endpoint)}, dialing unbound`);
          localEndpoint = undefined;
          continue;
        }
        debug(`Connect to ${formatEndpoint(endpoint)} failed: ${toError(err).message}`);
      }

      if (socket) {
        if (this.stopped) {
          socket.destroy();
          return;
        }

        this.inFlight.add(socket);
        const accepted = await authenticator.authenticate(socket);
        this.inFlight.delete(socket);

        if (accepted) {
          if (!this.deliver({ kind: 'connected', socket, via: 'active', remote: endpoint })) {
            socket.destroy();
          }
          return;
        }

        socket.destroy();
        if (!this.stopped) {
          debug(`Authentication with ${formatEndpoint(endpoint)} rejected`);
          this.emit('rejected', 'active', endpoint);
        }
      }

      await this.pause(this.config.retryIntervalMs);
    }
  }

  private pause(ms: number): Promise<void> {
    return new Promise<void>((resolve) => {
      const signal = this.abortController.signal;
      if (signal.aborted) {
        resolve();
        return;
      }
      const done = (): void => {
        clearTimeout(timer);
        signal.removeEventListener('abort', done);
        resolve();
      };
      const timer = setTimeout(done, ms);
      signal.addEventListener('abort', done, { once: true });
    });
  }

  /**
   * Offer an outcome to the result slot; only the first one is kept
   */
  private deliver(outcome: PunchOutcome<S>): boolean {
    if (this.stopped || !this.slot.offer(outcome)) {
      return false;
    }

    if (outcome.kind === 'connected') {
      debug(`Connected via ${outcome.via}${outcome.remote ? ` to ${formatEndpoint(outcome.remote)}` : ''}`);
      this.setStatus(HolePunchStatus.SUCCEEDED);
      this.emit('connected', outcome);
    } else {
      this.setStatus(HolePunchStatus.FAILED);
    }

    this.halt();
    return true;
  }

  /**
   * Stop every attempt and close all sockets that have not won. Safe to call
   * any number of times, before or after the race is decided.
   */
  public shutdownNow(): void {
    if (this._status === HolePunchStatus.RACING) {
      this.deliver({ kind: 'cancelled' });
    }
    this.halt();
  }

  private halt(): void {
    if (this.stopped) return;
    this.stopped = true;

    if (this.deadlineTimer) {
      clearTimeout(this.deadlineTimer);
      this.deadlineTimer = undefined;
    }
    this.abortController.abort();
    this.connectionListener.shutdown();

    for (const socket of this.inFlight) {
      socket.destroy();
    }
    this.inFlight.clear();
    debug(`Hole puncher stopped after ${this.attempts} outbound attempts`);
  }
}
