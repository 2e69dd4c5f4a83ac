/**
 * Hole Punching Source
 *
 * Source side of mediated TCP hole punching. A connection request goes to the
 * mediator, which answers with the target's forwarded endpoints and a token.
 * The source then races a listener on its own local endpoint against outbound
 * attempts to the first two target endpoints and returns the first socket
 * that proves it holds the token.
 */

import type { Duplex } from 'stream';
import type { Socket } from 'net';
import Debug from 'debug';
import { MessageCodec } from '../protocol/codec';
import { getMappedAddresses, getToken, type ProtocolMessage } from '../protocol/message';
import { TcpTransport } from '../transport/tcp-transport';
import type { Transport } from '../transport/types';
import { HolePunchError, isHolePunchError } from '../errors';
import { formatEndpoint } from '../utils/endpoint';
import type { Endpoint } from '../types';
import { HOLE_PUNCH_CONSTANTS } from './constants';
import { resolveSourceConfig } from './config';
import { ControlChannel } from './control-channel';
import { ConnectionListener } from './connection-listener';
import { HolePuncher } from './hole-puncher';
import { ResultSlot } from './result-slot';
import { SourceConnectionAuthenticator } from './authenticator';
import { isForwardedEndpointsMessage } from './validation';
import type { GetSocketOptions, HolePunchConfig, PunchOutcome } from './types';

const debug = Debug('holepunch-source:source');

export interface HolePunchingSourceOptions<S extends Duplex = Socket> extends Partial<HolePunchConfig> {
  codec?: MessageCodec;
  /** Called with each session's hole puncher before the race starts */
  onHolePuncher?: (holePuncher: HolePuncher<S>) => void;
}

interface Rendezvous {
  localEndpoint: Endpoint;
  endpoints: [Endpoint, Endpoint];
  token: Buffer;
}

/**
 * Hole punching source over any transport
 */
export class BaseHolePunchingSource<S extends Duplex> {
  protected readonly transport: Transport<S>;
  protected readonly codec: MessageCodec;
  protected readonly config: HolePunchConfig;
  private readonly onHolePuncher?: (holePuncher: HolePuncher<S>) => void;

  constructor(transport: Transport<S>, options: HolePunchingSourceOptions<S> = {}) {
    const { codec, onHolePuncher, ...overrides } = options;
    this.transport = transport;
    this.codec = codec ?? new MessageCodec({ maxMessageSize: HOLE_PUNCH_CONSTANTS.MAX_MESSAGE_SIZE });
    this.config = resolveSourceConfig(overrides);
    this.onHolePuncher = onHolePuncher;
  }

  /**
   * Returns a socket connected and authenticated to the given target.
   * @throws HolePunchError with code TRANSPORT_FAILED, PROTOCOL_MISMATCH,
   *   CONNECT_TIMEOUT or ABORTED
   */
  async getSocket(targetId: string, mediatorAddress: Endpoint, options: GetSocketOptions = {}): Promise<S> {
    const { signal } = options;
    if (signal?.aborted) {
      throw new HolePunchError('ABORTED', `Connecting to ${targetId} aborted`, { targetId });
    }

    debug(`Trying to connect to ${targetId} via mediator ${formatEndpoint(mediatorAddress)}`);

    const channel = new ControlChannel(this.transport, this.codec, this.config.controlTimeoutMs);
    let holePuncher: HolePuncher<S> | undefined;

    const onAbort = (): void => {
      debug(`Session for ${targetId} aborted`);
      channel.close();
      holePuncher?.shutdownNow();
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const rendezvous = await this.rendezvous(channel, mediatorAddress, signal);

      if (signal?.aborted) {
        throw new HolePunchError('ABORTED', `Connecting to ${targetId} aborted`, { targetId });
      }

      const slot = new ResultSlot<PunchOutcome<S>>();
      const connectionListener = new ConnectionListener(this.transport, rendezvous.localEndpoint);
      holePuncher = new HolePuncher(this.transport, connectionListener, slot, this.config);
      this.onHolePuncher?.(holePuncher);

      debug('Starting hole puncher');
      const authenticator = new SourceConnectionAuthenticator(
        this.codec,
        rendezvous.token,
        this.config.authTimeoutMs
      );
      const [first, second] = rendezvous.endpoints;
      holePuncher.establishHolePunchingConnection(first, second, authenticator);

      // An abort shuts the race down, so the slot always settles
      const outcome = await slot.take();
      connectionListener.shutdown();
      holePuncher.shutdownNow();

      if (signal?.aborted) {
        if (outcome.kind === 'connected') {
          outcome.socket.destroy();
        }
        throw new HolePunchError('ABORTED', `Connecting to ${targetId} aborted`, { targetId });
      }

      if (outcome.kind !== 'connected' || outcome.socket.destroyed) {
        throw new HolePunchError('CONNECT_TIMEOUT', `Could not get socket to: ${targetId}`, {
          targetId,
          deadlineMs: this.config.deadlineMs,
          attempts: holePuncher.attemptCount
        });
      }

      debug(`Returning socket to ${targetId} (${outcome.via})`);
      return outcome.socket;
    } catch (err) {
      if (signal?.aborted && !isHolePunchError(err, 'ABORTED')) {
        throw new HolePunchError('ABORTED', `Connecting to ${targetId} aborted`, { targetId }, { cause: err });
      }
      if (isHolePunchError(err)) {
        debug(`Session for ${targetId} failed (${err.code}): ${err.message}`);
      }
      throw err;
    } finally {
      signal?.removeEventListener('abort', onAbort);
      holePuncher?.shutdownNow();
      channel.close();
    }
  }

  private async rendezvous(
    channel: ControlChannel<S>,
    mediatorAddress: Endpoint,
    signal?: AbortSignal
  ): Promise<Rendezvous> {
    await channel.connect(mediatorAddress, signal);
    await channel.sendConnectionRequest();
    const message = await channel.receiveMessage(signal);

    if (!isForwardedEndpointsMessage(message)) {
      const received = this.codec.describe(message);
      debug(`Forwarded endpoints message expected but was ${received}`);
      throw new HolePunchError('PROTOCOL_MISMATCH', `Forwarded endpoints message expected but was ${received}`, {
        method: message.header.method,
        received
      });
    }
    debug('Received forwarded endpoints message');

    return {
      localEndpoint: channel.localEndpoint,
      endpoints: this.selectEndpoints(message),
      token: this.requireToken(message)
    };
  }

  /**
   * The race takes exactly two endpoints; extra ones are ignored
   */
  private selectEndpoints(message: ProtocolMessage): [Endpoint, Endpoint] {
    const endpoints = getMappedAddresses(message);
    const [first, second] = endpoints;
    if (!first || !second) {
      throw new HolePunchError(
        'PROTOCOL_MISMATCH',
        `Forwarded endpoints message needs ${HOLE_PUNCH_CONSTANTS.MAX_CANDIDATE_ENDPOINTS} endpoints but had ${endpoints.length}`,
        { endpoints: endpoints.map(formatEndpoint) }
      );
    }
    if (endpoints.length > HOLE_PUNCH_CONSTANTS.MAX_CANDIDATE_ENDPOINTS) {
      debug(`Ignoring ${endpoints.length - HOLE_PUNCH_CONSTANTS.MAX_CANDIDATE_ENDPOINTS} extra endpoints`);
    }
    return [first, second];
  }

  private requireToken(message: ProtocolMessage): Buffer {
    const token = getToken(message);
    if (!token || token.length === 0) {
      throw new HolePunchError('PROTOCOL_MISMATCH', 'Forwarded endpoints message carries an empty token');
    }
    return token;
  }
}

/**
 * Hole punching source over TCP
 */
export class HolePunchingSource extends BaseHolePunchingSource<Socket> {
  constructor(options: HolePunchingSourceOptions = {}) {
    super(new TcpTransport(), options);
  }
}
