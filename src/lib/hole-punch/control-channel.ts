/**
 * Mediator Control Channel
 *
 * One connection to the mediator per session: a single connection request
 * goes out, a single message comes back. Nothing here is retried.
 */

import type { Duplex } from 'stream';
import Debug from 'debug';
import { MessageClass, MessageMethod } from '../protocol/constants';
import { buildMappedAddress } from '../protocol/attributes';
import type { MessageCodec } from '../protocol/codec';
import type { ProtocolMessage } from '../protocol/message';
import type { Transport } from '../transport/types';
import { HolePunchError, isHolePunchError, toError } from '../errors';
import { formatEndpoint } from '../utils/endpoint';
import type { Endpoint } from '../types';

const debug = Debug('holepunch-source:control-channel');

export class ControlChannel<S extends Duplex> {
  private readonly transport: Transport<S>;
  private readonly codec: MessageCodec;
  private readonly timeoutMs: number;
  private socket?: S;
  private local?: Endpoint;
  private closed = false;

  constructor(transport: Transport<S>, codec: MessageCodec, timeoutMs: number) {
    this.transport = transport;
    this.codec = codec;
    this.timeoutMs = timeoutMs;
  }

  /**
   * Local endpoint of the mediator connection, shared with the race listener
   */
  get localEndpoint(): Endpoint {
    if (!this.local) {
      throw new HolePunchError('TRANSPORT_FAILED', 'Control channel is not connected');
    }
    return this.local;
  }

  async connect(mediatorAddress: Endpoint, signal?: AbortSignal): Promise<void> {
    if (this.socket || this.closed) {
      throw new HolePunchError('TRANSPORT_FAILED', 'Control channel is single use');
    }

    let socket: S;
    try {
      socket = await this.transport.connect(mediatorAddress, {
        reuseAddress: true,
        timeoutMs: this.timeoutMs,
        signal
      });
    } catch (err) {
      const error = toError(err);
      throw new HolePunchError(
        'TRANSPORT_FAILED',
        `Could not connect to mediator ${formatEndpoint(mediatorAddress)}: ${error.message}`,
        { mediator: formatEndpoint(mediatorAddress) },
        { cause: error }
      );
    }

    if (this.closed) {
      socket.destroy();
      throw new HolePunchError('TRANSPORT_FAILED', 'Control channel closed while connecting');
    }

    const local = this.transport.localEndpointOf(socket);
    if (!local) {
      socket.destroy();
      throw new HolePunchError('TRANSPORT_FAILED', 'Mediator connection has no local endpoint');
    }

    this.socket = socket;
    this.local = local;
    debug(`Connected to mediator ${formatEndpoint(mediatorAddress)} from ${formatEndpoint(local)}`);
  }

  async sendConnectionRequest(): Promise<void> {
    await this.codec.writeMessage(this.requireSocket(), {
      method: MessageMethod.CONNECTION_REQUEST,
      messageClass: MessageClass.REQUEST,
      attributes: [buildMappedAddress(this.localEndpoint)]
    });
  }

  /**
   * Wait for the next message from the mediator
   */
  async receiveMessage(signal?: AbortSignal): Promise<ProtocolMessage> {
    try {
      return await this.codec.readMessage(this.requireSocket(), { timeoutMs: this.timeoutMs, signal });
    } catch (err) {
      if (isHolePunchError(err, 'INVALID_MESSAGE')) {
        throw new HolePunchError('PROTOCOL_MISMATCH', `Malformed mediator message: ${err.message}`, err.context, {
          cause: err
        });
      }
      throw err;
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.socket && !this.socket.destroyed) {
      this.socket.destroy();
      debug('Control channel closed');
    }
  }

  private requireSocket(): S {
    if (!this.socket || this.closed) {
      throw new HolePunchError('TRANSPORT_FAILED', 'Control channel is not connected');
    }
    return this.socket;
  }
}
