/**
 * Source side of the connection authentication handshake.
 *
 * The source sends an AUTHENTICATE request carrying the session token; the
 * target answers with an AUTHENTICATE success response echoing the
 * transaction id and the token. Anything else rejects the socket.
 */

import type { Duplex } from 'stream';
import { timingSafeEqual } from 'crypto';
import Debug from 'debug';
import { MessageClass, MessageMethod } from '../protocol/constants';
import { buildToken } from '../protocol/attributes';
import { generateTransactionId, getToken, isMethod } from '../protocol/message';
import type { MessageCodec } from '../protocol/codec';
import { toError } from '../errors';
import type { ConnectionAuthenticator } from './types';

const debug = Debug('holepunch-source:authenticator');

export function tokensEqual(a: Buffer, b: Buffer): boolean {
  return a.length === b.length && timingSafeEqual(a, b);
}

export class SourceConnectionAuthenticator implements ConnectionAuthenticator {
  private readonly codec: MessageCodec;
  private readonly token: Buffer;
  private readonly timeoutMs: number;

  constructor(codec: MessageCodec, token: Buffer, timeoutMs: number) {
    this.codec = codec;
    this.token = Buffer.from(token);
    this.timeoutMs = timeoutMs;
  }

  async authenticate(socket: Duplex): Promise<boolean> {
    const transactionId = generateTransactionId();

    try {
      await this.codec.writeMessage(socket, {
        method: MessageMethod.AUTHENTICATE,
        messageClass: MessageClass.REQUEST,
        transactionId,
        attributes: [buildToken(this.token)]
      });

      const response = await this.codec.readMessage(socket, { timeoutMs: this.timeoutMs });
      if (!isMethod(response, MessageMethod.AUTHENTICATE)) {
        debug(`Expected AUTHENTICATE response but was ${this.codec.describe(response)}`);
        return false;
      }
      if (response.header.messageClass !== MessageClass.SUCCESS_RESPONSE) {
        debug(`Authentication refused by peer (${MessageClass[response.header.messageClass]})`);
        return false;
      }
      if (!response.header.transactionId.equals(transactionId)) {
        debug('Authentication response for another transaction');
        return false;
      }

      const echoed = getToken(response);
      if (!echoed || !tokensEqual(echoed, this.token)) {
        debug('Peer answered with a different token');
        return false;
      }

      return true;
    } catch (err) {
      debug(`Authentication failed: ${toError(err).message}`);
      return false;
    }
  }
}
