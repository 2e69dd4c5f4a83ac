/**
 * Message codec
 *
 * An explicitly constructed codec instance: framing limits, the SOFTWARE
 * attribute and method names for diagnostics are per instance.
 */

import type { Readable, Writable } from 'stream';
import Debug from 'debug';
import { HEADER_LENGTH, METHOD_NAMES, MessageClass } from './constants';
import { buildSoftware } from './attributes';
import { ProtocolMessage, parseMessage, buildMessage, parseHeader, generateTransactionId } from './message';
import { readExactly, writeAll, type ReadOptions } from './stream-io';
import { HolePunchError } from '../errors';

const debug = Debug('holepunch-source:protocol');

export interface MessageCodecOptions {
  /** Largest accepted message, header included */
  maxMessageSize?: number;
  /** Appended as a SOFTWARE attribute to every encoded message when set */
  software?: string;
  /** Extra method names used when describing messages */
  methodNames?: Record<number, string>;
}

export interface OutgoingMessage {
  method: number;
  messageClass: MessageClass;
  attributes: Buffer[];
  transactionId?: Buffer;
}

export class MessageCodec {
  private readonly maxMessageSize: number;
  private readonly software?: string;
  private readonly methodNames: Readonly<Record<number, string>>;

  constructor(options: MessageCodecOptions = {}) {
    this.maxMessageSize = options.maxMessageSize ?? 1500;
    this.software = options.software;
    this.methodNames = { ...METHOD_NAMES, ...options.methodNames };
  }

  encode(message: OutgoingMessage): Buffer {
    const attributes = this.software
      ? [...message.attributes, buildSoftware(this.software)]
      : message.attributes;
    const encoded = buildMessage(
      message.method,
      message.messageClass,
      message.transactionId ?? generateTransactionId(),
      attributes
    );
    if (encoded.length > this.maxMessageSize) {
      throw new HolePunchError('INVALID_MESSAGE', 'Message exceeds size limit', {
        size: encoded.length,
        limit: this.maxMessageSize
      });
    }
    return encoded;
  }

  decode(buf: Buffer): ProtocolMessage {
    if (buf.length > this.maxMessageSize) {
      throw new HolePunchError('INVALID_MESSAGE', 'Message exceeds size limit', {
        size: buf.length,
        limit: this.maxMessageSize
      });
    }
    return parseMessage(buf);
  }

  /**
   * Read exactly one message off the stream
   */
  async readMessage(stream: Readable, options: ReadOptions = {}): Promise<ProtocolMessage> {
    const headerBuf = await readExactly(stream, HEADER_LENGTH, options);
    const header = parseHeader(headerBuf);
    if (!header) {
      throw new HolePunchError('INVALID_MESSAGE', 'Invalid message header');
    }
    if (HEADER_LENGTH + header.length > this.maxMessageSize) {
      throw new HolePunchError('INVALID_MESSAGE', 'Message exceeds size limit', {
        size: HEADER_LENGTH + header.length,
        limit: this.maxMessageSize
      });
    }

    const body = await readExactly(stream, header.length, options);
    const message = parseMessage(Buffer.concat([headerBuf, body]));
    debug(`Read ${this.describe(message)}`);
    return message;
  }

  async writeMessage(stream: Writable, message: OutgoingMessage): Promise<void> {
    await writeAll(stream, this.encode(message));
    debug(`Wrote ${this.describeMethod(message.method)} (${MessageClass[message.messageClass]})`);
  }

  describeMethod(method: number): string {
    return this.methodNames[method] ?? `0x${method.toString(16).padStart(3, '0')}`;
  }

  describe(message: ProtocolMessage): string {
    return `${this.describeMethod(message.header.method)} (${MessageClass[message.header.messageClass]})`;
  }
}
