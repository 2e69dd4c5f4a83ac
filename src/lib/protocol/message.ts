/**
 * Message framing and attribute accessors.
 *
 * A message is a 20-byte header (type, body length, magic cookie,
 * transaction id) followed by TLV attributes.
 */

import { randomBytes } from 'crypto';
import {
  HEADER_LENGTH,
  MAGIC_COOKIE,
  MAGIC_COOKIE_BUF,
  TRANSACTION_ID_LENGTH,
  AttributeType,
  MessageClass,
  encodeMessageType,
  decodeMessageType
} from './constants';
import { RawAttribute, parseAttributes, decodeMappedAddress } from './attributes';
import { HolePunchError } from '../errors';
import type { Endpoint } from '../types';

export interface MessageHeader {
  method: number;
  messageClass: MessageClass;
  /** Body length, header excluded */
  length: number;
  transactionId: Buffer;
}

export interface ProtocolMessage {
  header: MessageHeader;
  attributes: RawAttribute[];
}

export function generateTransactionId(): Buffer {
  return randomBytes(TRANSACTION_ID_LENGTH);
}

/**
 * Header at the start of buf, or null when the bytes cannot be one
 */
export function parseHeader(buf: Buffer): MessageHeader | null {
  if (buf.length < HEADER_LENGTH) return null;

  const type = buf.readUInt16BE(0);
  const length = buf.readUInt16BE(2);
  const framed = (type & 0xc000) === 0 && buf.readUInt32BE(4) === MAGIC_COOKIE && length % 4 === 0;
  if (!framed) return null;

  return {
    ...decodeMessageType(type),
    length,
    transactionId: Buffer.from(buf.subarray(8, HEADER_LENGTH))
  };
}

export function buildHeader(
  method: number,
  messageClass: MessageClass,
  transactionId: Buffer,
  length: number
): Buffer {
  const header = Buffer.alloc(HEADER_LENGTH);
  header.writeUInt16BE(encodeMessageType(method, messageClass), 0);
  header.writeUInt16BE(length, 2);
  MAGIC_COOKIE_BUF.copy(header, 4);
  transactionId.copy(header, 8, 0, TRANSACTION_ID_LENGTH);
  return header;
}

/**
 * Parse a complete message from a raw buffer.
 * @throws HolePunchError (INVALID_MESSAGE)
 */
export function parseMessage(buf: Buffer): ProtocolMessage {
  const header = parseHeader(buf);
  if (!header) {
    throw new HolePunchError('INVALID_MESSAGE', 'Invalid message header');
  }

  const totalLength = HEADER_LENGTH + header.length;
  if (buf.length < totalLength) {
    throw new HolePunchError('INVALID_MESSAGE', 'Truncated message', {
      expected: totalLength,
      received: buf.length
    });
  }

  return {
    header,
    attributes: parseAttributes(buf.subarray(HEADER_LENGTH, totalLength))
  };
}

export function buildMessage(
  method: number,
  messageClass: MessageClass,
  transactionId: Buffer,
  attrBuffers: Buffer[]
): Buffer {
  const body = Buffer.concat(attrBuffers);
  return Buffer.concat([buildHeader(method, messageClass, transactionId, body.length), body]);
}

export function isMethod(message: ProtocolMessage, method: number): boolean {
  return message.header.method === method;
}

export function hasAttribute(message: ProtocolMessage, type: number): boolean {
  return message.attributes.some((a) => a.type === type);
}

export function getAttribute(message: ProtocolMessage, type: number): RawAttribute | undefined {
  return message.attributes.find((a) => a.type === type);
}

export function getAttributes(message: ProtocolMessage, type: number): RawAttribute[] {
  return message.attributes.filter((a) => a.type === type);
}

/**
 * All decodable MAPPED-ADDRESS attributes, in message order
 */
export function getMappedAddresses(message: ProtocolMessage): Endpoint[] {
  const endpoints: Endpoint[] = [];
  for (const attr of getAttributes(message, AttributeType.MAPPED_ADDRESS)) {
    const endpoint = decodeMappedAddress(attr.value);
    if (endpoint) {
      endpoints.push(endpoint);
    }
  }
  return endpoints;
}

export function getToken(message: ProtocolMessage): Buffer | undefined {
  return getAttribute(message, AttributeType.TOKEN)?.value;
}
