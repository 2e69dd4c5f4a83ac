/**
 * Attribute TLV parse/build.
 *
 * Each attribute:
 *   Type (16 bits) | Length (16 bits) | Value (variable, padded to 4 bytes)
 */

import { isIP } from 'net';
import * as ip from 'ip';
import { AttributeType, FAMILY_IPV4, FAMILY_IPV6 } from './constants';
import { HolePunchError } from '../errors';
import type { Endpoint } from '../types';

export interface RawAttribute {
  type: number;
  value: Buffer;
}

// ── Attribute parsing ────────────────────────────────────────────

/**
 * Parse all TLV attributes of a message body.
 * @throws HolePunchError (INVALID_MESSAGE) if an attribute overruns the body
 */
export function parseAttributes(body: Buffer): RawAttribute[] {
  const attrs: RawAttribute[] = [];
  let offset = 0;

  while (offset + 4 <= body.length) {
    const type = body.readUInt16BE(offset);
    const attrLen = body.readUInt16BE(offset + 2);
    if (offset + 4 + attrLen > body.length) {
      throw new HolePunchError('INVALID_MESSAGE', 'Attribute exceeds message length', {
        type,
        length: attrLen
      });
    }
    attrs.push({ type, value: body.subarray(offset + 4, offset + 4 + attrLen) });
    offset += 4 + attrLen + ((4 - (attrLen % 4)) % 4);
  }

  return attrs;
}

// ── Attribute builders ───────────────────────────────────────────

export function buildAttribute(type: number, value: Buffer): Buffer {
  const padLen = (4 - (value.length % 4)) % 4;
  const buf = Buffer.alloc(4 + value.length + padLen);
  buf.writeUInt16BE(type, 0);
  buf.writeUInt16BE(value.length, 2);
  value.copy(buf, 4);
  return buf;
}

/**
 * Build a MAPPED-ADDRESS attribute (IPv4 or IPv6, not XOR'd).
 */
export function buildMappedAddress(endpoint: Endpoint): Buffer {
  const version = isIP(endpoint.address);
  if (version === 0) {
    throw new HolePunchError('INVALID_MESSAGE', `Not an IP address: ${endpoint.address}`);
  }

  const addressBytes = ip.toBuffer(endpoint.address);
  const value = Buffer.alloc(4 + addressBytes.length);
  value.writeUInt8(0, 0); // reserved
  value.writeUInt8(addressBytes.length === 4 ? FAMILY_IPV4 : FAMILY_IPV6, 1);
  value.writeUInt16BE(endpoint.port, 2);
  addressBytes.copy(value, 4);
  return buildAttribute(AttributeType.MAPPED_ADDRESS, value);
}

export function buildToken(token: Buffer): Buffer {
  return buildAttribute(AttributeType.TOKEN, token);
}

export function buildSoftware(name: string): Buffer {
  return buildAttribute(AttributeType.SOFTWARE, Buffer.from(name, 'utf8'));
}

// ── Attribute value parsers ──────────────────────────────────────

/**
 * Decode a MAPPED-ADDRESS value. Returns null for unknown families or
 * truncated values.
 */
export function decodeMappedAddress(value: Buffer): Endpoint | null {
  if (value.length < 8) return null;

  const family = value.readUInt8(1);
  const port = value.readUInt16BE(2);

  if (family === FAMILY_IPV4) {
    return { address: ip.toString(value, 4, 4), port };
  }
  if (family === FAMILY_IPV6 && value.length >= 20) {
    return { address: ip.toString(value, 4, 16), port };
  }

  return null;
}
