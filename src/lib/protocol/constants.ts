/**
 * Hole punching wire protocol constants.
 *
 * Messages use STUN framing (RFC 5389): a 20-byte header followed by
 * 4-byte aligned TLV attributes. The hole punching methods and the TOKEN
 * attribute are protocol extensions.
 */

// STUN header
export const MAGIC_COOKIE = 0x2112a442;
export const MAGIC_COOKIE_BUF = Buffer.from([0x21, 0x12, 0xa4, 0x42]);
export const HEADER_LENGTH = 20;
export const TRANSACTION_ID_LENGTH = 12;

/**
 * Message classes (2-bit, interleaved into the message type)
 */
export enum MessageClass {
  REQUEST = 0x00,
  INDICATION = 0x01,
  SUCCESS_RESPONSE = 0x02,
  ERROR_RESPONSE = 0x03
}

/**
 * Message methods
 */
export enum MessageMethod {
  BINDING = 0x001,
  CONNECTION_REQUEST = 0x010,
  FORWARDED_ENDPOINTS = 0x011,
  AUTHENTICATE = 0x012
}

/**
 * Attribute types
 */
export enum AttributeType {
  MAPPED_ADDRESS = 0x0001,
  TOKEN = 0x0030,
  SOFTWARE = 0x8022
}

// Address families
export const FAMILY_IPV4 = 0x01;
export const FAMILY_IPV6 = 0x02;

export const METHOD_NAMES: Readonly<Record<number, string>> = {
  [MessageMethod.BINDING]: 'BINDING',
  [MessageMethod.CONNECTION_REQUEST]: 'CONNECTION_REQUEST',
  [MessageMethod.FORWARDED_ENDPOINTS]: 'FORWARDED_ENDPOINTS',
  [MessageMethod.AUTHENTICATE]: 'AUTHENTICATE'
};

/**
 * Encode method + class into the 16-bit message type.
 * Bits are interleaved per RFC 5389 Section 6:
 *   M11-M7 | C1 | M6-M4 | C0 | M3-M0
 */
export function encodeMessageType(method: number, messageClass: MessageClass): number {
  return (
    (method & 0x000f) |
    ((messageClass & 0x1) << 4) |
    ((method & 0x0070) << 1) |
    ((messageClass & 0x2) << 7) |
    ((method & 0x0f80) << 2)
  );
}

/**
 * Decode the 16-bit message type into method + class.
 */
export function decodeMessageType(type: number): { method: number; messageClass: MessageClass } {
  const c0 = (type >> 4) & 0x1;
  const c1 = (type >> 8) & 0x1;
  const method = (type & 0x000f) | ((type >> 1) & 0x0070) | ((type >> 2) & 0x0f80);
  return { method, messageClass: toMessageClass((c1 << 1) | c0) };
}

function toMessageClass(bits: number): MessageClass {
  switch (bits) {
    case 0x00:
      return MessageClass.REQUEST;
    case 0x01:
      return MessageClass.INDICATION;
    case 0x02:
      return MessageClass.SUCCESS_RESPONSE;
    default:
      return MessageClass.ERROR_RESPONSE;
  }
}
