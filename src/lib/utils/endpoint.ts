/**
 * Endpoint Utilities
 *
 * Parsing, formatting and family helpers for address/port pairs.
 */

import { isIP } from 'net';
import type { Endpoint } from '../types';

/**
 * IP address version enum
 */
enum IPVersion {
  IPv4 = 'IPv4',
  IPv6 = 'IPv6',
  Unknown = 'Unknown'
}

/**
 * Determine the version of an IP address
 */
function getIPVersion(address: string): IPVersion {
  switch (isIP(address)) {
    case 4:
      return IPVersion.IPv4;
    case 6:
      return IPVersion.IPv6;
    default:
      return IPVersion.Unknown;
  }
}

export function isIPv6(address: string): boolean {
  return getIPVersion(address) === IPVersion.IPv6;
}

/**
 * Wildcard bind address matching the family of the given address.
 * Hostnames are treated as IPv4.
 */
export function getBindAddressFor(address: string): string {
  return isIPv6(address) ? '::' : '0.0.0.0';
}

function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port > 0 && port <= 65535;
}

/**
 * Parse "host:port" or "[v6]:port" into an Endpoint
 * @throws Error if the input has no usable port
 */
export function parseEndpoint(input: string): Endpoint {
  const trimmed = input.trim();
  let address: string;
  let portText: string;

  if (trimmed.startsWith('[')) {
    const close = trimmed.indexOf(']');
    if (close === -1 || trimmed[close + 1] !== ':') {
      throw new Error(`Invalid endpoint: ${input}`);
    }
    address = trimmed.slice(1, close);
    portText = trimmed.slice(close + 2);
  } else {
    const colon = trimmed.lastIndexOf(':');
    if (colon <= 0 || trimmed.indexOf(':') !== colon) {
      throw new Error(`Invalid endpoint: ${input}`);
    }
    address = trimmed.slice(0, colon);
    portText = trimmed.slice(colon + 1);
  }

  const port = /^\d+$/.test(portText) ? parseInt(portText, 10) : NaN;
  if (!address || !isValidPort(port)) {
    throw new Error(`Invalid endpoint: ${input}`);
  }

  return { address, port };
}

export function formatEndpoint(endpoint: Endpoint): string {
  return isIPv6(endpoint.address)
    ? `[${endpoint.address}]:${endpoint.port}`
    : `${endpoint.address}:${endpoint.port}`;
}
