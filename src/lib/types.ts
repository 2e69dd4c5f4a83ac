/**
 * Shared types
 */

/**
 * A transport address: where a peer can be reached, as seen publicly (by the
 * mediator or a NAT) or privately (on the peer's own interface).
 */
export interface Endpoint {
  address: string;
  port: number;
}
