import { AttributeType, MessageMethod } from '../protocol/constants';
import { hasAttribute, isMethod, type ProtocolMessage } from '../protocol/message';

/**
 * A forwarded endpoints message names the target's endpoints and carries the
 * token both peers authenticate with.
 */
export function isForwardedEndpointsMessage(message: ProtocolMessage): boolean {
  return (
    isMethod(message, MessageMethod.FORWARDED_ENDPOINTS) &&
    hasAttribute(message, AttributeType.MAPPED_ADDRESS) &&
    hasAttribute(message, AttributeType.TOKEN)
  );
}
