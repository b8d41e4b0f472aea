export type PropertyValue = string | number | bigint | boolean | null;

export type MessageProperties = Record<string, PropertyValue | undefined>;

export type DeliveryMode = 'persistent' | 'non_persistent';

/**
 * The parts of a broker message a selector can see: the standard headers and
 * the application properties.
 */
export type Message = {
  messageId?: string | null;
  correlationId?: string | null;
  priority?: number | null;
  deliveryMode?: DeliveryMode | null;
  timestamp?: number | null;
  type?: string | null;
  redelivered?: boolean | null;
  properties: MessageProperties;
};
