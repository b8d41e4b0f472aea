import type { Message, MessageProperties, PropertyValue } from '@/lib/types';

/**
 * Read-only view the evaluator uses to resolve identifiers. Values are handed
 * over as text; the evaluator decides how to interpret them.
 */
export interface SelectorEnv {
  present(name: string): boolean;
  value(name: string): string | undefined;
}

type HeaderReader = (message: Message) => PropertyValue | undefined;

const HEADERS: ReadonlyMap<string, HeaderReader> = new Map<string, HeaderReader>([
  ['JMSMessageID', (message) => message.messageId],
  ['JMSCorrelationID', (message) => message.correlationId],
  ['JMSPriority', (message) => message.priority],
  [
    'JMSDeliveryMode',
    (message) => {
      if (!message.deliveryMode) {
        return undefined;
      }

      return message.deliveryMode === 'persistent' ? 'PERSISTENT' : 'NON_PERSISTENT';
    },
  ],
  ['JMSTimestamp', (message) => message.timestamp],
  ['JMSType', (message) => message.type],
  ['JMSRedelivered', (message) => message.redelivered],
]);

export const HEADER_IDENTIFIERS: readonly string[] = [...HEADERS.keys()];

export function formatPropertyValue(value: PropertyValue | undefined): string | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }

  if (typeof value === 'string') {
    return value;
  }

  if (typeof value === 'boolean') {
    return value ? 'true' : 'false';
  }

  return value.toString();
}

export class RecordSelectorEnv implements SelectorEnv {
  private readonly properties: MessageProperties;

  constructor(properties: MessageProperties) {
    this.properties = properties;
  }

  present(name: string): boolean {
    return this.value(name) !== undefined;
  }

  value(name: string): string | undefined {
    if (!Object.prototype.hasOwnProperty.call(this.properties, name)) {
      return undefined;
    }

    return formatPropertyValue(this.properties[name]);
  }
}

/**
 * Adapter over a broker message. Standard header identifiers take precedence
 * over application properties that happen to share their name.
 */
export class MessageSelectorEnv implements SelectorEnv {
  private readonly message: Message;
  private readonly properties: RecordSelectorEnv;

  constructor(message: Message) {
    this.message = message;
    this.properties = new RecordSelectorEnv(message.properties);
  }

  present(name: string): boolean {
    return this.value(name) !== undefined;
  }

  value(name: string): string | undefined {
    const header = HEADERS.get(name);
    if (header) {
      return formatPropertyValue(header(this.message));
    }

    return this.properties.value(name);
  }
}
