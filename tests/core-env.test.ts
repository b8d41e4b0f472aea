import { describe, expect, it } from 'vitest';

import { formatPropertyValue, HEADER_IDENTIFIERS, MessageSelectorEnv, RecordSelectorEnv } from '@/core/env';
import type { Message } from '@/lib/types';

describe('selector environments', () => {
  it('formats property values as text', () => {
    expect(formatPropertyValue('red')).toBe('red');
    expect(formatPropertyValue(1.5)).toBe('1.5');
    expect(formatPropertyValue(12n)).toBe('12');
    expect(formatPropertyValue(false)).toBe('false');
    expect(formatPropertyValue(null)).toBeUndefined();
    expect(formatPropertyValue(undefined)).toBeUndefined();
  });

  it('only exposes own record properties', () => {
    const env = new RecordSelectorEnv({ color: 'red', empty: null });

    expect(env.present('color')).toBe(true);
    expect(env.value('color')).toBe('red');
    expect(env.present('empty')).toBe(false);
    expect(env.present('toString')).toBe(false);
    expect(env.value('toString')).toBeUndefined();
  });

  it('maps standard headers onto message fields', () => {
    const message: Message = {
      messageId: 'ID:1',
      correlationId: null,
      priority: 4,
      deliveryMode: 'persistent',
      timestamp: 1_700_000_000_000,
      type: 'order',
      redelivered: false,
      properties: { JMSPriority: 9, color: 'red' },
    };
    const env = new MessageSelectorEnv(message);

    expect(env.value('JMSMessageID')).toBe('ID:1');
    expect(env.present('JMSCorrelationID')).toBe(false);
    expect(env.value('JMSPriority')).toBe('4');
    expect(env.value('JMSDeliveryMode')).toBe('PERSISTENT');
    expect(env.value('JMSTimestamp')).toBe('1700000000000');
    expect(env.value('JMSType')).toBe('order');
    expect(env.value('JMSRedelivered')).toBe('false');
    expect(env.value('color')).toBe('red');
    expect(env.present('size')).toBe(false);
  });

  it('reports headers that are not set as absent', () => {
    const env = new MessageSelectorEnv({ properties: {} });

    for (const name of HEADER_IDENTIFIERS) {
      expect(env.present(name)).toBe(false);
    }

    expect(new MessageSelectorEnv({ deliveryMode: 'non_persistent', properties: {} }).value('JMSDeliveryMode')).toBe(
      'NON_PERSISTENT',
    );
  });
});
