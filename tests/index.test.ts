import { afterEach, describe, expect, it } from 'vitest';

import { resetSelectorCache } from '@/daemon/selectorCache';
import {
  compileSelector,
  getOrCompileSelector,
  MessageSelectorEnv,
  ParseError,
  renderSelector,
  toErrorPayload,
} from '@/index';

describe('package entry point', () => {
  afterEach(() => {
    resetSelectorCache();
  });

  it('exposes compile, cache and filter together', () => {
    const cached = getOrCompileSelector("region = 'emea' OR JMSPriority >= 8");
    const message = { priority: 9, properties: { region: 'apac' } };

    expect(getOrCompileSelector("region = 'emea' OR JMSPriority >= 8")).toBe(cached);
    expect(cached.filter(message)).toBe(true);
    expect(cached.evaluate(new MessageSelectorEnv(message))).toBe('true');
    expect(renderSelector(cached.ast)).toBe("(region = 'emea') OR (JMSPriority >= 8)");
  });

  it('turns a rejected selector into an error payload', () => {
    let payload: unknown = null;
    try {
      compileSelector('weight >');
    } catch (error) {
      expect(error).toBeInstanceOf(ParseError);
      payload = toErrorPayload(error);
    }

    expect(payload).toEqual({
      error: {
        code: 'invalid_selector',
        message: 'Expected expression but found end of input at position 8.',
        details: { position: 8 },
      },
    });
  });
});
