import { describe, expect, it } from 'vitest';

import { compileSelector } from '@/core/selector';

import { generateMessage } from '../scripts/bench/generate';

describe('bench generator distributions', () => {
  it('covers expected categorical values in the first 3k messages', () => {
    const colors = new Set<unknown>();
    const regions = new Set<unknown>();
    let withoutGrade = 0;

    for (let index = 0; index < 3_000; index += 1) {
      const message = generateMessage(index);
      colors.add(message.properties.color);
      regions.add(message.properties.region);
      if (message.properties.grade === undefined) {
        withoutGrade += 1;
      }
    }

    expect(colors).toEqual(new Set(['red', 'green', 'blue', 'white']));
    expect(regions).toEqual(new Set(['emea', 'apac', 'amer']));
    expect(withoutGrade).toBe(1_000);
  });

  it('produces messages the selectors can see', () => {
    const red = compileSelector("color = 'red'");
    const noGrade = compileSelector('grade IS NULL');
    let redCount = 0;
    let noGradeCount = 0;

    for (let index = 0; index < 1_200; index += 1) {
      const message = generateMessage(index);
      if (red.filter(message)) {
        redCount += 1;
      }
      if (noGrade.filter(message)) {
        noGradeCount += 1;
      }
    }

    expect(redCount).toBe(300);
    expect(noGradeCount).toBe(400);
  });
});
