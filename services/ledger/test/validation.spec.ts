import { describe, expect, it } from 'vitest';

import { numericField, sanitize } from '../src/plugins/validation';

describe('sanitize', () => {
  it('trims strings and drops control characters', () => {
    expect(sanitize({ email: ' a@b.com\u0007 ', tags: [' x ', 2] })).toEqual({
      email: 'a@b.com',
      tags: ['x', 2],
    });
  });

  it('leaves passwords exactly as typed', () => {
    expect(sanitize({ password: '  pass\u0007word  ' })).toEqual({
      password: '  pass\u0007word  ',
    });
  });
});

describe('numericField', () => {
  it('reads numbers and numeric strings', () => {
    expect(numericField.parse(1.5)).toBe(1.5);
    expect(numericField.parse(' 3 ')).toBe(3);
  });

  it.each([[''], ['  '], [null], [true], [[]], ['abc'], ['Infinity']])('rejects %j', (value) => {
    expect(numericField.safeParse(value).success).toBe(false);
  });
});
