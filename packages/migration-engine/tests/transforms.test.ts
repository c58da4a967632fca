import { describe, expect, it } from 'vitest';
import { MigrationError, TRANSFORM_NAMES, castValue, resolveTransform } from '../src/index.js';
import { thrownBy } from './helpers.js';

function apply(name: string, value: unknown): unknown {
  const transform = resolveTransform(name);
  if (!transform) {
    throw new Error(`no transform ${name}`);
  }
  return transform.apply(value);
}

describe('transforms', () => {
  it('registers the fixed set', () => {
    expect(TRANSFORM_NAMES).toEqual([
      'divide_by_100',
      'extract_creative_data',
      'extract_tweet_creative_data',
      'trim',
      'lowercase',
      'uppercase',
    ]);
    expect(resolveTransform('reverse')).toBeUndefined();
    expect(resolveTransform('constructor')).toBeUndefined();
  });

  it('passes null and missing values through as null', () => {
    for (const name of TRANSFORM_NAMES) {
      expect(apply(name, null)).toBeNull();
      expect(apply(name, undefined)).toBeNull();
    }
  });

  it('divides cents into currency units', () => {
    expect(apply('divide_by_100', 2000)).toBe(20);
    expect(apply('divide_by_100', '150')).toBe(1.5);
    expect(apply('divide_by_100', 'n/a')).toBe('n/a');
  });

  it('leaves non-decimal number literals for the cast to reject', () => {
    expect(apply('divide_by_100', '0x10')).toBe('0x10');
    expect(apply('divide_by_100', '0b101')).toBe('0b101');
    expect(apply('divide_by_100', '1e3')).toBe(10);
  });

  it('flattens Facebook creatives', () => {
    expect(
      apply('extract_creative_data', [
        { image_url: 'https://cdn.example/1.png', headline: 'One', body: 'ignored' },
        { image_url: 'https://cdn.example/2.png' },
        'not a creative',
      ])
    ).toEqual([
      { photo_url: 'https://cdn.example/1.png', title: 'One' },
      { photo_url: 'https://cdn.example/2.png', title: null },
    ]);
    expect(apply('extract_creative_data', { image_url: 'x' })).toBeNull();
  });

  it('flattens tweet creatives', () => {
    expect(
      apply('extract_tweet_creative_data', [{ media_url: 'https://cdn.example/t.png', text: 'Tweet' }])
    ).toEqual([{ photo_url: 'https://cdn.example/t.png', title: 'Tweet' }]);
  });

  it('adjusts strings and leaves other values alone', () => {
    expect(apply('trim', '  Promo ')).toBe('Promo');
    expect(apply('lowercase', 'US')).toBe('us');
    expect(apply('uppercase', 'reach')).toBe('REACH');
    expect(apply('trim', 42)).toBe(42);
  });
});

describe('castValue', () => {
  it('converts strings and booleans', () => {
    expect(castValue('7', 'integer', 'count')).toBe(7);
    expect(castValue(' 2.5 ', 'float', 'bid')).toBe(2.5);
    expect(castValue(false, 'integer', 'flag')).toBe(0);
    expect(castValue('NO', 'boolean', 'active')).toBe(false);
    expect(castValue({ a: 1 }, 'string', 'raw')).toEqual({ a: 1 });
  });

  it('throws MAPPING_CAST_ERROR naming the field and type', () => {
    const cases: [unknown, 'integer' | 'float', string][] = [
      ['1.5', 'integer', "Could not cast x to integer: invalid literal for integer: '1.5'"],
      [Infinity, 'float', 'Could not cast x to float: cannot convert Infinity to float'],
      [{}, 'integer', 'Could not cast x to integer: object is not a number'],
      ['', 'float', "Could not cast x to float: could not convert string to float: ''"],
      ['0o7', 'float', "Could not cast x to float: could not convert string to float: '0o7'"],
    ];

    for (const [value, type, message] of cases) {
      const error = thrownBy(() => castValue(value, type, 'x'));
      expect(error).toBeInstanceOf(MigrationError);
      expect(error).toMatchObject({ code: 'MAPPING_CAST_ERROR', message });
    }
  });
});
