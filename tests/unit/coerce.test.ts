/**
 * Unit tests for numeric field coercion
 */

import { describe, it, expect } from '@jest/globals';
import { optionalInt, requiredInt } from '../../src/transform/coerce';
import { RowFormatError } from '../../src/errors';

describe('optionalInt', () => {
  it.each([
    { raw: '42', expected: 42 },
    { raw: '-1', expected: -1 },
    { raw: '+7', expected: 7 },
    { raw: ' 12 ', expected: 12 },
    { raw: '007', expected: 7 },
  ])('should read $raw as $expected', ({ raw, expected }) => {
    expect(optionalInt('gene', { start_position: raw }, 'start_position')).toBe(expected);
  });

  it('should read an empty or missing field as null', () => {
    expect(optionalInt('gene', { start_position: '' }, 'start_position')).toBeNull();
    expect(optionalInt('gene', {}, 'start_position')).toBeNull();
  });

  it.each(['1e3', '0x1A', '1.0', '12abc', '-'])('should reject %s', raw => {
    expect(() => optionalInt('gene', { start_position: raw }, 'start_position')).toThrow(
      `Invalid value "${raw}" for field start_position in gene data`
    );
  });
});

describe('requiredInt', () => {
  it('should reject an empty field', () => {
    expect(() => requiredInt('protein', { cds_length: '' }, 'cds_length')).toThrow(RowFormatError);
  });
});
