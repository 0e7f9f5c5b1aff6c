/**
 * parseJson Tests
 */

import { describe, it, expect } from 'vitest';
import { parseJson } from '@/shared/utils';

describe('parseJson', () => {
  it('should return the parsed value', () => {
    expect(parseJson('{"a":[1,2]}')).toEqual({ a: [1, 2] });
    expect(parseJson('null')).toBeNull();
  });

  it('should return undefined for invalid JSON', () => {
    expect(parseJson('{not json')).toBeUndefined();
    expect(parseJson('')).toBeUndefined();
  });
});
