/**
 * ID Generation Tests
 */

import { describe, it, expect } from 'vitest';
import { generateId } from '@/shared/utils';

describe('generateId', () => {
  it('should produce UUIDv7 strings', () => {
    expect(generateId()).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-7[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });

  it('should sort ids by creation order', () => {
    const ids = Array.from({ length: 20 }, () => generateId());

    expect([...ids].sort()).toEqual(ids);
    expect(new Set(ids).size).toBe(20);
  });
});
