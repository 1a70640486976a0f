import { describe, it, expect } from 'vitest';
import { chunkIdName, generateChunkId, uuidV5 } from '../../src/server/utils/chunkIds.js';

describe('chunk ids', () => {
  it('computes standard name-based UUIDs', () => {
    expect(uuidV5('example.com')).toBe('cfbff0d1-9375-5685-968c-48ce8b15ae17');
  });

  it('names chunks by country, law type, article and part', () => {
    expect(chunkIdName('egypt', 'criminal', 318, 2)).toBe('egypt_criminal_art318_p2');
  });

  it('is deterministic and distinct per part', () => {
    const first = generateChunkId('egypt', 'criminal', 1, 1);
    expect(generateChunkId('egypt', 'criminal', 1, 1)).toBe(first);
    expect(generateChunkId('egypt', 'criminal', 1, 2)).not.toBe(first);
    expect(first).toBe(uuidV5('egypt_criminal_art1_p1'));
    expect(first).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-5[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });

  it('rejects a malformed namespace', () => {
    expect(() => uuidV5('name', 'not-a-uuid')).toThrow('Invalid UUID: not-a-uuid');
  });
});
