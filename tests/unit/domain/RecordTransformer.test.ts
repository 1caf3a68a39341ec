import { describe, it, expect } from 'vitest';
import { RecordTransformer, renderFragment } from '../../../src/domain/services/RecordTransformer.js';

describe('renderFragment', () => {
  it('should wrap the trimmed line in parentheses', () => {
    expect(renderFragment('  1,a \t')).toBe('(1,a)');
  });

  it('should return null for a blank line', () => {
    expect(renderFragment('')).toBeNull();
    expect(renderFragment(' \t ')).toBeNull();
  });

  it('should pass quotes and parentheses through unescaped', () => {
    expect(renderFragment(`'x',"y",(z)`)).toBe(`('x',"y",(z))`);
  });
});

describe('RecordTransformer', () => {
  it('should reject a concurrency below 1', () => {
    expect(() => new RecordTransformer(0)).toThrow('Transform concurrency must be at least 1');
  });

  it('should keep line order with a concurrency of 1', async () => {
    const result = await new RecordTransformer(1).transform(['1', '2', '3']);

    expect(result).toEqual({ values: '(1), (2), (3)', recordCount: 3, droppedCount: 0 });
  });

  it('should drop blank lines and count them', async () => {
    const result = await new RecordTransformer(1).transform(['1,a', '', '  ', ' 2,b ']);

    expect(result).toEqual({ values: '(1,a), (2,b)', recordCount: 2, droppedCount: 2 });
  });

  it('should return null when every line is blank', async () => {
    expect(await new RecordTransformer().transform(['', ' ', '\t'])).toBeNull();
  });

  it('should return null for an empty batch', async () => {
    expect(await new RecordTransformer().transform([])).toBeNull();
  });

  it('should emit each non-blank line exactly once across concurrent slices', async () => {
    const lines = Array.from({ length: 11 }, (_, i) => (i % 4 === 3 ? '' : `${String(i)},v`));
    const result = await new RecordTransformer(4).transform(lines);

    expect(result).not.toBeNull();
    const fragments = result!.values.split(', ').sort();
    const expected = lines.filter((l) => l !== '').map((l) => `(${l})`).sort();
    expect(fragments).toEqual(expected);
    expect(result!.recordCount).toBe(8);
    expect(result!.droppedCount).toBe(3);
  });
});
