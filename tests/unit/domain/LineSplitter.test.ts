import { describe, it, expect } from 'vitest';
import { splitLines } from '../../../src/domain/services/LineSplitter.js';

async function* chunksOf(...chunks: (string | Buffer)[]) {
  for (const chunk of chunks) {
    await Promise.resolve();
    yield chunk;
  }
}

async function collect(lines: AsyncIterable<string>): Promise<string[]> {
  const out: string[] = [];
  for await (const line of lines) out.push(line);
  return out;
}

describe('splitLines', () => {
  it('should join lines split across chunk boundaries', async () => {
    expect(await collect(splitLines(chunksOf('1,a\n2,', 'b\n3,c')))).toEqual(['1,a', '2,b', '3,c']);
  });

  it('should strip carriage returns of CRLF line endings', async () => {
    expect(await collect(splitLines(chunksOf('1,a\r\n2,b\r\n')))).toEqual(['1,a', '2,b']);
  });

  it('should handle a CRLF split between chunks', async () => {
    expect(await collect(splitLines(chunksOf('a\r', '\nb')))).toEqual(['a', 'b']);
  });

  it('should not yield an empty line after a trailing newline', async () => {
    expect(await collect(splitLines(chunksOf('a\n')))).toEqual(['a']);
  });

  it('should keep blank lines in the middle of the stream', async () => {
    expect(await collect(splitLines(chunksOf('a\n\n b \n')))).toEqual(['a', '', ' b ']);
  });

  it('should yield nothing for empty input', async () => {
    expect(await collect(splitLines(chunksOf()))).toEqual([]);
    expect(await collect(splitLines(chunksOf('')))).toEqual([]);
  });

  it('should decode multi-byte characters split across Buffer chunks', async () => {
    const bytes = Buffer.from('é,ü\nx', 'utf-8');
    expect(await collect(splitLines(chunksOf(bytes.subarray(0, 1), bytes.subarray(1))))).toEqual(['é,ü', 'x']);
  });
});
