/**
 * Turn a stream of text chunks into a stream of lines.
 *
 * Lines end at `\n`; a preceding `\r` is dropped. A final line without a
 * terminator is still yielded, an empty remainder after the last newline is not.
 * Buffer chunks are decoded as UTF-8, carrying partial characters across chunks.
 */
export async function* splitLines(chunks: AsyncIterable<string | Buffer>): AsyncIterable<string> {
  const decoder = new TextDecoder('utf-8');
  let pending = '';

  for await (const chunk of chunks) {
    pending += typeof chunk === 'string' ? chunk : decoder.decode(chunk, { stream: true });

    let start = 0;
    let newline = pending.indexOf('\n', start);
    while (newline !== -1) {
      yield stripCarriageReturn(pending.slice(start, newline));
      start = newline + 1;
      newline = pending.indexOf('\n', start);
    }
    pending = pending.slice(start);
  }

  pending += decoder.decode();
  if (pending.length > 0) {
    yield stripCarriageReturn(pending);
  }
}

function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}
