export const DEFAULT_TRANSFORM_CONCURRENCY = 4;

/** Rendered form of one batch. */
export interface TransformedBatch {
  /** Value fragments joined with `, `, e.g. `(1,a), (2,b)`. */
  readonly values: string;
  readonly recordCount: number;
  /** Blank lines that produced no fragment. */
  readonly droppedCount: number;
}

interface RenderedSlice {
  readonly values: string | null;
  readonly recordCount: number;
}

/**
 * Renders each line of a batch as a parenthesised value fragment.
 *
 * The batch is cut into `concurrency` slices rendered concurrently. The order in
 * which slices are joined is unspecified: callers must not rely on fragment
 * order inside a batch. Lines are trimmed and otherwise passed
 * through verbatim: no quoting, escaping or type coercion.
 */
export class RecordTransformer {
  constructor(private readonly concurrency = DEFAULT_TRANSFORM_CONCURRENCY) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new Error('Transform concurrency must be at least 1');
    }
  }

  /** Returns `null` when every line is blank: such a batch has nothing to insert. */
  async transform(lines: readonly string[]): Promise<TransformedBatch | null> {
    const sliceSize = Math.max(1, Math.ceil(lines.length / this.concurrency));
    const slices: (readonly string[])[] = [];
    for (let start = 0; start < lines.length; start += sliceSize) {
      slices.push(lines.slice(start, start + sliceSize));
    }

    const parts: string[] = [];
    let recordCount = 0;

    await Promise.all(
      slices.map((slice) =>
        this.renderSlice(slice).then((rendered) => {
          if (rendered.values !== null) {
            parts.push(rendered.values);
            recordCount += rendered.recordCount;
          }
        }),
      ),
    );

    if (parts.length === 0) {
      return null;
    }

    return {
      values: parts.join(', '),
      recordCount,
      droppedCount: lines.length - recordCount,
    };
  }

  private async renderSlice(slice: readonly string[]): Promise<RenderedSlice> {
    await Promise.resolve();

    const fragments: string[] = [];
    for (const line of slice) {
      const fragment = renderFragment(line);
      if (fragment !== null) {
        fragments.push(fragment);
      }
    }

    return {
      values: fragments.length > 0 ? fragments.join(', ') : null,
      recordCount: fragments.length,
    };
  }
}

/** `  1,a ` → `(1,a)`; blank → `null`. */
export function renderFragment(line: string): string | null {
  const trimmed = line.trim();
  return trimmed.length > 0 ? `(${trimmed})` : null;
}
