import Papa from 'papaparse';
import type { PreviewResult } from '../../domain/model/LoadJob.js';
import { parseTableSchema } from '../../domain/model/TableSchema.js';
import { splitLines } from '../../domain/services/LineSplitter.js';
import { toLoadError } from '../../domain/errors/LoadError.js';
import type { LoadJobContext } from '../LoadJobContext.js';

/**
 * Use case: sample the first records after the header and split them into fields.
 *
 * Never talks to the query endpoint. Reading stops as soon as `maxLines`
 * non-blank lines are collected, so only re-readable sources (files, URLs,
 * buffers) can still be loaded afterwards.
 */
export class PreviewLoad {
  constructor(private readonly ctx: LoadJobContext) {}

  async execute(maxLines = 10): Promise<PreviewResult> {
    const source = this.ctx.assertSourceConfigured();
    this.ctx.transitionTo('PREVIEWING');

    try {
      const schemaColumnCount = this.ctx.schema === undefined ? null : parseTableSchema(this.ctx.schema).columns.length;
      const sampled = await this.sampleLines(source.read(), maxLines);

      const parsed = Papa.parse<string[]>(sampled.join('\n'), {
        delimiter: ',',
        header: false,
        skipEmptyLines: true,
        dynamicTyping: false,
      });
      const rows = parsed.data;
      const columnCount = rows.reduce((widest, row) => Math.max(widest, row.length), 0);
      const mismatchedRows =
        schemaColumnCount === null
          ? []
          : rows.flatMap((row, index) => (row.length === schemaColumnCount ? [] : [index]));

      this.ctx.transitionTo('PREVIEWED');

      return {
        rows,
        totalSampled: sampled.length,
        columnCount,
        schemaColumnCount,
        mismatchedRows,
      };
    } catch (error) {
      this.ctx.transitionTo('FAILED');
      throw toLoadError(error, 'STREAM_ERROR');
    }
  }

  private async sampleLines(chunks: AsyncIterable<string | Buffer>, maxLines: number): Promise<string[]> {
    const sampled: string[] = [];
    if (maxLines < 1) return sampled;

    const { lines } = await this.ctx.headerSkipper.skip(splitLines(chunks));
    for await (const line of lines) {
      const trimmed = line.trim();
      if (trimmed.length === 0) continue;
      sampled.push(trimmed);
      if (sampled.length >= maxLines) break;
    }
    return sampled;
  }
}
