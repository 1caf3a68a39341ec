import { Command, InvalidArgumentError, Option } from 'commander';
import type { Logger } from 'pino';
import type { AppConfig } from '../../config/index.js';
import type { LoadFormat, LoadOutcome } from '../../domain/model/LoadJob.js';
import type { QueryExecutor } from '../../domain/ports/QueryExecutor.js';
import type { OpenSourceOptions } from '../../infrastructure/sources/openSource.js';
import { resolveSourceSpec } from '../../domain/model/SourceSpec.js';
import { HttpQueryClient } from '../../infrastructure/query/HttpQueryClient.js';
import { runLoad } from '../../application/runLoad.js';

interface LoadCommandOptions {
  table: string;
  schema?: string;
  skipHeadLines: number;
  batchSize?: number;
  format: LoadFormat;
  endpoint?: string;
}

export interface LoadCommandDeps {
  readonly config: () => AppConfig;
  readonly logger: (config: AppConfig) => Logger;
  readonly executor?: (endpoint: string, config: AppConfig) => QueryExecutor;
  readonly sourceOptions?: OpenSourceOptions;
  /** Where the summary line goes. Default: stdout. */
  readonly print?: (line: string) => void;
}

export function registerLoad(program: Command, deps: LoadCommandDeps) {
  program
    .command('load')
    .description('Load a comma-delimited file, URL or standard input into a table')
    .argument('[source]', 'file path or http(s) URL to load; standard input when omitted')
    .requiredOption('--table <table>', 'target table')
    .option('--schema <schema>', 'create the table when missing, e.g. "a:uint8, b:uint64, c:string"')
    .addOption(
      new Option('--skip-head-lines <n>', 'ignore the first n lines of the source')
        .argParser(parseCount(0))
        .default(0),
    )
    .addOption(new Option('--batch-size <n>', 'lines per insert statement').argParser(parseCount(1)))
    .addOption(new Option('--format <format>', 'format of the source').choices(['csv']).default('csv'))
    .option('--endpoint <url>', 'query service URL (overrides STREAMLOAD_ENDPOINT)')
    .action(async (source: string | undefined, options: LoadCommandOptions) => {
      const config = deps.config();
      const logger = deps.logger(config);
      const endpoint = options.endpoint ?? config.endpoint;
      const executor = deps.executor
        ? deps.executor(endpoint, config)
        : new HttpQueryClient(endpoint, { statementPath: config.statementPath, timeout: config.timeoutMs });

      const outcome = await runLoad(
        {
          source: resolveSourceSpec(source),
          table: options.table,
          schema: options.schema,
          skipHeaderLines: options.skipHeadLines,
          batchSize: options.batchSize ?? config.batchSize,
          format: options.format,
        },
        { executor, logger, sourceOptions: deps.sourceOptions },
      );

      const print = deps.print ?? ((line: string) => process.stdout.write(`${line}\n`));
      print(describeOutcome(options.table, outcome));
      if (outcome.status !== 'COMPLETED') {
        process.exitCode = 1;
      }
    });
}

export function describeOutcome(table: string, outcome: LoadOutcome): string {
  const { summary } = outcome;
  switch (outcome.status) {
    case 'COMPLETED': {
      const base = `loaded ${String(summary.recordsSent)} records into ${table} in ${String(summary.batchesDispatched)} batches`;
      return outcome.failures.length > 0 ? `${base}, ${String(outcome.failures.length)} batches failed` : base;
    }
    case 'FAILED':
      return `load into ${table} failed: ${outcome.error.message}`;
    case 'ABORTED':
      return `load into ${table} aborted after ${String(summary.batchesDispatched)} batches`;
  }
}

function parseCount(min: number) {
  return (value: string): number => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < min) {
      throw new InvalidArgumentError(`expected an integer >= ${String(min)}`);
    }
    return parsed;
  };
}
