import { describe, it, expect, vi, beforeAll, afterAll, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { Command } from 'commander';
import { describeOutcome, registerLoad } from '../../../src/cli/commands/load.js';
import type { LoadCommandDeps } from '../../../src/cli/commands/load.js';
import type { AppConfig } from '../../../src/config/index.js';
import { LoadError } from '../../../src/domain/errors/LoadError.js';
import { emptySummary } from '../../../src/domain/model/LoadJob.js';
import { FakeQueryExecutor } from '../../helpers/FakeQueryExecutor.js';
import { silentLogger } from '../../helpers/logCapture.js';

const CONFIG: AppConfig = {
  endpoint: 'http://127.0.0.1:8000',
  statementPath: '/v1/statement',
  timeoutMs: 30000,
  batchSize: 100_000,
  logLevel: 'silent',
};

let testDir: string;

beforeAll(() => {
  testDir = mkdtempSync(join(tmpdir(), 'streamload-cli-'));
});

afterAll(() => {
  rmSync(testDir, { recursive: true, force: true });
});

afterEach(() => {
  process.exitCode = undefined;
});

function writeCsv(name: string, content: string): string {
  const path = join(testDir, name);
  writeFileSync(path, content, 'utf-8');
  return path;
}

function setup(executor: FakeQueryExecutor, overrides: Partial<LoadCommandDeps> = {}) {
  const printed: string[] = [];
  const executorFactory = vi.fn((_endpoint: string, _config: AppConfig) => executor);
  const program = new Command()
    .exitOverride()
    .configureOutput({ writeErr: () => {}, writeOut: () => {} });

  registerLoad(program, {
    config: () => CONFIG,
    logger: () => silentLogger,
    executor: executorFactory,
    print: (line) => printed.push(line),
    ...overrides,
  });

  const run = (...args: string[]) => program.parseAsync(['load', ...args], { from: 'user' });
  return { run, printed, executorFactory };
}

describe('load command', () => {
  it('should create the table and load a file after its header', async () => {
    const executor = new FakeQueryExecutor();
    const { run, printed } = setup(executor);
    const path = writeCsv('with-header.csv', 'a,b\n1,x\n2,y\n');

    await run(path, '--table', 't', '--schema', 'a:uint8, b:string', '--skip-head-lines', '1', '--batch-size', '1');

    expect(executor.statements).toEqual([
      "SHOW TABLES LIKE 't';",
      'CREATE TABLE t(a uint8, b string) Engine = Fuse;',
      'INSERT INTO t (a, b) VALUES (1,x);',
      'INSERT INTO t (a, b) VALUES (2,y);',
    ]);
    expect(printed).toEqual(['loaded 2 records into t in 2 batches']);
    expect(process.exitCode).not.toBe(1);
  });

  it('should fall back to the configured batch size', async () => {
    const executor = new FakeQueryExecutor({ tables: ['t'] });
    const { run } = setup(executor, { config: () => ({ ...CONFIG, batchSize: 2 }) });
    const path = writeCsv('three-lines.csv', '1\n2\n3\n');

    await run(path, '--table', 't');

    expect(executor.inserts).toEqual(['INSERT INTO t VALUES (1), (2);', 'INSERT INTO t VALUES (3);']);
  });

  it('should read standard input when no source is given', async () => {
    const executor = new FakeQueryExecutor({ tables: ['t'] });
    async function* stdin() {
      await Promise.resolve();
      yield Buffer.from('7,q\n');
    }
    const { run, printed } = setup(executor, { sourceOptions: { stdin: stdin() } });

    await run('--table', 't');

    expect(executor.inserts).toEqual(['INSERT INTO t VALUES (7,q);']);
    expect(printed).toEqual(['loaded 1 records into t in 1 batches']);
  });

  it('should report a missing table and set a failing exit code', async () => {
    const executor = new FakeQueryExecutor();
    const { run, printed } = setup(executor);
    const path = writeCsv('no-table.csv', '1,a\n');

    await run(path, '--table', 't');

    expect(printed).toEqual(['load into t failed: table t not found']);
    expect(executor.inserts).toEqual([]);
    expect(process.exitCode).toBe(1);
  });

  it('should report failed batches without failing the command', async () => {
    const executor = new FakeQueryExecutor({ tables: ['t'], failInsert: (i) => (i === 0 ? 'bad row' : undefined) });
    const { run, printed } = setup(executor);
    const path = writeCsv('one-bad.csv', 'x\n1\n');

    await run(path, '--table', 't', '--batch-size', '1');

    expect(printed).toEqual(['loaded 1 records into t in 1 batches, 1 batches failed']);
    expect(process.exitCode).not.toBe(1);
  });

  it('should reject an empty table name as an invalid request', async () => {
    const executor = new FakeQueryExecutor();
    const { run, printed } = setup(executor);
    const path = writeCsv('empty-table.csv', '1\n');

    await run(path, '--table', '');

    expect(printed).toEqual(['load into  failed: Target table name is required']);
    expect(executor.statements).toEqual([]);
    expect(process.exitCode).toBe(1);
  });

  it('should hand the endpoint override to the executor factory', async () => {
    const executor = new FakeQueryExecutor({ tables: ['t'] });
    const { run, executorFactory } = setup(executor);
    const path = writeCsv('endpoint.csv', '1\n');

    await run(path, '--table', 't', '--endpoint', 'http://query.test:9000');

    expect(executorFactory).toHaveBeenCalledWith('http://query.test:9000', CONFIG);
  });

  it('should reject a batch size below 1', async () => {
    const { run } = setup(new FakeQueryExecutor());

    await expect(run('--table', 't', '--batch-size', '0')).rejects.toThrow('expected an integer >= 1');
  });

  it('should reject a negative header count', async () => {
    const { run } = setup(new FakeQueryExecutor());

    await expect(run('--table', 't', '--skip-head-lines', '-1')).rejects.toThrow('expected an integer >= 0');
  });

  it('should require --table', async () => {
    const { run } = setup(new FakeQueryExecutor());

    await expect(run('data.csv')).rejects.toMatchObject({ code: 'commander.missingMandatoryOptionValue' });
  });

  it('should only accept the csv format', async () => {
    const { run } = setup(new FakeQueryExecutor());

    await expect(run('--table', 't', '--format', 'json')).rejects.toMatchObject({
      code: 'commander.invalidArgument',
    });
  });
});

describe('describeOutcome', () => {
  it('should describe an aborted load', () => {
    const summary = { ...emptySummary(), batchesDispatched: 3 };

    expect(describeOutcome('t', { status: 'ABORTED', summary })).toBe('load into t aborted after 3 batches');
  });

  it('should describe a fatal error', () => {
    const error = new LoadError('SOURCE_ERROR', 'cannot read foo.csv: ENOENT');

    expect(describeOutcome('t', { status: 'FAILED', error, summary: emptySummary() })).toBe(
      'load into t failed: cannot read foo.csv: ENOENT',
    );
  });
});
