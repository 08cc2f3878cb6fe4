import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Context } from '../context/index.js';
import { ConfigResolutionError, ExecutionError } from '../errors/index.js';
import { Task } from '../orchestrator/task.js';
import { jsonFileReader, jsonFileWriter } from '../steps/io/jsonFile.js';
import { filterRecords, mapRecords } from '../steps/transform/records.js';

const orders = [
  { id: 'o-1', total: 40 },
  { id: 'o-2', total: 150 },
  { id: 'o-3', total: 220 },
];

describe('built-in steps', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'stepline-steps-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function contextFor(source: string, target = join(dir, 'out', 'large.json')) {
    return Context.from({ source: { path: source }, sink: { path: target } });
  }

  it('reads, filters and writes a dataset as a three-step Task', async () => {
    const source = join(dir, 'orders.json');
    writeFileSync(source, JSON.stringify(orders));
    const target = join(dir, 'out', 'large.json');

    const task = new Task({
      name: 'orders',
      children: [
        jsonFileReader({ pathKey: 'source.path' }),
        filterRecords('keep-large', row => typeof row.total === 'number' && row.total >= 100),
        jsonFileWriter({ targetKey: 'sink.path' }),
      ],
    });
    const output = (await task.execute(contextFor(source, target), undefined))._unsafeUnwrap();
    expect(output.fields).toEqual({ target, count: 2 });
    expect(JSON.parse(readFileSync(target, 'utf-8'))).toEqual([
      { id: 'o-2', total: 150 },
      { id: 'o-3', total: 220 },
    ]);
    expect(output.trace.map(e => e.kind)).toEqual(['reader', 'transformation', 'writer']);
  });

  it('maps every record', async () => {
    const double = mapRecords('double', row => ({ ...row, total: Number(row.total) * 2 }));
    const output = (await double.execute(Context.empty(), { data: orders }))._unsafeUnwrap();
    expect(output.fields.data.map(r => r.total)).toEqual([80, 300, 440]);
  });

  it('writes the same bytes when run twice with the same records', async () => {
    const target = join(dir, 'same.json');
    const writer = jsonFileWriter({ targetKey: 'sink.path' });
    const ctx = contextFor(join(dir, 'unused.json'), target);
    await writer.execute(ctx, { data: orders });
    const first = readFileSync(target, 'utf-8');
    await writer.execute(ctx, { data: orders });
    expect(readFileSync(target, 'utf-8')).toBe(first);
    expect(first).toBe(JSON.stringify(orders, null, 2));
  });

  it('fails when the source is not an array of objects', async () => {
    const source = join(dir, 'object.json');
    writeFileSync(source, '{"id":"o-1"}');
    const reader = jsonFileReader({ pathKey: 'source.path' });
    const error = (await reader.execute(contextFor(source), undefined))._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(ExecutionError);
    expect(error.message).toBe(`Step 'read-json' failed: ${source} must contain a JSON array of objects`);
  });

  it('fails when the source file is missing', async () => {
    const source = join(dir, 'missing.json');
    const reader = jsonFileReader({ pathKey: 'source.path' });
    const error = (await reader.execute(contextFor(source), undefined))._unsafeUnwrapErr();
    expect(error.message.startsWith(`Step 'read-json' failed: Failed to read ${source}:`)).toBe(true);
  });

  it('requires its path in the Context', () => {
    const reader = jsonFileReader({ name: 'orders-in', pathKey: 'source.path' });
    const error = reader.validate(Context.from({ source: { path: '' } }))._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(ConfigResolutionError);
    expect(error).toMatchObject({ step: 'orders-in', path: 'source.path', reason: 'type' });
    expect(reader.validate(Context.empty())._unsafeUnwrapErr()).toMatchObject({ reason: 'missing' });
  });
});
