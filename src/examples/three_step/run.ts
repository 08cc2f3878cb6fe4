import 'dotenv/config';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { Context } from '../../context/index.js';
import { defaultContext } from '../../context/defaults.js';
import { fromJsonFile } from '../../context/sources.js';
import { describeError, originOf } from '../../errors/index.js';
import { Task } from '../../orchestrator/task.js';
import { DatasetInput, Records, defineTransformation } from '../../step/variants.js';
import { jsonFileReader, jsonFileWriter } from '../../steps/io/jsonFile.js';

// Config file < STEPLINE__* environment < command-line overrides
function buildContext(): Context {
  const configPath = fileURLToPath(new URL('../../../../src/examples/three_step/config.json', import.meta.url));
  const minTotal = process.argv.find(a => a.startsWith('--min-total='));
  return Context.from(
    fromJsonFile(configPath),
    defaultContext,
    minTotal ? { 'filter.minTotal': Number(minTotal.slice('--min-total='.length)) } : {}
  );
}

const keepLarge = defineTransformation({
  name: 'keep-large-orders',
  requires: { 'filter.minTotal': z.number().nonnegative() },
  input: DatasetInput,
  output: z.object({ data: Records }),
  idempotent: true,
  run: ({ config }, { data }) => ({
    data: data.filter(row => typeof row.total === 'number' && row.total >= config['filter.minTotal']),
  }),
});

async function main() {
  const context = buildContext();
  const task = new Task(
    {
      name: 'three-step',
      children: [
        jsonFileReader({ pathKey: 'source.path' }),
        keepLarge,
        jsonFileWriter({ targetKey: 'sink.path' }),
      ],
      aggregation: 'history',
    },
    { context }
  );

  const result = await task.run();
  if (result.isErr()) {
    console.error(describeError(result.error));
    console.error(`origin: ${originOf(result.error)?.step ?? 'unknown'}`);
    process.exit(1);
  }

  console.log('\n[Trace]');
  for (const entry of result.value.trace) {
    console.log(`• ${entry.position} ${entry.step}:`, JSON.stringify(entry.output.fields.count ?? entry.output.fields.source ?? null));
  }
  console.log('\nDone.');
}

main().catch(e => { console.error(e); process.exit(1); });
