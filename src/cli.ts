#!/usr/bin/env tsx
import { parseArgs } from 'util';
import { loadTablesConfig, runBatch } from '@/lib/excel-utils';

const USAGE = `Usage: table-filler [options]

  -c, --config <file>   Table configuration (default: config/tables.json)
  -i, --input <dir>     Directory with the raw extracts
  -o, --output <dir>    Directory for the filled tables
  -l, --layouts <dir>   Directory with the layout templates
      --no-collection   Do not assemble the per-period collections
  -h, --help            Show this help
`;

async function main(): Promise<number> {
  const { values } = parseArgs({
    options: {
      config: { type: 'string', short: 'c', default: 'config/tables.json' },
      input: { type: 'string', short: 'i' },
      output: { type: 'string', short: 'o' },
      layouts: { type: 'string', short: 'l' },
      'no-collection': { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  if (values.help) {
    console.log(USAGE);
    return 0;
  }

  const config = await loadTablesConfig(values.config ?? 'config/tables.json');
  const summary = await runBatch({
    ...config,
    inputDir: values.input ?? config.inputDir,
    outputDir: values.output ?? config.outputDir,
    layoutDir: values.layouts ?? config.layoutDir,
    collection: { ...config.collection, enabled: config.collection.enabled && !values['no-collection'] },
  });
  return summary.failed > 0 ? 1 : 0;
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    console.error(error instanceof Error ? error.message : error);
    process.exitCode = 1;
  });
