import { readFileSync } from 'node:fs';
import { binary, run, subcommands } from 'cmd-ts';

import { metricsCommand } from './commands/metrics/index.js';

const packageJson: { version: string } = JSON.parse(
  readFileSync(new URL('../package.json', import.meta.url), 'utf8'),
);

export const app = subcommands({
  name: 'fieldcheck',
  description: 'Extraction quality metrics against annotated ground truth',
  version: packageJson.version,
  cmds: {
    metrics: metricsCommand,
  },
});

export async function runCli(argv: string[] = process.argv): Promise<void> {
  await run(binary(app), argv);
}
