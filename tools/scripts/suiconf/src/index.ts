import chalk from 'chalk';
import { describeError } from '@suiconf/types';
import { runCli } from './cli';
import { loadRuntimeConfig } from './env';
import type { Tone } from './output';

const format: Record<Tone, (msg: string) => void> = {
  info: (msg) => console.log(chalk.cyan(msg)),
  success: (msg) => console.log(chalk.green(msg)),
  error: (msg) => console.error(chalk.red(msg))
};

async function main(): Promise<void> {
  const config = await loadRuntimeConfig();
  const outcome = await runCli(process.argv.slice(2), { config });
  for (const { tone, text } of outcome.lines) {
    format[tone](text);
  }
  process.exitCode = outcome.exitCode;
}

main().catch((error: unknown) => {
  format.error(describeError(error));
  process.exitCode = 1;
});
