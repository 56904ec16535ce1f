import chalk from 'chalk';
import { createSlipRuntime } from '../../../src/slip';
import { listenForPresses } from '../../../src/trigger/keypress';
import { loadConfig } from '../../../src/utils/env';

interface ListenOptions {
  category?: string;
}

export const listen = async (options: ListenOptions): Promise<void> => {
  const config = loadConfig();
  const { pipeline, printer } = createSlipRuntime(config);

  console.error(chalk.bold(`Listening for presses on stdin, printing to ${chalk.cyan(printer.name)}`));
  console.error(chalk.dim('Press Enter to print a slip, Ctrl+D to stop.\n'));

  const stats = await listenForPresses({
    input: process.stdin,
    pipeline,
    request: { category: options.category },
  });

  console.error(
    chalk.dim(`\n${stats.pressed} presses: ${stats.printed} printed, ${stats.ignored} ignored, ${stats.failed} failed`),
  );
};
