import chalk from 'chalk';
import ora from 'ora';
import { HttpSlipClient } from '../../../src/client/httpSlipClient';
import { createSlipRuntime } from '../../../src/slip';
import type { SlipResult } from '../../../src/slip/pipeline';
import { loadConfig } from '../../../src/utils/env';
import { errorMessage } from '../../../src/utils/errors';

interface PrintOptions {
  category?: string;
  temperature?: number;
  remote?: string;
}

const triggerSlip = async (options: PrintOptions): Promise<SlipResult> => {
  const request = { category: options.category, temperature: options.temperature };

  if (options.remote) {
    return new HttpSlipClient(options.remote).trigger(request);
  }

  const { pipeline } = createSlipRuntime(loadConfig());
  return pipeline.run(request);
};

export const print = async (options: PrintOptions): Promise<void> => {
  const spinner = ora('Summoning a slip...').start();

  try {
    const result = await triggerSlip(options);

    if (result.fallback) {
      spinner.warn(chalk.yellow(`Unknown category '${options.category}'; picked ${result.category} instead.`));
    }
    spinner.succeed(`Printed ${chalk.cyan(result.category)} ${chalk.dim(`(${result.durationMs} ms)`)}`);
  } catch (e) {
    spinner.fail(chalk.red(`Error: ${errorMessage(e)}`));
    process.exit(1);
  }
};
