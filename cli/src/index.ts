#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { categories } from './commands/categories';
import { listen } from './commands/listen';
import { print } from './commands/print';
import { serve } from './commands/serve';

const parseTemperature = (value: string): number => {
  const temperature = Number(value);
  if (!Number.isFinite(temperature) || temperature < 0 || temperature > 2) {
    throw new InvalidArgumentError('Temperature must be a number between 0 and 2.');
  }
  return temperature;
};

const parsePort = (value: string): number => {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError('Port must be an integer between 0 and 65535.');
  }
  return port;
};

const program = new Command();

program
  .name('slipwraith')
  .version('1.0.0')
  .description('Prints haunted receipt slips generated by a language model');

program
  .command('print', { isDefault: true })
  .description('Print one slip')
  .option('-c, --category <name>', 'Category to print; unknown or omitted picks one at random')
  .option('-t, --temperature <n>', 'Sampling temperature, 0 to 2 (higher is weirder)', parseTemperature)
  .option('-r, --remote <url>', 'Trigger the slip on a remote trigger server instead')
  .action(print);

program
  .command('listen')
  .description('Print a slip on every Enter press (USB buttons that act as keyboards)')
  .option('-c, --category <name>', 'Always print this category')
  .action(listen);

program
  .command('serve')
  .description('Start the HTTP trigger server')
  .option('-p, --port <n>', 'Port to listen on (overrides PORT)', parsePort)
  .action(serve);

program
  .command('categories')
  .description('List slip categories and their weights')
  .option('-r, --remote <url>', 'List the categories of a remote trigger server instead')
  .action(categories);

program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
