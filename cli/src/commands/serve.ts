import chalk from 'chalk';
import { startServer } from '../../../src';
import { loadConfig } from '../../../src/utils/env';

interface ServeOptions {
  port?: number;
}

export const serve = async (options: ServeOptions): Promise<void> => {
  const config = loadConfig();
  if (options.port !== undefined) {
    config.server.port = options.port;
  }

  const server = await startServer(config);
  const address = server.address();
  const port = typeof address === 'object' && address ? address.port : config.server.port;
  console.error(chalk.green(`✓ Trigger server on http://${config.server.host}:${port}`));
  console.error(chalk.dim(`  POST /api/slips to print a slip`));

  const shutdown = () => {
    server.close(() => process.exit(0));
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
};
