import http from 'http';
import { createApp } from './app';
import { createSlipRuntime } from './slip';
import type { AppConfig } from './utils/env';
import { logger } from './utils/logger';

/** Starts the HTTP trigger server and resolves once it is listening. */
export const startServer = (config: AppConfig): Promise<http.Server> => {
  const { selector, printer, pipeline } = createSlipRuntime(config);

  const app = createApp({
    pipeline,
    selector,
    printer,
    allowedOrigins: config.server.allowedOrigins,
  });
  const server = http.createServer(app);

  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(config.server.port, config.server.host, () => {
      server.off('error', reject);
      server.on('error', (err) => logger.error({ err }, 'slip trigger server error'));
      logger.info(
        { host: config.server.host, port: config.server.port, printer: printer.name, provider: config.generation.provider },
        'slip trigger server listening',
      );
      resolve(server);
    });
  });
};

export { createApp } from './app';
export { createSlipRuntime, SlipPipeline } from './slip';
export { PromptSelector } from './prompts/selector';
export { PROMPT_CATALOG } from './prompts/catalog';
export { loadConfig } from './utils/env';
export type { AppConfig } from './utils/env';
export * from './utils/errors';
