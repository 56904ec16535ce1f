import readline from 'readline';
import type { SlipPipeline, SlipRequest } from '../slip/pipeline';
import { SlipInProgressError } from '../utils/errors';
import { logger as rootLogger, Logger } from '../utils/logger';

export interface TriggerStats {
  pressed: number;
  printed: number;
  ignored: number;
  failed: number;
}

export interface KeypressTriggerOptions {
  input: NodeJS.ReadableStream;
  pipeline: Pick<SlipPipeline, 'run'>;
  request?: SlipRequest;
  logger?: Logger;
}

/**
 * Treats every line on `input` as a button press. USB arcade buttons show up
 * as keyboards sending Enter. Presses that land while a slip is printing are
 * ignored; failures are logged and the loop keeps listening. Resolves once
 * the input ends and the last slip has settled.
 */
export const listenForPresses = async (options: KeypressTriggerOptions): Promise<TriggerStats> => {
  const log = options.logger ?? rootLogger;
  const stats: TriggerStats = { pressed: 0, printed: 0, ignored: 0, failed: 0 };
  const pending = new Set<Promise<void>>();
  const rl = readline.createInterface({ input: options.input, terminal: false });

  const press = async (): Promise<void> => {
    stats.pressed++;
    try {
      const result = await options.pipeline.run(options.request);
      stats.printed++;
      log.info({ category: result.category, durationMs: result.durationMs }, 'press printed a slip');
    } catch (error) {
      if (error instanceof SlipInProgressError) {
        stats.ignored++;
        log.warn('press ignored, a slip is still printing');
        return;
      }
      stats.failed++;
      log.error({ err: error }, 'press failed');
    }
  };

  rl.on('line', () => {
    const task = press().finally(() => pending.delete(task));
    pending.add(task);
  });

  await new Promise<void>((resolve) => rl.once('close', resolve));
  await Promise.all(pending);
  return stats;
};
