import type { Slip, SlipPrinter } from './types';
import { PrinterError, errorMessage } from '../utils/errors';

/** Writes slips to a stream, stdout by default. Used when no printer is attached. */
export class ConsoleSlipPrinter implements SlipPrinter {
  readonly name = 'console';

  constructor(private readonly out: NodeJS.WritableStream = process.stdout) {}

  printSlip(slip: Slip): Promise<void> {
    const chunk = `--- Category: ${slip.category} ---\n${slip.text}\n\n`;

    return new Promise((resolve, reject) => {
      const fail = (error: unknown) =>
        reject(new PrinterError(`Console write failed: ${errorMessage(error)}`, { cause: error }));

      // a failed write is also emitted as 'error', which would otherwise go unhandled
      this.out.once('error', fail);
      this.out.write(chunk, (error) => {
        if (error) {
          fail(error);
          return;
        }
        this.out.off('error', fail);
        resolve();
      });
    });
  }

  async isConnected(): Promise<boolean> {
    return true;
  }
}
