import { describe, it, expect } from 'vitest';
import { PassThrough, Writable } from 'stream';
import { ConsoleSlipPrinter } from './console';
import { createPrinter } from './index';
import { PrinterError } from '../utils/errors';

describe('ConsoleSlipPrinter', () => {
  it('writes the category header and the slip text', async () => {
    const out = new PassThrough();
    const printer = new ConsoleSlipPrinter(out);

    await printer.printSlip({ category: 'warnings', text: 'DO NOT BLINK', createdAt: new Date() });

    expect(out.read().toString()).toBe('--- Category: warnings ---\nDO NOT BLINK\n\n');
  });

  it('rejects with a PrinterError when the stream write fails', async () => {
    const out = new Writable({
      write(_chunk, _encoding, callback) {
        callback(new Error('EPIPE'));
      },
    });
    const printer = new ConsoleSlipPrinter(out);

    const error = await printer
      .printSlip({ category: 'warnings', text: 'DO NOT BLINK', createdAt: new Date() })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PrinterError);
    expect(error).toMatchObject({ message: 'Console write failed: EPIPE', statusCode: 503 });
  });

  it('is always connected', async () => {
    await expect(new ConsoleSlipPrinter(new PassThrough()).isConnected()).resolves.toBe(true);
  });
});

describe('createPrinter', () => {
  it('falls back to the console when no interface is configured', () => {
    expect(createPrinter({ type: 'epson', width: 48, timeoutMs: 5000 }).name).toBe('console');
  });

  it('builds a thermal printer for a configured interface', () => {
    const printer = createPrinter({ interface: '/dev/usb/lp0', type: 'epson', width: 48, timeoutMs: 5000 });
    expect(printer.name).toBe('thermal:/dev/usb/lp0');
  });
});
