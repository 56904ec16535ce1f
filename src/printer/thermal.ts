import { PrinterTypes, ThermalPrinter } from 'node-thermal-printer';
import { toPrintableLines } from './format';
import type { Slip, SlipPrinter } from './types';
import { PrinterError, errorMessage } from '../utils/errors';
import type { PrinterConfig, PrinterType } from '../utils/env';

/** The calls made on a `node-thermal-printer` instance. */
export interface ThermalDevice {
  isPrinterConnected(): Promise<boolean>;
  clear(): void;
  alignLeft(): void;
  println(text: string): void;
  newLine(): void;
  cut(): void;
  execute(): Promise<unknown>;
}

const PRINTER_TYPES = {
  epson: PrinterTypes.EPSON,
  star: PrinterTypes.STAR,
} satisfies Record<PrinterType, unknown>;

export const createThermalDevice = (config: PrinterConfig & { interface: string }): ThermalDevice =>
  new ThermalPrinter({
    type: PRINTER_TYPES[config.type],
    interface: config.interface,
    width: config.width,
    removeSpecialCharacters: true,
    options: { timeout: config.timeoutMs },
  });

/** ESC/POS receipt printer reached over TCP or a device file. */
export class ThermalSlipPrinter implements SlipPrinter {
  readonly name: string;
  private readonly device: ThermalDevice;
  private readonly width: number;

  constructor(config: PrinterConfig & { interface: string }, device?: ThermalDevice) {
    this.name = `thermal:${config.interface}`;
    this.width = config.width;
    this.device = device ?? createThermalDevice(config);
  }

  async printSlip(slip: Slip): Promise<void> {
    if (!(await this.isConnected())) {
      throw new PrinterError(`Printer not reachable at ${this.name}`);
    }

    const lines = toPrintableLines(slip.text, this.width);
    if (lines.every((line) => line === '')) {
      throw new PrinterError('Slip has no printable text');
    }

    this.device.clear();
    this.device.alignLeft();
    for (const line of lines) {
      this.device.println(line);
    }
    this.device.newLine();
    this.device.cut();

    try {
      await this.device.execute();
    } catch (error) {
      throw new PrinterError(`Print failed: ${errorMessage(error)}`, { cause: error });
    } finally {
      this.device.clear();
    }
  }

  async isConnected(): Promise<boolean> {
    try {
      return await this.device.isPrinterConnected();
    } catch {
      return false;
    }
  }
}
