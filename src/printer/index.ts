import { ConsoleSlipPrinter } from './console';
import { ThermalSlipPrinter } from './thermal';
import type { SlipPrinter } from './types';
import type { PrinterConfig } from '../utils/env';

export const createPrinter = (config: PrinterConfig): SlipPrinter => {
  if (!config.interface) {
    return new ConsoleSlipPrinter();
  }

  return new ThermalSlipPrinter({ ...config, interface: config.interface });
};

export { ConsoleSlipPrinter, ThermalSlipPrinter };
export * from './types';
