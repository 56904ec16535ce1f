export interface Slip {
  category: string;
  text: string;
  createdAt: Date;
}

export interface SlipPrinter {
  readonly name: string;
  /** Sends the slip as a single job. Does not retry. */
  printSlip(slip: Slip): Promise<void>;
  /** Resolves false when the device cannot be reached; never rejects. */
  isConnected(): Promise<boolean>;
}
