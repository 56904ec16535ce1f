export class AppError extends Error {
  public readonly statusCode: number;

  constructor(message: string, statusCode = 500, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AppError';
    this.statusCode = statusCode;
  }
}

export class ConfigError extends AppError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Configuration is invalid:\n${issues.join('\n')}`, 500);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export class GenerationError extends AppError {
  public readonly provider: string;

  constructor(provider: string, message: string, options?: { cause?: unknown }) {
    super(message, 502, options);
    this.name = 'GenerationError';
    this.provider = provider;
  }
}

export class PrinterError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 503, options);
    this.name = 'PrinterError';
  }
}

export class SlipInProgressError extends AppError {
  constructor() {
    super('A slip is already being printed', 409);
    this.name = 'SlipInProgressError';
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
