import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors';

dotenv.config();

// .env files leave unset keys as empty strings
const optionalString = z.preprocess(
  (value) => (value === '' ? undefined : value),
  z.string().optional(),
);

const withDefault = <T extends z.ZodTypeAny>(schema: T, fallback: z.input<T>) =>
  z.preprocess((value) => (value === '' || value === undefined ? fallback : value), schema);

export const providerSchema = z.enum(['openai', 'gemini', 'ollama']);
export const selectionSchema = z.enum(['weighted', 'rotate']);
export const printerTypeSchema = z.enum(['epson', 'star']);
export const temperatureSchema = z.coerce.number().min(0).max(2);

export type LlmProvider = z.infer<typeof providerSchema>;
export type SelectionStrategy = z.infer<typeof selectionSchema>;
export type PrinterType = z.infer<typeof printerTypeSchema>;

const envSchema = z
  .object({
    NODE_ENV: withDefault(z.string(), 'development'),
    LLM_PROVIDER: withDefault(providerSchema, 'openai'),
    OPENAI_API_KEY: optionalString,
    OPENAI_MODEL: withDefault(z.string(), 'gpt-4.1'),
    OPENAI_BASE_URL: optionalString.pipe(z.string().url().optional()),
    GEMINI_API_KEY: optionalString,
    GEMINI_MODEL: withDefault(z.string(), 'gemini-2.0-flash'),
    OLLAMA_URL: withDefault(z.string().url(), 'http://127.0.0.1:11434'),
    OLLAMA_MODEL: withDefault(z.string(), 'llama3.1'),
    LLM_TIMEOUT: withDefault(z.coerce.number().int().positive(), 30000),
    SLIP_TEMPERATURE: withDefault(temperatureSchema, 1),
    SLIP_MAX_TOKENS: withDefault(z.coerce.number().int().positive(), 400),
    SLIP_SELECTION: withDefault(selectionSchema, 'weighted'),
    PRINTER_INTERFACE: optionalString,
    PRINTER_TYPE: withDefault(printerTypeSchema, 'epson'),
    PRINTER_WIDTH: withDefault(z.coerce.number().int().min(16).max(80), 48),
    PRINTER_TIMEOUT: withDefault(z.coerce.number().int().positive(), 5000),
    PORT: withDefault(z.coerce.number().int().min(0).max(65535), 3000),
    HOST: withDefault(z.string(), '0.0.0.0'),
    ALLOWED_ORIGINS: optionalString,
  })
  .superRefine((env, ctx) => {
    if (env.LLM_PROVIDER === 'openai' && !env.OPENAI_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['OPENAI_API_KEY'],
        message: 'required when LLM_PROVIDER is openai',
      });
    }
    if (env.LLM_PROVIDER === 'gemini' && !env.GEMINI_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['GEMINI_API_KEY'],
        message: 'required when LLM_PROVIDER is gemini',
      });
    }
  });

export interface GenerationConfig {
  provider: LlmProvider;
  openaiApiKey?: string;
  openaiModel: string;
  openaiBaseUrl?: string;
  geminiApiKey?: string;
  geminiModel: string;
  ollamaUrl: string;
  ollamaModel: string;
  timeoutMs: number;
  temperature: number;
  maxTokens: number;
}

export interface PrinterConfig {
  interface?: string;
  type: PrinterType;
  width: number;
  timeoutMs: number;
}

export interface ServerConfig {
  port: number;
  host: string;
  allowedOrigins: string[];
}

export interface AppConfig {
  nodeEnv: string;
  generation: GenerationConfig;
  selection: SelectionStrategy;
  printer: PrinterConfig;
  server: ServerConfig;
}

/**
 * Reads and validates the process environment.
 *
 * @throws ConfigError listing every invalid or missing variable
 */
export const loadConfig = (source: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const env = parsed.data;
  return {
    nodeEnv: env.NODE_ENV,
    generation: {
      provider: env.LLM_PROVIDER,
      openaiApiKey: env.OPENAI_API_KEY,
      openaiModel: env.OPENAI_MODEL,
      openaiBaseUrl: env.OPENAI_BASE_URL,
      geminiApiKey: env.GEMINI_API_KEY,
      geminiModel: env.GEMINI_MODEL,
      ollamaUrl: env.OLLAMA_URL.replace(/\/+$/, ''),
      ollamaModel: env.OLLAMA_MODEL,
      timeoutMs: env.LLM_TIMEOUT,
      temperature: env.SLIP_TEMPERATURE,
      maxTokens: env.SLIP_MAX_TOKENS,
    },
    selection: env.SLIP_SELECTION,
    printer: {
      interface: env.PRINTER_INTERFACE,
      type: env.PRINTER_TYPE,
      width: env.PRINTER_WIDTH,
      timeoutMs: env.PRINTER_TIMEOUT,
    },
    server: {
      port: env.PORT,
      host: env.HOST,
      allowedOrigins: env.ALLOWED_ORIGINS
        ? env.ALLOWED_ORIGINS.split(',').map((origin) => origin.trim()).filter(Boolean)
        : [],
    },
  };
};
