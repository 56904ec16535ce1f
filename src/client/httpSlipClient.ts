import { z } from 'zod';
import type { SlipRequest, SlipResult } from '../slip/pipeline';

type FetchImplementation = typeof fetch;

const slipResultSchema = z.object({
  category: z.string(),
  text: z.string(),
  fallback: z.boolean(),
  durationMs: z.number(),
});

const categoriesSchema = z.object({
  categories: z.array(z.object({ name: z.string(), weight: z.number() })),
});

const errorBodySchema = z.object({ error: z.string() });

export type RemoteCategory = z.infer<typeof categoriesSchema>['categories'][number];

class HttpSlipClientError extends Error {
  public readonly status?: number;
  public readonly responseBody?: unknown;

  constructor(message: string, status?: number, responseBody?: unknown, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HttpSlipClientError';
    this.status = status;
    this.responseBody = responseBody;
  }
}

/** Triggers slips on another installation's trigger server. */
export class HttpSlipClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchImplementation;

  constructor(baseUrl: string, fetchImpl?: FetchImplementation) {
    const normalizedBase = baseUrl.replace(/\/+$/, '');
    this.baseUrl = normalizedBase.length ? normalizedBase : baseUrl;
    this.fetchImpl = fetchImpl ?? globalThis.fetch;
  }

  async trigger(request: SlipRequest = {}): Promise<SlipResult> {
    const payload = await this.request('/api/slips', { method: 'POST', body: JSON.stringify(request) });
    return slipResultSchema.parse(payload);
  }

  async categories(): Promise<RemoteCategory[]> {
    const payload = await this.request('/api/categories');
    return categoriesSchema.parse(payload).categories;
  }

  private async request(path: string, init?: { method: string; body: string }): Promise<unknown> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (init?.body) {
      headers['Content-Type'] = 'application/json';
    }

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${path}`, { ...init, headers });
    } catch (error) {
      throw new HttpSlipClientError(`Failed to reach ${this.baseUrl}`, undefined, undefined, { cause: error });
    }

    const payload = await this.deserialize(response);

    if (!response.ok) {
      const body = errorBodySchema.safeParse(payload);
      const reason = body.success ? `: ${body.data.error}` : '';
      throw new HttpSlipClientError(
        `Request to ${path} failed with status ${response.status}${reason}`,
        response.status,
        payload,
      );
    }

    return payload;
  }

  private async deserialize(response: Response): Promise<unknown> {
    const textPayload = await response.text();
    if (!textPayload) {
      return null;
    }

    try {
      return JSON.parse(textPayload);
    } catch {
      return textPayload;
    }
  }
}

export { HttpSlipClientError };
