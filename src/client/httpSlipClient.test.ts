import { describe, it, expect, vi } from 'vitest';
import { HttpSlipClient, HttpSlipClientError } from './httpSlipClient';

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });

const slipResult = { category: 'rituals', text: 'Hum at the toaster.', fallback: false, durationMs: 900 };

describe('HttpSlipClient', () => {
  it('posts the slip request to /api/slips', async () => {
    const fakeFetch = vi.fn<typeof fetch>(async () => jsonResponse(slipResult, 201));
    const client = new HttpSlipClient('https://slips.example/', fakeFetch);

    const result = await client.trigger({ category: 'rituals' });

    expect(result).toEqual(slipResult);
    expect(fakeFetch).toHaveBeenCalledTimes(1);
    const [url, init] = fakeFetch.mock.calls[0];
    expect(url).toBe('https://slips.example/api/slips');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({ Accept: 'application/json', 'Content-Type': 'application/json' });
    expect(JSON.parse(String(init?.body))).toEqual({ category: 'rituals' });
  });

  it('raises the status and body of a refused trigger', async () => {
    const fakeFetch = vi.fn<typeof fetch>(async () => jsonResponse({ error: 'A slip is already being printed' }, 409));
    const client = new HttpSlipClient('https://slips.example', fakeFetch);

    const error = await client.trigger().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HttpSlipClientError);
    expect(error).toMatchObject({
      status: 409,
      responseBody: { error: 'A slip is already being printed' },
      message: 'Request to /api/slips failed with status 409: A slip is already being printed',
    });
  });

  it('reports only the status when the error body is not JSON', async () => {
    const fakeFetch = vi.fn<typeof fetch>(async () => new Response('Bad Gateway', { status: 502 }));
    const client = new HttpSlipClient('https://slips.example', fakeFetch);

    await expect(client.trigger()).rejects.toThrow(/^Request to \/api\/slips failed with status 502$/);
  });

  it('wraps network failures', async () => {
    const fakeFetch = vi.fn<typeof fetch>(async () => {
      throw new TypeError('fetch failed');
    });
    const client = new HttpSlipClient('https://slips.example', fakeFetch);

    await expect(client.trigger()).rejects.toThrow('Failed to reach https://slips.example');
  });

  it('fetches the remote category list', async () => {
    const fakeFetch = vi.fn<typeof fetch>(async () =>
      jsonResponse({ categories: [{ name: 'rituals', weight: 1 }] }),
    );
    const client = new HttpSlipClient('https://slips.example', fakeFetch);

    await expect(client.categories()).resolves.toEqual([{ name: 'rituals', weight: 1 }]);
    expect(fakeFetch.mock.calls[0][1]?.method).toBeUndefined();
  });
});
