import { describe, it, expect, vi } from 'vitest';
import { OllamaService, withTimeout } from './ollama.js';
import { DEFAULT_CONFIG, type SeopostConfig } from '../types/config.js';

/**
 * Fetch that never answers on its own; it only settles when its signal aborts
 */
function hangingFetch() {
  const signals: AbortSignal[] = [];
  const fetchMock = vi.fn<typeof fetch>(
    (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        const signal = init?.signal;
        if (!signal) return;
        signals.push(signal);
        signal.addEventListener('abort', () => reject(signal.reason));
      })
  );
  return { fetchMock, signals };
}

describe('withTimeout', () => {
  it('aborts a request that takes longer than the timeout', async () => {
    const { fetchMock, signals } = hangingFetch();

    await expect(withTimeout(fetchMock, 5)('http://127.0.0.1:11434/api/tags')).rejects.toMatchObject({
      name: 'TimeoutError',
    });
    expect(signals).toHaveLength(1);
    expect(signals[0].aborted).toBe(true);
  });

  it('keeps the caller options and still honours the caller signal', async () => {
    const { fetchMock, signals } = hangingFetch();
    const controller = new AbortController();

    const request = withTimeout(fetchMock, 60000)('http://127.0.0.1:11434/api/generate', {
      method: 'POST',
      signal: controller.signal,
    });
    controller.abort(new Error('cancelled'));

    await expect(request).rejects.toThrow('cancelled');
    expect(fetchMock.mock.calls[0][1]?.method).toBe('POST');
    expect(signals[0].aborted).toBe(true);
  });
});

describe('OllamaService', () => {
  it('applies the configured timeout to its requests', async () => {
    const { fetchMock, signals } = hangingFetch();
    const config: SeopostConfig = {
      ...DEFAULT_CONFIG,
      ollama: { host: 'http://127.0.0.1:11434', model: 'llama3.1', timeout: 5 },
    };

    const service = new OllamaService(config, fetchMock);

    await expect(service.isAvailable()).resolves.toBe(false);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(signals[0].aborted).toBe(true);
  });
});
