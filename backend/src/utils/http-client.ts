export const DEFAULT_FETCH_HEADERS: Record<string, string> = { 'User-Agent': 'WeatherMap/1.0 (map backend)' };

export type FetchWithTimeout = (url: string, options?: RequestInit, timeoutMs?: number) => Promise<Response>;

export type FetchImpl = (url: string, init?: RequestInit) => Promise<Response>;

const defaultFetchImpl: FetchImpl = (url, init) => globalThis.fetch(url, init);

export const createFetchWithTimeout = (defaultTimeoutMs: number, fetchImpl: FetchImpl = defaultFetchImpl): FetchWithTimeout =>
  async (url, options = {}, timeoutMs = defaultTimeoutMs) => {
    const controller = new AbortController();
    const upstreamSignal = options.signal;
    const abortFromUpstream = () => {
      controller.abort(upstreamSignal?.reason);
    };
    if (upstreamSignal) {
      if (upstreamSignal.aborted) {
        abortFromUpstream();
      } else {
        upstreamSignal.addEventListener('abort', abortFromUpstream, { once: true });
      }
    }
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    try {
      return await fetchImpl(url, { ...options, signal: controller.signal });
    } finally {
      clearTimeout(timeout);
      if (upstreamSignal) {
        upstreamSignal.removeEventListener('abort', abortFromUpstream);
      }
    }
  };

// Reads a JSON body, treating an empty or unparsable body as null.
export const readJsonPayload = async (response: Response): Promise<unknown> => {
  const text = await response.text();
  if (!text) {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
};

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  Boolean(value) && typeof value === 'object' && !Array.isArray(value);
