import { FetchError, errorMessage } from '../shared/errors.js';

export interface RequestOptions {
  timeoutMs: number;
  userAgent: string;
  method?: 'GET' | 'HEAD' | 'POST';
  headers?: Record<string, string>;
  body?: string;
}

export interface HttpResponse {
  url: string;
  status: number;
  ok: boolean;
  body: string;
}

/**
 * `fetch` with a per-request timeout covering both the headers and the body.
 * Network failures and timeouts become FetchError; HTTP error statuses are
 * left to the caller.
 */
export async function request(url: string, opts: RequestOptions): Promise<HttpResponse> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), opts.timeoutMs);

  try {
    const response = await fetch(url, {
      method: opts.method ?? 'GET',
      headers: { 'User-Agent': opts.userAgent, ...opts.headers },
      body: opts.body,
      signal: controller.signal,
      redirect: 'follow',
    });
    const body = await response.text();
    return { url, status: response.status, ok: response.ok, body };
  } catch (err) {
    if (controller.signal.aborted || (err instanceof Error && err.name === 'AbortError')) {
      throw new FetchError(`Request timed out after ${opts.timeoutMs}ms: ${url}`, {
        url,
        timeout: opts.timeoutMs,
      });
    }
    throw new FetchError(`Request failed: ${errorMessage(err)}`, { url });
  } finally {
    clearTimeout(timer);
  }
}

export async function requestOk(url: string, opts: RequestOptions): Promise<HttpResponse> {
  const response = await request(url, opts);
  if (!response.ok) {
    throw new FetchError(`HTTP ${response.status} from ${url}`, { url, status: response.status });
  }
  return response;
}

export function readJson(response: HttpResponse): unknown {
  try {
    return JSON.parse(response.body);
  } catch (err) {
    throw new FetchError(`Invalid JSON from ${response.url}: ${errorMessage(err)}`, { url: response.url });
  }
}

/**
 * HEAD the URL, falling back to GET for servers that reject HEAD.
 */
export async function probeUrl(url: string, opts: RequestOptions): Promise<boolean> {
  try {
    const head = await request(url, { ...opts, method: 'HEAD' });
    if (head.ok) return true;
  } catch {
    // fall through to GET
  }
  const get = await request(url, { ...opts, method: 'GET' });
  return get.ok;
}
