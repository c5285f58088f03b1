import { CollaboratorError, errorMessage } from './errors.js';

export interface HttpOptions {
  /** Name used in errors, e.g. `youtube-search`. */
  collaborator: string;
  timeoutMs: number;
}

const SECRET_PARAMS = ['key', 'api_key', 'access_token'];

/** Strip credentials from a URL before it lands in an error or a log line. */
export function redactUrl(url: string): string {
  try {
    const parsed = new URL(url);
    for (const name of SECRET_PARAMS) {
      if (parsed.searchParams.has(name)) parsed.searchParams.set(name, '***');
    }
    return parsed.toString();
  } catch {
    return url;
  }
}

/**
 * `fetch` with an abort timeout. Transport failures, timeouts and non-2xx
 * responses all become `CollaboratorError`.
 */
export async function fetchWithTimeout(
  url: string,
  init: RequestInit,
  opts: HttpOptions,
): Promise<Response> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), opts.timeoutMs);
  const safeUrl = redactUrl(url);

  try {
    const response = await fetch(url, { ...init, signal: controller.signal, redirect: 'follow' });
    if (!response.ok) {
      const body = await response.text().catch(() => '');
      throw new CollaboratorError(
        opts.collaborator,
        `${opts.collaborator} request failed: ${response.status} ${response.statusText}`.trim(),
        { url: safeUrl, status: response.status, body: body.slice(0, 300) },
      );
    }
    return response;
  } catch (err) {
    if (err instanceof CollaboratorError) throw err;
    if (err instanceof Error && err.name === 'AbortError') {
      throw new CollaboratorError(
        opts.collaborator,
        `${opts.collaborator} request timed out after ${opts.timeoutMs}ms`,
        { url: safeUrl, timeout: opts.timeoutMs },
      );
    }
    throw new CollaboratorError(opts.collaborator, `${opts.collaborator} request failed: ${errorMessage(err)}`, {
      url: safeUrl,
    });
  } finally {
    clearTimeout(timer);
  }
}

export async function fetchJson(url: string, init: RequestInit, opts: HttpOptions): Promise<unknown> {
  const response = await fetchWithTimeout(url, init, opts);
  try {
    const data: unknown = await response.json();
    return data;
  } catch {
    throw new CollaboratorError(opts.collaborator, `${opts.collaborator} returned invalid JSON`, {
      url: redactUrl(url),
    });
  }
}
