import { FetchError, errorMessage } from '../shared/errors.js';
import { abortable, abortError } from '../shared/utils.js';

export interface FetchPageOptions {
  timeoutMs: number;
  userAgent: string;
  accept?: string;
  signal?: AbortSignal;
}

const TRANSIENT_STATUSES = new Set([408, 425, 429]);

export function isTransientStatus(status: number): boolean {
  return status >= 500 || TRANSIENT_STATUSES.has(status);
}

/**
 * GET a page body. Timeouts, network faults, 429 and 5xx become transient
 * FetchErrors; other non-2xx statuses are permanent. Cancellation through
 * `signal` rejects with an AbortError instead.
 */
export async function fetchPage(url: string, opts: FetchPageOptions): Promise<string> {
  if (opts.signal?.aborted) throw abortError();

  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, opts.timeoutMs);
  const onAbort = (): void => controller.abort();
  opts.signal?.addEventListener('abort', onAbort, { once: true });

  try {
    const response = await fetch(url, {
      headers: {
        'User-Agent': opts.userAgent,
        Accept: opts.accept ?? 'text/html,application/xhtml+xml,*/*',
      },
      signal: controller.signal,
      redirect: 'follow',
    });

    if (!response.ok) {
      throw new FetchError(
        `Fetch failed: ${response.status} from ${url}`,
        isTransientStatus(response.status) ? 'transient' : 'permanent',
        { url, status: response.status },
      );
    }

    return await abortable(response.text(), controller.signal);
  } catch (err) {
    if (err instanceof FetchError) throw err;
    if (opts.signal?.aborted) throw abortError();
    if (timedOut) {
      throw new FetchError(`Fetch timed out after ${opts.timeoutMs}ms: ${url}`, 'transient', {
        url,
        timeout: opts.timeoutMs,
      });
    }
    throw new FetchError(`Fetch failed: ${errorMessage(err)}`, 'transient', { url });
  } finally {
    clearTimeout(timer);
    opts.signal?.removeEventListener('abort', onAbort);
  }
}
