import { config } from "../config";
import { ProxyAgent, fetch as undiciFetch } from "undici";

export async function delay(ms: number): Promise<void> {
  if (ms <= 0) return;
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function getProxyDispatcher(): ProxyAgent | undefined {
  const proxyUrl =
    process.env.HTTPS_PROXY ||
    process.env.https_proxy ||
    process.env.HTTP_PROXY ||
    process.env.http_proxy;
  if (!proxyUrl) return undefined;
  return new ProxyAgent(proxyUrl);
}

export interface FetchOptions {
  retries?: number;
  retryDelayMs?: number;
  timeoutMs?: number;
}

class NonRetryableError extends Error {}

/**
 * GET a JSON document. Network errors, timeouts, 429 and 5xx responses are
 * retried with exponential backoff; other 4xx responses fail immediately.
 */
export async function fetchJson(url: string, options: FetchOptions = {}): Promise<unknown> {
  const {
    retries = config.fetchRetries,
    retryDelayMs = config.fetchRetryDelayMs,
    timeoutMs = config.fetchTimeoutMs,
  } = options;

  const dispatcher = getProxyDispatcher();
  let lastError: unknown = null;

  for (let attempt = 0; attempt <= retries; attempt++) {
    if (attempt > 0) {
      await delay(retryDelayMs * Math.pow(2, attempt - 1));
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await undiciFetch(url, {
        headers: {
          "User-Agent": config.getRandomUserAgent(),
          Accept: "application/json",
          "Accept-Language": "en-US,en;q=0.9",
        },
        signal: controller.signal,
        dispatcher,
      });

      if (response.status === 429 || response.status >= 500) {
        lastError = new Error(`HTTP ${response.status} for ${url}`);
        // Release the connection before the next attempt
        await response.body?.cancel();
        continue;
      }

      if (!response.ok) {
        throw new NonRetryableError(`HTTP ${response.status} for ${url}`);
      }

      return await response.json();
    } catch (error: unknown) {
      if (error instanceof NonRetryableError) throw error;
      lastError = error;
    } finally {
      clearTimeout(timeout);
    }
  }

  const reason = lastError instanceof Error ? lastError.message : String(lastError);
  throw new Error(`Failed to fetch ${url} after ${retries} retries: ${reason}`);
}
