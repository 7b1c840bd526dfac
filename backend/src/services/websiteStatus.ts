import type { WebsiteStatus } from "../types/contracts.js";

type FetchLike = typeof fetch;

export type WebsiteCheckOptions = {
  fetchImpl?: FetchLike;
  timeoutMs?: number;
};

const DEFAULT_TIMEOUT_MS = 10_000;

export async function checkWebsiteStatus(url: string, options: WebsiteCheckOptions = {}): Promise<WebsiteStatus> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), options.timeoutMs ?? DEFAULT_TIMEOUT_MS);

  try {
    const response = await fetchImpl(url, {
      method: "GET",
      signal: controller.signal,
      redirect: "follow"
    });

    return {
      url,
      status: response.status,
      accessible: response.status === 200
    };
  } catch (error) {
    return {
      url,
      status: null,
      accessible: false,
      error: error instanceof Error ? error.message : String(error)
    };
  } finally {
    clearTimeout(timeout);
  }
}

/** Probes every URL concurrently; results keep the input order. */
export async function checkWebsites(urls: readonly string[], options: WebsiteCheckOptions = {}): Promise<WebsiteStatus[]> {
  const targets = urls.map((url) => url.trim()).filter((url) => url.length > 0);
  return Promise.all(targets.map((url) => checkWebsiteStatus(url, options)));
}
