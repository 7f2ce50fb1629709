import { fetch } from "undici";

import type { ListingFetchErrorCode, ListingPage } from "./types";

const REQUEST_HEADERS = {
  "user-agent":
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36",
  "accept-language": "zh-CN,zh;q=0.9,en;q=0.8",
  accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
};

// Present in the interstitial the site serves before the real listing page.
export const CHALLENGE_MARKER = "acw_sc__v2";

export type FetchListingOptions = {
  timeoutMs?: number;
  challengeTimeoutMs?: number;
  pollIntervalMs?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
};

export type RetryOptions = FetchListingOptions & {
  retries?: number;
  retryDelayMs?: number;
};

export class ListingFetchError extends Error {
  constructor(
    readonly code: ListingFetchErrorCode,
    message: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = "ListingFetchError";
  }
}

/**
 * Loads a search page and waits out the anti-bot interstitial: while the body still
 * carries the challenge marker the page is requested again, replaying any cookies the
 * earlier responses set, until it clears or `challengeTimeoutMs` elapses.
 */
export async function fetchListingPage(url: string, options: FetchListingOptions = {}): Promise<ListingPage> {
  const timeoutMs = options.timeoutMs ?? 20000;
  const challengeTimeoutMs = options.challengeTimeoutMs ?? 15000;
  const pollIntervalMs = options.pollIntervalMs ?? 500;
  const sleep = options.sleep ?? defaultSleep;
  const now = options.now ?? Date.now;

  const cookies = new Map<string, string>();
  const startedAt = now();

  for (;;) {
    const page = await fetchPageHtml(url, timeoutMs, cookies);
    if (!page.html.includes(CHALLENGE_MARKER)) {
      return page;
    }

    if (now() - startedAt > challengeTimeoutMs) {
      throw new ListingFetchError("CHALLENGE_TIMEOUT", `Challenge page did not clear within ${challengeTimeoutMs}ms`);
    }
    await sleep(pollIntervalMs);
  }
}

export async function fetchWithRetry(url: string, options: RetryOptions = {}): Promise<ListingPage> {
  const retries = options.retries ?? 4;
  const retryDelayMs = options.retryDelayMs ?? 15000;
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 0; ; attempt += 1) {
    try {
      return await fetchListingPage(url, options);
    } catch (error) {
      if (attempt >= retries || !isRetryableFetchError(error)) {
        throw error;
      }
      await sleep(retryDelayMs);
    }
  }
}

export function isRetryableFetchError(error: unknown): boolean {
  if (error instanceof ListingFetchError) {
    if (error.code === "CHALLENGE_TIMEOUT") {
      return true;
    }
    return error.code === "HTTP_STATUS" && typeof error.status === "number" && (error.status >= 500 || error.status === 429);
  }
  // Network failures and aborted requests surface as plain errors from undici.
  return error instanceof Error;
}

async function fetchPageHtml(url: string, timeoutMs: number, cookies: Map<string, string>): Promise<ListingPage> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(url, {
      redirect: "manual",
      signal: controller.signal,
      headers: {
        ...REQUEST_HEADERS,
        ...(cookies.size > 0 ? { cookie: serializeCookies(cookies) } : {}),
      },
    });

    if (response.status >= 300 && response.status < 400) {
      throw new ListingFetchError(
        "REDIRECT_BLOCKED",
        `Redirect ${response.status} to ${response.headers.get("location") ?? "unknown location"}`,
        response.status,
      );
    }

    if (!response.ok) {
      throw new ListingFetchError("HTTP_STATUS", `Fetch failed with status ${response.status}`, response.status);
    }

    for (const header of response.headers.getSetCookie()) {
      const [pair] = header.split(";");
      const separator = pair.indexOf("=");
      if (separator > 0) {
        cookies.set(pair.slice(0, separator).trim(), pair.slice(separator + 1).trim());
      }
    }

    return {
      html: await response.text(),
      finalUrl: response.url || url,
    };
  } finally {
    clearTimeout(timeout);
  }
}

function serializeCookies(cookies: Map<string, string>): string {
  return [...cookies.entries()].map(([name, value]) => `${name}=${value}`).join("; ");
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
