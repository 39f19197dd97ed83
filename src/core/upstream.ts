/*
Purpose: download the upstream profile script over HTTP(S).
Assumptions: a single GET with no auth; the response body is UTF-8 text.
Usage: createUpstreamSource({ url, timeoutMs }).fetchScript().
*/

import { formatErrorMessage } from "./error-format.js";
import { NetworkError } from "./errors.js";

export type FetchLike = (input: string, init?: { signal?: AbortSignal }) => Promise<Response>;

export type UpstreamSourceOptions = {
  url: string;
  timeoutMs?: number;
  fetch?: FetchLike;
};

export type UpstreamSource = {
  url: string;
  fetchScript: () => Promise<string>;
};

const DEFAULT_TIMEOUT_MS = 30_000;

export function createUpstreamSource(options: UpstreamSourceOptions): UpstreamSource {
  return {
    url: options.url,
    fetchScript: () => fetchUpstreamScript(options),
  };
}

export async function fetchUpstreamScript(options: UpstreamSourceOptions): Promise<string> {
  const fetchImpl = options.fetch ?? fetch;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  let response: Response;
  try {
    response = await fetchImpl(options.url, { signal: AbortSignal.timeout(timeoutMs) });
  } catch (err) {
    throw new NetworkError(`Failed to fetch ${options.url}: ${formatErrorMessage(err)}`, err);
  }

  if (!response.ok) {
    const status = `${response.status} ${response.statusText}`.trim();
    throw new NetworkError(`${options.url} responded with HTTP ${status}`);
  }

  try {
    return await response.text();
  } catch (err) {
    throw new NetworkError(
      `Failed to read response body from ${options.url}: ${formatErrorMessage(err)}`,
      err,
    );
  }
}
