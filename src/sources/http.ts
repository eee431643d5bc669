import { SourceError } from "../core/errors.js";
import { formatErrorMessage } from "../core/error-format.js";

export type FetchLike = (url: string) => Promise<Response>;

export function isHttpLocation(location: string): boolean {
  return /^https?:\/\//i.test(location);
}

export async function fetchText(url: string, fetchImpl: FetchLike = fetch): Promise<string> {
  let response: Response;
  try {
    response = await fetchImpl(url);
  } catch (err) {
    throw new SourceError(`Failed to fetch ${url}: ${formatErrorMessage(err)}`, err);
  }

  if (!response.ok) {
    throw new SourceError(`Failed to fetch ${url}: HTTP ${response.status} ${response.statusText}`);
  }

  return response.text();
}
