import { toError } from "../utils/errorUtils.js";

export class InvalidURLError extends Error {
  readonly index: number;
  readonly raw: string;

  constructor(index: number, raw: string, cause: unknown) {
    super(`invalid URL at index ${index}: ${JSON.stringify(raw)}: ${toError(cause).message}`, { cause });
    this.name = "InvalidURLError";
    this.index = index;
    this.raw = raw;
  }
}

function parseOrigin(raw: string): URL {
  const url = new URL(raw);
  // `localhost:3000` parses with `localhost:` as its scheme and no host.
  if (url.host === "") {
    throw new Error("URL has no host");
  }
  return url;
}

/**
 * Checks that every entry is an absolute URL with a host, in order, stopping
 * at the first one that is not. Returns the input untouched.
 */
export function validateUrls(urls: readonly string[]): readonly string[] {
  urls.forEach((raw, index) => {
    try {
      parseOrigin(raw);
    } catch (error) {
      throw new InvalidURLError(index, raw, error);
    }
  });
  return urls;
}
