import axios, {
  AxiosAdapter,
  AxiosInstance,
  AxiosResponse,
} from "axios";
import type { Readable } from "node:stream";
import { config } from "../../../config";
import type { FaviconMeta } from "..";
import { IconHttpStatusError, IconRequestError } from "../error";

export const MAX_REDIRECTS = 5;

// Some servers reject requests that do not look like they came from a
// browser, so every request carries a desktop browser's header set.
export function browserHeaders(userAgent: string): Record<string, string> {
  return {
    "User-Agent": userAgent,
    Accept:
      "image/avif,image/webp,image/*,text/html;q=0.9,application/xhtml+xml;q=0.9,*/*;q=0.8",
    "Accept-Language": "en-US,en;q=0.5",
    "Cache-Control": "no-cache",
    DNT: "1",
  };
}

export type FaviconHttpClientOptions = {
  userAgent?: string;
  adapter?: AxiosAdapter;
};

export function createFaviconHttpClient(
  options: FaviconHttpClientOptions = {},
): AxiosInstance {
  return axios.create({
    headers: browserHeaders(options.userAgent ?? config.FAVICON_USER_AGENT),
    maxRedirects: MAX_REDIRECTS,
    responseType: "stream",
    validateStatus: () => true,
    ...(options.adapter ? { adapter: options.adapter } : {}),
  });
}

export type FetchedResource = {
  url: string;
  status: number;
  contentType?: string;
  body: Buffer;
  /** True when the body was cut off at `maxBytes`. */
  truncated: boolean;
};

function getHeaderContentType(
  headers: AxiosResponse["headers"],
): string | undefined {
  const value = (Object.entries(headers).find(
    x => x[0].toLowerCase() === "content-type",
  ) ?? [])[1];

  return typeof value === "string" ? value : undefined;
}

async function readCapped(
  stream: Readable,
  maxBytes: number,
): Promise<{ body: Buffer; truncated: boolean }> {
  const chunks: Buffer[] = [];
  let size = 0;
  let truncated = false;

  for await (const chunk of stream) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
    if (size + buffer.length > maxBytes) {
      chunks.push(buffer.subarray(0, maxBytes - size));
      size = maxBytes;
      truncated = true;
      break;
    }
    chunks.push(buffer);
    size += buffer.length;
  }

  return { body: Buffer.concat(chunks, size), truncated };
}

/**
 * GET a URL and read at most `maxBytes` of its body.
 *
 * Throws IconRequestError on network errors and timeouts, and
 * IconHttpStatusError on non-2xx responses.
 */
export async function fetchResource(
  meta: FaviconMeta,
  url: string,
  limits: { timeoutMs: number; maxBytes: number },
): Promise<FetchedResource> {
  let response: AxiosResponse<Readable>;
  try {
    response = await meta.http.get<Readable>(url, {
      timeout: limits.timeoutMs,
      signal: AbortSignal.timeout(limits.timeoutMs),
    });
  } catch (error) {
    throw new IconRequestError(url, error);
  }

  if (response.status < 200 || response.status >= 300) {
    response.data.destroy();
    throw new IconHttpStatusError(url, response.status);
  }

  try {
    const { body, truncated } = await readCapped(response.data, limits.maxBytes);
    return {
      url,
      status: response.status,
      contentType: getHeaderContentType(response.headers),
      body,
      truncated,
    };
  } catch (error) {
    throw new IconRequestError(url, error);
  }
}
