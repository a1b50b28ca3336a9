export class IconRequestError extends Error {
  public url: string;

  constructor(url: string, cause: unknown) {
    super(
      `Request for ${url} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
    this.name = "IconRequestError";
    this.url = url;
  }
}

export class IconHttpStatusError extends Error {
  public url: string;
  public status: number;

  constructor(url: string, status: number) {
    super(`Request for ${url} returned HTTP ${status}`);
    this.name = "IconHttpStatusError";
    this.url = url;
    this.status = status;
  }
}

export class IconTooSmallError extends Error {
  public url: string;
  public bytes: number;

  constructor(url: string, bytes: number, minBytes: number) {
    super(
      `Response from ${url} is ${bytes} bytes, below the ${minBytes} byte minimum`,
    );
    this.name = "IconTooSmallError";
    this.url = url;
    this.bytes = bytes;
  }
}

export class IconTooLargeError extends Error {
  public url: string;

  constructor(url: string, maxBytes: number) {
    super(`Response from ${url} exceeds the ${maxBytes} byte limit`);
    this.name = "IconTooLargeError";
    this.url = url;
  }
}

export class IconWriteError extends Error {
  public filePath: string;

  constructor(filePath: string, cause: unknown) {
    super(`Failed to write icon to ${filePath}`, { cause });
    this.name = "IconWriteError";
    this.filePath = filePath;
  }
}

export class SiteRootFetchError extends Error {
  public url: string;

  constructor(url: string, reason: string) {
    super(`Could not fetch HTML from ${url}: ${reason}`);
    this.name = "SiteRootFetchError";
    this.url = url;
  }
}

export type FaviconError =
  | IconRequestError
  | IconHttpStatusError
  | IconTooSmallError
  | IconTooLargeError
  | IconWriteError;
