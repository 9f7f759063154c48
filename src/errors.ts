export class UnsafeUrlError extends Error {
  readonly url: string;

  constructor(url: string) {
    super(`Refusing to request unsafe URL: ${JSON.stringify(url)}`);
    this.name = "UnsafeUrlError";
    this.url = url;
  }
}

export class HttpStatusError extends Error {
  readonly url: string;
  readonly statusCode: number;

  constructor(url: string, statusCode: number) {
    super(`Unexpected status code ${statusCode} for ${url}`);
    this.name = "HttpStatusError";
    this.url = url;
    this.statusCode = statusCode;
  }
}

export class TooManyRedirectsError extends Error {
  readonly url: string;
  readonly maxRedirections: number;

  constructor(url: string, maxRedirections: number) {
    super(`More than ${maxRedirections} redirects for ${url}`);
    this.name = "TooManyRedirectsError";
    this.url = url;
    this.maxRedirections = maxRedirections;
  }
}

export class DeadlineExceededError extends Error {
  readonly ms: number;

  constructor(ms: number) {
    super(`Deadline of ${ms}ms exceeded`);
    this.name = "DeadlineExceededError";
    this.ms = ms;
  }
}
