export class FetchError extends Error {
  readonly url: string;
  readonly statusCode?: number;

  constructor(url: string, cause: unknown, statusCode?: number) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Could not fetch ${url}: ${reason}`, { cause });
    this.name = 'FetchError';
    this.url = url;
    this.statusCode = statusCode;
  }
}
