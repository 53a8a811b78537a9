import got, { Response } from 'got';

type HttpOptions = {
  userAgent?: string;
  timeoutMs?: number;
};

export type PageResponse = { body: string; url: string; statusCode: number };

export type FormResponse = { body: string; statusCode: number };

export interface PageFetcher {
  page(url: string): Promise<PageResponse>;
}

export interface FormPoster {
  postForm(url: string, form: Record<string, string>): Promise<FormResponse>;
}

export class HttpClient implements PageFetcher, FormPoster {
  private client = got.extend({
    headers: {},
    followRedirect: true,
    retry: { limit: 0 },
    timeout: { request: 30000 }
  });

  constructor(opts: HttpOptions = {}) {
    const { userAgent, timeoutMs } = opts;
    this.client = this.client.extend({
      headers: userAgent ? { 'user-agent': userAgent } : undefined,
      timeout: timeoutMs ? { request: timeoutMs } : undefined
    });
  }

  // Non-2xx responses reject with got's HTTPError.
  async page(url: string): Promise<PageResponse> {
    const res: Response<string> = await this.client.get(url, { responseType: 'text' });
    return { body: res.body, url: res.url, statusCode: res.statusCode };
  }

  // Resolves for every status code; the caller decides what counts as success.
  async postForm(url: string, form: Record<string, string>): Promise<FormResponse> {
    const res: Response<string> = await this.client.post(url, {
      form,
      responseType: 'text',
      throwHttpErrors: false
    });
    return { body: res.body, statusCode: res.statusCode };
  }
}
