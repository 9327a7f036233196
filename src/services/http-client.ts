import { TransferError } from '../shared/errors.js';

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface HttpClientOptions {
  userAgent: string;
  timeoutMs: number;
  fetchImpl?: FetchLike;
}

export interface RequestOptions {
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

export interface TransferContext {
  /** Aborts when the request is cancelled or goes idle. */
  signal: AbortSignal;
  /** Re-arms the idle timer; call it whenever body data arrives. */
  keepAlive(): void;
}

export type ResponseHandler<T> = (response: Response, transfer: TransferContext) => Promise<T>;

/**
 * One client shared by every worker. Default headers are frozen; each call
 * builds its own header object on top of them. The timeout is an idle
 * timeout: it covers connect and headers, then each gap between body chunks
 * the handler reports through `keepAlive`.
 */
export class HttpClient {
  private readonly defaultHeaders: Readonly<Record<string, string>>;
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: HttpClientOptions) {
    this.defaultHeaders = Object.freeze({
      'User-Agent': options.userAgent,
      Accept: '*/*'
    });
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async get<T>(url: string, handle: ResponseHandler<T>, request: RequestOptions = {}): Promise<T> {
    return this.send(url, { method: 'GET' }, handle, request);
  }

  async postForm<T>(url: string, body: string, handle: ResponseHandler<T>, request: RequestOptions = {}): Promise<T> {
    return this.send(
      url,
      { method: 'POST', body },
      handle,
      { ...request, headers: { ...request.headers, 'Content-Type': 'application/x-www-form-urlencoded' } }
    );
  }

  private async send<T>(url: string, init: RequestInit, handle: ResponseHandler<T>, request: RequestOptions): Promise<T> {
    const controller = new AbortController();
    const idleError = new TransferError(`Request timed out after ${this.options.timeoutMs} ms of inactivity`, url);
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort(idleError);
    }, this.options.timeoutMs);
    const forwardAbort = () => controller.abort(request.signal?.reason);
    if (request.signal?.aborted) {
      forwardAbort();
    } else {
      request.signal?.addEventListener('abort', forwardAbort, { once: true });
    }

    try {
      const response = await this.fetchImpl(url, {
        ...init,
        headers: { ...this.defaultHeaders, ...request.headers },
        signal: controller.signal
      });
      return await handle(response, {
        signal: controller.signal,
        keepAlive: () => {
          if (!timedOut) {
            timeout.refresh();
          }
        }
      });
    } catch (error) {
      if (timedOut) {
        throw idleError;
      }
      throw error;
    } finally {
      clearTimeout(timeout);
      request.signal?.removeEventListener('abort', forwardAbort);
    }
  }
}

export const expectOk = (response: Response, url: string): void => {
  if (!response.ok) {
    throw new TransferError(`Unexpected response status ${response.status}`, url, response.status);
  }
};
