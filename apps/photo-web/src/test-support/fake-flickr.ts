import { FlickrClient, type HttpRequestInitLike, type HttpResponseLike } from '@photo-relay/flickr-client';

export interface FakeFlickrReply {
  status?: number;
  /** Objects are served as JSON, strings as a form-encoded body. */
  body: unknown;
}

export type FakeFlickrHandler = (params: URLSearchParams) => FakeFlickrReply | Promise<FakeFlickrReply>;

export interface FakeFlickrCall {
  method: string;
  params: URLSearchParams;
  signed: boolean;
}

/**
 * In-process stand-in for the Flickr REST and OAuth endpoints. Routes on the
 * `method` query parameter (or `oauth.<endpoint>` for the OAuth legs) and
 * records every request so tests can count upstream calls.
 */
export class FakeFlickr {
  readonly calls: FakeFlickrCall[] = [];
  private readonly handlers = new Map<string, FakeFlickrHandler>();

  on(method: string, handler: FakeFlickrHandler): this {
    this.handlers.set(method, handler);
    return this;
  }

  /** Answer `method` with a `stat: ok` envelope around `payload`. */
  reply(method: string, payload: Record<string, unknown>): this {
    return this.on(method, () => ({ body: { stat: 'ok', ...payload } }));
  }

  /** Make `method` fail at the transport level. */
  fail(method: string): this {
    return this.on(method, () => {
      throw new Error(`connect ECONNREFUSED (${method})`);
    });
  }

  callsTo(method: string): FakeFlickrCall[] {
    return this.calls.filter((call) => call.method === method);
  }

  createClient(): FlickrClient {
    return new FlickrClient({
      apiKey: 'test-key',
      apiSecret: 'test-secret',
      httpClient: (url, init) => this.dispatch(url, init),
    });
  }

  private async dispatch(rawUrl: string, init?: HttpRequestInitLike): Promise<HttpResponseLike> {
    const url = new URL(rawUrl);
    const method = url.pathname.startsWith('/services/oauth/')
      ? `oauth.${url.pathname.slice('/services/oauth/'.length)}`
      : (url.searchParams.get('method') ?? '');

    this.calls.push({
      method,
      params: url.searchParams,
      signed: Boolean(init?.headers?.Authorization),
    });

    if (init?.signal?.aborted) {
      throw new Error('This operation was aborted');
    }

    const handler = this.handlers.get(method);
    if (!handler) {
      return createResponse({ status: 404, body: { stat: 'fail', code: 112, message: `Method "${method}" not found` } });
    }

    return createResponse(await handler(url.searchParams));
  }
}

function createResponse(reply: FakeFlickrReply): HttpResponseLike {
  const status = reply.status ?? 200;
  const text = typeof reply.body === 'string' ? reply.body : JSON.stringify(reply.body);

  return {
    ok: status >= 200 && status < 300,
    status,
    json: async () => JSON.parse(text),
    text: async () => text,
  };
}

export function rawPhoto(id: string, owner: string, extra: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id,
    owner,
    title: `Photo ${id}`,
    ispublic: 1,
    isfriend: 0,
    isfamily: 0,
    ...extra,
  };
}
