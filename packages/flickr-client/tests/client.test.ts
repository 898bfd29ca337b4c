import { describe, expect, it } from 'vitest';

import { FlickrClient } from '../src/client';
import { FlickrUnavailableError } from '../src/errors';
import type { HttpRequestInitLike, HttpResponseLike } from '../src/types';

const API_KEY = 'test-key';
const API_SECRET = 'test-secret';
const CREDENTIALS = { token: 'user-token', tokenSecret: 'user-token-secret' };

interface RecordedCall {
  url: URL;
  init?: HttpRequestInitLike;
}

function createClient(respond: (url: URL) => HttpResponseLike | Promise<HttpResponseLike>) {
  const calls: RecordedCall[] = [];
  const client = new FlickrClient({
    apiKey: API_KEY,
    apiSecret: API_SECRET,
    httpClient: async (url, init) => {
      const parsed = new URL(url);
      calls.push({ url: parsed, init });
      return respond(parsed);
    },
  });

  return { client, calls };
}

describe('FlickrClient', () => {
  it('requests public recent photos with the API key and passes page counters through', async () => {
    const { client, calls } = createClient(() =>
      createOkResponse({
        stat: 'ok',
        photos: {
          page: 2,
          pages: 37,
          perpage: 20,
          total: '740',
          photo: [{ id: '101', owner: 'owner@N01', title: 'Harbour', ispublic: 1 }],
        },
      }),
    );

    const page = await client.fetchRecentPhotos({ page: 2, perPage: 20 });

    expect(page.pages).toBe(37);
    expect(page.page).toBe(2);
    expect(page.total).toBe(740);
    expect(page.photos.map((photo) => photo.id)).toEqual(['101']);

    const [call] = calls;
    expect(`${call?.url.origin}${call?.url.pathname}`).toBe('https://api.flickr.com/services/rest');
    expect(call?.url.searchParams.get('method')).toBe('flickr.photos.getRecent');
    expect(call?.url.searchParams.get('api_key')).toBe(API_KEY);
    expect(call?.url.searchParams.get('format')).toBe('json');
    expect(call?.url.searchParams.get('nojsoncallback')).toBe('1');
    expect(call?.init?.headers).toEqual({});
  });

  it('signs own-photo searches and forwards the privacy filter', async () => {
    const { client, calls } = createClient(() =>
      createOkResponse({ stat: 'ok', photos: { page: 1, pages: 4, perpage: 20, total: 61, photo: [] } }),
    );

    const page = await client.fetchOwnPhotos(CREDENTIALS, { page: 1, perPage: 20, privacyFilter: 5 });

    expect(page.pages).toBe(4);
    const [call] = calls;
    expect(call?.url.searchParams.get('method')).toBe('flickr.photos.search');
    expect(call?.url.searchParams.get('user_id')).toBe('me');
    expect(call?.url.searchParams.get('privacy_filter')).toBe('5');
    expect(call?.url.searchParams.has('api_key')).toBe(false);

    const authorization = call?.init?.headers?.Authorization ?? '';
    expect(authorization.startsWith('OAuth ')).toBe(true);
    expect(authorization).toContain('oauth_consumer_key="test-key"');
    expect(authorization).toContain('oauth_token="user-token"');
    expect(authorization).toContain('oauth_signature_method="HMAC-SHA1"');
  });

  it('omits the privacy filter when none is requested', async () => {
    const { client, calls } = createClient(() => createOkResponse({ stat: 'ok', photos: { photo: [] } }));

    await client.fetchOwnPhotos(CREDENTIALS, { page: 3, perPage: 20 });

    expect(calls[0]?.url.searchParams.has('privacy_filter')).toBe(false);
    expect(calls[0]?.url.searchParams.get('page')).toBe('3');
  });

  it('resolves null when Flickr reports a failed stat', async () => {
    const { client } = createClient(() =>
      createOkResponse({ stat: 'fail', code: 1, message: 'Photo "42" not found (invalid ID)' }),
    );

    await expect(client.fetchPhotoInfo(null, '42')).resolves.toBeNull();
  });

  it('normalises unauthorised responses to empty results', async () => {
    const { client } = createClient(() => createResponse(401, { stat: 'fail', code: 98 }));

    await expect(client.fetchContacts(CREDENTIALS)).resolves.toEqual([]);
    await expect(client.fetchUserInfo(CREDENTIALS)).resolves.toBeNull();
  });

  it('treats an empty size list as no data', async () => {
    const { client } = createClient(() => createOkResponse({ stat: 'ok', sizes: { size: [] } }));

    await expect(client.fetchPhotoSizes(null, '42')).resolves.toBeNull();
  });

  it('raises FlickrUnavailableError on 5xx responses', async () => {
    const { client } = createClient(() => createResponse(502, {}));

    await expect(client.fetchPhotosOfUser(CREDENTIALS, 'friend@N01')).rejects.toBeInstanceOf(
      FlickrUnavailableError,
    );
  });

  it('raises FlickrUnavailableError when the transport fails', async () => {
    const { client } = createClient(() => {
      throw new Error('connect ECONNREFUSED');
    });

    await expect(client.fetchPhotoSizes(null, '42')).rejects.toThrow(
      'Flickr request flickr.photos.getSizes failed: connect ECONNREFUSED',
    );
  });

  it('raises FlickrUnavailableError when the body read is aborted', async () => {
    const { client } = createClient(() => ({
      ok: true,
      status: 200,
      json: async () => {
        throw Object.assign(new Error('This operation was aborted'), { name: 'AbortError' });
      },
      text: async () => '',
    }));

    await expect(client.fetchPhotoInfo(null, '42')).rejects.toThrow(
      'Flickr request flickr.photos.getInfo failed: This operation was aborted',
    );
  });

  it('still resolves null for a body that is not JSON', async () => {
    const { client } = createClient(() => createTextResponse('<html>Bad gateway page</html>'));

    await expect(client.fetchPhotoInfo(null, '42')).resolves.toBeNull();
  });

  it('treats the service-unavailable error code as an outage', async () => {
    const { client } = createClient(() =>
      createOkResponse({ stat: 'fail', code: 105, message: 'Service currently unavailable' }),
    );

    const failure = client.fetchPhotoInfo(null, '42');

    await expect(failure).rejects.toBeInstanceOf(FlickrUnavailableError);
    await expect(failure).rejects.toMatchObject({
      method: 'flickr.photos.getInfo',
      errorCode: 105,
      message: 'Flickr request flickr.photos.getInfo failed: error code 105',
    });
  });

  it('raises FlickrUnavailableError when an OAuth response body cannot be read', async () => {
    const { client } = createClient(() => ({
      ok: true,
      status: 200,
      json: async () => ({}),
      text: async () => {
        throw new Error('socket hang up');
      },
    }));

    await expect(client.getRequestToken('http://localhost:8000/callback')).rejects.toThrow(
      'Flickr request oauth.request_token failed: socket hang up',
    );
  });

  it('caps contacts photo requests at fifty', async () => {
    const { client, calls } = createClient(() => createOkResponse({ stat: 'ok', photos: { photo: [] } }));

    await client.fetchContactsPhotos(CREDENTIALS, 500);

    expect(calls[0]?.url.searchParams.get('count')).toBe('50');
    expect(calls[0]?.url.searchParams.get('single_photo')).toBe('1');
  });

  it('runs the OAuth request token leg', async () => {
    const { client, calls } = createClient(() =>
      createTextResponse('oauth_callback_confirmed=true&oauth_token=req-token&oauth_token_secret=req-secret'),
    );

    const token = await client.getRequestToken('http://localhost:8000/callback');

    expect(token).toEqual({ token: 'req-token', tokenSecret: 'req-secret', callbackConfirmed: true });
    expect(calls[0]?.url.pathname).toBe('/services/oauth/request_token');
    expect(calls[0]?.url.searchParams.get('oauth_callback')).toBe('http://localhost:8000/callback');
    expect(calls[0]?.init?.headers?.Authorization).toContain('oauth_consumer_key="test-key"');
  });

  it('builds the authorize URL with read permissions', () => {
    const { client } = createClient(() => createOkResponse({}));

    expect(client.buildAuthorizeUrl('req-token')).toBe(
      'https://www.flickr.com/services/oauth/authorize?oauth_token=req-token&perms=read',
    );
  });

  it('exchanges the verifier for an access token', async () => {
    const { client, calls } = createClient(() =>
      createTextResponse(
        'fullname=Jamie%20Doe&oauth_token=access-token&oauth_token_secret=access-secret&user_nsid=12345%40N01&username=jamie',
      ),
    );

    const token = await client.getAccessToken({ token: 'req-token', tokenSecret: 'req-secret' }, 'verifier-1');

    expect(token).toEqual({
      token: 'access-token',
      tokenSecret: 'access-secret',
      nsid: '12345@N01',
      username: 'jamie',
      fullname: 'Jamie Doe',
    });
    expect(calls[0]?.url.searchParams.get('oauth_verifier')).toBe('verifier-1');
    expect(calls[0]?.init?.headers?.Authorization).toContain('oauth_token="req-token"');
  });
});

function createResponse(status: number, body: unknown): HttpResponseLike {
  return {
    ok: status >= 200 && status < 300,
    status,
    json: async () => body,
    text: async () => JSON.stringify(body),
  };
}

function createOkResponse(body: unknown): HttpResponseLike {
  return createResponse(200, body);
}

function createTextResponse(text: string): HttpResponseLike {
  return {
    ok: true,
    status: 200,
    json: async () => {
      throw new SyntaxError('Unexpected token');
    },
    text: async () => text,
  };
}
