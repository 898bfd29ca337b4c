import { createHmac } from 'node:crypto';

import OAuth from 'oauth-1.0a';

import type { FlickrCredentials, FlickrParams } from './types';

export interface SignedRequest {
  url: string;
  headers: Record<string, string>;
}

/**
 * Thin wrapper over `oauth-1.0a` producing HMAC-SHA1 signed GET requests. The
 * operation parameters travel in the query string and are part of the
 * signature base; the `oauth_*` values travel in the Authorization header.
 */
export class OAuthSigner {
  private readonly oauth: OAuth;

  constructor(apiKey: string, apiSecret: string) {
    this.oauth = new OAuth({
      consumer: { key: apiKey, secret: apiSecret },
      signature_method: 'HMAC-SHA1',
      hash_function: (baseString, key) => createHmac('sha1', key).update(baseString).digest('base64'),
    });
  }

  sign(url: string, params: FlickrParams, credentials?: FlickrCredentials): SignedRequest {
    const data = toStringParams(params);
    const token = credentials ? { key: credentials.token, secret: credentials.tokenSecret } : undefined;
    const authorization = this.oauth.authorize({ url, method: 'GET', data }, token);
    const header = this.oauth.toHeader(authorization);

    return {
      url: appendQuery(url, data),
      headers: { Authorization: header.Authorization },
    };
  }
}

export function appendQuery(url: string, params: FlickrParams): string {
  const query = new URLSearchParams(toStringParams(params)).toString();
  return query ? `${url}?${query}` : url;
}

function toStringParams(params: FlickrParams): Record<string, string> {
  const result: Record<string, string> = {};

  for (const [key, value] of Object.entries(params)) {
    result[key] = String(value);
  }

  return result;
}
