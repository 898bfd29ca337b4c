import { isFlickrUnavailableError } from '@photo-relay/flickr-client';

import { UpstreamUnavailableError } from '../../errors';
import type { AppMetrics } from '../../telemetry/metrics';

/**
 * Run one Flickr operation, counting it by outcome and translating transport
 * failures into {@link UpstreamUnavailableError}.
 */
export async function callUpstream<T>(
  metrics: AppMetrics,
  method: string,
  operation: () => Promise<T>,
): Promise<T> {
  try {
    const result = await operation();
    metrics.upstreamCalls.inc({ method, outcome: isEmpty(result) ? 'empty' : 'ok' });
    return result;
  } catch (error) {
    if (isFlickrUnavailableError(error)) {
      metrics.upstreamCalls.inc({ method, outcome: 'unavailable' });
      throw new UpstreamUnavailableError(`Flickr is unavailable (${method})`, error);
    }

    metrics.upstreamCalls.inc({ method, outcome: 'error' });
    throw error;
  }
}

function isEmpty(result: unknown): boolean {
  return result === null || (Array.isArray(result) && result.length === 0);
}
