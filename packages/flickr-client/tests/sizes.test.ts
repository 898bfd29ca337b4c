import { describe, expect, it } from 'vitest';

import { selectDisplaySize } from '../src/sizes';
import type { PhotoSize } from '../src/types';

function size(label: string, width: number): PhotoSize {
  return { label, width, height: Math.round(width * 0.66), source: `https://live.staticflickr.com/${width}.jpg` };
}

describe('selectDisplaySize', () => {
  it('prefers Original regardless of list order', () => {
    const selected = selectDisplaySize([size('Small', 240), size('Original', 4000), size('Medium', 500)]);

    expect(selected?.label).toBe('Original');
  });

  it('walks the preference order before anything else', () => {
    const selected = selectDisplaySize([size('Medium 640', 640), size('Medium 800', 800), size('Small', 240)]);

    expect(selected?.label).toBe('Medium 800');
  });

  it('falls back to the widest size when no preferred label exists', () => {
    const selected = selectDisplaySize([size('Square', 75), size('Large Square', 150), size('Thumbnail', 100)]);

    expect(selected?.label).toBe('Large Square');
  });

  it('returns undefined for an empty list', () => {
    expect(selectDisplaySize([])).toBeUndefined();
  });
});
