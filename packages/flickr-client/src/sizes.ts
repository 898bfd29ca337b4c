import type { PhotoSize } from './types';

export const PREFERRED_SIZE_LABELS = [
  'Original',
  'Large',
  'Medium 800',
  'Medium 640',
  'Medium',
  'Small',
] as const;

/**
 * Pick the size to display on the photo page: the first preferred label that
 * exists, otherwise the widest size on offer. Flickr does not promise any
 * ordering of the `sizes` list, so the fallback compares widths.
 */
export function selectDisplaySize(sizes: readonly PhotoSize[]): PhotoSize | undefined {
  for (const label of PREFERRED_SIZE_LABELS) {
    const match = sizes.find((size) => size.label === label);
    if (match) {
      return match;
    }
  }

  let widest: PhotoSize | undefined;
  for (const size of sizes) {
    if (!widest || size.width >= widest.width) {
      widest = size;
    }
  }

  return widest;
}
