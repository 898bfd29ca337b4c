import type {
  AccessToken,
  FlickrContact,
  FlickrGroup,
  FlickrPhoto,
  FlickrUser,
  PhotoInfo,
  PhotoPage,
  PhotoSize,
  RequestToken,
} from './types';

type RawRecord = Record<string, unknown>;

const DEFAULT_BUDDY_ICON_URL = 'https://www.flickr.com/images/buddyicon.gif';

/** Extras requested on every photo listing so thumbnails render without extra calls. */
export const PHOTO_LIST_EXTRAS = [
  'url_q',
  'url_m',
  'description',
  'date_upload',
  'date_taken',
  'owner_name',
  'ispublic',
  'isfriend',
  'isfamily',
].join(',');

export function asRecord(value: unknown): RawRecord | undefined {
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    return undefined;
  }

  return value as RawRecord;
}

export function readString(record: RawRecord | undefined, key: string): string | undefined {
  const value = record?.[key];

  if (typeof value === 'string') {
    return value;
  }

  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }

  return undefined;
}

export function readNumber(record: RawRecord | undefined, key: string): number | undefined {
  const value = record?.[key];

  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }

  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }

  return undefined;
}

export function readFlag(record: RawRecord | undefined, key: string): boolean {
  const value = record?.[key];
  return value === 1 || value === '1' || value === true;
}

/**
 * Flickr wraps most text fields as `{ _content: "..." }`. Accept both the
 * wrapped and the bare form.
 */
export function readContent(record: RawRecord | undefined, key: string): string | undefined {
  const value = record?.[key];

  if (typeof value === 'string') {
    return value;
  }

  return readString(asRecord(value), '_content');
}

export function readRecords(record: RawRecord | undefined, key: string): RawRecord[] {
  const value = record?.[key];

  if (!Array.isArray(value)) {
    return [];
  }

  const results: RawRecord[] = [];
  for (const item of value) {
    const entry = asRecord(item);
    if (entry) {
      results.push(entry);
    }
  }

  return results;
}

export function buildBuddyIconUrl(
  nsid: string,
  iconServer: string | undefined,
  iconFarm: string | undefined,
): string {
  if (!iconServer || iconServer === '0' || !iconFarm) {
    return DEFAULT_BUDDY_ICON_URL;
  }

  return `https://farm${iconFarm}.staticflickr.com/${iconServer}/buddyicons/${nsid}.jpg`;
}

export function normalizeUser(envelope: RawRecord): FlickrUser | null {
  const user = asRecord(envelope.user);
  const nsid = readString(user, 'id') ?? readString(user, 'nsid');

  if (!nsid) {
    return null;
  }

  return {
    nsid,
    username: readContent(user, 'username') ?? '',
  };
}

export function normalizeContacts(envelope: RawRecord): FlickrContact[] {
  const contacts: FlickrContact[] = [];

  for (const raw of readRecords(asRecord(envelope.contacts), 'contact')) {
    const nsid = readString(raw, 'nsid');
    if (!nsid) {
      continue;
    }

    contacts.push({
      nsid,
      username: readString(raw, 'username') ?? nsid,
      realname: readString(raw, 'realname') || undefined,
      iconUrl: buildBuddyIconUrl(nsid, readString(raw, 'iconserver'), readString(raw, 'iconfarm')),
      friend: readFlag(raw, 'friend'),
      family: readFlag(raw, 'family'),
    });
  }

  return contacts;
}

export function normalizePhoto(raw: RawRecord): FlickrPhoto | null {
  const id = readString(raw, 'id');
  if (!id) {
    return null;
  }

  return {
    id,
    owner: readString(raw, 'owner') ?? '',
    ownerName: readString(raw, 'ownername') ?? readString(raw, 'username'),
    title: readContent(raw, 'title') ?? '',
    description: readContent(raw, 'description') ?? '',
    thumbnailUrl: readString(raw, 'url_q'),
    mediumUrl: readString(raw, 'url_m'),
    dateUploaded: readString(raw, 'dateupload'),
    dateTaken: readString(raw, 'datetaken'),
    isPublic: readFlag(raw, 'ispublic'),
    isFriend: readFlag(raw, 'isfriend'),
    isFamily: readFlag(raw, 'isfamily'),
  };
}

export function normalizePhotoList(envelope: RawRecord): FlickrPhoto[] {
  const photos: FlickrPhoto[] = [];

  for (const raw of readRecords(asRecord(envelope.photos), 'photo')) {
    const photo = normalizePhoto(raw);
    if (photo) {
      photos.push(photo);
    }
  }

  return photos;
}

/** Page counters are passed through exactly as Flickr reports them. */
export function normalizePhotoPage(envelope: RawRecord, requested: { page: number; perPage: number }): PhotoPage {
  const container = asRecord(envelope.photos);
  const photos = normalizePhotoList(envelope);

  return {
    photos,
    page: readNumber(container, 'page') ?? requested.page,
    pages: readNumber(container, 'pages') ?? 1,
    perPage: readNumber(container, 'perpage') ?? requested.perPage,
    total: readNumber(container, 'total') ?? photos.length,
  };
}

export function normalizePhotoInfo(envelope: RawRecord): PhotoInfo | null {
  const photo = asRecord(envelope.photo);
  const id = readString(photo, 'id');

  if (!id) {
    return null;
  }

  const owner = asRecord(photo?.owner);
  const dates = asRecord(photo?.dates);
  const tags = readRecords(asRecord(photo?.tags), 'tag')
    .map((tag) => readContent(tag, '_content'))
    .filter((tag): tag is string => Boolean(tag));
  const pageUrl = readRecords(asRecord(photo?.urls), 'url').find(
    (url) => readString(url, 'type') === 'photopage',
  );

  return {
    id,
    title: readContent(photo, 'title') ?? '',
    description: readContent(photo, 'description') ?? '',
    ownerNsid: readString(owner, 'nsid') ?? '',
    ownerName: readString(owner, 'realname') || readString(owner, 'username') || '',
    tags,
    views: readNumber(photo, 'views'),
    comments: readNumber(asRecord(photo?.comments), '_content') ?? 0,
    dateUploaded: readString(photo, 'dateuploaded') ?? readString(dates, 'posted'),
    dateTaken: readString(dates, 'taken'),
    pageUrl: pageUrl ? readContent(pageUrl, '_content') : undefined,
  };
}

export function normalizeSizes(envelope: RawRecord): PhotoSize[] {
  const sizes: PhotoSize[] = [];

  for (const raw of readRecords(asRecord(envelope.sizes), 'size')) {
    const label = readString(raw, 'label');
    const source = readString(raw, 'source');
    if (!label || !source) {
      continue;
    }

    sizes.push({
      label,
      source,
      width: readNumber(raw, 'width') ?? 0,
      height: readNumber(raw, 'height') ?? 0,
    });
  }

  return sizes;
}

export function normalizeGroups(envelope: RawRecord): FlickrGroup[] {
  const groups: FlickrGroup[] = [];

  for (const raw of readRecords(asRecord(envelope.groups), 'group')) {
    const nsid = readString(raw, 'nsid') ?? readString(raw, 'id');
    if (!nsid) {
      continue;
    }

    groups.push({
      nsid,
      name: readContent(raw, 'name') ?? nsid,
      members: readNumber(raw, 'members'),
      iconUrl: buildBuddyIconUrl(nsid, readString(raw, 'iconserver'), readString(raw, 'iconfarm')),
    });
  }

  return groups;
}

/** Parse the form-encoded body returned by the OAuth request token endpoint. */
export function parseRequestTokenResponse(body: string): RequestToken | null {
  const params = new URLSearchParams(body.trim());
  const token = params.get('oauth_token');
  const tokenSecret = params.get('oauth_token_secret');

  if (!token || !tokenSecret) {
    return null;
  }

  return {
    token,
    tokenSecret,
    callbackConfirmed: params.get('oauth_callback_confirmed') === 'true',
  };
}

export function parseAccessTokenResponse(body: string): AccessToken | null {
  const params = new URLSearchParams(body.trim());
  const token = params.get('oauth_token');
  const tokenSecret = params.get('oauth_token_secret');

  if (!token || !tokenSecret) {
    return null;
  }

  return {
    token,
    tokenSecret,
    nsid: params.get('user_nsid') ?? undefined,
    username: params.get('username') ?? undefined,
    fullname: params.get('fullname') ?? undefined,
  };
}
