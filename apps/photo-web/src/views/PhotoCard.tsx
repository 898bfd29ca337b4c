import type { FlickrPhoto } from '@photo-relay/flickr-client';

import { formatTimestamp } from './format';

export interface PhotoCardProps {
  photo: FlickrPhoto;
  now: Date;
  /** Extra line under the title, such as the contact who posted it. */
  byline?: string;
}

export function PhotoCard({ photo, now, byline }: PhotoCardProps) {
  const title = photo.title || '(Untitled)';

  return (
    <div className="photo-card">
      <a href={`/photo/${encodeURIComponent(photo.id)}`}>
        {photo.thumbnailUrl ? <img src={photo.thumbnailUrl} alt={title} width={150} height={150} /> : null}
      </a>
      <div className="photo-title">
        <a href={`/photo/${encodeURIComponent(photo.id)}`}>{title}</a>
      </div>
      <div className="photo-meta">
        {byline ? <div>{byline}</div> : null}
        <div>{`Uploaded: ${photo.dateUploaded ? formatTimestamp(photo.dateUploaded, now) : 'N/A'}`}</div>
        <div>{`Taken: ${photo.dateTaken ? formatTimestamp(photo.dateTaken, now) : 'N/A'}`}</div>
      </div>
    </div>
  );
}
