import type { PhotoPageView } from '../services/photos';

import { formatTimestamp } from './format';
import { Layout } from './Layout';

export interface PhotoPageProps {
  viewer?: string;
  view: PhotoPageView;
  now: Date;
}

export function PhotoPage({ viewer, view, now }: PhotoPageProps) {
  const { photo, imageUrl } = view;
  const title = photo.title || '(Untitled)';

  return (
    <Layout title={title} viewer={viewer}>
      {imageUrl ? <img className="photo-full" src={imageUrl} alt={title} style={{ maxWidth: '100%' }} /> : null}
      <div className="photo-meta">
        <div>{`By ${photo.ownerName || photo.ownerNsid}`}</div>
        <div>{`Uploaded: ${photo.dateUploaded ? formatTimestamp(photo.dateUploaded, now) : 'N/A'}`}</div>
        <div>{`Taken: ${photo.dateTaken ? formatTimestamp(photo.dateTaken, now) : 'N/A'}`}</div>
        <div>{`${photo.views ?? 0} views · ${photo.comments} comments`}</div>
      </div>
      {photo.description ? <p className="description">{photo.description}</p> : null}
      {photo.tags.length > 0 ? (
        <div className="tags">
          {photo.tags.map((tag) => (
            <span key={tag}>{tag}</span>
          ))}
        </div>
      ) : null}
      {photo.pageUrl ? (
        <p>
          <a href={photo.pageUrl}>View on Flickr</a>
        </p>
      ) : null}
    </Layout>
  );
}
