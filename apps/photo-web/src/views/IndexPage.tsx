import type { PhotoListing } from '../services/photos';

import { Layout } from './Layout';
import { PhotoCard } from './PhotoCard';

export interface PrivacyFilterLink {
  label: string;
  href: string;
  active: boolean;
}

export interface IndexPageProps {
  viewer?: string;
  listing: PhotoListing;
  /** Only offered for the viewer's own stream. */
  filters: PrivacyFilterLink[];
  previousHref?: string;
  nextHref?: string;
  now: Date;
}

export function IndexPage({ viewer, listing, filters, previousHref, nextHref, now }: IndexPageProps) {
  const title = listing.scope === 'own' ? 'Your photos' : 'Recent public photos';

  return (
    <Layout title={title} viewer={viewer}>
      {filters.length > 0 ? (
        <nav className="filters">
          {filters.map((filter) => (
            <a key={filter.href} href={filter.href} className={filter.active ? 'active' : undefined}>
              {filter.label}
            </a>
          ))}
        </nav>
      ) : null}
      {listing.photos.length === 0 ? (
        <p>No photos to show.</p>
      ) : (
        <ul className="photo-grid">
          {listing.photos.map((photo) => (
            <li key={photo.id}>
              <PhotoCard photo={photo} now={now} byline={listing.scope === 'recent' ? photo.ownerName : undefined} />
            </li>
          ))}
        </ul>
      )}
      <nav className="pager">
        {previousHref ? <a href={previousHref}>Previous</a> : null}
        <span>{`Page ${listing.page} of ${listing.pages}`}</span>
        {nextHref ? <a href={nextHref}>Next</a> : null}
      </nav>
    </Layout>
  );
}
