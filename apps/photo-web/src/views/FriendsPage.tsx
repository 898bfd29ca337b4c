import type { FlickrContact } from '@photo-relay/flickr-client';

import type { FriendWithPhoto } from '../services/photos';

import { Layout } from './Layout';
import { PhotoCard } from './PhotoCard';

export interface FriendsPageProps {
  viewer?: string;
  friends: FriendWithPhoto[];
  now: Date;
}

function displayName(contact: FlickrContact): string {
  return contact.realname || contact.username || contact.nsid;
}

export function FriendsPage({ viewer, friends, now }: FriendsPageProps) {
  return (
    <Layout title="Friends" viewer={viewer}>
      {friends.length === 0 ? <p>You have no contacts yet.</p> : null}
      <ul className="photo-grid">
        {friends.map(({ contact, latestPhoto }) => (
          <li key={contact.nsid} className="friend" data-nsid={contact.nsid}>
            <img src={contact.iconUrl} alt="" width={48} height={48} />
            <strong>{displayName(contact)}</strong>
            {latestPhoto?.status === 'found' ? (
              <PhotoCard photo={latestPhoto.value} now={now} />
            ) : latestPhoto?.status === 'not_found' ? (
              <p className="photo-meta">No recent photos</p>
            ) : latestPhoto?.status === 'unavailable' ? (
              <p className="photo-meta">Latest photo is unavailable right now</p>
            ) : null}
          </li>
        ))}
      </ul>
    </Layout>
  );
}
