import type { FlickrGroup } from '@photo-relay/flickr-client';

import { Layout } from './Layout';

export interface GroupsPageProps {
  viewer?: string;
  groups: FlickrGroup[];
}

export function GroupsPage({ viewer, groups }: GroupsPageProps) {
  return (
    <Layout title="Groups" viewer={viewer}>
      {groups.length === 0 ? <p>You are not a member of any group.</p> : null}
      <ul className="photo-grid">
        {groups.map((group) => (
          <li key={group.nsid} className="group">
            <img src={group.iconUrl} alt="" width={48} height={48} />
            <a href={`https://www.flickr.com/groups/${encodeURIComponent(group.nsid)}/`}>{group.name}</a>
            {group.members !== undefined ? <div className="photo-meta">{`${group.members} members`}</div> : null}
          </li>
        ))}
      </ul>
    </Layout>
  );
}
