export {
  PerContactLatestPhotoStrategy,
  SnapshotLatestPhotoStrategy,
  createLatestPhotoStrategy,
  type LatestPhotoStrategy,
} from './latest-photo-strategy';
export { DEFAULT_PER_PAGE, PhotoService, type PhotoServiceOptions } from './photo-service';
export type {
  CallbackParams,
  FriendWithPhoto,
  LatestPhotoContext,
  ListPhotosQuery,
  PhotoListing,
  PhotoPageView,
  PhotoSummary,
  Viewer,
} from './types';
export { callUpstream } from './upstream';
