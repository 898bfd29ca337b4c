export { loadConfig } from './env';
export type { AppConfig, FriendsPhotoStrategy, StoreDriver } from './env';
