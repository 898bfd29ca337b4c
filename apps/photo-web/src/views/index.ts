export { ErrorPage, type ErrorPageProps } from './ErrorPage';
export { FriendsPage, type FriendsPageProps } from './FriendsPage';
export { GroupsPage, type GroupsPageProps } from './GroupsPage';
export { IndexPage, type IndexPageProps, type PrivacyFilterLink } from './IndexPage';
export { PhotoPage, type PhotoPageProps } from './PhotoPage';
export { formatTimestamp, parseTimestamp } from './format';
export { renderPage } from './render';
