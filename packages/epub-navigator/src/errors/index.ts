export { ArchiveOpenError } from './archive-open-error';
export { PageNotFoundError } from './page-not-found-error';
