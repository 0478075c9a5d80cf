export { CatalogError, AccountError, SocialError } from './errors';
