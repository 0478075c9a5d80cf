export { AuthController, type AuthControllerDeps } from './AuthController';
export { UserController, type UserControllerDeps } from './UserController';
export { SocialController, type SocialControllerDeps } from './SocialController';
export { CatalogController } from './CatalogController';
