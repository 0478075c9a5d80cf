/**
 * ServiceFactory
 *
 * Wires stores, use cases and controllers for one app instance. Tests build
 * their own factory over the memory driver.
 */

import { StandardJWTService, type CallerLookup } from '@shelfwise/platform-core';
import type { ServiceConfig } from '@config/service-config';
import {
  ChangeUserRoleUseCase,
  EnsureBootstrapAdminUseCase,
  FollowUserUseCase,
  GetBookStatsUseCase,
  GetCurrentUserUseCase,
  GetFeedUseCase,
  GetUserProfileUseCase,
  LikePostUseCase,
  ListFollowsUseCase,
  ListNotificationsUseCase,
  LoginUserUseCase,
  MarkAllNotificationsReadUseCase,
  MarkNotificationReadUseCase,
  RegisterUserUseCase,
  UnfollowUserUseCase,
  UnlikePostUseCase,
  UpdateProfileUseCase,
  createStoreGuard,
  type StoreGuard,
} from '@application/use-cases';
import { AuthController, CatalogController, SocialController, UserController } from '@presentation/controllers';
import {
  createAuthorHandler,
  createBookHandler,
  createCommentHandler,
  createLibraryHandler,
  createPostHandler,
} from '@presentation/resources';
import type { Repositories } from './repositories';

export class ServiceFactory {
  readonly jwtService: StandardJWTService;
  private readonly guard: StoreGuard;

  constructor(
    private readonly config: ServiceConfig,
    readonly repositories: Repositories
  ) {
    this.jwtService = new StandardJWTService(config.jwt);
    this.guard = createStoreGuard(config.timeouts.store);
  }

  /** Current role per request, so role changes reach tokens already issued. */
  createCallerLookup(): CallerLookup {
    return userId => this.guard('users.findById', () => this.repositories.users.findById(userId));
  }

  createBookHandler() {
    return createBookHandler(this.repositories.books, this.config.timeouts.store);
  }

  createAuthorHandler() {
    return createAuthorHandler(this.repositories.authors, this.config.timeouts.store);
  }

  createLibraryHandler() {
    return createLibraryHandler(this.repositories.libraries, this.config.timeouts.store);
  }

  createPostHandler() {
    return createPostHandler(this.repositories.posts, this.config.timeouts.store);
  }

  createCommentHandler() {
    return createCommentHandler(this.repositories.comments, this.config.timeouts.store);
  }

  createCatalogController(): CatalogController {
    return new CatalogController(new GetBookStatsUseCase(this.repositories.books, this.guard));
  }

  createAuthController(): AuthController {
    const { users, profiles } = this.repositories;
    return new AuthController({
      registerUser: new RegisterUserUseCase(users, profiles, this.jwtService, this.config.bcryptRounds, this.guard),
      loginUser: new LoginUserUseCase(users, profiles, this.jwtService, this.guard),
      getCurrentUser: new GetCurrentUserUseCase(users, profiles, this.guard),
      updateProfile: new UpdateProfileUseCase(profiles, this.guard),
    });
  }

  createUserController(): UserController {
    const { users, profiles, follows } = this.repositories;
    return new UserController({
      getUserProfile: new GetUserProfileUseCase(users, profiles, follows, this.guard),
      changeUserRole: new ChangeUserRoleUseCase(users, profiles, this.guard),
      followUser: new FollowUserUseCase(users, follows, this.guard),
      unfollowUser: new UnfollowUserUseCase(users, follows, this.guard),
      listFollows: new ListFollowsUseCase(users, follows, this.guard),
    });
  }

  createSocialController(): SocialController {
    const { posts, likes, follows, notifications } = this.repositories;
    return new SocialController({
      likePost: new LikePostUseCase(posts, likes, notifications, this.guard),
      unlikePost: new UnlikePostUseCase(posts, likes, this.guard),
      getFeed: new GetFeedUseCase(follows, posts, this.guard),
      listNotifications: new ListNotificationsUseCase(notifications, this.guard),
      markNotificationRead: new MarkNotificationReadUseCase(notifications, this.guard),
      markAllNotificationsRead: new MarkAllNotificationsReadUseCase(notifications, this.guard),
    });
  }

  createEnsureBootstrapAdminUseCase(): EnsureBootstrapAdminUseCase {
    const { users, profiles } = this.repositories;
    return new EnsureBootstrapAdminUseCase(users, profiles, this.config.bcryptRounds, this.guard);
  }
}
