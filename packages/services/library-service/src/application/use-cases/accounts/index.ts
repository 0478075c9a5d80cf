export { RegisterUserUseCase, type AuthResult } from './RegisterUserUseCase';
export { LoginUserUseCase } from './LoginUserUseCase';
export { GetCurrentUserUseCase } from './GetCurrentUserUseCase';
export { UpdateProfileUseCase } from './UpdateProfileUseCase';
export { GetUserProfileUseCase } from './GetUserProfileUseCase';
export { ChangeUserRoleUseCase } from './ChangeUserRoleUseCase';
export { EnsureBootstrapAdminUseCase } from './EnsureBootstrapAdminUseCase';
