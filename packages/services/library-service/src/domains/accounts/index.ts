export type { User, NewUser, Profile, UserSummary } from './entities/User';
export type { IUserRepository, IProfileRepository } from './repositories/IUserRepository';
