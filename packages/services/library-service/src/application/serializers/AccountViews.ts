import type { FollowCounts } from '@domains/social';
import type { Profile, User, UserSummary } from '@domains/accounts';

export interface ProfileWire {
  user_id: number;
  bio: string;
  updated_at: string;
}

export interface AccountWire {
  id: number;
  username: string;
  email: string | null;
  role: string;
  date_joined: string;
  profile: ProfileWire | null;
}

export interface PublicUserWire {
  id: number;
  username: string;
  role: string;
  date_joined: string;
  bio: string;
  followers_count: number;
  following_count: number;
  /** Only present when the viewer is signed in. */
  is_following?: boolean;
}

export function toProfileWire(profile: Profile): ProfileWire {
  return {
    user_id: profile.userId,
    bio: profile.bio,
    updated_at: profile.updatedAt.toISOString(),
  };
}

/**
 * The signed-in user's own view of their account. Never includes the hash.
 */
export function toAccountWire(user: User, profile: Profile | null): AccountWire {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    role: user.role,
    date_joined: user.createdAt.toISOString(),
    profile: profile ? toProfileWire(profile) : null,
  };
}

export function toPublicUserWire(
  user: User,
  profile: Profile | null,
  counts: FollowCounts,
  isFollowing?: boolean
): PublicUserWire {
  return {
    id: user.id,
    username: user.username,
    role: user.role,
    date_joined: user.createdAt.toISOString(),
    bio: profile?.bio ?? '',
    followers_count: counts.followers,
    following_count: counts.following,
    ...(isFollowing === undefined ? {} : { is_following: isFollowing }),
  };
}

export function toUserSummaryWire(user: UserSummary): { id: number; username: string } {
  return { id: user.id, username: user.username };
}
