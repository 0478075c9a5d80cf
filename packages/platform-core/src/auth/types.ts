/**
 * Authentication Types
 */

import type { AuthContext } from '@shelfwise/shared-contracts';

declare global {
  namespace Express {
    interface Request {
      authContext?: AuthContext;
    }
  }
}

export interface AuthOptions {
  /** Reject requests without a bearer token instead of treating them as anonymous. */
  required?: boolean;
}

export interface CallerRecord {
  role: string;
  username?: string;
}

/**
 * Loads the caller's current account so role changes apply to tokens already
 * issued. Resolves null when the account no longer exists.
 */
export type CallerLookup = (userId: number) => Promise<CallerRecord | null>;
