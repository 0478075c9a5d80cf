import {
  ALLOW,
  CAPABILITY,
  decide,
  decideOwnership,
  type AuthContext,
  type Capability,
  type GateDecision,
} from '@shelfwise/shared-contracts';
import type { AccessPolicy } from './types.js';

/**
 * Role capabilities only: the gate from shared-contracts as a policy.
 */
export function capabilityPolicy<TEntity>(): AccessPolicy<TEntity> {
  return {
    check: (ctx: AuthContext, capability: Capability) => decide(ctx, capability),
  };
}

/**
 * Anyone may view; any signed-in user may create; edits and deletes
 * belong to the owner or to a role holding the capability.
 */
export function ownershipPolicy<TEntity>(ownerOf: (entity: TEntity) => number): AccessPolicy<TEntity> {
  return {
    check: (ctx: AuthContext, capability: Capability): GateDecision => {
      if (capability === CAPABILITY.VIEW || ctx.isAuthenticated) {
        return ALLOW;
      }
      return decide(ctx, capability);
    },
    checkObject: (ctx: AuthContext, capability: Capability, entity: TEntity): GateDecision => {
      if (capability === CAPABILITY.VIEW) {
        return ALLOW;
      }
      return decideOwnership(ctx, capability, ownerOf(entity));
    },
  };
}
