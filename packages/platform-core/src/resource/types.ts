/**
 * Resource CRUD contracts: the store, serializer, filter and access policy
 * a ResourceHandler is assembled from.
 */

import type {
  AuthContext,
  Capability,
  ErrorEnvelope,
  FieldErrors,
  GateDecision,
  QueryCapabilities,
  SuccessEnvelope,
} from '@shelfwise/shared-contracts';

export type QueryParams = Record<string, unknown>;

export interface PageRequest {
  page: number;
  pageSize: number;
}

export interface ListResult<TEntity> {
  items: TEntity[];
  total: number;
}

export type SortDirection = 'asc' | 'desc';

export interface OrderTerm<TField extends string> {
  field: TField;
  direction: SortDirection;
}

/**
 * Persistence for one entity type. `null` means no row with that id.
 * Constraint violations are thrown as DomainErrors (400 for a bad
 * reference, 409 for a duplicate).
 */
export interface EntityStore<TEntity, TCreate, TUpdate, TQuery> {
  get(id: number): Promise<TEntity | null>;
  list(query: TQuery, page: PageRequest): Promise<ListResult<TEntity>>;
  create(fields: TCreate): Promise<TEntity>;
  update(id: number, fields: TUpdate): Promise<TEntity | null>;
  delete(id: number): Promise<TEntity | null>;
}

export type ValidationResult<T> = { success: true; data: T } | { success: false; errors: FieldErrors };

export interface Serializer<TEntity, TInput> {
  toWire(entity: TEntity): Record<string, unknown>;
  fromWire(data: unknown, partial: false): ValidationResult<TInput>;
  fromWire(data: unknown, partial: true): ValidationResult<Partial<TInput>>;
}

/**
 * Turns request query parameters into a store query. Unknown or malformed
 * parameters are dropped, never rejected.
 */
export interface QueryFilter<TQuery> {
  readonly capabilities: QueryCapabilities;
  parse(params: QueryParams, ctx: AuthContext): TQuery;
}

export interface AccessPolicy<TEntity> {
  check(ctx: AuthContext, capability: Capability): GateDecision;
  /** Runs after the entity is loaded, for owner-aware rules. */
  checkObject?(ctx: AuthContext, capability: Capability, entity: TEntity): GateDecision;
}

export type RequestStage = 'received' | 'authorized' | 'validated' | 'persisted' | 'rendered' | 'rejected';

export interface HandlerOutcome {
  statusCode: number;
  body: SuccessEnvelope | ErrorEnvelope;
  /** Stages the request passed through, ending in `rendered` or `rejected`. */
  trail: RequestStage[];
}
