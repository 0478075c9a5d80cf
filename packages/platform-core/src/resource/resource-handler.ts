/**
 * ResourceHandler
 *
 * Runs one CRUD request through gate → validation → store → rendering.
 * Every outcome is an envelope plus the stages it passed:
 *
 *   received → authorized → validated → persisted → rendered
 *                  ↘            ↘            ↘
 *                               rejected
 *
 * Reads skip `validated`. Errors the store raises as DomainErrors become
 * rejections; anything else propagates to the Express error handler.
 */

import {
  CAPABILITY,
  buildPaginationMeta,
  createErrorEnvelope,
  createListEnvelope,
  createSuccessEnvelope,
  denialStatusCode,
  type AuthContext,
  type Capability,
  type FieldErrors,
  type GateDecision,
  type SuccessEnvelope,
} from '@shelfwise/shared-contracts';
import type { Logger } from 'winston';
import { DomainError, toEnvelopeCode } from '../error-handling/errors.js';
import { withTimeout } from '../database/withTimeout.js';
import { getCorrelationId } from '../logging/correlation.js';
import { getLogger } from '../logging/logger.js';
import { capabilityPolicy } from './policies.js';
import { DEFAULT_PAGE_SIZE, parseId, parsePage } from './query-params.js';
import type {
  AccessPolicy,
  EntityStore,
  HandlerOutcome,
  QueryFilter,
  QueryParams,
  RequestStage,
  Serializer,
} from './types.js';

export interface ResourceDefinition<TEntity, TInput, TCreate, TQuery> {
  /** Singular display name, e.g. "Book". */
  name: string;
  /** Plural display name, e.g. "Books". */
  pluralName: string;
  /** Envelope key for one entity, e.g. "book". */
  dataKey: string;
  /** Envelope key for a page of entities, e.g. "books". */
  listKey: string;
  store: EntityStore<TEntity, TCreate, Partial<TInput>, TQuery>;
  serializer: Serializer<TEntity, TInput>;
  filter: QueryFilter<TQuery>;
  idOf: (entity: TEntity) => number;
  /** Validated input plus caller → the fields the store creates from. */
  toCreateFields: (input: TInput, ctx: AuthContext) => TCreate;
  /** What a delete reports back; defaults to the full wire form. */
  summarize?: (entity: TEntity) => Record<string, unknown>;
  policy?: AccessPolicy<TEntity>;
  storeTimeoutMs: number;
  defaultPageSize?: number;
  logger?: Logger;
}

class Trail {
  readonly stages: RequestStage[] = ['received'];

  advance(stage: RequestStage): void {
    this.stages.push(stage);
  }

  render(statusCode: number, body: SuccessEnvelope): HandlerOutcome {
    this.advance('rendered');
    return { statusCode, body, trail: this.stages };
  }

  reject(
    statusCode: number,
    message: string,
    options?: { code?: string; errors?: FieldErrors; retryable?: boolean }
  ): HandlerOutcome {
    this.advance('rejected');
    return {
      statusCode,
      body: createErrorEnvelope(toEnvelopeCode(options?.code, statusCode), message, {
        errors: options?.errors,
        correlationId: getCorrelationId(),
        retryable: options?.retryable,
      }),
      trail: this.stages,
    };
  }
}

export class ResourceHandler<TEntity, TInput, TCreate = TInput, TQuery = unknown> {
  private readonly policy: AccessPolicy<TEntity>;
  private readonly logger: Logger;

  constructor(private readonly definition: ResourceDefinition<TEntity, TInput, TCreate, TQuery>) {
    this.policy = definition.policy ?? capabilityPolicy<TEntity>();
    this.logger = definition.logger ?? getLogger(`resource:${definition.dataKey}`);
  }

  get name(): string {
    return this.definition.name;
  }

  async list(ctx: AuthContext, params: QueryParams): Promise<HandlerOutcome> {
    const trail = new Trail();
    const denied = this.gate(trail, this.policy.check(ctx, CAPABILITY.VIEW));
    if (denied) return denied;

    const { store, filter, serializer } = this.definition;
    const page = parsePage(params, this.definition.defaultPageSize ?? DEFAULT_PAGE_SIZE);

    return this.persist(trail, 'list', () => store.list(filter.parse(params, ctx), page), result =>
      trail.render(
        200,
        createListEnvelope(
          `${this.definition.pluralName} retrieved successfully`,
          this.definition.listKey,
          result.items.map(item => serializer.toWire(item)),
          buildPaginationMeta(result.total, page.page, page.pageSize),
          filter.capabilities
        )
      )
    );
  }

  async retrieve(ctx: AuthContext, rawId: string | undefined): Promise<HandlerOutcome> {
    const trail = new Trail();
    const denied = this.gate(trail, this.policy.check(ctx, CAPABILITY.VIEW));
    if (denied) return denied;

    const id = parseId(rawId);
    if (id === null) return this.notFound(trail);

    return this.persist(trail, 'get', () => this.definition.store.get(id), entity =>
      entity === null
        ? this.notFound(trail)
        : trail.render(
            200,
            createSuccessEnvelope(
              `${this.definition.name} retrieved successfully`,
              this.definition.dataKey,
              this.definition.serializer.toWire(entity)
            )
          )
    );
  }

  async create(ctx: AuthContext, body: unknown): Promise<HandlerOutcome> {
    const trail = new Trail();
    const denied = this.gate(trail, this.policy.check(ctx, CAPABILITY.CREATE));
    if (denied) return denied;

    const validated = this.definition.serializer.fromWire(body, false);
    if (!validated.success) {
      return trail.reject(400, 'Validation failed', { errors: validated.errors });
    }
    trail.advance('validated');

    const input = validated.data;
    const create = () => this.definition.store.create(this.definition.toCreateFields(input, ctx));
    return this.persist(trail, 'create', create, entity => {
      this.logger.info(`${this.definition.name} created`, { id: this.definition.idOf(entity), actorId: ctx.userId });
      return trail.render(
        201,
        createSuccessEnvelope(
          `${this.definition.name} created successfully`,
          this.definition.dataKey,
          this.definition.serializer.toWire(entity)
        )
      );
    });
  }

  /**
   * PUT validates a full payload; PATCH (`partial`) only the supplied fields.
   */
  async update(ctx: AuthContext, rawId: string | undefined, body: unknown, partial: boolean): Promise<HandlerOutcome> {
    const trail = new Trail();
    const denied = await this.authorizeObject(trail, ctx, CAPABILITY.EDIT, rawId);
    if (denied) return denied;

    const id = parseId(rawId);
    if (id === null) return this.notFound(trail);

    const validated = partial
      ? this.definition.serializer.fromWire(body, true)
      : this.definition.serializer.fromWire(body, false);
    if (!validated.success) {
      return trail.reject(400, 'Validation failed', { errors: validated.errors });
    }
    trail.advance('validated');

    const fields: Partial<TInput> = validated.data;
    return this.persist(trail, 'update', () => this.definition.store.update(id, fields), entity => {
      if (entity === null) return this.notFound(trail);
      this.logger.info(`${this.definition.name} updated`, { id, actorId: ctx.userId, partial });
      return trail.render(
        200,
        createSuccessEnvelope(
          `${this.definition.name} updated successfully`,
          this.definition.dataKey,
          this.definition.serializer.toWire(entity)
        )
      );
    });
  }

  async destroy(ctx: AuthContext, rawId: string | undefined): Promise<HandlerOutcome> {
    const trail = new Trail();
    const denied = await this.authorizeObject(trail, ctx, CAPABILITY.DELETE, rawId);
    if (denied) return denied;

    const id = parseId(rawId);
    if (id === null) return this.notFound(trail);

    return this.persist(trail, 'delete', () => this.definition.store.delete(id), entity => {
      if (entity === null) return this.notFound(trail);
      this.logger.info(`${this.definition.name} deleted`, { id, actorId: ctx.userId });
      const summary = this.definition.summarize
        ? this.definition.summarize(entity)
        : this.definition.serializer.toWire(entity);
      return trail.render(
        200,
        createSuccessEnvelope(`${this.definition.name} deleted successfully`, `deleted_${this.definition.dataKey}`, summary)
      );
    });
  }

  private gate(trail: Trail, decision: GateDecision): HandlerOutcome | null {
    if (decision.allowed) {
      trail.advance('authorized');
      return null;
    }
    const statusCode = denialStatusCode(decision.reason);
    this.logger.log(statusCode === 401 ? 'info' : 'warn', `${this.definition.name} request denied`, {
      reason: decision.reason,
    });
    return trail.reject(statusCode, decision.message);
  }

  /**
   * Role check first; when the policy has an object rule, load the entity
   * (404 if missing) and apply it before anything is validated.
   */
  private async authorizeObject(
    trail: Trail,
    ctx: AuthContext,
    capability: Capability,
    rawId: string | undefined
  ): Promise<HandlerOutcome | null> {
    const roleDecision = this.policy.check(ctx, capability);
    const checkObject = this.policy.checkObject;
    if (!roleDecision.allowed || !checkObject) {
      return this.gate(trail, roleDecision);
    }

    const id = parseId(rawId);
    const entity =
      id === null
        ? null
        : await withTimeout(`${this.definition.dataKey}.get`, this.definition.storeTimeoutMs, () =>
            this.definition.store.get(id)
          );
    if (entity === null) {
      return this.notFound(trail);
    }
    return this.gate(trail, checkObject(ctx, capability, entity));
  }

  private async persist<TResult>(
    trail: Trail,
    operation: string,
    call: () => Promise<TResult>,
    render: (result: TResult) => HandlerOutcome
  ): Promise<HandlerOutcome> {
    let result: TResult;
    try {
      result = await withTimeout(`${this.definition.dataKey}.${operation}`, this.definition.storeTimeoutMs, call);
    } catch (error) {
      if (error instanceof DomainError && (error.statusCode < 500 || error.retryable)) {
        this.logger.warn(`${this.definition.name} ${operation} rejected by store`, {
          statusCode: error.statusCode,
          error: error.message,
        });
        return trail.reject(error.statusCode, error.message, {
          code: error.code,
          errors: error.fieldErrors,
          retryable: error.retryable,
        });
      }
      throw error;
    }
    trail.advance('persisted');
    return render(result);
  }

  private notFound(trail: Trail): HandlerOutcome {
    return trail.reject(404, `${this.definition.name} not found`);
  }
}
