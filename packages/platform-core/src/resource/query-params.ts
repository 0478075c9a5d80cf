import type { OrderTerm, PageRequest, QueryParams } from './types.js';

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

/**
 * First value of a query parameter as a trimmed, non-empty string
 */
export function readString(params: QueryParams, key: string): string | undefined {
  const raw = params[key];
  const value: unknown = Array.isArray(raw) ? raw[0] : raw;
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

/**
 * Integer query parameter; anything non-numeric reads as absent
 */
export function readInteger(params: QueryParams, key: string): number | undefined {
  const value = readString(params, key);
  if (value === undefined || !/^-?\d+$/.test(value)) return undefined;
  const parsed = Number(value);
  return Number.isSafeInteger(parsed) ? parsed : undefined;
}

export function readBoolean(params: QueryParams, key: string): boolean | undefined {
  const value = readString(params, key)?.toLowerCase();
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  return undefined;
}

/**
 * Whitespace/comma separated search terms
 */
export function readSearchTerms(params: QueryParams, key = 'search'): string[] {
  const value = readString(params, key);
  if (!value) return [];
  return value.split(/[\s,]+/).filter(term => term.length > 0);
}

/**
 * `ordering=title,-publication_year` → order terms over the allowed fields.
 * Unknown fields are skipped; a field listed twice keeps its first position.
 */
export function parseOrdering<TField extends string>(
  params: QueryParams,
  allowed: readonly TField[],
  key = 'ordering'
): OrderTerm<TField>[] {
  const value = readString(params, key);
  if (!value) return [];

  const terms: OrderTerm<TField>[] = [];
  for (const token of value.split(',')) {
    const trimmed = token.trim();
    const descending = trimmed.startsWith('-');
    const name = descending ? trimmed.slice(1) : trimmed;
    const field = allowed.find(candidate => candidate === name);
    if (field && !terms.some(term => term.field === field)) {
      terms.push({ field, direction: descending ? 'desc' : 'asc' });
    }
  }
  return terms;
}

export function parsePage(params: QueryParams, defaultPageSize = DEFAULT_PAGE_SIZE): PageRequest {
  const page = readInteger(params, 'page');
  const pageSize = readInteger(params, 'page_size');
  return {
    page: page !== undefined && page >= 1 ? page : 1,
    pageSize: pageSize !== undefined && pageSize >= 1 ? Math.min(pageSize, MAX_PAGE_SIZE) : defaultPageSize,
  };
}

/**
 * Parse a path id. Non-numeric ids match nothing.
 */
export function parseId(raw: string | undefined): number | null {
  if (!raw || !/^\d+$/.test(raw)) return null;
  const id = Number(raw);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}
