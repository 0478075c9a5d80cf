import { asc, desc, type AnyColumn, type SQL } from 'drizzle-orm';
import type { OrderTerm, PageRequest } from '@shelfwise/platform-core';

/** `%term%` with LIKE wildcards in the term taken literally. */
export function containsPattern(term: string): string {
  return `%${term.replace(/[\\%_]/g, match => `\\${match}`)}%`;
}

/**
 * Order terms → ORDER BY list, finishing with the id column in the last
 * term's direction so pages are stable.
 */
export function orderByTerms<TField extends string>(
  terms: OrderTerm<TField>[],
  columns: Record<TField, AnyColumn | SQL>,
  idColumn: AnyColumn
): SQL[] {
  const clauses = terms.map(term => (term.direction === 'desc' ? desc(columns[term.field]) : asc(columns[term.field])));
  const lastDirection = terms[terms.length - 1]?.direction;
  clauses.push(lastDirection === 'desc' ? desc(idColumn) : asc(idColumn));
  return clauses;
}

export function offsetOf(page: PageRequest): number {
  return (page.page - 1) * page.pageSize;
}
