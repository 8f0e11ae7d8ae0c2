/**
 * Row Predicates
 *
 * A small predicate tree the gateway compiles to a parameterized WHERE
 * clause. Column names are checked against the collection's columns before
 * they reach SQL.
 */

import { invalidInput } from '@palimpsest/core';
import { quoteIdentifier, type SqlValue } from '@palimpsest/storage';

// ============================================================================
// Types
// ============================================================================

export type Predicate =
  | { readonly kind: 'eq'; readonly column: string; readonly value: SqlValue }
  | { readonly kind: 'ne'; readonly column: string; readonly value: SqlValue }
  | { readonly kind: 'in'; readonly column: string; readonly values: readonly SqlValue[] }
  | { readonly kind: 'notIn'; readonly column: string; readonly values: readonly SqlValue[] }
  /** `column NOT IN (SELECT select FROM <same table> WHERE where)` */
  | { readonly kind: 'notInSelect'; readonly column: string; readonly select: string; readonly where: Predicate }
  | { readonly kind: 'and'; readonly predicates: readonly Predicate[] }
  | { readonly kind: 'or'; readonly predicates: readonly Predicate[] };

export type SortDirection = 'asc' | 'desc';

export interface OrderBy {
  readonly column: string;
  readonly direction: SortDirection;
}

export interface CompiledPredicate {
  readonly sql: string;
  readonly params: SqlValue[];
}

// ============================================================================
// Builders
// ============================================================================

export function eq(column: string, value: SqlValue): Predicate {
  return { kind: 'eq', column, value };
}

export function ne(column: string, value: SqlValue): Predicate {
  return { kind: 'ne', column, value };
}

export function inList(column: string, values: readonly SqlValue[]): Predicate {
  return { kind: 'in', column, values };
}

export function notInList(column: string, values: readonly SqlValue[]): Predicate {
  return { kind: 'notIn', column, values };
}

export function notInSelect(column: string, select: string, where: Predicate): Predicate {
  return { kind: 'notInSelect', column, select, where };
}

export function and(...predicates: Predicate[]): Predicate {
  return { kind: 'and', predicates };
}

export function or(...predicates: Predicate[]): Predicate {
  return { kind: 'or', predicates };
}

// ============================================================================
// Compilation
// ============================================================================

function column(name: string, columns: ReadonlySet<string>): string {
  if (!columns.has(name)) {
    throw invalidInput('column', name, `one of ${Array.from(columns).join(', ')}`);
  }
  return quoteIdentifier(name);
}

function placeholders(count: number): string {
  return new Array<string>(count).fill('?').join(', ');
}

/**
 * Compiles a predicate over `table` to SQL. Empty lists keep their set
 * meaning: `in []` matches nothing, `notIn []` everything, `and()`
 * everything and `or()` nothing.
 */
export function compilePredicate(
  predicate: Predicate,
  columns: ReadonlySet<string>,
  table: string
): CompiledPredicate {
  switch (predicate.kind) {
    case 'eq':
      return predicate.value === null
        ? { sql: `${column(predicate.column, columns)} IS NULL`, params: [] }
        : { sql: `${column(predicate.column, columns)} = ?`, params: [predicate.value] };
    case 'ne':
      return predicate.value === null
        ? { sql: `${column(predicate.column, columns)} IS NOT NULL`, params: [] }
        : { sql: `${column(predicate.column, columns)} != ?`, params: [predicate.value] };
    case 'in':
      if (predicate.values.length === 0) {
        return { sql: '0', params: [] };
      }
      return {
        sql: `${column(predicate.column, columns)} IN (${placeholders(predicate.values.length)})`,
        params: [...predicate.values],
      };
    case 'notIn':
      if (predicate.values.length === 0) {
        return { sql: '1', params: [] };
      }
      return {
        sql: `${column(predicate.column, columns)} NOT IN (${placeholders(predicate.values.length)})`,
        params: [...predicate.values],
      };
    case 'notInSelect': {
      const where = compilePredicate(predicate.where, columns, table);
      return {
        sql:
          `${column(predicate.column, columns)} NOT IN ` +
          `(SELECT ${column(predicate.select, columns)} FROM ${quoteIdentifier(table)} WHERE ${where.sql})`,
        params: where.params,
      };
    }
    case 'and':
    case 'or': {
      if (predicate.predicates.length === 0) {
        return { sql: predicate.kind === 'and' ? '1' : '0', params: [] };
      }
      const parts = predicate.predicates.map((p) => compilePredicate(p, columns, table));
      const joiner = predicate.kind === 'and' ? ' AND ' : ' OR ';
      return {
        sql: parts.map((p) => `(${p.sql})`).join(joiner),
        params: parts.flatMap((p) => p.params),
      };
    }
  }
}

export function compileOrderBy(orderBy: readonly OrderBy[], columns: ReadonlySet<string>): string {
  if (orderBy.length === 0) {
    return '';
  }
  const terms = orderBy.map(
    (term) => `${column(term.column, columns)} ${term.direction === 'desc' ? 'DESC' : 'ASC'}`
  );
  return ` ORDER BY ${terms.join(', ')}`;
}
