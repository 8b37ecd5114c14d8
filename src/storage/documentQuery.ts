/**
 * In-process document matching, projection and limiting shared by the storage
 * backends that keep documents outside a database engine.
 *
 * Filters follow the MongoDB shape for the subset the library needs: plain
 * values match by equality, and an object whose keys all start with `$` is read
 * as field operators (`$lt`, `$lte`, `$gt`, `$gte`, `$ne`, `$in`).
 */
import type { DocumentFilter, FieldOperators, QueryOptions, StorageDocument } from '../types/index.js';

const OPERATORS = new Set(['$lt', '$lte', '$gt', '$gte', '$ne', '$in']);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOperatorObject(value: unknown): value is FieldOperators {
  if (!isPlainObject(value)) {
    return false;
  }
  const keys = Object.keys(value);
  return keys.length > 0 && keys.every(key => OPERATORS.has(key));
}

/**
 * Structural equality for JSON-compatible values
 */
export function valuesEqual(left: unknown, right: unknown): boolean {
  if (left === right) {
    return true;
  }
  if (typeof left !== 'object' || typeof right !== 'object' || left === null || right === null) {
    return false;
  }
  if (Array.isArray(left) !== Array.isArray(right)) {
    return false;
  }
  if (Array.isArray(left) && Array.isArray(right)) {
    return left.length === right.length && left.every((item, index) => valuesEqual(item, right[index]));
  }
  if (!isPlainObject(left) || !isPlainObject(right)) {
    return false;
  }
  const leftKeys = Object.keys(left);
  const rightKeys = Object.keys(right);
  return leftKeys.length === rightKeys.length
    && leftKeys.every(key => Object.prototype.hasOwnProperty.call(right, key) && valuesEqual(left[key], right[key]));
}

function compare(value: unknown, bound: number | string): number | null {
  if (typeof value === 'number' && typeof bound === 'number') {
    return value - bound;
  }
  if (typeof value === 'string' && typeof bound === 'string') {
    return value < bound ? -1 : value > bound ? 1 : 0;
  }
  return null;
}

function matchesOperators(value: unknown, operators: FieldOperators): boolean {
  const checks: Array<[number | string | undefined, (diff: number) => boolean]> = [
    [operators.$lt, diff => diff < 0],
    [operators.$lte, diff => diff <= 0],
    [operators.$gt, diff => diff > 0],
    [operators.$gte, diff => diff >= 0]
  ];

  for (const [bound, accept] of checks) {
    if (bound === undefined) {
      continue;
    }
    const diff = compare(value, bound);
    if (diff === null || !accept(diff)) {
      return false;
    }
  }

  if ('$ne' in operators && valuesEqual(value, operators.$ne)) {
    return false;
  }
  if (operators.$in && !operators.$in.some(candidate => valuesEqual(value, candidate))) {
    return false;
  }
  return true;
}

/**
 * Checks a document against every field condition of the filter
 */
export function matchesFilter(document: StorageDocument, filter: DocumentFilter = {}): boolean {
  return Object.entries(filter).every(([field, condition]) => {
    const value = document[field];
    if (isOperatorObject(condition)) {
      return matchesOperators(value, condition);
    }
    return valuesEqual(value, condition);
  });
}

/**
 * Keeps only the listed columns; returns a copy of the whole document when none are listed
 */
export function projectColumns(document: StorageDocument, columns: string[] = []): StorageDocument {
  if (columns.length === 0) {
    return { ...document };
  }
  const projected: StorageDocument = {};
  for (const column of columns) {
    if (Object.prototype.hasOwnProperty.call(document, column)) {
      projected[column] = document[column];
    }
  }
  return projected;
}

/**
 * Filters, limits and projects a document list, preserving its order
 */
export function applyQuery(documents: StorageDocument[], options: QueryOptions = {}): StorageDocument[] {
  const { columns = [], filter = {}, count = 0 } = options;
  const matched = documents.filter(document => matchesFilter(document, filter));
  const limited = count > 0 ? matched.slice(0, count) : matched;
  return limited.map(document => projectColumns(document, columns));
}

/**
 * Narrows parsed JSON to a list of documents
 */
export function isDocumentList(value: unknown): value is StorageDocument[] {
  return Array.isArray(value) && value.every(isPlainObject);
}
