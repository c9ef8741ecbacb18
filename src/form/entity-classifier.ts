import type { EntityCategory } from '../types/index.js';
import { getEntityTables, type EntityTables } from './tables.js';

export interface EntityClassification {
  category: EntityCategory;
  subType: string;
  nonProfit: boolean;
}

function normalizeKey(value: string | undefined): string {
  return (value ?? '').trim().replace(/\s+/g, ' ').toLowerCase();
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function lookupByWords(table: Record<string, string> | undefined, key: string): string | undefined {
  if (!table || !key) return undefined;
  if (table[key] !== undefined) return table[key];

  const candidates = Object.keys(table).sort((a, b) => b.length - a.length);
  const hit = candidates.find((candidate) =>
    new RegExp(`(^|[^a-z])${escapeRegExp(candidate)}($|[^a-z])`).test(key),
  );
  return hit !== undefined ? table[hit] : undefined;
}

export function isNonProfit(description: string | undefined, tables: EntityTables = getEntityTables()): boolean {
  const text = normalizeKey(description);
  if (!text) return false;
  return tables.nonProfitKeywords.some((keyword) => text.includes(keyword.toLowerCase()));
}

/**
 * Map the raw entity-type string to a form category and sub-type. Pure: the
 * same three inputs always produce the same result.
 */
export function classifyEntity(
  entityType: string,
  description?: string,
  trustType?: string,
  tables: EntityTables = getEntityTables(),
): EntityClassification {
  const typeKey = normalizeKey(entityType);
  const category: EntityCategory = tables.categories[typeKey] ?? 'Other';
  const subTypes = tables.subTypes[category];
  const nonProfit = isNonProfit(description, tables);

  if (!subTypes) {
    return { category, subType: category, nonProfit };
  }

  const explicit =
    subTypes.byEntityType?.[typeKey] ??
    (category === 'Trust' ? lookupByWords(subTypes.byTrustType, normalizeKey(trustType)) : undefined);

  if (explicit !== undefined) {
    return { category, subType: explicit, nonProfit };
  }

  // no table entry pinned the sub-type; the description decides
  if (nonProfit && subTypes.nonProfit) {
    return { category, subType: subTypes.nonProfit, nonProfit };
  }

  return { category, subType: subTypes.default, nonProfit };
}
