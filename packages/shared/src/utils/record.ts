import { NO_INFO, VC_RECORD_FIELDS, type VcRecord } from '../types/index.js';

/**
 * Wrap a scalar model answer in a one-element list
 */
export function toList(value: string | string[]): string[] {
  return typeof value === 'string' ? [value] : value;
}

/**
 * True when the value is exactly the `['no info']` sentinel
 */
export function isNoInfo(value: string | string[]): boolean {
  return Array.isArray(value) && value.length === 1 && value[0] === NO_INFO;
}

/**
 * JSON with keys in canonical field order, independent of how the
 * record object was built. Used for ids and similarity queries.
 */
export function serializeVcRecord(record: VcRecord): string {
  const ordered: Record<string, string | string[]> = {};
  for (const field of VC_RECORD_FIELDS) {
    ordered[field] = record[field];
  }
  return JSON.stringify(ordered);
}
