/**
 * Scalar coercion for cell values
 */

import type { CellValue } from './table.js';

export type OutputType = 'string' | 'float' | 'int' | 'boolean';

export const OUTPUT_TYPES: readonly OutputType[] = ['string', 'float', 'int', 'boolean'];

export type CoercionResult =
  | { ok: true; value: CellValue }
  | { ok: false; reason: string };

const INT_PATTERN = /^[+-]?\d+$/;

/**
 * Coerce a cell to the requested scalar type. Null passes through.
 */
export function coerceValue(value: CellValue, type: OutputType): CoercionResult {
  if (value === null) {
    return { ok: true, value: null };
  }

  switch (type) {
    case 'string':
      return { ok: true, value: String(value) };

    case 'float': {
      if (typeof value === 'number') {
        return Number.isFinite(value) ? { ok: true, value } : { ok: false, reason: 'not a finite number' };
      }
      if (typeof value === 'string' && value.trim().length > 0) {
        const parsed = Number(value.trim());
        if (Number.isFinite(parsed)) {
          return { ok: true, value: parsed };
        }
      }
      return { ok: false, reason: `"${String(value)}" is not a float` };
    }

    case 'int': {
      if (typeof value === 'number') {
        return Number.isInteger(value) ? { ok: true, value } : { ok: false, reason: `${value} is not an integer` };
      }
      if (typeof value === 'string' && INT_PATTERN.test(value.trim())) {
        return { ok: true, value: parseInt(value.trim(), 10) };
      }
      return { ok: false, reason: `"${String(value)}" is not an integer` };
    }

    case 'boolean': {
      if (typeof value === 'boolean') {
        return { ok: true, value };
      }
      if (typeof value === 'string') {
        const lowered = value.trim().toLowerCase();
        if (lowered === 'true') return { ok: true, value: true };
        if (lowered === 'false') return { ok: true, value: false };
      }
      return { ok: false, reason: `"${String(value)}" is not a boolean` };
    }
  }
}

/**
 * String form used for literal key lookups (alias maps, vocabularies)
 */
export function cellToString(value: CellValue): string | null {
  return value === null ? null : String(value);
}
