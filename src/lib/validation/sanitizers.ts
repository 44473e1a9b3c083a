import type { TransformFnParams } from 'class-transformer';

/** Trim; null/undefined become the empty string. */
export function sanitizeString(value: string | null | undefined): string {
  return value === null || value === undefined ? '' : value.trim();
}

/** Trim and lowercase. */
export function sanitizeEmail(value: string | null | undefined): string {
  return sanitizeString(value).toLowerCase();
}

/** Optional free text: blank becomes null. */
export function emptyToNull(value: string | null | undefined): string | null {
  const s = sanitizeString(value);
  return s.length === 0 ? null : s;
}

/*
 * `@Transform` adapters for request DTOs. Non-string input is passed
 * through untouched so the type validators still see it.
 */

export function trimInput({ value }: TransformFnParams): unknown {
  return typeof value === 'string' ? sanitizeString(value) : value;
}

export function emailInput({ value }: TransformFnParams): unknown {
  return typeof value === 'string' ? sanitizeEmail(value) : value;
}

export function optionalTextInput({ value }: TransformFnParams): unknown {
  if (value === null || value === undefined) return null;
  return typeof value === 'string' ? emptyToNull(value) : value;
}
