/**
 * Outcome of an entity creation. Services return these instead of throwing
 * for business failures; the HTTP layer maps `errorKind` to a status code.
 */

export const CREATION_ERROR_KINDS = [
  'NotFound',
  'InvalidInput',
  'Conflict',
  'DependencyFailure',
  'Unknown',
] as const;

export type CreationErrorKind = (typeof CREATION_ERROR_KINDS)[number];

/** Kinds produced while persisting, shared by every entity. */
export type StoreErrorKind = Extract<
  CreationErrorKind,
  'Conflict' | 'DependencyFailure' | 'Unknown'
>;

export interface CreationSuccess<E> {
  readonly success: true;
  readonly entity: E;
}

export interface CreationFailure<
  K extends CreationErrorKind = CreationErrorKind,
> {
  readonly success: false;
  readonly errorKind: K;
  readonly message: string;
}

export type CreationResult<
  E,
  K extends CreationErrorKind = CreationErrorKind,
> = CreationSuccess<E> | CreationFailure<K>;

export function created<E>(entity: E): CreationSuccess<E> {
  const result: CreationSuccess<E> = { success: true, entity };
  return Object.freeze(result);
}

export function rejected<K extends CreationErrorKind>(
  errorKind: K,
  message: string,
): CreationFailure<K> {
  const result: CreationFailure<K> = { success: false, errorKind, message };
  return Object.freeze(result);
}
