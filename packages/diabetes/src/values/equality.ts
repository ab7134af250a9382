/**
 * Structural equality shared by all value objects
 */

/**
 * Every value object carries a kind tag so that, say, a Carbohydrate of 10
 * and an ExerciseDuration of 10 never compare equal.
 */
export interface ValueObject {
  readonly kind: string;
}

/**
 * Same kind and same underlying fields => equal
 */
export function valueEquals<T extends ValueObject>(a: T, b: T): boolean {
  if (a === b) return true;

  const left = Object.entries(a);
  const right = new Map(Object.entries(b));
  if (left.length !== right.size) return false;

  return left.every(([key, value]) => right.has(key) && Object.is(right.get(key), value));
}
