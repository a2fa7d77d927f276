/**
 * Field Paths
 * Dotted property paths into a row type ('name', 'address.city')
 */

type Primitive = string | number | bigint | boolean | symbol | null | undefined;

type Leaf = Primitive | Date | ReadonlyArray<unknown> | ((...args: never[]) => unknown);

/**
 * All dotted paths of a row type. Dates, arrays and functions are leaves.
 */
export type FieldPath<T> = (T extends Leaf
  ? never
  : {
      [K in keyof T & string]: NonNullable<T[K]> extends Leaf
        ? K
        : K | `${K}.${FieldPath<NonNullable<T[K]>>}`;
    }[keyof T & string]) &
  string;

/**
 * Read the value at a dotted path. Missing intermediate objects yield undefined.
 */
export function getFieldValue(row: unknown, path: string): unknown {
  let current: unknown = row;
  for (const key of path.split('.')) {
    if (typeof current !== 'object' || current === null) {
      return undefined;
    }
    current = Reflect.get(current, key);
  }
  return current;
}

/**
 * Last segment of a path, used as the default column title
 */
export function fieldName(path: string): string {
  const index = path.lastIndexOf('.');
  return index === -1 ? path : path.slice(index + 1);
}
