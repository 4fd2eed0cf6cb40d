import { TreeSource } from '../types/tree-source';

export function sourceChildren<S>(
  source: TreeSource<S>,
  parent: S | null,
): S[] {
  const children: S[] = [];
  const count = source.childCount(parent);

  for (let row = 0; row < count; row += 1) {
    const child = source.childAt(parent, row);
    if (child !== null) {
      children.push(child);
    }
  }

  return children;
}

/** Ancestors of `element`, root-most first, excluding the `null` root. */
export function getSourceAncestors<S>(
  source: TreeSource<S>,
  element: S,
): S[] {
  const ancestors: S[] = [];
  let current = source.parentOf(element);

  while (current !== null) {
    ancestors.unshift(current);
    current = source.parentOf(current);
  }

  return ancestors;
}

/** Row indices from the root down to `element`; `null` once it is detached. */
export function getSourcePath<S>(
  source: TreeSource<S>,
  element: S,
): number[] | null {
  const path: number[] = [];
  let current: S | null = element;

  while (current !== null) {
    const row = source.rowOf(current);
    if (row < 0) {
      return null;
    }
    path.unshift(row);
    current = source.parentOf(current);
  }

  return path;
}

export function isAttached<S>(source: TreeSource<S>, element: S): boolean {
  return getSourcePath(source, element) !== null;
}

/** Pre-order comparison of two row paths. */
export function comparePaths(a: readonly number[], b: readonly number[]): number {
  const length = Math.min(a.length, b.length);

  for (let index = 0; index < length; index += 1) {
    const left = a[index] ?? 0;
    const right = b[index] ?? 0;
    if (left !== right) {
      return left - right;
    }
  }

  return a.length - b.length;
}

/** Code-unit string ordering; values compare through `String()`. */
export function compareSortKeys(a: unknown, b: unknown): number {
  const left = toSortKey(a);
  const right = toSortKey(b);
  if (left < right) {
    return -1;
  }
  if (left > right) {
    return 1;
  }
  return 0;
}

export function toSortKey(value: unknown): string {
  return value === null || value === undefined ? '' : String(value);
}
