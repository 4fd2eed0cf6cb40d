import { ObjectTreeSource } from './object-tree-source';
import {
  comparePaths,
  compareSortKeys,
  getSourceAncestors,
  getSourcePath,
  isAttached,
  sourceChildren,
  toSortKey,
} from './tree-utils';

describe('tree-utils', () => {
  let source: ObjectTreeSource;

  beforeEach(() => {
    source = new ObjectTreeSource(
      ['name'],
      [
        { name: 'A', children: [{ name: 'A1' }, { name: 'A2', children: [{ name: 'A2x' }] }] },
        { name: 'B' },
      ],
    );
  });

  const at = (...names: string[]) => {
    const item = source.itemAtPath(names);
    if (!item) {
      throw new Error(`No item at ${names.join('/')}`);
    }
    return item;
  };

  it('lists the children of a parent', () => {
    expect(sourceChildren(source, null).map((item) => item.name)).toEqual(['A', 'B']);
    expect(sourceChildren(source, at('A')).map((item) => item.name)).toEqual(['A1', 'A2']);
  });

  it('gets ancestors root-most first', () => {
    expect(getSourceAncestors(source, at('A', 'A2', 'A2x')).map((item) => item.name)).toEqual([
      'A',
      'A2',
    ]);
    expect(getSourceAncestors(source, at('B'))).toEqual([]);
  });

  it('builds row paths and notices detached elements', () => {
    const leaf = at('A', 'A2', 'A2x');
    expect(getSourcePath(source, leaf)).toEqual([0, 1, 0]);
    expect(isAttached(source, leaf)).toBe(true);

    source.removeItems(null, 0);
    expect(getSourcePath(source, leaf)).toBeNull();
    expect(isAttached(source, leaf)).toBe(false);
  });

  it('compares paths in pre-order', () => {
    expect(comparePaths([0], [1])).toBeLessThan(0);
    expect(comparePaths([0], [0, 0])).toBeLessThan(0);
    expect(comparePaths([0, 3], [1])).toBeLessThan(0);
    expect(comparePaths([1, 0], [1, 0])).toBe(0);
  });

  it('compares sort keys as strings', () => {
    expect(compareSortKeys(9, 300)).toBe(1);
    expect(compareSortKeys('B', 'a')).toBe(-1);
    expect(compareSortKeys(undefined, '')).toBe(0);
    expect(toSortKey(null)).toBe('');
    expect(toSortKey(42)).toBe('42');
  });
});
