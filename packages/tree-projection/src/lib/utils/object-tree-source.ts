import { Observable, Subject } from 'rxjs';

import { SourceChangeEvent } from '../types/tree-events';
import { TreeSource, TreeValueRole } from '../types/tree-source';

export interface ObjectTreeItemInit {
  name: string;
  /** Values of fields 1..n; field 0 is the name. */
  values?: unknown[];
  children?: ObjectTreeItemInit[];
}

export class ObjectTreeItem {
  parent: ObjectTreeItem | null = null;
  readonly children: ObjectTreeItem[] = [];

  constructor(
    public name: string,
    public values: unknown[] = [],
  ) {}

  static from(init: ObjectTreeItemInit): ObjectTreeItem {
    const item = new ObjectTreeItem(init.name, init.values ? [...init.values] : []);
    for (const childInit of init.children ?? []) {
      const child = ObjectTreeItem.from(childInit);
      child.parent = item;
      item.children.push(child);
    }
    return item;
  }
}

/**
 * In-memory {@link TreeSource} over plain named items. Every mutation goes
 * through this class so the matching change event is emitted after it.
 */
export class ObjectTreeSource implements TreeSource<ObjectTreeItem> {
  private readonly events = new Subject<SourceChangeEvent<ObjectTreeItem>>();
  private roots: ObjectTreeItem[] = [];

  readonly changes$: Observable<SourceChangeEvent<ObjectTreeItem>> =
    this.events.asObservable();

  constructor(
    readonly columns: readonly string[] = ['name'],
    roots: ObjectTreeItemInit[] = [],
  ) {
    this.roots = roots.map((init) => ObjectTreeItem.from(init));
  }

  get topLevelItems(): readonly ObjectTreeItem[] {
    return this.roots;
  }

  fieldCount(): number {
    return this.columns.length;
  }

  childCount(parent: ObjectTreeItem | null): number {
    return this.childrenOf(parent).length;
  }

  childAt(parent: ObjectTreeItem | null, row: number): ObjectTreeItem | null {
    return this.childrenOf(parent)[row] ?? null;
  }

  parentOf(element: ObjectTreeItem): ObjectTreeItem | null {
    return element.parent;
  }

  rowOf(element: ObjectTreeItem): number {
    return this.childrenOf(element.parent).indexOf(element);
  }

  /** `display` and `edit` read the same value; other roles have none. */
  valueAt(element: ObjectTreeItem, field: number, role: TreeValueRole = 'display'): unknown {
    if (role !== 'display' && role !== 'edit') {
      return undefined;
    }
    return field === 0 ? element.name : element.values[field - 1];
  }

  /** Finds an item by its chain of names from the top level. */
  itemAtPath(names: readonly string[]): ObjectTreeItem | null {
    let current: ObjectTreeItem | null = null;
    for (const name of names) {
      const next: ObjectTreeItem | undefined = this.childrenOf(current).find(
        (child) => child.name === name,
      );
      if (!next) {
        return null;
      }
      current = next;
    }
    return current;
  }

  insertItems(
    parent: ObjectTreeItem | null,
    row: number,
    items: readonly (ObjectTreeItem | ObjectTreeItemInit)[],
  ): ObjectTreeItem[] {
    if (items.length === 0) {
      return [];
    }

    const siblings = this.childrenOf(parent);
    const at = Math.max(0, Math.min(row, siblings.length));
    const inserted = items.map((item) =>
      item instanceof ObjectTreeItem ? item : ObjectTreeItem.from(item),
    );
    for (const item of inserted) {
      item.parent = parent;
    }
    siblings.splice(at, 0, ...inserted);

    this.events.next({
      type: 'rowsInserted',
      parent,
      first: at,
      last: at + inserted.length - 1,
    });
    return inserted;
  }

  appendChild(
    parent: ObjectTreeItem | null,
    item: ObjectTreeItem | ObjectTreeItemInit,
  ): ObjectTreeItem {
    const [inserted] = this.insertItems(parent, this.childCount(parent), [item]);
    if (!inserted) {
      throw new Error('Append did not insert an item');
    }
    return inserted;
  }

  /** Removed items are detached: their parent link is cleared. */
  removeItems(parent: ObjectTreeItem | null, first: number, last = first): ObjectTreeItem[] {
    const siblings = this.childrenOf(parent);
    if (first < 0 || last < first || last >= siblings.length) {
      throw new RangeError(
        `Cannot remove rows ${first}..${last} from a parent with ${siblings.length} children`,
      );
    }

    const removed = siblings.splice(first, last - first + 1);
    for (const item of removed) {
      item.parent = null;
    }

    this.events.next({ type: 'rowsRemoved', parent, first, last });
    return removed;
  }

  setValue(item: ObjectTreeItem, field: number, value: unknown): void {
    if (field === 0) {
      item.name = String(value);
    } else {
      item.values[field - 1] = value;
    }
    this.events.next({ type: 'dataChanged', topLeft: item, bottomRight: item, fields: [field] });
  }

  reset(roots: readonly ObjectTreeItemInit[]): void {
    this.roots = roots.map((init) => ObjectTreeItem.from(init));
    this.events.next({ type: 'reset' });
  }

  sortChildren(
    parent: ObjectTreeItem | null,
    compare: (a: ObjectTreeItem, b: ObjectTreeItem) => number,
  ): void {
    this.childrenOf(parent).sort(compare);
    this.events.next({ type: 'layoutChanged' });
  }

  /**
   * Walks `parts` by name below `parent`, reusing existing items and creating
   * missing ones one row at a time. Returns the last item of the path.
   */
  insertPath(parts: readonly string[], parent: ObjectTreeItem | null = null): ObjectTreeItem | null {
    let current = parent;
    for (const part of parts) {
      const existing = this.childrenOf(current).find((child) => child.name === part);
      current = existing ?? this.appendChild(current, { name: part });
    }
    return current;
  }

  /**
   * Inserts one separator-delimited path per non-empty line, as produced by
   * hierarchical node path listings (`|group|mesh|shape`).
   */
  insertPathsFromText(
    text: string,
    parent: ObjectTreeItem | null = null,
    separator = '|',
  ): ObjectTreeItem[] {
    const leaves: ObjectTreeItem[] = [];
    for (const line of text.split(/\r?\n/)) {
      const parts = line
        .trim()
        .split(separator)
        .map((part) => part.trim())
        .filter((part) => part.length > 0);
      if (parts.length === 0) {
        continue;
      }
      const leaf = this.insertPath(parts, parent);
      if (leaf) {
        leaves.push(leaf);
      }
    }
    return leaves;
  }

  private childrenOf(parent: ObjectTreeItem | null): ObjectTreeItem[] {
    return parent ? parent.children : this.roots;
  }
}
