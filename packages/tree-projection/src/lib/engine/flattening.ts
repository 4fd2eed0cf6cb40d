import type { Subscription } from 'rxjs';

import {
  mergeProjectionConfig,
  ResolvedTreeProjectionConfig,
  TreeProjectionConfig,
  TreeSortConfig,
  TreeSortOrder,
  TreeSortScope,
} from '../types/tree-config';
import { TreeProjectionError } from '../types/tree-errors';
import {
  INVALID_PROXY_ID,
  ProjectionSnapshot,
  ProxyId,
  ROOT_PROXY_ID,
} from '../types/tree-node';
import {
  DEFAULT_VALUE_ROLE,
  TreeProjection,
  TreeSource,
  TreeValueRole,
} from '../types/tree-source';
import { compareSortKeys, sourceChildren, toSortKey } from '../utils/tree-utils';
import { TreeWalker, TreeWalkerOptions } from '../utils/tree-walker';
import { ChangeNotifier } from './change-notifier';

/** Position of an element in the flat projection; the column is the sort field. */
export interface FlatIndex {
  row: number;
  field: number;
}

export const INVALID_FLAT_INDEX: Readonly<FlatIndex> = Object.freeze({ row: -1, field: -1 });

interface FlatState<S> {
  rows: ProxyId[];
  elementsById: Map<ProxyId, S>;
  rowsById: Map<ProxyId, number>;
  idsByElement: Map<S, ProxyId>;
}

function createFlatState<S>(): FlatState<S> {
  return {
    rows: [],
    elementsById: new Map(),
    rowsById: new Map(),
    idsByElement: new Map(),
  };
}

/**
 * Hierarchy-free projection: every element of the source (or every one the
 * inclusion predicate admits) as a single sorted list under the root. Any
 * source change re-collects and re-sorts the whole list.
 */
export class FlatteningEngine<S> implements TreeProjection<S> {
  private config: ResolvedTreeProjectionConfig;
  private sort: TreeSortConfig;
  private include: ((element: S) => boolean) | null = null;
  private source: TreeSource<S> | null = null;
  private subscription: Subscription | null = null;
  private state: FlatState<S> = createFlatState();
  private nextId: ProxyId = ROOT_PROXY_ID + 1;
  private invalidateQueued = false;
  private readonly notifier = new ChangeNotifier();

  readonly changes$ = this.notifier.changes$;

  constructor(config?: TreeProjectionConfig) {
    this.config = mergeProjectionConfig(config);
    this.sort = { ...this.config.sort };
  }

  get sortConfig(): Readonly<TreeSortConfig> {
    return { ...this.sort };
  }

  setSource(source: TreeSource<S> | null): void {
    this.subscription?.unsubscribe();
    this.subscription = null;
    this.source = source;

    if (source) {
      this.subscription = source.changes$.subscribe(() => this.invalidateFromSource());
    }

    this.invalidate();
  }

  dispose(): void {
    this.subscription?.unsubscribe();
    this.subscription = null;
    this.source = null;
    this.notifier.complete();
  }

  setSort(field: number, order: TreeSortOrder = this.sort.order): void {
    this.sort = { ...this.sort, field, order };
    this.invalidate();
  }

  setSortField(field: number): void {
    this.setSort(field);
  }

  setSortOrder(order: TreeSortOrder): void {
    this.setSort(this.sort.field, order);
  }

  setSortScope(scope: TreeSortScope): void {
    this.sort = { ...this.sort, scope };
    this.invalidate();
  }

  /** Restricts the list to admitted elements; their descendants are still visited. */
  setInclude(include: ((element: S) => boolean) | null): void {
    this.include = include;
    this.invalidate();
  }

  invalidate(): void {
    if (this.invalidateQueued) {
      return;
    }
    this.invalidateQueued = true;
    this.notifier.runOrDefer(() => {
      this.invalidateQueued = false;
      this.performInvalidate();
    });
  }

  private invalidateFromSource(): void {
    try {
      this.invalidate();
    } catch (error) {
      // The emitting source cannot receive errors through the subscription.
      const failure = new TreeProjectionError({
        scope: 'filter',
        reason: 'predicate-failed',
        message: 'Flattening failed while handling a source change',
        cause: error,
      });
      this.config.logger.error(failure.message, {
        scope: failure.scope,
        reason: failure.reason,
      });
      this.config.onError?.(failure);
    }
  }

  private performInvalidate(): void {
    const next = createFlatState<S>();

    this.notifier.beginMutation('reset');
    try {
      if (this.source) {
        for (const element of this.collect(this.source)) {
          const id = this.nextId;
          this.nextId += 1;
          next.rowsById.set(id, next.rows.length);
          next.rows.push(id);
          next.elementsById.set(id, element);
          next.idsByElement.set(element, id);
        }
      }
      this.state = next;
      this.config.logger.debug('Flat projection rebuilt', {
        rows: next.rows.length,
        sortField: this.sort.field,
        sortOrder: this.sort.order,
        sortScope: this.sort.scope,
      });
    } finally {
      this.notifier.endMutation();
    }
  }

  private collect(source: TreeSource<S>): S[] {
    const include = this.include;
    const walkerOptions: TreeWalkerOptions<S> = include
      ? { include: (element) => include(element) }
      : {};

    if (this.sort.scope === 'siblings') {
      const children = (parent: S | null) =>
        this.sortElements(source, sourceChildren(source, parent));
      return Array.from(
        new TreeWalker<S>(children(null), (element) => children(element), walkerOptions),
      );
    }

    const collected = Array.from(
      new TreeWalker<S>(
        sourceChildren(source, null),
        (element) => sourceChildren(source, element),
        walkerOptions,
      ),
    );
    return this.sortElements(source, collected);
  }

  /** Stable: equal keys keep their pre-order position in either direction. */
  private sortElements(source: TreeSource<S>, elements: S[]): S[] {
    const direction = this.sort.order === 'descending' ? -1 : 1;
    const field = this.sort.field;

    return elements
      .map((element) => ({ element, key: toSortKey(source.valueAt(element, field)) }))
      .sort((a, b) => direction * compareSortKeys(a.key, b.key))
      .map((entry) => entry.element);
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  fieldCount(): number {
    return this.source?.fieldCount() ?? 0;
  }

  rowCount(parent: ProxyId = ROOT_PROXY_ID): number {
    return parent === ROOT_PROXY_ID ? this.state.rows.length : 0;
  }

  childAt(parent: ProxyId, row: number): ProxyId {
    if (parent !== ROOT_PROXY_ID) {
      return INVALID_PROXY_ID;
    }
    return this.state.rows[row] ?? INVALID_PROXY_ID;
  }

  parentOf(id: ProxyId): ProxyId {
    return this.state.elementsById.has(id) ? ROOT_PROXY_ID : INVALID_PROXY_ID;
  }

  rowOf(id: ProxyId): number {
    return this.state.rowsById.get(id) ?? -1;
  }

  hasChildren(id: ProxyId): boolean {
    return this.rowCount(id) > 0;
  }

  valueAt(id: ProxyId, field: number, role: TreeValueRole = DEFAULT_VALUE_ROLE): unknown {
    const element = this.mapToSource(id);
    if (element === null || !this.source || field < 0 || field >= this.source.fieldCount()) {
      return undefined;
    }
    return this.source.valueAt(element, field, role);
  }

  mapToSource(id: ProxyId): S | null {
    return this.state.elementsById.get(id) ?? null;
  }

  mapFromSource(element: S | null): ProxyId {
    if (element === null) {
      return ROOT_PROXY_ID;
    }
    return this.state.idsByElement.get(element) ?? INVALID_PROXY_ID;
  }

  /**
   * Flat rows carry a single column: whichever field an element is looked up
   * by, the answer points at its row in the sort field.
   */
  indexFromSource(element: S): Readonly<FlatIndex> {
    const row = this.rowOf(this.mapFromSource(element));
    if (row < 0) {
      return INVALID_FLAT_INDEX;
    }
    return { row, field: this.sort.field };
  }

  /** Source element at a flat index, whatever column it names. */
  elementAt(index: FlatIndex): S | null {
    return this.mapToSource(this.childAt(ROOT_PROXY_ID, index.row));
  }

  /** Source elements in projected order. */
  elements(): S[] {
    return this.state.rows
      .map((id) => this.state.elementsById.get(id))
      .filter((element): element is S => element !== undefined);
  }

  snapshot(field = 0): ProjectionSnapshot[] {
    return this.state.rows.map((id) => ({
      value: this.valueAt(id, field),
      placeholder: false,
      children: [],
    }));
  }
}
