import type { Subscription } from 'rxjs';

import {
  mergeProjectionConfig,
  ResolvedTreeProjectionConfig,
  TreeProjectionConfig,
} from '../types/tree-config';
import { TreeProjectionError, TreeProjectionErrorInfo } from '../types/tree-errors';
import { SourceChangeEvent } from '../types/tree-events';
import {
  createFilterState,
  isFilterActive,
  TreeCaptureFilter,
  TreeFilterState,
  TreeFilterTextOptions,
} from '../types/tree-filter';
import {
  INVALID_PROXY_ID,
  ProjectionSnapshot,
  ProxyId,
  ProxyNode,
  ROOT_PROXY_ID,
} from '../types/tree-node';
import {
  DEFAULT_VALUE_ROLE,
  TreeProjection,
  TreeSource,
  TreeValueRole,
} from '../types/tree-source';
import {
  comparePaths,
  getSourceAncestors,
  getSourcePath,
  isAttached,
  sourceChildren,
  toSortKey,
} from '../utils/tree-utils';
import { TreeWalker } from '../utils/tree-walker';
import {
  AcceptanceIndex,
  compilePattern,
  computeAcceptanceIndex,
  computeElementAcceptance,
  createAcceptance,
  TreeAcceptance,
  wildcardToPattern,
} from './acceptance';
import { ChangeNotifier } from './change-notifier';
import { ProxyArena } from './proxy-arena';

/**
 * Filtered projection of a {@link TreeSource}. Filter changes rebuild the whole
 * derived tree; structural source changes are patched in place and leave the
 * same tree a rebuild would.
 */
export class TreeProjectionEngine<S> implements TreeProjection<S> {
  private config: ResolvedTreeProjectionConfig = mergeProjectionConfig(undefined);
  private filter: TreeFilterState = createFilterState();
  private arena = new ProxyArena<S>();
  private readonly notifier = new ChangeNotifier();
  private source: TreeSource<S> | null = null;
  private subscription: Subscription | null = null;
  private accept: TreeAcceptance<S> = () => true;
  private rebuildQueued = false;
  private filterChanges = 0;

  readonly changes$ = this.notifier.changes$;

  constructor(config?: TreeProjectionConfig) {
    this.configure(config);
  }

  /** Applies a partial configuration. Filtering settings rebuild the tree. */
  configure(config?: TreeProjectionConfig): void {
    this.config = mergeProjectionConfig(config, this.config);
    const filtering = config?.filtering;
    if (filtering) {
      // Only the keys given here; settings made through the setters stay.
      this.updateFilter({
        keepParentIfChildMatches:
          filtering.keepParentIfChildMatches ?? this.filter.keepParentIfChildMatches,
        role: filtering.role ?? this.filter.role,
      });
    }
  }

  get filterState(): Readonly<TreeFilterState> {
    return { ...this.filter, fields: [...this.filter.fields] };
  }

  get isFiltering(): boolean {
    return isFilterActive(this.filter);
  }

  /** Number of projected rows. */
  get size(): number {
    return this.arena.size;
  }

  /** Counts filter updates; a rebuild with the same count only followed the source. */
  get filterRevision(): number {
    return this.filterChanges;
  }

  setSource(source: TreeSource<S> | null): void {
    this.subscription?.unsubscribe();
    this.subscription = null;
    this.source = source;

    if (source) {
      this.subscription = source.changes$.subscribe((event) =>
        this.dispatchSourceEvent(event),
      );
    }

    this.rebuild();
  }

  dispose(): void {
    this.subscription?.unsubscribe();
    this.subscription = null;
    this.source = null;
    this.notifier.complete();
  }

  // ---------------------------------------------------------------------------
  // Filter configuration. Every setter rebuilds.
  // ---------------------------------------------------------------------------

  setFilterText(text: string | null | undefined, options: TreeFilterTextOptions = {}): void {
    this.updateFilter({
      text: text ?? '',
      pattern: null,
      caseSensitive: options.caseSensitive === true,
      exactMatch: options.exactMatch === true,
    });
  }

  /** String patterns are compiled case-insensitively unless told otherwise. */
  setFilterPattern(pattern: RegExp | string | null, caseSensitive = false): void {
    this.updateFilter({
      text: '',
      pattern: pattern === null ? null : compilePattern(pattern, caseSensitive),
    });
  }

  setFilterWildcard(glob: string, caseSensitive = false): void {
    this.setFilterPattern(glob ? wildcardToPattern(glob, caseSensitive) : null);
  }

  clearFilter(): void {
    this.updateFilter({ text: '', pattern: null });
  }

  setFilterFields(fields: readonly number[]): void {
    const invalid = fields.filter((field) => !Number.isInteger(field) || field < 0);
    if (invalid.length > 0) {
      this.fail({
        scope: 'configuration',
        reason: 'invalid-field',
        message: `Filter fields must be non-negative integers, got ${invalid.join(', ')}`,
        context: { fields: [...fields] },
      });
    }
    this.updateFilter({ fields: [...fields] });
  }

  setFilterRole(role: TreeValueRole): void {
    this.updateFilter({ role });
  }

  setCaptureFilter(callback: TreeCaptureFilter | null): void {
    this.updateFilter({ capture: callback });
  }

  setKeepParentIfChildMatches(flag: boolean): void {
    this.updateFilter({ keepParentIfChildMatches: flag });
  }

  private updateFilter(changes: Partial<TreeFilterState>): void {
    this.filter = { ...this.filter, ...changes };
    this.filterChanges += 1;
    this.rebuild();
  }

  isAccepted(element: S): boolean {
    return this.accept(element);
  }

  /** The element or one of its descendants is accepted. */
  isAcceptedRecursively(element: S): boolean {
    if (!this.source) {
      return false;
    }
    const index = computeElementAcceptance(this.source, element, this.accept);
    return index.get(element)?.subtree === true;
  }

  // ---------------------------------------------------------------------------
  // Rebuild
  // ---------------------------------------------------------------------------

  /**
   * Discards the derived tree and reconstructs it from the source. Called from
   * inside a change callback it runs once the current mutation is over.
   */
  rebuild(): void {
    if (this.rebuildQueued) {
      return;
    }
    this.rebuildQueued = true;
    this.notifier.runOrDefer(() => {
      this.rebuildQueued = false;
      this.performRebuild();
    });
  }

  private performRebuild(): void {
    const source = this.source;
    const next = this.arena.fork();

    this.notifier.beginMutation('reset');
    try {
      if (source) {
        const accept = createAcceptance(source, this.filter);
        const index = computeAcceptanceIndex(source, null, accept);
        this.buildChildren(source, next, next.root, null, index);
        next.register(next.root);
        this.accept = accept;
      } else {
        this.accept = () => true;
      }
      this.arena = next;
      this.config.logger.debug('Projection rebuilt', {
        rows: next.size,
        filtering: isFilterActive(this.filter),
        keepParentIfChildMatches: this.filter.keepParentIfChildMatches,
      });
    } finally {
      this.notifier.endMutation();
    }
  }

  private buildChildren(
    source: TreeSource<S>,
    arena: ProxyArena<S>,
    proxyParent: ProxyNode<S>,
    sourceParent: S | null,
    index: AcceptanceIndex<S>,
  ): void {
    for (const child of sourceChildren(source, sourceParent)) {
      this.buildElement(source, arena, proxyParent, child, index);
    }
  }

  private buildElement(
    source: TreeSource<S>,
    arena: ProxyArena<S>,
    proxyParent: ProxyNode<S>,
    element: S,
    index: AcceptanceIndex<S>,
  ): void {
    const entry = index.get(element);
    if (!entry?.subtree) {
      return;
    }

    if (entry.self || this.filter.keepParentIfChildMatches) {
      const node = arena.create(element, entry.self);
      arena.attach(proxyParent, node);
      this.buildChildren(source, arena, node, element, index);
      return;
    }

    // Promote: the rejected row vanishes and its matching descendants take its place.
    this.buildChildren(source, arena, proxyParent, element, index);
  }

  // ---------------------------------------------------------------------------
  // Incremental updates
  // ---------------------------------------------------------------------------

  onSourceRowsInserted(parent: S | null, first: number, last: number): void {
    const source = this.source;
    if (!source) {
      return;
    }

    const count = source.childCount(parent);
    if (first < 0 || last < first || last >= count) {
      this.fail({
        scope: 'source-event',
        reason: 'invalid-range',
        message: `rowsInserted range ${first}..${last} is invalid for a parent with ${count} children`,
        context: { first, last, count },
      });
    }

    this.notifier.batch(() => {
      for (let row = first; row <= last; row += 1) {
        const element = source.childAt(parent, row);
        if (element === null || this.arena.idOf(element) !== INVALID_PROXY_ID) {
          continue;
        }
        this.insertElement(source, element);
      }
    });
  }

  onSourceRowsRemoved(parent: S | null, first: number, last: number): void {
    const source = this.source;
    if (!source) {
      return;
    }

    if (first < 0 || last < first) {
      this.fail({
        scope: 'source-event',
        reason: 'invalid-range',
        message: `rowsRemoved range ${first}..${last} is invalid`,
        context: { first, last },
      });
    }

    this.notifier.batch(() => {
      const anchor = this.nearestProxy(source, parent);
      this.removeDetached(source, anchor);
      if (this.filter.keepParentIfChildMatches) {
        this.pruneEmptyPlaceholders(anchor);
      }
    });
  }

  /**
   * Forwards value changes of already projected rows. Acceptance is not
   * re-evaluated; a rebuild picks up rows whose match status changed.
   */
  onSourceDataChanged(topLeft: S, bottomRight: S, fields?: readonly number[]): void {
    const source = this.source;
    if (!source) {
      return;
    }

    const parent = source.parentOf(topLeft);
    const first = source.rowOf(topLeft);
    const last = source.rowOf(bottomRight);
    if (first < 0 || last < first || source.parentOf(bottomRight) !== parent) {
      this.fail({
        scope: 'source-event',
        reason: 'invalid-range',
        message: `dataChanged range ${first}..${last} does not span siblings`,
        context: { first, last },
      });
    }

    for (let row = first; row <= last; row += 1) {
      const element = source.childAt(parent, row);
      const id = element === null ? INVALID_PROXY_ID : this.arena.idOf(element);
      if (id !== INVALID_PROXY_ID) {
        this.notifier.dataChanged(id, fields);
      }
    }
  }

  onSourceModelReset(): void {
    this.rebuild();
  }

  private dispatchSourceEvent(event: SourceChangeEvent<S>): void {
    this.notifier.runOrDefer(() => {
      try {
        this.applySourceEvent(event);
      } catch (error) {
        // Errors cannot travel back to the emitting source through the
        // subscription. Contract violations were reported by fail() already.
        if (!(error instanceof TreeProjectionError)) {
          this.report(this.predicateFailure(error, event.type));
        }
      }
    });
  }

  private applySourceEvent(event: SourceChangeEvent<S>): void {
    switch (event.type) {
      case 'rowsInserted':
        this.onSourceRowsInserted(event.parent, event.first, event.last);
        break;
      case 'rowsRemoved':
        this.onSourceRowsRemoved(event.parent, event.first, event.last);
        break;
      case 'dataChanged':
        this.onSourceDataChanged(event.topLeft, event.bottomRight, event.fields);
        break;
      case 'reset':
      case 'layoutChanged':
        this.onSourceModelReset();
        break;
    }
  }

  private insertElement(source: TreeSource<S>, element: S): void {
    const keepParents = this.filter.keepParentIfChildMatches;
    const ancestors = getSourceAncestors(source, element);
    let container = this.arena.root;
    let top = element;

    for (let index = ancestors.length - 1; index >= 0; index -= 1) {
      const ancestor = ancestors[index];
      if (ancestor === undefined) {
        continue;
      }
      const node = this.arena.get(this.arena.idOf(ancestor));
      if (node) {
        container = node;
        break;
      }
      // A pruned parent chain comes back as placeholders.
      if (keepParents) {
        top = ancestor;
      }
    }

    const index = computeElementAcceptance(source, top, this.accept);
    if (!index.get(element)?.subtree) {
      return;
    }

    const staging: ProxyNode<S> = {
      id: INVALID_PROXY_ID,
      element: null,
      parentId: INVALID_PROXY_ID,
      childIds: [],
      matched: false,
    };
    this.buildElement(source, this.arena, staging, top, index);

    for (const node of this.arena.children(staging)) {
      const row = this.insertionRow(source, container, node);
      this.notifier.beginMutation('insert', { parent: container.id, first: row, last: row });
      this.arena.attach(container, node, row);
      this.arena.register(node);
      this.notifier.endMutation();
    }
  }

  /** Siblings are kept in source pre-order. */
  private insertionRow(
    source: TreeSource<S>,
    container: ProxyNode<S>,
    node: ProxyNode<S>,
  ): number {
    const path = node.element === null ? null : getSourcePath(source, node.element);
    if (!path) {
      return container.childIds.length;
    }

    const siblings = this.arena.children(container);
    for (let row = 0; row < siblings.length; row += 1) {
      const sibling = siblings[row];
      const siblingPath =
        !sibling || sibling.element === null
          ? null
          : getSourcePath(source, sibling.element);
      if (siblingPath && comparePaths(siblingPath, path) > 0) {
        return row;
      }
    }
    return siblings.length;
  }

  private nearestProxy(source: TreeSource<S>, element: S | null): ProxyNode<S> {
    let current = element;
    while (current !== null) {
      const node = this.arena.get(this.arena.idOf(current));
      if (node) {
        return node;
      }
      current = source.parentOf(current);
    }
    return this.arena.root;
  }

  private removeDetached(source: TreeSource<S>, node: ProxyNode<S>): void {
    for (let row = node.childIds.length - 1; row >= 0; row -= 1) {
      const child = this.arena.childAt(node, row);
      if (!child || child.element === null) {
        continue;
      }

      if (isAttached(source, child.element)) {
        this.removeDetached(source, child);
        continue;
      }

      this.notifier.beginMutation('remove', { parent: node.id, first: row, last: row });
      this.arena.removeAt(node, row);
      this.notifier.endMutation();
    }
  }

  private pruneEmptyPlaceholders(start: ProxyNode<S>): void {
    let node = start;
    while (node.id !== ROOT_PROXY_ID && !node.matched && node.childIds.length === 0) {
      const parent = this.arena.get(node.parentId);
      if (!parent) {
        return;
      }
      const row = parent.childIds.indexOf(node.id);
      this.notifier.beginMutation('remove', { parent: parent.id, first: row, last: row });
      this.arena.removeAt(parent, row);
      this.notifier.endMutation();
      node = parent;
    }
  }

  // ---------------------------------------------------------------------------
  // Queries. Invalid ids answer with sentinels instead of throwing.
  // ---------------------------------------------------------------------------

  fieldCount(): number {
    return this.source?.fieldCount() ?? 0;
  }

  rowCount(parent: ProxyId = ROOT_PROXY_ID): number {
    return this.arena.get(parent)?.childIds.length ?? 0;
  }

  childAt(parent: ProxyId, row: number): ProxyId {
    const node = this.arena.get(parent);
    return node?.childIds[row] ?? INVALID_PROXY_ID;
  }

  parentOf(id: ProxyId): ProxyId {
    return this.arena.get(id)?.parentId ?? INVALID_PROXY_ID;
  }

  rowOf(id: ProxyId): number {
    const node = this.arena.get(id);
    return node ? this.arena.rowOf(node) : -1;
  }

  hasChildren(id: ProxyId): boolean {
    return this.rowCount(id) > 0;
  }

  isPlaceholder(id: ProxyId): boolean {
    const node = this.arena.get(id);
    return !!node && !node.matched;
  }

  valueAt(id: ProxyId, field: number, role: TreeValueRole = DEFAULT_VALUE_ROLE): unknown {
    const element = this.mapToSource(id);
    if (element === null || !this.source || field < 0 || field >= this.source.fieldCount()) {
      return undefined;
    }
    return this.source.valueAt(element, field, role);
  }

  mapToSource(id: ProxyId): S | null {
    return this.arena.get(id)?.element ?? null;
  }

  mapFromSource(element: S | null): ProxyId {
    return element === null ? ROOT_PROXY_ID : this.arena.idOf(element);
  }

  /** Projected rows whose value at `field` is one of `values`, in pre-order. */
  findByValues(values: Iterable<unknown>, field = 0): ProxyId[] {
    const wanted = new Set(Array.from(values, (value) => toSortKey(value)));
    const walker = new TreeWalker<ProxyNode<S>>(
      this.arena.children(this.arena.root),
      (node) => this.arena.children(node),
      { include: (node) => wanted.has(toSortKey(this.valueAt(node.id, field))) },
    );
    return Array.from(walker, (node) => node.id);
  }

  snapshot(field = 0): ProjectionSnapshot[] {
    const describe = (node: ProxyNode<S>): ProjectionSnapshot => ({
      value: this.valueAt(node.id, field),
      placeholder: !node.matched,
      children: this.arena.children(node).map(describe),
    });
    return this.arena.children(this.arena.root).map(describe);
  }

  // ---------------------------------------------------------------------------
  // Errors
  // ---------------------------------------------------------------------------

  private fail(info: TreeProjectionErrorInfo): never {
    const error = new TreeProjectionError(info);
    this.report(error);
    throw error;
  }

  private report(error: TreeProjectionError): void {
    this.config.logger.error(error.message, {
      scope: error.scope,
      reason: error.reason,
      ...error.context,
    });
    this.config.onError?.(error);
  }

  private predicateFailure(error: unknown, eventType: string): TreeProjectionError {
    return new TreeProjectionError({
      scope: 'filter',
      reason: 'predicate-failed',
      message: `Filter evaluation failed while handling ${eventType}`,
      context: { eventType },
      cause: error,
    });
  }
}
