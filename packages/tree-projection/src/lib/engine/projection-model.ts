import { Observable, Subject, Subscription } from 'rxjs';

import {
  mergeProjectionConfig,
  TreeProjectionConfig,
  TreeSortOrder,
  TreeSortScope,
} from '../types/tree-config';
import { ProjectionChangeEvent } from '../types/tree-events';
import { TreeCaptureFilter, TreeFilterTextOptions } from '../types/tree-filter';
import { TreeProjection, TreeSource, TreeValueRole } from '../types/tree-source';
import { FlatteningEngine } from './flattening';
import { TreeProjectionEngine } from './tree-engine';

/**
 * Switches a view between the filtered hierarchy and a flat sorted list of
 * the same source. The filter survives the switch: in flat mode only accepted
 * elements are listed while it is active.
 */
export class TreeProjectionModel<S> {
  readonly tree: TreeProjectionEngine<S>;
  readonly flat: FlatteningEngine<S>;

  private readonly events = new Subject<ProjectionChangeEvent>();
  private readonly subscriptions = new Subscription();
  private source: TreeSource<S> | null = null;
  private flatMode: boolean;
  private switching = false;
  private syncedFilterRevision = -1;

  /** Events of whichever projection is active. */
  readonly changes$: Observable<ProjectionChangeEvent> = this.events.asObservable();

  constructor(config?: TreeProjectionConfig) {
    this.tree = new TreeProjectionEngine<S>(config);
    this.flat = new FlatteningEngine<S>(config);
    this.flatMode = mergeProjectionConfig(config).flat;

    this.subscriptions.add(
      this.tree.changes$.subscribe((event) => {
        if (!this.flatMode) {
          this.events.next(event);
        } else if (
          event.type === 'modelReset' &&
          this.tree.filterRevision !== this.syncedFilterRevision
        ) {
          // Source-driven rebuilds reach the flat list through its own subscription.
          this.syncInclude();
        }
      }),
    );
    this.subscriptions.add(
      this.flat.changes$.subscribe((event) => {
        if (this.flatMode && !this.switching) {
          this.events.next(event);
        }
      }),
    );
  }

  get isFlat(): boolean {
    return this.flatMode;
  }

  get projection(): TreeProjection<S> {
    return this.flatMode ? this.flat : this.tree;
  }

  setSource(source: TreeSource<S> | null): void {
    this.source = source;
    this.tree.setSource(source);
    if (this.flatMode) {
      this.flat.setSource(source);
    }
  }

  /** Emits a single reset around the switch. */
  setFlat(flat: boolean): void {
    if (flat === this.flatMode) {
      return;
    }

    this.events.next({ type: 'modelAboutToBeReset' });
    this.switching = true;
    try {
      this.flatMode = flat;
      if (flat) {
        this.syncInclude();
        this.flat.setSource(this.source);
      } else {
        // Nothing listens to the flat list while the hierarchy is shown.
        this.flat.setSource(null);
      }
    } finally {
      this.switching = false;
      this.events.next({ type: 'modelReset' });
    }
  }

  setFilterText(text: string | null | undefined, options?: TreeFilterTextOptions): void {
    this.tree.setFilterText(text, options);
  }

  setFilterPattern(pattern: RegExp | string | null, caseSensitive?: boolean): void {
    this.tree.setFilterPattern(pattern, caseSensitive);
  }

  setFilterWildcard(glob: string, caseSensitive?: boolean): void {
    this.tree.setFilterWildcard(glob, caseSensitive);
  }

  clearFilter(): void {
    this.tree.clearFilter();
  }

  setFilterFields(fields: readonly number[]): void {
    this.tree.setFilterFields(fields);
  }

  setFilterRole(role: TreeValueRole): void {
    this.tree.setFilterRole(role);
  }

  setCaptureFilter(callback: TreeCaptureFilter | null): void {
    this.tree.setCaptureFilter(callback);
  }

  setKeepParentIfChildMatches(flag: boolean): void {
    this.tree.setKeepParentIfChildMatches(flag);
  }

  setSort(field: number, order?: TreeSortOrder): void {
    this.flat.setSort(field, order);
  }

  setSortOrder(order: TreeSortOrder): void {
    this.flat.setSortOrder(order);
  }

  setSortScope(scope: TreeSortScope): void {
    this.flat.setSortScope(scope);
  }

  dispose(): void {
    this.subscriptions.unsubscribe();
    this.tree.dispose();
    this.flat.dispose();
    this.events.complete();
  }

  private syncInclude(): void {
    this.syncedFilterRevision = this.tree.filterRevision;
    this.flat.setInclude(
      this.tree.isFiltering ? (element) => this.tree.isAccepted(element) : null,
    );
  }
}
