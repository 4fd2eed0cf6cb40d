import type { Observable } from 'rxjs';

import { ProjectionChangeEvent, SourceChangeEvent } from './tree-events';
import { ProjectionSnapshot, ProxyId } from './tree-node';

/** Value roles a source may distinguish; `'display'` is what rows render. */
export type TreeValueRole = 'display' | 'edit' | (string & {});

export const DEFAULT_VALUE_ROLE: TreeValueRole = 'display';

/**
 * Contract a caller-owned hierarchy fulfils to be projected. The root is the
 * `null` sentinel. Elements are read, never mutated.
 */
export interface TreeSource<S> {
  fieldCount(): number;
  childCount(parent: S | null): number;
  /** `null` when `row` is out of range. */
  childAt(parent: S | null, row: number): S | null;
  parentOf(element: S): S | null;
  /** Position of `element` under its parent, or -1 once it is detached. */
  rowOf(element: S): number;
  valueAt(element: S, field: number, role?: TreeValueRole): unknown;
  readonly changes$: Observable<SourceChangeEvent<S>>;
}

/** Read surface shared by the hierarchical and flat projections. */
export interface TreeProjection<S> {
  readonly changes$: Observable<ProjectionChangeEvent>;
  fieldCount(): number;
  rowCount(parent?: ProxyId): number;
  childAt(parent: ProxyId, row: number): ProxyId;
  parentOf(id: ProxyId): ProxyId;
  rowOf(id: ProxyId): number;
  hasChildren(id: ProxyId): boolean;
  valueAt(id: ProxyId, field: number, role?: TreeValueRole): unknown;
  mapToSource(id: ProxyId): S | null;
  mapFromSource(element: S | null): ProxyId;
  snapshot(field?: number): ProjectionSnapshot[];
}
