/** Integer handle of a node owned by a projection. */
export type ProxyId = number;

/** Root sentinel of every projection; it maps to the source root (`null`). */
export const ROOT_PROXY_ID: ProxyId = 0;

/** Canonical "no such node" answer for queries on stale or out-of-range input. */
export const INVALID_PROXY_ID: ProxyId = -1;

/** Arena slot of the derived tree. */
export interface ProxyNode<S> {
  id: ProxyId;
  /** Source element this row renders; `null` only for the root sentinel. */
  element: S | null;
  parentId: ProxyId;
  childIds: ProxyId[];
  /**
   * False for keep-ancestor placeholders, which are present only because a
   * descendant matched.
   */
  matched: boolean;
}

/** Serialisable view of a projected subtree. */
export interface ProjectionSnapshot {
  value: unknown;
  placeholder: boolean;
  children: ProjectionSnapshot[];
}
