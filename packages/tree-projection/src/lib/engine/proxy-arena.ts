import {
  INVALID_PROXY_ID,
  ProxyId,
  ProxyNode,
  ROOT_PROXY_ID,
} from '../types/tree-node';

function createRootNode<S>(): ProxyNode<S> {
  return {
    id: ROOT_PROXY_ID,
    element: null,
    parentId: INVALID_PROXY_ID,
    childIds: [],
    matched: true,
  };
}

/**
 * Owns the derived tree: nodes addressed by integer ids plus the side table
 * from source element to id. Ids are never reused, so a stale id resolves to
 * nothing instead of aliasing a newer node.
 */
export class ProxyArena<S> {
  private readonly rootNode: ProxyNode<S> = createRootNode();
  private readonly nodes = new Map<ProxyId, ProxyNode<S>>([
    [ROOT_PROXY_ID, this.rootNode],
  ]);
  private readonly bySource = new Map<S, ProxyId>();

  constructor(private nextId: ProxyId = ROOT_PROXY_ID + 1) {}

  /** Number of projected rows, the root sentinel excluded. */
  get size(): number {
    return this.bySource.size;
  }

  /** An empty arena whose ids continue after this one's. */
  fork(): ProxyArena<S> {
    return new ProxyArena<S>(this.nextId);
  }

  get root(): ProxyNode<S> {
    return this.rootNode;
  }

  get(id: ProxyId): ProxyNode<S> | undefined {
    return this.nodes.get(id);
  }

  idOf(element: S): ProxyId {
    return this.bySource.get(element) ?? INVALID_PROXY_ID;
  }

  /**
   * Creates a detached node. It becomes reachable through `attach` and
   * visible to `idOf` through `register`.
   */
  create(element: S, matched: boolean): ProxyNode<S> {
    const node: ProxyNode<S> = {
      id: this.nextId,
      element,
      parentId: INVALID_PROXY_ID,
      childIds: [],
      matched,
    };
    this.nextId += 1;
    this.nodes.set(node.id, node);
    return node;
  }

  /** Enters `node` and its subtree into the source lookup table. */
  register(node: ProxyNode<S>): void {
    const stack = [node];
    while (stack.length > 0) {
      const current = stack.pop();
      if (!current) {
        continue;
      }
      if (current.element !== null) {
        this.bySource.set(current.element, current.id);
      }
      stack.push(...this.children(current));
    }
  }

  /** Appends when `row` is omitted. */
  attach(parent: ProxyNode<S>, child: ProxyNode<S>, row?: number): void {
    child.parentId = parent.id;
    if (row === undefined || row >= parent.childIds.length) {
      parent.childIds.push(child.id);
    } else {
      parent.childIds.splice(row, 0, child.id);
    }
  }

  /** Unlinks the node at `row` and forgets its whole subtree. */
  removeAt(parent: ProxyNode<S>, row: number): void {
    const [removedId] = parent.childIds.splice(row, 1);
    if (removedId === undefined) {
      return;
    }

    const stack = [removedId];
    while (stack.length > 0) {
      const id = stack.pop();
      const node = id === undefined ? undefined : this.nodes.get(id);
      if (!node) {
        continue;
      }
      stack.push(...node.childIds);
      this.nodes.delete(node.id);
      if (node.element !== null && this.bySource.get(node.element) === node.id) {
        this.bySource.delete(node.element);
      }
    }
  }

  rowOf(node: ProxyNode<S>): number {
    const parent = this.nodes.get(node.parentId);
    return parent ? parent.childIds.indexOf(node.id) : -1;
  }

  childAt(parent: ProxyNode<S>, row: number): ProxyNode<S> | undefined {
    const id = parent.childIds[row];
    return id === undefined ? undefined : this.nodes.get(id);
  }

  children(parent: ProxyNode<S>): ProxyNode<S>[] {
    const children: ProxyNode<S>[] = [];
    for (const id of parent.childIds) {
      const child = this.nodes.get(id);
      if (child) {
        children.push(child);
      }
    }
    return children;
  }
}
