export type TreeTraversalOrder = 'depth-first' | 'breadth-first';

export interface TreeWalkerOptions<N> {
  /** Defaults to depth-first (pre-order). */
  order?: TreeTraversalOrder;
  /** Visit children last-to-first. */
  reverse?: boolean;
  /** Nodes failing the predicate are not yielded; their children are still visited. */
  include?: (node: N, depth: number) => boolean;
  /** Roots are depth 0. Nodes at `maxDepth` are yielded but not expanded. */
  maxDepth?: number;
}

interface PendingEntry<N> {
  node: N;
  depth: number;
  parent: PendingEntry<N> | null;
}

/**
 * Lazy, restartable traversal over any hierarchy described by a children
 * accessor. Cycles are not detected: a cyclic hierarchy never terminates.
 */
export class TreeWalker<N> implements IterableIterator<N> {
  private readonly order: TreeTraversalOrder;
  private readonly reverse: boolean;
  private readonly include?: (node: N, depth: number) => boolean;
  private readonly maxDepth?: number;

  private pending: PendingEntry<N>[] = [];
  private current: PendingEntry<N> | null = null;

  constructor(
    private readonly roots: readonly N[],
    private readonly children: (node: N) => readonly N[],
    options: TreeWalkerOptions<N> = {},
  ) {
    this.order = options.order ?? 'depth-first';
    this.reverse = options.reverse === true;
    this.include = options.include;
    this.maxDepth = options.maxDepth;
    this.reset();
  }

  /** Depth of the node yielded last, or -1 before the first / after the last. */
  get depth(): number {
    return this.current?.depth ?? -1;
  }

  reset(): void {
    this.current = null;
    this.pending = [];
    this.enqueue(
      this.roots.map((node) => ({ node, depth: 0, parent: null })),
    );
  }

  next(): IteratorResult<N> {
    while (this.pending.length > 0) {
      const entry = this.take();
      if (!entry) {
        break;
      }
      this.expand(entry);

      if (!this.include || this.include(entry.node, entry.depth)) {
        this.current = entry;
        return { done: false, value: entry.node };
      }
    }

    this.current = null;
    return { done: true, value: undefined };
  }

  /** Skips the unvisited subtree of the node yielded last. */
  prune(): void {
    const pruned = this.current;
    if (!pruned) {
      return;
    }
    this.pending = this.pending.filter(
      (entry) => !this.descendsFrom(entry, pruned),
    );
  }

  [Symbol.iterator](): IterableIterator<N> {
    return this;
  }

  private take(): PendingEntry<N> | undefined {
    return this.order === 'depth-first'
      ? this.pending.pop()
      : this.pending.shift();
  }

  private expand(entry: PendingEntry<N>): void {
    if (this.maxDepth !== undefined && entry.depth >= this.maxDepth) {
      return;
    }
    this.enqueue(
      this.children(entry.node).map((node) => ({
        node,
        depth: entry.depth + 1,
        parent: entry,
      })),
    );
  }

  private enqueue(entries: PendingEntry<N>[]): void {
    // The stack pops from the end, so forward depth-first order pushes reversed.
    const reversed =
      this.order === 'depth-first' ? !this.reverse : this.reverse;
    if (reversed) {
      entries.reverse();
    }
    this.pending.push(...entries);
  }

  private descendsFrom(
    entry: PendingEntry<N>,
    ancestor: PendingEntry<N>,
  ): boolean {
    let current = entry.parent;
    while (current) {
      if (current === ancestor) {
        return true;
      }
      current = current.parent;
    }
    return false;
  }
}
