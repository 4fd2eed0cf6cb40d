import { Observable, Subject } from 'rxjs';

import {
  ProjectionChangeEvent,
  ProjectionMutationKind,
  ProjectionRowRange,
} from '../types/tree-events';
import { ProxyId } from '../types/tree-node';

interface OpenMutation {
  kind: ProjectionMutationKind;
  range?: ProjectionRowRange;
}

/**
 * Two-phase commit between a projection and its consumers:
 * `beginMutation` announces the change while queries still answer with the old
 * structure, `endMutation` announces it done. Work requested while a mutation
 * is open is deferred until it closes.
 */
export class ChangeNotifier {
  private readonly events = new Subject<ProjectionChangeEvent>();
  private open: OpenMutation | null = null;
  private batchDepth = 0;
  private deferred: (() => void)[] = [];

  readonly changes$: Observable<ProjectionChangeEvent> = this.events.asObservable();

  /** True while a mutation or a batch of mutations is in progress. */
  get isMutating(): boolean {
    return this.open !== null || this.batchDepth > 0;
  }

  beginMutation(kind: 'reset'): void;
  beginMutation(kind: 'insert' | 'remove', range: ProjectionRowRange): void;
  beginMutation(kind: ProjectionMutationKind, range?: ProjectionRowRange): void {
    if (this.open) {
      throw new Error(
        `Cannot begin a ${kind} mutation while a ${this.open.kind} mutation is open`,
      );
    }
    this.open = { kind, range };

    switch (kind) {
      case 'reset':
        this.events.next({ type: 'modelAboutToBeReset' });
        break;
      case 'insert':
        this.events.next({ type: 'rowsAboutToBeInserted', ...this.requireRange(range) });
        break;
      case 'remove':
        this.events.next({ type: 'rowsAboutToBeRemoved', ...this.requireRange(range) });
        break;
    }
  }

  endMutation(): void {
    const open = this.open;
    if (!open) {
      throw new Error('No mutation is open');
    }
    this.open = null;

    switch (open.kind) {
      case 'reset':
        this.events.next({ type: 'modelReset' });
        break;
      case 'insert':
        this.events.next({ type: 'rowsInserted', ...this.requireRange(open.range) });
        break;
      case 'remove':
        this.events.next({ type: 'rowsRemoved', ...this.requireRange(open.range) });
        break;
    }

    this.flushDeferred();
  }

  dataChanged(id: ProxyId, fields?: readonly number[]): void {
    this.events.next({ type: 'dataChanged', id, fields });
  }

  /**
   * Runs several mutations as one unit: work requested from any of their
   * callbacks waits until the whole batch is done.
   */
  batch(work: () => void): void {
    this.batchDepth += 1;
    try {
      work();
    } finally {
      this.batchDepth -= 1;
      this.flushDeferred();
    }
  }

  /**
   * Runs `work` now, or once the current mutation (or batch) is over when
   * called from one of its callbacks. Returns true when the work ran now.
   */
  runOrDefer(work: () => void): boolean {
    if (this.isMutating) {
      this.deferred.push(work);
      return false;
    }
    work();
    return true;
  }

  complete(): void {
    this.deferred = [];
    this.events.complete();
  }

  private flushDeferred(): void {
    while (this.deferred.length > 0 && !this.isMutating) {
      const work = this.deferred.shift();
      work?.();
    }
  }

  private requireRange(range: ProjectionRowRange | undefined): ProjectionRowRange {
    if (!range) {
      throw new Error('Row mutations require a range');
    }
    return range;
  }
}
