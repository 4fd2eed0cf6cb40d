import { ProxyId } from './tree-node';

/** Change notifications a source delivers to its projections. */
export type SourceChangeEvent<S> =
  | { type: 'rowsInserted'; parent: S | null; first: number; last: number }
  | { type: 'rowsRemoved'; parent: S | null; first: number; last: number }
  | {
      type: 'dataChanged';
      topLeft: S;
      bottomRight: S;
      /** Fields whose values changed; omitted means every field. */
      fields?: readonly number[];
    }
  | { type: 'reset' }
  | { type: 'layoutChanged' };

export type ProjectionMutationKind = 'insert' | 'remove' | 'reset';

export interface ProjectionRowRange {
  parent: ProxyId;
  first: number;
  last: number;
}

/**
 * Change notifications a projection delivers to its consumer. Every structural
 * change arrives as an "about to" event followed by its completion event.
 */
export type ProjectionChangeEvent =
  | ({ type: 'rowsAboutToBeInserted' } & ProjectionRowRange)
  | ({ type: 'rowsInserted' } & ProjectionRowRange)
  | ({ type: 'rowsAboutToBeRemoved' } & ProjectionRowRange)
  | ({ type: 'rowsRemoved' } & ProjectionRowRange)
  | { type: 'dataChanged'; id: ProxyId; fields?: readonly number[] }
  | { type: 'modelAboutToBeReset' }
  | { type: 'modelReset' };
