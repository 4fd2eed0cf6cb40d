import { TreeValueRole } from './tree-source';

/**
 * Secondary refinement for pattern filters. Receives capture group 1 of the
 * match (`undefined` when the pattern has none or it did not participate).
 */
export type TreeCaptureFilter = (captured: string | undefined) => boolean;

export interface TreeFilterTextOptions {
  caseSensitive?: boolean;
  exactMatch?: boolean;
}

export interface TreeFilterState {
  text: string;
  caseSensitive: boolean;
  exactMatch: boolean;
  /** Mutually exclusive with `text`; takes precedence when set. */
  pattern: RegExp | null;
  /** Fields tested for a match. Empty means every field of the source. */
  fields: readonly number[];
  role: TreeValueRole;
  capture: TreeCaptureFilter | null;
  keepParentIfChildMatches: boolean;
}

export interface TreeFilteringConfig {
  /**
   * Keep rejected ancestors of matching rows as placeholders. When false,
   * matching rows are promoted to their nearest matching ancestor.
   */
  keepParentIfChildMatches?: boolean;
  /** Value role filters test when none has been set explicitly. */
  role?: TreeValueRole;
}

export const DEFAULT_TREE_FILTERING_CONFIG: Readonly<Required<TreeFilteringConfig>> = Object.freeze({
  keepParentIfChildMatches: false,
  role: 'display',
});

export function createFilterState(
  config: Required<TreeFilteringConfig> = DEFAULT_TREE_FILTERING_CONFIG,
): TreeFilterState {
  return {
    text: '',
    caseSensitive: false,
    exactMatch: false,
    pattern: null,
    fields: [],
    role: config.role,
    capture: null,
    keepParentIfChildMatches: config.keepParentIfChildMatches,
  };
}

export function isFilterActive(state: TreeFilterState): boolean {
  return state.pattern !== null || state.text.length > 0;
}
