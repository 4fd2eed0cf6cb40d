import { createSilentLogger, TreeLogger } from '../utils/tree-logger';
import { TreeProjectionError } from './tree-errors';
import { DEFAULT_TREE_FILTERING_CONFIG, TreeFilteringConfig } from './tree-filter';

export type TreeSortOrder = 'ascending' | 'descending';

/**
 * - global: one sort over every collected element
 * - siblings: children are ordered among their siblings, pre-order is kept
 */
export type TreeSortScope = 'global' | 'siblings';

export interface TreeSortConfig {
  field: number;
  order: TreeSortOrder;
  scope: TreeSortScope;
}

export interface TreeProjectionConfig {
  /** Initial structural mode and value role of the filter. */
  filtering?: TreeFilteringConfig;
  /** Initial sort of the flat projection. */
  sort?: Partial<TreeSortConfig>;
  /** Start the model facade in flat mode. */
  flat?: boolean;
  logger?: TreeLogger;
  /** Invoked with contract violations before they are thrown. */
  onError?: (error: TreeProjectionError) => void;
}

export interface ResolvedTreeProjectionConfig {
  filtering: Required<TreeFilteringConfig>;
  sort: TreeSortConfig;
  flat: boolean;
  logger: TreeLogger;
  onError?: (error: TreeProjectionError) => void;
}

export const DEFAULT_TREE_SORT_CONFIG: Readonly<TreeSortConfig> = Object.freeze({
  field: 0,
  order: 'ascending',
  scope: 'global',
});

export const DEFAULT_TREE_PROJECTION_CONFIG: Readonly<TreeProjectionConfig> = Object.freeze({
  filtering: DEFAULT_TREE_FILTERING_CONFIG,
  sort: DEFAULT_TREE_SORT_CONFIG,
  flat: false,
});

export function mergeProjectionConfig(
  config: TreeProjectionConfig | undefined,
  base?: ResolvedTreeProjectionConfig,
): ResolvedTreeProjectionConfig {
  return {
    filtering: {
      ...DEFAULT_TREE_FILTERING_CONFIG,
      ...base?.filtering,
      ...config?.filtering,
    },
    sort: {
      ...DEFAULT_TREE_SORT_CONFIG,
      ...base?.sort,
      ...config?.sort,
    },
    flat: config?.flat ?? base?.flat ?? false,
    logger: config?.logger ?? base?.logger ?? createSilentLogger(),
    onError: config?.onError ?? base?.onError,
  };
}
