/*
 * Public API Surface of tree-projection
 */

// =================== TYPES & INTERFACES ===================
export * from './lib/types/tree-config';
export * from './lib/types/tree-errors';
export * from './lib/types/tree-events';
export * from './lib/types/tree-filter';
export * from './lib/types/tree-node';
export * from './lib/types/tree-source';

// =================== ENGINE ===================
export * from './lib/engine/acceptance';
export * from './lib/engine/change-notifier';
export * from './lib/engine/flattening';
export * from './lib/engine/projection-model';
export * from './lib/engine/proxy-arena';
export * from './lib/engine/tree-engine';

// =================== UTILITIES ===================
export * from './lib/utils/object-tree-source';
export * from './lib/utils/tree-logger';
export * from './lib/utils/tree-utils';
export * from './lib/utils/tree-walker';
