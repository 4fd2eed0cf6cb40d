import { TreeFilterState } from '../types/tree-filter';
import { TreeSource } from '../types/tree-source';
import { sourceChildren } from '../utils/tree-utils';

export type TreeAcceptance<S> = (element: S) => boolean;

export interface AcceptanceEntry {
  /** The element itself matches. */
  self: boolean;
  /** The element or one of its descendants matches. */
  subtree: boolean;
}

export type AcceptanceIndex<S> = Map<S, AcceptanceEntry>;

const REGEXP_SPECIALS = /[.*+?^${}()|[\]\\/]/g;

function escapeRegExp(text: string): string {
  return text.replace(REGEXP_SPECIALS, '\\$&');
}

/** Strips the stateful global/sticky flags so repeated tests stay independent. */
export function compilePattern(
  pattern: RegExp | string,
  caseSensitive = true,
): RegExp {
  if (typeof pattern === 'string') {
    return new RegExp(pattern, caseSensitive ? '' : 'i');
  }
  return new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
}

/**
 * Translates a shell-style wildcard (`*`, `?`, `[abc]`, `[!abc]`) into an
 * unanchored pattern. An unterminated `[` is taken literally.
 */
export function wildcardToPattern(glob: string, caseSensitive = false): RegExp {
  let source = '';
  let index = 0;

  while (index < glob.length) {
    const char = glob.charAt(index);

    if (char === '*') {
      source += '.*';
    } else if (char === '?') {
      source += '.';
    } else if (char === '[') {
      const close = glob.indexOf(']', index + 2);
      if (close < 0) {
        source += '\\[';
      } else {
        let body = glob.slice(index + 1, close);
        const negated = body.startsWith('!');
        if (negated) {
          body = body.slice(1);
        }
        source += `[${negated ? '^' : ''}${body.replace(/[\\\]^]/g, '\\$&')}]`;
        index = close;
      }
    } else {
      source += escapeRegExp(char);
    }

    index += 1;
  }

  return new RegExp(source, caseSensitive ? '' : 'i');
}

function isEmptyValue(value: unknown): boolean {
  return value === null || value === undefined || value === '';
}

function filterFields<S>(
  source: TreeSource<S>,
  state: TreeFilterState,
): readonly number[] {
  if (state.fields.length > 0) {
    return state.fields;
  }
  return Array.from({ length: source.fieldCount() }, (_, field) => field);
}

/**
 * Builds the acceptance predicate for the current filter state. Exceptions
 * thrown by a supplied pattern or capture callback propagate to the caller.
 */
export function createAcceptance<S>(
  source: TreeSource<S>,
  state: TreeFilterState,
): TreeAcceptance<S> {
  const fields = filterFields(source, state);
  const { pattern, capture, role } = state;

  if (pattern) {
    return (element) => {
      for (const field of fields) {
        const value = source.valueAt(element, field, role);
        if (isEmptyValue(value)) {
          continue;
        }
        const match = pattern.exec(String(value));
        if (!match) {
          continue;
        }
        if (capture && !capture(match[1])) {
          continue;
        }
        return true;
      }
      return false;
    };
  }

  if (!state.text) {
    return () => true;
  }

  const needle = state.caseSensitive ? state.text : state.text.toLowerCase();

  return (element) => {
    for (const field of fields) {
      const value = source.valueAt(element, field, role);
      if (isEmptyValue(value)) {
        continue;
      }
      const text = state.caseSensitive
        ? String(value)
        : String(value).toLowerCase();
      const matched = state.exactMatch ? text === needle : text.includes(needle);
      if (matched) {
        return true;
      }
    }
    return false;
  };
}

/**
 * Evaluates `accept` once per element of the subtree under `root` (exclusive)
 * in a single post-order pass.
 */
export function computeAcceptanceIndex<S>(
  source: TreeSource<S>,
  root: S | null,
  accept: TreeAcceptance<S>,
  index: AcceptanceIndex<S> = new Map(),
): AcceptanceIndex<S> {
  for (const child of sourceChildren(source, root)) {
    visitElement(source, child, accept, index);
  }
  return index;
}

/** Same as `computeAcceptanceIndex`, but `element` itself is included. */
export function computeElementAcceptance<S>(
  source: TreeSource<S>,
  element: S,
  accept: TreeAcceptance<S>,
  index: AcceptanceIndex<S> = new Map(),
): AcceptanceIndex<S> {
  visitElement(source, element, accept, index);
  return index;
}

function visitElement<S>(
  source: TreeSource<S>,
  element: S,
  accept: TreeAcceptance<S>,
  index: AcceptanceIndex<S>,
): AcceptanceEntry {
  const self = accept(element);
  let subtree = self;

  for (const child of sourceChildren(source, element)) {
    if (visitElement(source, child, accept, index).subtree) {
      subtree = true;
    }
  }

  const entry = { self, subtree };
  index.set(element, entry);
  return entry;
}
