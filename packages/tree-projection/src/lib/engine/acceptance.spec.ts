import { createFilterState, TreeFilterState } from '../types/tree-filter';
import { ObjectTreeItem, ObjectTreeSource } from '../utils/object-tree-source';
import {
  compilePattern,
  computeAcceptanceIndex,
  createAcceptance,
  wildcardToPattern,
} from './acceptance';

describe('acceptance', () => {
  let source: ObjectTreeSource;

  const state = (overrides: Partial<TreeFilterState>): TreeFilterState => ({
    ...createFilterState(),
    ...overrides,
  });

  const item = (...names: string[]): ObjectTreeItem => {
    const found = source.itemAtPath(names);
    if (!found) {
      throw new Error(`No item at ${names.join('/')}`);
    }
    return found;
  };

  beforeEach(() => {
    source = new ObjectTreeSource(
      ['name', 'kind'],
      [
        {
          name: 'Body_01',
          values: ['mesh'],
          children: [
            { name: 'Arm_left', values: ['joint'] },
            { name: 'Arm_right', values: [''] },
          ],
        },
        { name: 'camera', values: [null] },
      ],
    );
  });

  describe('text filters', () => {
    it('accepts everything while the text is empty', () => {
      const accept = createAcceptance(source, state({}));
      expect(accept(item('camera'))).toBe(true);
    });

    it('matches substrings case-insensitively by default', () => {
      const accept = createAcceptance(source, state({ text: 'ARM' }));
      expect(accept(item('Body_01', 'Arm_left'))).toBe(true);
      expect(accept(item('Body_01'))).toBe(false);
    });

    it('respects case sensitivity', () => {
      const accept = createAcceptance(source, state({ text: 'ARM', caseSensitive: true }));
      expect(accept(item('Body_01', 'Arm_left'))).toBe(false);
    });

    it('requires the whole value in exact mode', () => {
      const accept = createAcceptance(source, state({ text: 'arm_left', exactMatch: true }));
      expect(accept(item('Body_01', 'Arm_left'))).toBe(true);
      expect(accept(item('Body_01', 'Arm_right'))).toBe(false);
    });

    it('tests every field unless restricted', () => {
      expect(createAcceptance(source, state({ text: 'joint' }))(item('Body_01', 'Arm_left'))).toBe(
        true,
      );
      expect(
        createAcceptance(source, state({ text: 'joint', fields: [0] }))(item('Body_01', 'Arm_left')),
      ).toBe(false);
    });

    it('tests the configured role', () => {
      const accept = createAcceptance(source, state({ text: 'camera', role: 'tooltip' }));
      expect(accept(item('camera'))).toBe(false);
    });
  });

  describe('pattern filters', () => {
    it('matches unanchored', () => {
      const accept = createAcceptance(source, state({ pattern: /_\d+$/ }));
      expect(accept(item('Body_01'))).toBe(true);
      expect(accept(item('camera'))).toBe(false);
    });

    it('refines matches through the capture callback', () => {
      const captured: (string | undefined)[] = [];
      const accept = createAcceptance(
        source,
        state({
          pattern: /^Arm_(\w+)/,
          capture: (value) => {
            captured.push(value);
            return value === 'left';
          },
        }),
      );

      expect(accept(item('Body_01', 'Arm_left'))).toBe(true);
      expect(accept(item('Body_01', 'Arm_right'))).toBe(false);
      expect(captured).toEqual(['left', 'right']);
    });

    it('passes undefined to the capture callback when the pattern has no group', () => {
      const capture = jest.fn(() => true);
      createAcceptance(source, state({ pattern: /camera/, capture }))(item('camera'));
      expect(capture).toHaveBeenCalledWith(undefined);
    });

    it('propagates errors thrown by the capture callback', () => {
      const accept = createAcceptance(
        source,
        state({
          pattern: /camera/,
          capture: () => {
            throw new Error('capture failed');
          },
        }),
      );
      expect(() => accept(item('camera'))).toThrow('capture failed');
    });
  });

  describe('compilePattern', () => {
    it('compiles strings case-insensitively on request', () => {
      expect(compilePattern('body', false).test('BODY')).toBe(true);
      expect(compilePattern('body').test('BODY')).toBe(false);
    });

    it('drops stateful flags', () => {
      const pattern = compilePattern(/a/gy);
      expect(pattern.flags).toBe('');
      expect(pattern.test('a')).toBe(true);
      expect(pattern.test('a')).toBe(true);
    });
  });

  describe('wildcardToPattern', () => {
    it('translates stars and question marks', () => {
      const pattern = wildcardToPattern('arm_*t');
      expect(pattern.test('Arm_left')).toBe(true);
      expect(pattern.test('Arm_right')).toBe(true);
      expect(wildcardToPattern('Body_0?').test('Body_01')).toBe(true);
      expect(wildcardToPattern('Body_0?').test('Body_0')).toBe(false);
    });

    it('supports character classes and their negation', () => {
      expect(wildcardToPattern('Body_0[12]').test('Body_01')).toBe(true);
      expect(wildcardToPattern('Body_0[!12]').test('Body_01')).toBe(false);
      expect(wildcardToPattern('Body_0[!12]').test('Body_03')).toBe(true);
    });

    it('escapes regular expression syntax', () => {
      expect(wildcardToPattern('a.b').test('axb')).toBe(false);
      expect(wildcardToPattern('a.b').test('a.b')).toBe(true);
      expect(wildcardToPattern('[x').test('[x')).toBe(true);
    });
  });

  describe('computeAcceptanceIndex', () => {
    it('records self and subtree matches in one pass', () => {
      const accept = jest.fn((element: ObjectTreeItem) => element.name === 'Arm_left');
      const index = computeAcceptanceIndex(source, null, accept);

      expect(accept).toHaveBeenCalledTimes(4);
      expect(index.get(item('Body_01'))).toEqual({ self: false, subtree: true });
      expect(index.get(item('Body_01', 'Arm_left'))).toEqual({ self: true, subtree: true });
      expect(index.get(item('Body_01', 'Arm_right'))).toEqual({ self: false, subtree: false });
      expect(index.get(item('camera'))).toEqual({ self: false, subtree: false });
    });
  });
});
