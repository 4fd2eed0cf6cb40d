import { ProjectionChangeEvent } from '../types/tree-events';
import { ObjectTreeItem, ObjectTreeSource } from '../utils/object-tree-source';
import { TreeProjectionModel } from './projection-model';

describe('TreeProjectionModel', () => {
  let source: ObjectTreeSource;
  let model: TreeProjectionModel<ObjectTreeItem>;
  let events: ProjectionChangeEvent[];

  const flatNames = () => model.flat.elements().map((element) => element.name);
  const types = () => events.map((event) => event.type);

  beforeEach(() => {
    source = new ObjectTreeSource(
      ['name'],
      [
        { name: 'A', children: [{ name: 'A1' }] },
        { name: 'B', children: [{ name: 'B1' }] },
      ],
    );
    model = new TreeProjectionModel<ObjectTreeItem>();
    model.setSource(source);
    events = [];
    model.changes$.subscribe((event) => events.push(event));
  });

  afterEach(() => model.dispose());

  it('starts with the hierarchical projection', () => {
    expect(model.isFlat).toBe(false);
    expect(model.projection).toBe(model.tree);
    expect(model.projection.rowCount()).toBe(2);
  });

  it('forwards events of the hierarchy while it is shown', () => {
    model.setFilterText('A');
    expect(types()).toEqual(['modelAboutToBeReset', 'modelReset']);
  });

  it('switches to the flat list with a single reset', () => {
    model.setFlat(true);

    expect(types()).toEqual(['modelAboutToBeReset', 'modelReset']);
    expect(model.projection).toBe(model.flat);
    expect(model.projection.rowCount()).toBe(4);
    expect(flatNames()).toEqual(['A', 'A1', 'B', 'B1']);
  });

  it('lists only accepted elements while a filter is active', () => {
    model.setKeepParentIfChildMatches(true);
    model.setFilterText('1');
    model.setFlat(true);

    expect(flatNames()).toEqual(['A1', 'B1']);
  });

  it('re-flattens when the filter changes in flat mode', () => {
    model.setFlat(true);
    events = [];

    model.setFilterText('B');

    expect(flatNames()).toEqual(['B', 'B1']);
    expect(types()).toEqual(['modelAboutToBeReset', 'modelReset']);

    model.clearFilter();
    expect(flatNames()).toEqual(['A', 'A1', 'B', 'B1']);
  });

  it('keeps the filter when switching back', () => {
    model.setFlat(true);
    model.setFilterPattern('^b');
    model.setFlat(false);

    expect(model.projection.snapshot()).toEqual([
      {
        value: 'B',
        placeholder: false,
        children: [{ value: 'B1', placeholder: false, children: [] }],
      },
    ]);
  });

  it('forwards only flat events for source changes in flat mode', () => {
    model.setFlat(true);
    events = [];

    source.appendChild(null, { name: 'C' });

    expect(types()).toEqual(['modelAboutToBeReset', 'modelReset']);
    expect(flatNames()).toEqual(['A', 'A1', 'B', 'B1', 'C']);
  });

  it('turns a source reset into a single reset in flat mode', () => {
    model.setFilterText('1');
    model.setFlat(true);
    events = [];

    source.reset([{ name: 'C1' }, { name: 'D' }]);

    expect(types()).toEqual(['modelAboutToBeReset', 'modelReset']);
    expect(flatNames()).toEqual(['C1']);
  });

  it('delegates sorting to the flat list', () => {
    model.setFlat(true);
    model.setSort(0, 'descending');
    expect(flatNames()).toEqual(['B1', 'B', 'A1', 'A']);

    model.setSortScope('siblings');
    expect(flatNames()).toEqual(['B', 'B1', 'A', 'A1']);

    model.setSortOrder('ascending');
    expect(flatNames()).toEqual(['A', 'A1', 'B', 'B1']);
  });

  it('starts flat when configured to', () => {
    const configured = new TreeProjectionModel<ObjectTreeItem>({ flat: true });
    configured.setSource(source);

    expect(configured.isFlat).toBe(true);
    expect(configured.projection.rowCount()).toBe(4);
    configured.dispose();
  });

  it('ignores a switch to the current mode', () => {
    model.setFlat(false);
    expect(events).toEqual([]);
  });
});
