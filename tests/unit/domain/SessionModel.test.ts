import { describe, it, expect } from 'vitest';
import { SessionModel } from '../../../src/domain/model/SessionModel.js';
import { navigation } from '../../helpers/entities.js';

describe('SessionModel', () => {
  it('enumerates entities in first-reference order', () => {
    const model = new SessionModel();
    model.getOrCreateWindow(5);
    model.getOrCreateWindow(1);
    model.getOrCreateTab(30);
    model.getOrCreateTab(10);

    expect([...model.windows()].map((w) => w.id)).toEqual([5, 1]);
    expect([...model.tabs()].map((t) => t.id)).toEqual([30, 10]);
  });

  it('returns the same entity on repeated getOrCreate', () => {
    const model = new SessionModel();
    const tab = model.getOrCreateTab(1);
    tab.pinned = true;
    expect(model.getOrCreateTab(1).pinned).toBe(true);
    expect(model.tabCount).toBe(1);
  });

  it('creates entities with default fields', () => {
    const model = new SessionModel();
    expect(model.getOrCreateWindow(1)).toEqual({
      id: 1,
      bounds: null,
      selectedTabIndex: null,
      tabIds: [],
      closed: false,
      closedAt: null,
      windowType: null,
      appName: null,
    });
    expect(model.getWindow(2)).toBeUndefined();
  });

  it('lists tabs without a window as orphans', () => {
    const model = new SessionModel();
    model.attachTab(10, 1);
    model.getOrCreateTab(11);
    expect([...model.orphanTabs()].map((t) => t.id)).toEqual([11]);
  });

  it('does not duplicate tab references', () => {
    const model = new SessionModel();
    model.attachTab(10, 1);
    model.attachTab(10, 1);
    expect(model.getWindow(1)?.tabIds).toEqual([10]);
  });

  it('sorts navigation entries by index', () => {
    const model = new SessionModel();
    const tab = model.getOrCreateTab(1);
    tab.navigations.set(3, navigation(3, 'c'));
    tab.navigations.set(0, navigation(0, 'a'));

    expect([...model.navigationEntries(1)].map((e) => e.url)).toEqual(['a', 'c']);
    expect([...model.navigationEntries(99)]).toEqual([]);
    expect([...model.prunedNavigationEntries(99)]).toEqual([]);
  });

  it('returns iterables that can be consumed more than once', () => {
    const model = new SessionModel();
    model.getOrCreateWindow(1);
    model.addDiagnostic({ kind: 'TruncatedRecord', offset: 0, declaredSize: null, available: 1 });

    const windows = model.windows();
    expect([...windows]).toHaveLength(1);
    expect([...windows]).toHaveLength(1);

    const diagnostics = model.diagnostics();
    expect([...diagnostics]).toHaveLength(1);
    expect([...diagnostics]).toHaveLength(1);
    expect(model.diagnosticCount).toBe(1);
  });

  it('resolves the selected tab by position', () => {
    const model = new SessionModel();
    model.attachTab(10, 1);
    model.attachTab(11, 1);
    model.getOrCreateTab(10).indexInWindow = 0;
    model.getOrCreateTab(11).indexInWindow = 1;

    expect(model.selectedTabId(1)).toBeNull();
    model.getOrCreateWindow(1).selectedTabIndex = 1;
    expect(model.selectedTabId(1)).toBe(11);
    model.getOrCreateWindow(1).selectedTabIndex = 5;
    expect(model.selectedTabId(1)).toBeNull();
    expect(model.selectedTabId(42)).toBeNull();
  });

  it('prefers an open tab when a closed tab kept the selected index', () => {
    const model = new SessionModel();
    model.attachTab(10, 1);
    model.attachTab(11, 1);
    model.getOrCreateTab(10).indexInWindow = 0;
    model.getOrCreateTab(10).closed = true;
    model.getOrCreateTab(11).indexInWindow = 0;
    model.getOrCreateWindow(1).selectedTabIndex = 0;

    expect(model.selectedTabId(1)).toBe(11);

    model.getOrCreateTab(11).closed = true;
    expect(model.selectedTabId(1)).toBe(10);
  });
});
