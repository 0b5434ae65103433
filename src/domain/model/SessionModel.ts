import type { Diagnostic } from '../commands/Diagnostic.js';
import type { NavigationEntry } from '../entities/NavigationEntry.js';
import { createTab } from '../entities/Tab.js';
import type { Tab, TabId } from '../entities/Tab.js';
import { createWindow } from '../entities/Window.js';
import type { Window, WindowId } from '../entities/Window.js';

/** 每次迭代都重新建立 iterator 的惰性序列 */
function lazy<T>(factory: () => Iterator<T>): Iterable<T> {
  return { [Symbol.iterator]: factory };
}

const EMPTY: readonly never[] = [];

/**
 * 視窗、分頁與導覽項目的物件圖
 *
 * - 所有實體由 model 擁有，以 id 定址；視窗只保存 tab id 參照
 * - 列舉順序為串流中第一次被參照的順序，而非 id 大小
 * - 實體建立後不會移除，關閉只是旗標
 */
export class SessionModel {
  private readonly windowMap = new Map<WindowId, Window>();
  private readonly tabMap = new Map<TabId, Tab>();
  private readonly diagnosticList: Diagnostic[] = [];

  /** SetActiveWindow 最後指定的視窗 */
  activeWindowId: WindowId | null = null;
  /** initial state marker 所在紀錄的 offset；之後的指令為增量更新 */
  initialStateMarkerOffset: number | null = null;

  getWindow(id: WindowId): Window | undefined {
    return this.windowMap.get(id);
  }

  getTab(id: TabId): Tab | undefined {
    return this.tabMap.get(id);
  }

  /** 不存在時以預設值建立（串流不保證建立指令先於第一次修改） */
  getOrCreateWindow(id: WindowId): Window {
    let window = this.windowMap.get(id);
    if (!window) {
      window = createWindow(id);
      this.windowMap.set(id, window);
    }
    return window;
  }

  getOrCreateTab(id: TabId): Tab {
    let tab = this.tabMap.get(id);
    if (!tab) {
      tab = createTab(id);
      this.tabMap.set(id, tab);
    }
    return tab;
  }

  /** 把分頁掛到視窗；若原本屬於其他視窗則先移出，確保只被一個視窗參照 */
  attachTab(tabId: TabId, windowId: WindowId): void {
    const tab = this.getOrCreateTab(tabId);
    const target = this.getOrCreateWindow(windowId);

    if (tab.windowId !== null && tab.windowId !== windowId) {
      const previous = this.windowMap.get(tab.windowId);
      if (previous) {
        previous.tabIds = previous.tabIds.filter((id) => id !== tabId);
      }
    }

    tab.windowId = windowId;
    if (!target.tabIds.includes(tabId)) {
      target.tabIds.push(tabId);
    }
  }

  addDiagnostic(diagnostic: Diagnostic): void {
    this.diagnosticList.push(diagnostic);
  }

  get windowCount(): number {
    return this.windowMap.size;
  }

  get tabCount(): number {
    return this.tabMap.size;
  }

  get diagnosticCount(): number {
    return this.diagnosticList.length;
  }

  windows(): Iterable<Window> {
    return lazy(() => this.windowMap.values());
  }

  tabs(): Iterable<Tab> {
    return lazy(() => this.tabMap.values());
  }

  /** 尚未觀察到 SetTabWindow 的分頁 */
  orphanTabs(): Iterable<Tab> {
    return lazy(() => [...this.tabMap.values()].filter((tab) => tab.windowId === null)[Symbol.iterator]());
  }

  /** 依 index 遞增；index 可不連續 */
  navigationEntries(tabId: TabId): Iterable<NavigationEntry> {
    return lazy(() => {
      const tab = this.tabMap.get(tabId);
      if (!tab) return EMPTY[Symbol.iterator]();
      return [...tab.navigations.values()].sort((a, b) => a.index - b.index)[Symbol.iterator]();
    });
  }

  /** 被 prune 指令移出的項目，依移出順序 */
  prunedNavigationEntries(tabId: TabId): Iterable<NavigationEntry> {
    return lazy(() => (this.tabMap.get(tabId)?.prunedNavigations ?? EMPTY)[Symbol.iterator]());
  }

  /** 依 selectedTabIndex 找出視窗中位置相符的分頁 */
  selectedTabId(windowId: WindowId): TabId | null {
    const window = this.windowMap.get(windowId);
    if (!window || window.selectedTabIndex === null) return null;
    // 關閉的分頁可能保留舊 index；同 index 時以未關閉的分頁優先
    const matches = window.tabIds.filter((id) => this.tabMap.get(id)?.indexInWindow === window.selectedTabIndex);
    const live = matches.find((id) => this.tabMap.get(id)?.closed === false);
    return live ?? matches[0] ?? null;
  }

  diagnostics(): Iterable<Diagnostic> {
    return lazy(() => this.diagnosticList[Symbol.iterator]());
  }
}
