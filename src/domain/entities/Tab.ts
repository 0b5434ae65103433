import type { ChromeTimestamp } from '../value-objects/ChromeTimestamp.js';
import type { NavigationEntry } from './NavigationEntry.js';

export type TabId = number;
export type NavigationIndex = number;

/**
 * 分頁
 *
 * windowId 在觀察到 SetTabWindow 之前為 null（孤兒分頁，截斷檔案中常見）。
 * closed 為 tombstone 旗標，分頁不會從 model 移除。
 */
export interface Tab {
  id: TabId;
  windowId: number | null;
  indexInWindow: number | null;
  navigations: Map<NavigationIndex, NavigationEntry>;
  /** 被 prune 指令移出的項目，依移出順序保留 */
  prunedNavigations: NavigationEntry[];
  activeNavigationIndex: NavigationIndex | null;
  /** 選取導覽項目時一併記錄的時間（僅 tabs 檔案有） */
  activeNavigationChangedAt: ChromeTimestamp | null;
  closed: boolean;
  closedAt: ChromeTimestamp | null;
  pinned: boolean;
  extensionAppId: string | null;
  userAgentOverride: string | null;
  sessionStorageId: string | null;
  lastActiveTime: ChromeTimestamp | null;
}

export function createTab(id: TabId): Tab {
  return {
    id,
    windowId: null,
    indexInWindow: null,
    navigations: new Map(),
    prunedNavigations: [],
    activeNavigationIndex: null,
    activeNavigationChangedAt: null,
    closed: false,
    closedAt: null,
    pinned: false,
    extensionAppId: null,
    userAgentOverride: null,
    sessionStorageId: null,
    lastActiveTime: null,
  };
}
