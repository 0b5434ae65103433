import type { ChromeTimestamp } from '../value-objects/ChromeTimestamp.js';
import type { TabId } from './Tab.js';

export type WindowId = number;

/** 視窗顯示狀態（show state），未知值保留數字 */
export type WindowShowState = 'default' | 'normal' | 'minimized' | 'maximized' | 'inactive' | 'fullscreen' | number;

export interface WindowBounds {
  x: number;
  y: number;
  width: number;
  height: number;
  showState: WindowShowState | null;
}

/**
 * 瀏覽器視窗
 *
 * tabIds 只是參照，分頁實體由 SessionModel 擁有。
 */
export interface Window {
  id: WindowId;
  bounds: WindowBounds | null;
  /** SetSelectedTabInWindow 指定的分頁位置（非 tab id） */
  selectedTabIndex: number | null;
  tabIds: TabId[];
  closed: boolean;
  closedAt: ChromeTimestamp | null;
  windowType: number | null;
  appName: string | null;
}

export function createWindow(id: WindowId): Window {
  return {
    id,
    bounds: null,
    selectedTabIndex: null,
    tabIds: [],
    closed: false,
    closedAt: null,
    windowType: null,
    appName: null,
  };
}
