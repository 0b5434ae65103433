import type { ChromeTimestamp } from '../value-objects/ChromeTimestamp.js';
import type { PageTransition } from '../value-objects/PageTransition.js';
import type { PageState } from './PageState.js';

/** type mask 中代表含 POST 資料的位元 */
export const HAS_POST_DATA_MASK = 1;

/**
 * 分頁導覽歷史中的單一項目
 *
 * 同一 (tabId, index) 的後續 UpdateTabNavigation 直接覆蓋（last-write-wins）。
 */
export interface NavigationEntry {
  index: number;
  url: string | null;
  title: string | null;
  referrer: string | null;
  transitionType: PageTransition;
  timestamp: ChromeTimestamp | null;
  /** 曾以不同內容覆蓋同 index 的既有項目 */
  isOverwrite: boolean;
  typeMask: number;
  hasPostData: boolean;
  originalRequestUrl: string | null;
  isOverridingUserAgent: boolean;
  searchTerms: string | null;
  httpStatusCode: number;
  referrerPolicy: number;
  /** encoded page state 原始長度（bytes），無則為 0 */
  pageStateSize: number;
  pageState: PageState | null;
  pageStateError: string | null;
}
