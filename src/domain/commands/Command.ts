import type { ChromeTimestamp } from '../value-objects/ChromeTimestamp.js';
import type { WindowBounds } from '../entities/Window.js';
import type { NavigationEntry } from '../entities/NavigationEntry.js';

/**
 * 已辨識的 session 指令
 *
 * 每個 kind 對應一種 payload 形狀；同一 kind 可由多個 command id 產生
 * （例如三代 window bounds 指令都解碼為 UpdateWindowBounds）。
 */
export type Command =
  | { kind: 'CreateWindow'; windowId: number; windowType: number }
  | { kind: 'UpdateWindowBounds'; windowId: number; bounds: WindowBounds }
  | { kind: 'SetSelectedTabInWindow'; windowId: number; index: number }
  | { kind: 'SetActiveWindow'; windowId: number }
  | { kind: 'SetWindowAppName'; windowId: number; appName: string | null }
  | { kind: 'WindowClosed'; windowId: number; closedAt: ChromeTimestamp }
  | { kind: 'SetTabWindow'; tabId: number; windowId: number }
  | { kind: 'SetTabIndex'; tabId: number; index: number }
  | { kind: 'UpdateTabNavigation'; tabId: number; entry: NavigationEntry }
  | { kind: 'SetActiveNavigationIndex'; tabId: number; index: number; timestamp: ChromeTimestamp | null }
  | { kind: 'TabNavigationPathPrunedFromBack'; tabId: number; index: number }
  | { kind: 'TabNavigationPathPrunedFromFront'; tabId: number; count: number }
  | { kind: 'TabNavigationPathPruned'; tabId: number; index: number; count: number }
  | { kind: 'SetPinnedState'; tabId: number; pinned: boolean }
  | { kind: 'SetExtensionAppId'; tabId: number; appId: string | null }
  | { kind: 'SetTabUserAgentOverride'; tabId: number; userAgent: string | null }
  | { kind: 'SessionStorageAssociated'; tabId: number; persistentId: string | null }
  | { kind: 'LastActiveTime'; tabId: number; time: ChromeTimestamp }
  | { kind: 'TabClosed'; tabId: number; closedAt: ChromeTimestamp }
  | { kind: 'InitialStateMarker' };

export type CommandKind = Command['kind'];
