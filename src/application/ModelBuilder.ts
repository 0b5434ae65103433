import type { Command } from '../domain/commands/Command.js';
import type { DecodeOutcome } from '../domain/commands/DecodeOutcome.js';
import type { NavigationEntry } from '../domain/entities/NavigationEntry.js';
import type { Tab } from '../domain/entities/Tab.js';
import { SessionModel } from '../domain/model/SessionModel.js';

export type BuilderState = 'Empty' | 'Building' | 'Finalized';
export type FinalizationReason = 'EndOfStream' | 'TruncatedRecord' | 'ToleranceExceeded';
export type MalformedTolerance = number | 'unbounded';

export interface ModelBuilderOptions {
  /** 可接受的 MalformedCommand 數量，超過即提前 finalize */
  malformedCommandTolerance: MalformedTolerance;
}

/** 比較可觀察內容；isOverwrite 本身不參與 */
function sameNavigationContent(a: NavigationEntry, b: NavigationEntry): boolean {
  return a.index === b.index &&
    a.url === b.url &&
    a.title === b.title &&
    a.referrer === b.referrer &&
    a.transitionType.value === b.transitionType.value &&
    (a.timestamp === null ? b.timestamp === null : a.timestamp.equals(b.timestamp)) &&
    a.typeMask === b.typeMask &&
    a.originalRequestUrl === b.originalRequestUrl &&
    a.isOverridingUserAgent === b.isOverridingUserAgent &&
    a.searchTerms === b.searchTerms &&
    a.httpStatusCode === b.httpStatusCode &&
    a.referrerPolicy === b.referrerPolicy &&
    a.pageStateSize === b.pageStateSize;
}

/**
 * 把解碼後的指令依串流順序折疊進 SessionModel
 *
 * 狀態：Empty → Building（第一個成功解碼的指令）→ Finalized。
 * - 參照到不存在的實體時以預設值建立
 * - 同一欄位後寫者勝，不做欄位合併
 * - unknown / malformed 轉為 diagnostic，不中斷折疊；
 *   malformed 超過容忍數量時提前 finalize
 * - finalize 一律成功，保留目前累積的 model
 */
export class ModelBuilder {
  readonly model = new SessionModel();
  private currentState: BuilderState = 'Empty';
  private reason: FinalizationReason | null = null;
  private malformedCount = 0;
  private appliedCount = 0;

  constructor(private readonly options: ModelBuilderOptions = { malformedCommandTolerance: 'unbounded' }) {}

  get state(): BuilderState {
    return this.currentState;
  }

  get finalization(): FinalizationReason | null {
    return this.reason;
  }

  get commandsApplied(): number {
    return this.appliedCount;
  }

  /**
   * 消化一筆紀錄的解碼結果
   * @param offset - 紀錄 size 前綴在檔案中的位置
   * @returns 是否可以繼續消化下一筆
   */
  consume(outcome: DecodeOutcome, offset: number): boolean {
    this.assertOpen();

    switch (outcome.kind) {
      case 'command':
        this.currentState = 'Building';
        this.apply(outcome.command, offset);
        this.appliedCount++;
        return true;

      case 'unknown':
        this.model.addDiagnostic({
          kind: 'UnknownCommand',
          offset,
          commandId: outcome.commandId,
          rawPayload: outcome.rawPayload,
        });
        return true;

      case 'malformed': {
        this.model.addDiagnostic({
          kind: 'MalformedCommand',
          offset,
          commandId: outcome.commandId,
          cause: outcome.cause,
        });
        this.malformedCount++;
        const limit = this.options.malformedCommandTolerance;
        if (limit !== 'unbounded' && this.malformedCount > limit) {
          this.finalize('ToleranceExceeded');
          return false;
        }
        return true;
      }
    }
  }

  /** 紀錄層級截斷：記錄 diagnostic 並結束 */
  truncated(offset: number, declaredSize: number | null, available: number): SessionModel {
    this.assertOpen();
    this.model.addDiagnostic({ kind: 'TruncatedRecord', offset, declaredSize, available });
    return this.finalize('TruncatedRecord');
  }

  finalize(reason: FinalizationReason): SessionModel {
    if (this.currentState !== 'Finalized') {
      this.currentState = 'Finalized';
      this.reason = reason;
    }
    return this.model;
  }

  private assertOpen(): void {
    if (this.currentState === 'Finalized') {
      throw new Error(`ModelBuilder already finalized (${this.reason ?? 'unknown'})`);
    }
  }

  private apply(command: Command, offset: number): void {
    const model = this.model;

    switch (command.kind) {
      case 'CreateWindow':
        model.getOrCreateWindow(command.windowId).windowType = command.windowType;
        break;
      case 'UpdateWindowBounds':
        model.getOrCreateWindow(command.windowId).bounds = { ...command.bounds };
        break;
      case 'SetSelectedTabInWindow':
        model.getOrCreateWindow(command.windowId).selectedTabIndex = command.index;
        break;
      case 'SetActiveWindow':
        model.getOrCreateWindow(command.windowId);
        model.activeWindowId = command.windowId;
        break;
      case 'SetWindowAppName':
        model.getOrCreateWindow(command.windowId).appName = command.appName;
        break;
      case 'WindowClosed': {
        const window = model.getOrCreateWindow(command.windowId);
        window.closed = true;
        window.closedAt = command.closedAt;
        break;
      }
      case 'SetTabWindow':
        model.attachTab(command.tabId, command.windowId);
        break;
      case 'SetTabIndex':
        model.getOrCreateTab(command.tabId).indexInWindow = command.index;
        break;
      case 'UpdateTabNavigation':
        this.updateNavigation(model.getOrCreateTab(command.tabId), command.entry);
        break;
      case 'SetActiveNavigationIndex': {
        const tab = model.getOrCreateTab(command.tabId);
        tab.activeNavigationIndex = command.index;
        if (command.timestamp) tab.activeNavigationChangedAt = command.timestamp;
        break;
      }
      case 'TabNavigationPathPrunedFromBack':
        this.pruneFromBack(model.getOrCreateTab(command.tabId), command.index);
        break;
      case 'TabNavigationPathPrunedFromFront':
        this.pruneRange(model.getOrCreateTab(command.tabId), 0, command.count);
        break;
      case 'TabNavigationPathPruned':
        this.pruneRange(model.getOrCreateTab(command.tabId), command.index, command.count);
        break;
      case 'SetPinnedState':
        model.getOrCreateTab(command.tabId).pinned = command.pinned;
        break;
      case 'SetExtensionAppId':
        model.getOrCreateTab(command.tabId).extensionAppId = command.appId;
        break;
      case 'SetTabUserAgentOverride':
        model.getOrCreateTab(command.tabId).userAgentOverride = command.userAgent;
        break;
      case 'SessionStorageAssociated':
        model.getOrCreateTab(command.tabId).sessionStorageId = command.persistentId;
        break;
      case 'LastActiveTime':
        model.getOrCreateTab(command.tabId).lastActiveTime = command.time;
        break;
      case 'TabClosed': {
        const tab = model.getOrCreateTab(command.tabId);
        tab.closed = true;
        tab.closedAt = command.closedAt;
        break;
      }
      case 'InitialStateMarker':
        model.initialStateMarkerOffset = offset;
        break;
    }
  }

  /** 同 index 直接覆蓋；內容不同才標記 isOverwrite，重複套用相同指令結果不變 */
  private updateNavigation(tab: Tab, entry: NavigationEntry): void {
    const existing = tab.navigations.get(entry.index);
    const isOverwrite = existing
      ? existing.isOverwrite || !sameNavigationContent(existing, entry)
      : false;
    tab.navigations.set(entry.index, { ...entry, isOverwrite });
  }

  /** 保留 index < keep 的項目，其餘移到 prunedNavigations */
  private pruneFromBack(tab: Tab, keep: number): void {
    const doomed = [...tab.navigations.values()]
      .filter((entry) => entry.index >= keep)
      .sort((a, b) => a.index - b.index);
    for (const entry of doomed) {
      tab.navigations.delete(entry.index);
      tab.prunedNavigations.push(entry);
    }

    if (tab.activeNavigationIndex !== null && tab.activeNavigationIndex >= keep) {
      tab.activeNavigationIndex = keep > 0 ? keep - 1 : null;
    }
  }

  /**
   * 移除 [start, start + count) 的項目，之後的項目 index 往前遞補 count
   * 選取位置落在移除範圍內時改指向範圍前一項（start 為 0 時指向遞補後的第一項）
   */
  private pruneRange(tab: Tab, start: number, count: number): void {
    if (count <= 0 || start < 0) return;
    const end = start + count;

    const ordered = [...tab.navigations.values()].sort((a, b) => a.index - b.index);
    const survivors = new Map<number, NavigationEntry>();
    for (const entry of ordered) {
      if (entry.index >= start && entry.index < end) {
        tab.prunedNavigations.push(entry);
      } else if (entry.index >= end) {
        survivors.set(entry.index - count, { ...entry, index: entry.index - count });
      } else {
        survivors.set(entry.index, entry);
      }
    }
    tab.navigations = survivors;

    const active = tab.activeNavigationIndex;
    if (active === null || active < start) return;
    if (active >= end) {
      tab.activeNavigationIndex = active - count;
    } else if (start > 0) {
      tab.activeNavigationIndex = start - 1;
    } else {
      tab.activeNavigationIndex = survivors.size > 0 ? 0 : null;
    }
  }
}
