import type { DecodeResult } from '../../application/dto/DecodeResult.js';
import { describeDiagnostic } from '../../domain/commands/Diagnostic.js';
import type { Diagnostic } from '../../domain/commands/Diagnostic.js';
import type { NavigationEntry } from '../../domain/entities/NavigationEntry.js';
import type { Tab } from '../../domain/entities/Tab.js';
import type { Window } from '../../domain/entities/Window.js';
import type { SessionModel } from '../../domain/model/SessionModel.js';

export type OutputFormat = 'json' | 'text';

export interface SessionReportOptions {
  /** 是否輸出被 prune 移除的導覽項目 */
  includePruned: boolean;
}

function toHex(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('hex');
}

/** JSON.stringify 不支援 bigint 與 Uint8Array */
function jsonReplacer(_key: string, value: unknown): unknown {
  if (typeof value === 'bigint') return value.toString();
  if (value instanceof Uint8Array) return toHex(value);
  return value;
}

/**
 * 解碼結果的輸出格式化器
 *
 * - text：依視窗 → 分頁 → 導覽項目縮排列出，最後列出 diagnostics
 * - json：同樣的結構化資料，bigint 以字串、bytes 以 hex 表示
 */
export class SessionReportFormatter {
  constructor(private readonly options: SessionReportOptions = { includePruned: false }) {}

  formatResult(result: DecodeResult, format: OutputFormat): string {
    if (format === 'json') {
      return JSON.stringify(this.shapeResult(result), jsonReplacer, 2);
    }
    return this.textResult(result);
  }

  /** 多個檔案：JSON 為陣列（只有一個檔案時為單一物件），文字以空行分隔 */
  formatResults(results: readonly DecodeResult[], format: OutputFormat): string {
    if (format === 'json') {
      const shaped = results.map((result) => this.shapeResult(result));
      return JSON.stringify(shaped.length === 1 ? shaped[0] : shaped, jsonReplacer, 2);
    }
    return results.map((result) => this.textResult(result)).join('\n\n');
  }

  formatObject(data: unknown, format: OutputFormat): string {
    if (format === 'json') {
      return JSON.stringify(data, jsonReplacer, 2);
    }
    return this.flattenToText(data);
  }

  private shapeResult(result: DecodeResult): Record<string, unknown> {
    const { model } = result;
    return {
      source: result.source,
      headerVersion: result.header?.version ?? null,
      formatVersion: result.formatVersion,
      sessionKind: result.sessionKind,
      finalization: result.finalization,
      stats: result.stats,
      activeWindowId: model.activeWindowId,
      initialStateMarkerOffset: model.initialStateMarkerOffset,
      windows: [...model.windows()].map((window) => ({
        id: window.id,
        windowType: window.windowType,
        bounds: window.bounds,
        appName: window.appName,
        selectedTabIndex: window.selectedTabIndex,
        selectedTabId: model.selectedTabId(window.id),
        closed: window.closed,
        closedAt: window.closedAt,
        tabIds: window.tabIds,
      })),
      tabs: [...model.tabs()].map((tab) => this.shapeTab(model, tab)),
      diagnostics: [...model.diagnostics()].map((diagnostic) => this.shapeDiagnostic(diagnostic)),
    };
  }

  private shapeTab(model: SessionModel, tab: Tab): Record<string, unknown> {
    const shaped: Record<string, unknown> = {
      id: tab.id,
      windowId: tab.windowId,
      indexInWindow: tab.indexInWindow,
      activeNavigationIndex: tab.activeNavigationIndex,
      activeNavigationChangedAt: tab.activeNavigationChangedAt,
      pinned: tab.pinned,
      closed: tab.closed,
      closedAt: tab.closedAt,
      extensionAppId: tab.extensionAppId,
      userAgentOverride: tab.userAgentOverride,
      sessionStorageId: tab.sessionStorageId,
      lastActiveTime: tab.lastActiveTime,
      navigations: [...model.navigationEntries(tab.id)],
    };
    if (this.options.includePruned) {
      shaped.prunedNavigations = [...model.prunedNavigationEntries(tab.id)];
    }
    return shaped;
  }

  private shapeDiagnostic(diagnostic: Diagnostic): Record<string, unknown> {
    return { ...diagnostic, message: describeDiagnostic(diagnostic) };
  }

  /** 人類可讀的報告 */
  private textResult(result: DecodeResult): string {
    const { model, stats } = result;
    const lines: string[] = [
      `${result.source} (${result.sessionKind}, format v${result.formatVersion}, ${result.finalization})`,
      `  records: ${stats.recordsRead}, commands: ${stats.commandsApplied}, ` +
        `unknown: ${stats.unknownCommands}, malformed: ${stats.malformedCommands}`,
    ];

    for (const window of model.windows()) {
      lines.push(this.windowLine(model, window));
      for (const tabId of window.tabIds) {
        const tab = model.getTab(tabId);
        if (tab) lines.push(...this.tabLines(model, tab, '  '));
      }
    }

    const orphans = [...model.orphanTabs()];
    if (orphans.length > 0) {
      lines.push('Orphan tabs:');
      for (const tab of orphans) lines.push(...this.tabLines(model, tab, '  '));
    }

    if (model.diagnosticCount > 0) {
      lines.push('Diagnostics:');
      for (const diagnostic of model.diagnostics()) {
        lines.push(`  ${describeDiagnostic(diagnostic)}`);
      }
    }

    return lines.join('\n');
  }

  private windowLine(model: SessionModel, window: Window): string {
    const flags: string[] = [];
    if (model.activeWindowId === window.id) flags.push('active');
    if (window.closed) flags.push('closed');
    const selected = model.selectedTabId(window.id);
    const suffix = flags.length > 0 ? ` [${flags.join(', ')}]` : '';
    return `Window ${window.id}${suffix}` + (selected !== null ? ` selected tab ${selected}` : '');
  }

  private tabLines(model: SessionModel, tab: Tab, indent: string): string[] {
    const flags: string[] = [];
    if (tab.pinned) flags.push('pinned');
    if (tab.closed) flags.push('closed');
    const position = tab.indexInWindow !== null ? ` (index ${tab.indexInWindow})` : '';
    const suffix = flags.length > 0 ? ` [${flags.join(', ')}]` : '';
    const lines = [`${indent}Tab ${tab.id}${position}${suffix}`];

    for (const entry of model.navigationEntries(tab.id)) {
      lines.push(this.navigationLine(entry, tab.activeNavigationIndex === entry.index, `${indent}  `));
    }
    if (this.options.includePruned) {
      for (const entry of model.prunedNavigationEntries(tab.id)) {
        lines.push(`${this.navigationLine(entry, false, `${indent}  `)} (pruned)`);
      }
    }
    return lines;
  }

  private navigationLine(entry: NavigationEntry, active: boolean, indent: string): string {
    const marker = active ? '*' : ' ';
    const title = entry.title ? ` - ${entry.title}` : '';
    return `${indent}${marker}[${entry.index}] ${entry.url ?? '<no url>'}${title}`;
  }

  /** 將任意物件平展為人類可讀文字 */
  private flattenToText(data: unknown, indent: number = 0): string {
    if (data === null || data === undefined) return '';
    if (typeof data !== 'object') return String(data);

    const prefix = '  '.repeat(indent);
    if (Array.isArray(data)) {
      return data.map((item, i) => `${prefix}[${i}] ${this.flattenToText(item, indent + 1)}`).join('\n');
    }

    return Object.entries(data)
      .map(([key, val]: [string, unknown]) => {
        if (typeof val === 'object' && val !== null) {
          return `${prefix}${key}:\n${this.flattenToText(val, indent + 1)}`;
        }
        return `${prefix}${key}: ${String(val)}`;
      })
      .join('\n');
  }
}
