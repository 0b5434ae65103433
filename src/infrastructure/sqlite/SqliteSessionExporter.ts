import type Database from 'better-sqlite3';
import type { DecodeResult } from '../../application/dto/DecodeResult.js';
import { describeDiagnostic } from '../../domain/commands/Diagnostic.js';
import type { NavigationEntry } from '../../domain/entities/NavigationEntry.js';
import type { FrameState } from '../../domain/entities/PageState.js';
import type { ExportSummary, SessionExportPort } from '../../domain/ports/SessionExportPort.js';

function flag(value: boolean): number {
  return value ? 1 : 0;
}

function hasFormState(frame: FrameState | null): boolean {
  if (!frame) return false;
  return frame.formState.length > 0 || frame.children.some(hasFormState);
}

/**
 * 把一份解碼結果寫入 SQLite
 *
 * 每次匯出新增一列 source_files，其餘資料表以 source_file_id 區隔，
 * 同一個 DB 可累積多個檔案的結果。整份匯出在單一 transaction 內完成。
 */
export class SqliteSessionExporter implements SessionExportPort {
  constructor(private readonly db: Database.Database) {}

  exportResult(result: DecodeResult): ExportSummary {
    const run = this.db.transaction((): ExportSummary => {
      const sourceFileId = this.insertSource(result);
      const { model } = result;

      let windows = 0;
      for (const window of model.windows()) {
        this.db.prepare(`
          INSERT INTO windows(source_file_id, window_id, ordinal, window_type, x, y, width, height,
            show_state, selected_tab_index, selected_tab_id, app_name, closed, closed_at)
          VALUES(?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        `).run(
          sourceFileId,
          window.id,
          windows++,
          window.windowType,
          window.bounds?.x ?? null,
          window.bounds?.y ?? null,
          window.bounds?.width ?? null,
          window.bounds?.height ?? null,
          window.bounds && window.bounds.showState !== null ? String(window.bounds.showState) : null,
          window.selectedTabIndex,
          model.selectedTabId(window.id),
          window.appName,
          flag(window.closed),
          window.closedAt?.toISOString() ?? null,
        );
      }

      let tabs = 0;
      let navigations = 0;
      for (const tab of model.tabs()) {
        this.db.prepare(`
          INSERT INTO tabs(source_file_id, tab_id, ordinal, window_id, index_in_window,
            active_navigation_index, pinned, extension_app_id, user_agent_override,
            session_storage_id, last_active_time, closed, closed_at)
          VALUES(?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        `).run(
          sourceFileId,
          tab.id,
          tabs++,
          tab.windowId,
          tab.indexInWindow,
          tab.activeNavigationIndex,
          flag(tab.pinned),
          tab.extensionAppId,
          tab.userAgentOverride,
          tab.sessionStorageId,
          tab.lastActiveTime?.toISOString() ?? null,
          flag(tab.closed),
          tab.closedAt?.toISOString() ?? null,
        );

        for (const entry of model.navigationEntries(tab.id)) {
          this.insertNavigation(sourceFileId, tab.id, entry, false);
          navigations++;
        }
        for (const entry of model.prunedNavigationEntries(tab.id)) {
          this.insertNavigation(sourceFileId, tab.id, entry, true);
          navigations++;
        }
      }

      let diagnostics = 0;
      for (const diagnostic of model.diagnostics()) {
        this.db.prepare(`
          INSERT INTO diagnostics(source_file_id, kind, byte_offset, command_id, detail)
          VALUES(?, ?, ?, ?, ?)
        `).run(
          sourceFileId,
          diagnostic.kind,
          diagnostic.offset,
          diagnostic.kind === 'TruncatedRecord' ? null : diagnostic.commandId,
          describeDiagnostic(diagnostic),
        );
        diagnostics++;
      }

      return { sourceFileId, windows, tabs, navigations, diagnostics };
    });

    return run();
  }

  private insertSource(result: DecodeResult): number {
    const info = this.db.prepare(`
      INSERT INTO source_files(source, header_version, format_version, session_kind, finalization,
        records_read, commands_applied, bytes_consumed, active_window_id, exported_at)
      VALUES(?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      result.source,
      result.header?.version ?? null,
      result.formatVersion,
      result.sessionKind,
      result.finalization,
      result.stats.recordsRead,
      result.stats.commandsApplied,
      result.stats.bytesConsumed,
      result.model.activeWindowId,
      Date.now(),
    );
    return Number(info.lastInsertRowid);
  }

  private insertNavigation(sourceFileId: number, tabId: number, entry: NavigationEntry, pruned: boolean): void {
    this.db.prepare(`
      INSERT INTO navigations(source_file_id, tab_id, nav_index, pruned, url, title, referrer, timestamp,
        transition_type, transition_raw, search_terms, http_status_code, original_request_url,
        has_post_data, is_overwrite, page_state_size, has_form_state, page_state_error)
      VALUES(?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      sourceFileId,
      tabId,
      entry.index,
      flag(pruned),
      entry.url,
      entry.title,
      entry.referrer,
      entry.timestamp?.toISOString() ?? null,
      entry.transitionType.toString(),
      entry.transitionType.value,
      entry.searchTerms,
      entry.httpStatusCode,
      entry.originalRequestUrl,
      flag(entry.hasPostData),
      flag(entry.isOverwrite),
      entry.pageStateSize,
      flag(hasFormState(entry.pageState?.frame ?? null)),
      entry.pageStateError,
    );
  }
}
