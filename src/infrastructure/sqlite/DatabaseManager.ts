import Database from 'better-sqlite3';
import { PRAGMA_SQL, SCHEMA_SQL, SCHEMA_VERSION } from './schema.js';
import { Logger } from '../../shared/Logger.js';

/**
 * SQLite 資料庫管理器
 *
 * 負責：初始化 DB、設定 PRAGMA、執行 schema、檢查 schema 版本。
 */
export class DatabaseManager {
  private db: Database.Database;

  constructor(
    dbPath: string,
    private readonly logger: Logger = new Logger('DatabaseManager'),
  ) {
    this.db = new Database(dbPath);

    // 設定 PRAGMA（逐行執行，因為 PRAGMA 不支援批次）
    for (const line of PRAGMA_SQL.trim().split('\n')) {
      const trimmed = line.trim();
      if (trimmed && !trimmed.startsWith('--')) {
        this.db.pragma(trimmed.replace('PRAGMA ', '').replace(';', ''));
      }
    }

    this.db.exec(SCHEMA_SQL);
    this.validateSchemaVersion();

    this.logger.info('Database initialized', { dbPath });
  }

  getDb(): Database.Database {
    return this.db;
  }

  close(): void {
    this.db.close();
  }

  /** 首次使用時寫入 schema 版本；既有 DB 版本不同時拒絕寫入 */
  private validateSchemaVersion(): void {
    const row = this.db.prepare(
      "SELECT value FROM schema_meta WHERE key = 'version'"
    ).get() as { value: string } | undefined;

    if (!row) {
      this.db.prepare(
        "INSERT INTO schema_meta(key, value) VALUES('version', ?)"
      ).run(SCHEMA_VERSION);
      return;
    }

    if (row.value !== SCHEMA_VERSION) {
      throw new Error(
        `Schema version mismatch: database has ${row.value}, expected ${SCHEMA_VERSION}. ` +
        `Export into a new database file.`
      );
    }
  }
}
