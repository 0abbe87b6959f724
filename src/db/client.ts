import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { DB_FILE_NAME, DEFAULT_CONFIG } from "../shared/constants.js";
import type {
  AppConfig,
  Channel,
  ChannelStats,
  DownloadJob,
  DownloadStats,
  RecordingHistoryEntry,
  SessionStats
} from "../shared/types.js";
import { CONFIG_KEYS, stringifyConfigValue } from "../config/settings.js";
import { AlreadyExistsError, NotFoundError } from "../shared/errors.js";
import type { ChannelStore } from "../registry/registry.js";

interface ChannelRow {
  id: string;
  display_name: string;
  added_at: string;
}

interface SessionRow {
  id: number;
  channel_id: string;
  title: string;
  output_path: string;
  stream_started_at: string;
  record_started_at: string;
  ended_at: string | null;
  exit_code: number | null;
  file_size_bytes: number | null;
}

interface DownloadRow {
  id: string;
  source_url: string;
  quality: string;
  output_path: string | null;
  status: DownloadJob["status"];
  started_at: string;
  ended_at: string | null;
}

export class DbClient implements ChannelStore {
  readonly db: Database.Database;
  readonly dbPath: string;

  constructor(configDir: string) {
    fs.mkdirSync(configDir, { recursive: true });
    this.dbPath = path.join(configDir, DB_FILE_NAME);
    this.db = new Database(this.dbPath);
    this.db.pragma("journal_mode = WAL");
    this.migrate();
    this.seedDefaults();
  }

  close(): void {
    this.db.close();
  }

  /** Folds the WAL back into the main file so the database can be copied as one file. */
  checkpoint(): void {
    this.db.pragma("wal_checkpoint(TRUNCATE)");
  }

  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        version INTEGER PRIMARY KEY,
        applied_at TEXT NOT NULL
      );
    `);

    const row = this.db.prepare("SELECT MAX(version) AS version FROM schema_migrations").get() as { version: number | null };
    const currentVersion = row.version ?? 0;

    if (currentVersion < 1) {
      this.db.exec(`
        CREATE TABLE IF NOT EXISTS config (
          key TEXT PRIMARY KEY,
          value TEXT NOT NULL,
          updated_at TEXT NOT NULL
        );

        CREATE TABLE IF NOT EXISTS channels (
          position INTEGER PRIMARY KEY AUTOINCREMENT,
          id TEXT NOT NULL UNIQUE,
          display_name TEXT NOT NULL,
          added_at TEXT NOT NULL
        );

        CREATE TABLE IF NOT EXISTS recording_sessions (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          channel_id TEXT NOT NULL,
          title TEXT NOT NULL,
          output_path TEXT NOT NULL,
          stream_started_at TEXT NOT NULL,
          record_started_at TEXT NOT NULL,
          ended_at TEXT,
          exit_code INTEGER,
          file_size_bytes INTEGER
        );

        CREATE INDEX IF NOT EXISTS idx_sessions_active ON recording_sessions(ended_at);
        CREATE INDEX IF NOT EXISTS idx_sessions_channel ON recording_sessions(channel_id);

        CREATE TABLE IF NOT EXISTS download_jobs (
          id TEXT PRIMARY KEY,
          source_url TEXT NOT NULL,
          quality TEXT NOT NULL,
          output_path TEXT,
          status TEXT NOT NULL,
          started_at TEXT NOT NULL,
          ended_at TEXT
        );

        CREATE TABLE IF NOT EXISTS daemon_meta (
          key TEXT PRIMARY KEY,
          value TEXT NOT NULL,
          updated_at TEXT NOT NULL
        );
      `);

      this.db
        .prepare("INSERT INTO schema_migrations(version, applied_at) VALUES(1, ?)")
        .run(new Date().toISOString());
    }
  }

  private seedDefaults(): void {
    const now = new Date().toISOString();
    const insertStmt = this.db.prepare(
      "INSERT OR IGNORE INTO config(key, value, updated_at) VALUES(?, ?, ?)"
    );

    const seed = this.db.transaction(() => {
      for (const key of CONFIG_KEYS) {
        insertStmt.run(key, stringifyConfigValue(key, DEFAULT_CONFIG[key]), now);
      }
    });
    seed();
  }

  listConfigRaw(): Partial<Record<keyof AppConfig, string>> {
    const rows = this.db.prepare("SELECT key, value FROM config").all() as Array<{ key: string; value: string }>;
    const result: Partial<Record<keyof AppConfig, string>> = {};
    for (const row of rows) {
      const key = CONFIG_KEYS.find((candidate) => candidate === row.key);
      if (key) {
        result[key] = row.value;
      }
    }
    return result;
  }

  getConfigValueRaw(key: keyof AppConfig): string {
    const row = this.db.prepare("SELECT value FROM config WHERE key = ?").get(key) as { value: string } | undefined;
    if (!row) {
      throw new NotFoundError(`Config key ${key} not found`);
    }
    return row.value;
  }

  setConfigValueRaw(key: keyof AppConfig, value: string): void {
    this.db
      .prepare(
        `INSERT INTO config(key, value, updated_at) VALUES(?, ?, ?)
         ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at`
      )
      .run(key, value, new Date().toISOString());
  }

  loadChannels(): Channel[] {
    const rows = this.db.prepare("SELECT id, display_name, added_at FROM channels ORDER BY position ASC").all() as ChannelRow[];
    return rows.map(mapChannelRow);
  }

  insertChannel(channel: Channel): void {
    const insert = this.db.transaction((entry: Channel) => {
      const existing = this.db.prepare("SELECT id FROM channels WHERE id = ?").get(entry.id);
      if (existing) {
        throw new AlreadyExistsError(`Channel ${entry.id} is already added`);
      }
      this.db
        .prepare("INSERT INTO channels(id, display_name, added_at) VALUES (?, ?, ?)")
        .run(entry.id, entry.displayName, entry.addedAt);
    });
    insert(channel);
  }

  deleteChannel(id: string): void {
    const result = this.db.prepare("DELETE FROM channels WHERE id = ?").run(id);
    if (result.changes === 0) {
      throw new NotFoundError(`Channel ${id} is not added`);
    }
  }

  insertRecordingSession(input: {
    channelId: string;
    title: string;
    outputPath: string;
    streamStartedAt: string;
    recordStartedAt: string;
  }): number {
    const result = this.db
      .prepare(
        `INSERT INTO recording_sessions(channel_id, title, output_path, stream_started_at, record_started_at)
         VALUES (?, ?, ?, ?, ?)`
      )
      .run(input.channelId, input.title, input.outputPath, input.streamStartedAt, input.recordStartedAt);

    return Number(result.lastInsertRowid);
  }

  finishRecordingSession(
    channelId: string,
    outputPath: string,
    input: { endedAt: string; exitCode: number | null; fileSizeBytes: number | null }
  ): void {
    this.db
      .prepare(
        `UPDATE recording_sessions
         SET ended_at = ?, exit_code = ?, file_size_bytes = ?
         WHERE channel_id = ? AND output_path = ? AND ended_at IS NULL`
      )
      .run(input.endedAt, input.exitCode, input.fileSizeBytes, channelId, outputPath);
  }

  /** Sessions left open by a daemon that died without recording their end. */
  closeDanglingSessions(endedAt: string): number {
    const result = this.db.prepare("UPDATE recording_sessions SET ended_at = ? WHERE ended_at IS NULL").run(endedAt);
    return result.changes;
  }

  listSessions(): RecordingHistoryEntry[] {
    const rows = this.db
      .prepare("SELECT * FROM recording_sessions ORDER BY record_started_at ASC")
      .all() as SessionRow[];
    return rows.map(mapSessionRow);
  }

  upsertDownloadJob(job: DownloadJob): void {
    this.db
      .prepare(
        `INSERT INTO download_jobs(id, source_url, quality, output_path, status, started_at, ended_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(id) DO UPDATE SET output_path = excluded.output_path, status = excluded.status, ended_at = excluded.ended_at`
      )
      .run(job.id, job.sourceUrl, job.quality, job.outputPath, job.status, job.startedAt, job.endedAt);
  }

  listDownloadJobs(): DownloadJob[] {
    const rows = this.db.prepare("SELECT * FROM download_jobs ORDER BY started_at ASC").all() as DownloadRow[];
    return rows.map((row) => ({
      id: row.id,
      sourceUrl: row.source_url,
      quality: row.quality,
      outputPath: row.output_path,
      pid: null,
      status: row.status,
      startedAt: row.started_at,
      endedAt: row.ended_at
    }));
  }

  getChannelStats(): ChannelStats {
    const row = this.db.prepare("SELECT COUNT(*) AS total FROM channels").get() as { total: number };
    return { total: row.total };
  }

  getSessionStats(): SessionStats {
    const row = this.db
      .prepare(
        `SELECT
          COUNT(*) AS total,
          SUM(CASE WHEN ended_at IS NULL THEN 1 ELSE 0 END) AS active,
          SUM(CASE WHEN ended_at IS NOT NULL THEN 1 ELSE 0 END) AS finished,
          SUM(CASE
            WHEN ended_at IS NOT NULL THEN CAST(ROUND((julianday(ended_at) - julianday(record_started_at)) * 86400) AS INTEGER)
            ELSE 0
          END) AS total_duration_sec
         FROM recording_sessions`
      )
      .get() as {
        total: number;
        active: number | null;
        finished: number | null;
        total_duration_sec: number | null;
      };

    return {
      total: row.total,
      active: row.active ?? 0,
      finished: row.finished ?? 0,
      totalDurationSec: row.total_duration_sec ?? 0
    };
  }

  getDownloadStats(): DownloadStats {
    const row = this.db
      .prepare(
        `SELECT
          COUNT(*) AS total,
          SUM(CASE WHEN status = 'succeeded' THEN 1 ELSE 0 END) AS succeeded,
          SUM(CASE WHEN status = 'failed' THEN 1 ELSE 0 END) AS failed
         FROM download_jobs`
      )
      .get() as { total: number; succeeded: number | null; failed: number | null };

    return {
      total: row.total,
      succeeded: row.succeeded ?? 0,
      failed: row.failed ?? 0
    };
  }

  upsertDaemonMeta(key: string, value: string): void {
    this.db
      .prepare(
        `INSERT INTO daemon_meta(key, value, updated_at) VALUES(?, ?, ?)
         ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at`
      )
      .run(key, value, new Date().toISOString());
  }

  getDaemonMeta(key: string): string | null {
    const row = this.db.prepare("SELECT value FROM daemon_meta WHERE key = ?").get(key) as { value: string } | undefined;
    return row?.value ?? null;
  }
}

function mapChannelRow(row: ChannelRow): Channel {
  return {
    id: row.id,
    displayName: row.display_name,
    addedAt: row.added_at
  };
}

function mapSessionRow(row: SessionRow): RecordingHistoryEntry {
  return {
    id: row.id,
    channelId: row.channel_id,
    title: row.title,
    outputPath: row.output_path,
    streamStartedAt: row.stream_started_at,
    recordStartedAt: row.record_started_at,
    endedAt: row.ended_at,
    exitCode: row.exit_code,
    fileSizeBytes: row.file_size_bytes
  };
}
