import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import type { BackupRecord } from "./backup_manager.js";

export type RunStatus = "running" | "completed" | "failed" | "cancelled";

export type LedgerRunRow = {
  id: string;
  rootDir: string;
  // Null when the run wrote to an output tree and left the sources alone.
  backupDir: string | null;
  outputDir: string | null;
  catalogs: string[];
  startedAt: number;
  finishedAt: number | null;
  status: RunStatus;
  summary: Record<string, number>;
};

export type LedgerBackupRow = BackupRecord & {
  // Digest of the bytes the run wrote; null until the write succeeded.
  wovenSha256: string | null;
};

type RunDbRow = {
  id: string;
  rootDir: string;
  backupDir: string | null;
  outputDir: string | null;
  catalogs: string;
  startedAt: number;
  finishedAt: number | null;
  status: string;
  summary: string;
};

type BackupDbRow = {
  runId: string;
  originalPath: string;
  relPath: string;
  backupPath: string;
  takenAt: number;
  sha256: string;
  wovenSha256: string | null;
};

function toStatus(s: string): RunStatus {
  if (s === "running" || s === "completed" || s === "failed" || s === "cancelled") return s;
  return "failed";
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}

function parseStringList(raw: string): string[] {
  const v = parseJson(raw);
  return Array.isArray(v) ? v.filter((x): x is string => typeof x === "string") : [];
}

function parseCounts(raw: string): Record<string, number> {
  const v = parseJson(raw);
  const out: Record<string, number> = {};
  if (typeof v !== "object" || v === null || Array.isArray(v)) return out;
  for (const [k, n] of Object.entries(v)) if (typeof n === "number") out[k] = n;
  return out;
}

function toRun(r: RunDbRow): LedgerRunRow {
  return {
    id: r.id,
    rootDir: r.rootDir,
    backupDir: r.backupDir,
    outputDir: r.outputDir,
    catalogs: parseStringList(r.catalogs),
    startedAt: r.startedAt,
    finishedAt: r.finishedAt,
    status: toStatus(r.status),
    summary: parseCounts(r.summary),
  };
}

export type Ledger = ReturnType<typeof createLedger>;

export function createLedger(baseDir: string) {
  fs.mkdirSync(baseDir, { recursive: true });
  const dbPath = path.join(baseDir, "ledger.sqlite");
  const db = new Database(dbPath);

  db.pragma("journal_mode = WAL");

  db.exec(`
    CREATE TABLE IF NOT EXISTS runs (
      id TEXT PRIMARY KEY,
      rootDir TEXT NOT NULL,
      backupDir TEXT,
      outputDir TEXT,
      catalogs TEXT NOT NULL,
      startedAt INTEGER NOT NULL,
      finishedAt INTEGER,
      status TEXT NOT NULL,
      summary TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_runs_startedAt ON runs(startedAt);

    CREATE TABLE IF NOT EXISTS backups (
      runId TEXT NOT NULL,
      originalPath TEXT NOT NULL,
      relPath TEXT NOT NULL,
      backupPath TEXT NOT NULL,
      takenAt INTEGER NOT NULL,
      sha256 TEXT NOT NULL,
      wovenSha256 TEXT,
      PRIMARY KEY(runId, originalPath)
    );
  `);

  const insertRun = db.prepare<[string, string, string | null, string | null, string, number]>(
    "INSERT INTO runs (id, rootDir, backupDir, outputDir, catalogs, startedAt, finishedAt, status, summary) VALUES (?, ?, ?, ?, ?, ?, NULL, 'running', '{}')",
  );
  const updateRun = db.prepare<[number, string, string, string]>(
    "UPDATE runs SET finishedAt = ?, status = ?, summary = ? WHERE id = ?",
  );
  const selectRun = db.prepare<[string], RunDbRow>("SELECT * FROM runs WHERE id = ?");
  const selectRuns = db.prepare<[number], RunDbRow>("SELECT * FROM runs ORDER BY startedAt DESC, id DESC LIMIT ?");
  // First snapshot wins: a second insert for the same file in the same run is ignored.
  const insertBackup = db.prepare<[string, string, string, string, number, string]>(
    "INSERT OR IGNORE INTO backups (runId, originalPath, relPath, backupPath, takenAt, sha256, wovenSha256) VALUES (?, ?, ?, ?, ?, ?, NULL)",
  );
  const updateWoven = db.prepare<[string, string, string]>(
    "UPDATE backups SET wovenSha256 = ? WHERE runId = ? AND originalPath = ?",
  );
  const selectBackups = db.prepare<[string], BackupDbRow>("SELECT * FROM backups WHERE runId = ? ORDER BY relPath ASC");

  return {
    path: dbPath,

    beginRun(run: { id: string; rootDir: string; backupDir: string | null; outputDir: string | null; catalogs: string[]; startedAt: number }) {
      insertRun.run(run.id, run.rootDir, run.backupDir, run.outputDir, JSON.stringify(run.catalogs), run.startedAt);
    },

    finishRun(id: string, status: RunStatus, summary: Record<string, number>, finishedAt = Date.now()) {
      updateRun.run(finishedAt, status, JSON.stringify(summary), id);
    },

    getRun(id: string): LedgerRunRow | null {
      const r = selectRun.get(id);
      return r ? toRun(r) : null;
    },

    listRuns(limit = 20): LedgerRunRow[] {
      return selectRuns.all(Math.max(1, Math.floor(limit))).map(toRun);
    },

    recordBackup(rec: BackupRecord) {
      insertBackup.run(rec.runId, rec.originalPath, rec.relPath, rec.backupPath, rec.takenAt, rec.sha256);
    },

    setWovenDigest(runId: string, originalPath: string, digest: string) {
      updateWoven.run(digest, runId, originalPath);
    },

    listBackups(runId: string): LedgerBackupRow[] {
      return selectBackups.all(runId).map((r) => ({ ...r }));
    },

    close() {
      db.close();
    },
  };
}
