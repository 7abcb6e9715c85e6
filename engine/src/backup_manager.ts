import fs from "node:fs";
import path from "node:path";
import { errorMessage } from "./errors.js";
import { writeFileAtomic } from "./fs_atomic.js";
import { sha256 } from "./source_text.js";

export type BackupRecord = {
  readonly runId: string;
  readonly originalPath: string;
  readonly relPath: string;
  readonly backupPath: string;
  readonly takenAt: number;
  // Digest of the original bytes at snapshot time.
  readonly sha256: string;
};

export type SnapshotResult = { ok: true; record: BackupRecord; created: boolean } | { ok: false; reason: string };
export type RestoreResult = { ok: true; record: BackupRecord } | { ok: false; reason: string };

export function formatTimestamp(d: Date): string {
  const p = (n: number) => String(n).padStart(2, "0");
  return `${d.getFullYear()}${p(d.getMonth() + 1)}${p(d.getDate())}_${p(d.getHours())}${p(d.getMinutes())}${p(d.getSeconds())}`;
}

// `<root>_backup_<YYYYMMDD_HHMMSS>` next to the woven tree.
export function defaultBackupDir(rootDir: string, startedAt: Date): string {
  const root = path.resolve(rootDir);
  return `${root}_backup_${formatTimestamp(startedAt)}`;
}

function isInside(p: string, root: string): boolean {
  const rel = path.relative(root, p);
  return rel !== "" && !rel.startsWith("..") && !path.isAbsolute(rel);
}

// First snapshot of a path wins for the whole run.
export class BackupManager {
  readonly runId: string;
  readonly rootDir: string;
  readonly backupDir: string;
  private readonly records = new Map<string, BackupRecord>();
  private readonly onRecord: ((record: BackupRecord) => void) | undefined;

  constructor(opts: {
    runId: string;
    rootDir: string;
    backupDir: string;
    onRecord?: (record: BackupRecord) => void;
  }) {
    this.runId = opts.runId;
    this.rootDir = path.resolve(opts.rootDir);
    this.backupDir = path.resolve(opts.backupDir);
    this.onRecord = opts.onRecord;
  }

  snapshot(filePath: string): SnapshotResult {
    const originalPath = path.resolve(filePath);
    const existing = this.records.get(originalPath);
    if (existing) return { ok: true, record: existing, created: false };

    if (!isInside(originalPath, this.rootDir)) return { ok: false, reason: `${originalPath} is outside ${this.rootDir}` };
    const relPath = path.relative(this.rootDir, originalPath);
    const backupPath = path.join(this.backupDir, relPath);

    let bytes: Buffer;
    try {
      bytes = fs.readFileSync(originalPath);
    } catch (e) {
      return { ok: false, reason: `cannot read original: ${errorMessage(e)}` };
    }

    try {
      fs.mkdirSync(path.dirname(backupPath), { recursive: true });
      // COPYFILE_EXCL: a backup that already exists on disk belongs to someone else.
      fs.copyFileSync(originalPath, backupPath, fs.constants.COPYFILE_EXCL);
    } catch (e) {
      return { ok: false, reason: `cannot write backup ${backupPath}: ${errorMessage(e)}` };
    }

    const digest = sha256(bytes);
    let copied: Buffer;
    try {
      copied = fs.readFileSync(backupPath);
    } catch (e) {
      return { ok: false, reason: `cannot verify backup ${backupPath}: ${errorMessage(e)}` };
    }
    if (sha256(copied) !== digest) return { ok: false, reason: `backup ${backupPath} does not match the original` };

    const record: BackupRecord = Object.freeze({
      runId: this.runId,
      originalPath,
      relPath,
      backupPath,
      takenAt: Date.now(),
      sha256: digest,
    });
    this.records.set(originalPath, record);
    this.onRecord?.(record);
    return { ok: true, record, created: true };
  }

  get(filePath: string): BackupRecord | undefined {
    return this.records.get(path.resolve(filePath));
  }

  list(): BackupRecord[] {
    return [...this.records.values()];
  }
}

// Overwrite the original with its snapshot. The backup must still hash to the
// digest taken at snapshot time.
export function restoreBackup(record: BackupRecord): RestoreResult {
  let bytes: Buffer;
  try {
    bytes = fs.readFileSync(record.backupPath);
  } catch (e) {
    return { ok: false, reason: `backup missing: ${errorMessage(e)}` };
  }
  if (sha256(bytes) !== record.sha256) return { ok: false, reason: "backup content does not match the recorded digest" };
  try {
    writeFileAtomic(record.originalPath, bytes);
  } catch (e) {
    return { ok: false, reason: `cannot write ${record.originalPath}: ${errorMessage(e)}` };
  }
  return { ok: true, record };
}
