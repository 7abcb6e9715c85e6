import fs from "node:fs";
import path from "node:path";
import { glob } from "glob";
import { nanoid } from "nanoid";
import { BackupManager, defaultBackupDir, formatTimestamp, restoreBackup } from "./backup_manager.js";
import type { Config } from "./config.js";
import { ConfigError, errorKind, errorMessage, IoError, ScanError } from "./errors.js";
import { writeFileAtomic } from "./fs_atomic.js";
import type { Ledger } from "./ledger.js";
import { createLogger, type Logger } from "./log.js";
import { findNearMisses, scanMarkers } from "./marker_scanner.js";
import { runPool } from "./pool.js";
import {
  countsRecord,
  type FileReport,
  type MarkerReport,
  type RestoreReport,
  type RunReport,
  summarize,
  toMarkerReports,
} from "./report.js";
import type { SnippetCatalog } from "./snippet_catalog.js";
import { decodeSource, encodeSource, sha256 } from "./source_text.js";
import { applyWeave } from "./weaver.js";

export type WeaveRunOptions = {
  rootDir: string;
  catalog: SnippetCatalog;
  config: Config;
  // Recorded in the ledger only.
  catalogFiles?: string[];
  // Write a mirrored, woven copy of the tree here instead of weaving in place.
  outputDir?: string;
  // Parent directory for this run's backup tree.
  backupDir?: string;
  ledger?: Ledger;
  logger?: Logger;
  signal?: AbortSignal;
  now?: () => Date;
};

type FileTask = { abs: string; rel: string; ext: string };

function isUnder(p: string, root: string): boolean {
  const rel = path.relative(root, p);
  return rel === "" || (!rel.startsWith("..") && !path.isAbsolute(rel));
}

function uniqueDir(base: string): string {
  if (!fs.existsSync(base)) return base;
  for (let i = 2; ; i++) {
    const candidate = `${base}_${i}`;
    if (!fs.existsSync(candidate)) return candidate;
  }
}

export async function listEligibleFiles(rootDir: string, config: Config, extraIgnore: string[] = []): Promise<FileTask[]> {
  const root = path.resolve(rootDir);
  const exts = new Set(config.weave.extensions);
  const found = await glob("**/*", {
    cwd: root,
    nodir: true,
    dot: false,
    posix: true,
    ignore: [...config.weave.exclude, ...extraIgnore],
  });
  return found
    .map((rel) => ({ rel, ext: path.extname(rel).toLowerCase() }))
    .filter((f) => exts.has(f.ext))
    .sort((a, b) => (a.rel < b.rel ? -1 : a.rel > b.rel ? 1 : 0))
    .map((f) => ({ abs: path.join(root, f.rel), rel: f.rel, ext: f.ext }));
}

function failedReport(task: FileTask, err: Error, extra?: Partial<FileReport>): FileReport {
  return {
    path: task.abs,
    relPath: task.rel,
    status: "failed",
    markers: [],
    warnings: [],
    ...extra,
    error: { kind: errorKind(err), message: errorMessage(err) },
  };
}

// The file was not written, so nothing it would have changed took effect.
function withdrawn(markers: MarkerReport[], reason: string): MarkerReport[] {
  return markers.map((m): MarkerReport =>
    m.status === "inserted" || m.status === "replaced_existing" ? { ...m, status: "failed", reason } : m,
  );
}

// One file's failure lands in its report and stops the others only under run.failFast.
export async function weaveTree(opts: WeaveRunOptions): Promise<RunReport> {
  const log = opts.logger ?? createLogger();
  const cfg = opts.config;
  const rootDir = path.resolve(opts.rootDir);

  let st: fs.Stats;
  try {
    st = fs.statSync(rootDir);
  } catch {
    throw new ConfigError(`root directory does not exist: ${rootDir}`);
  }
  if (!st.isDirectory()) throw new ConfigError(`root is not a directory: ${rootDir}`);

  for (const ext of cfg.weave.extensions) {
    if (!cfg.weave.commentPrefixes[ext]) throw new ConfigError(`no comment prefix configured for ${ext}`);
  }

  const started = (opts.now ?? (() => new Date()))();
  const runId = `${formatTimestamp(started)}-${nanoid(6)}`;
  const outputDir = opts.outputDir ? path.resolve(opts.outputDir) : null;
  if (outputDir && outputDir === rootDir) throw new ConfigError("output directory cannot be the root itself");

  let backupDir: string | null = null;
  if (!outputDir) {
    const parent = opts.backupDir || cfg.run.backupDir;
    backupDir = parent ? path.join(path.resolve(parent), runId) : uniqueDir(defaultBackupDir(rootDir, started));
  }

  const extraIgnore: string[] = [];
  for (const d of [outputDir, backupDir]) {
    if (d && isUnder(d, rootDir)) extraIgnore.push(`${path.relative(rootDir, d).split(path.sep).join("/")}/**`);
  }
  const tasks = await listEligibleFiles(rootDir, cfg, extraIgnore);
  log.info(`run ${runId}: ${tasks.length} file(s) under ${rootDir}, ${opts.catalog.size} snippet(s)`);

  const ledger = opts.ledger;
  ledger?.beginRun({
    id: runId,
    rootDir,
    backupDir,
    outputDir,
    catalogs: opts.catalogFiles ?? [],
    startedAt: started.getTime(),
  });

  const backups = backupDir
    ? new BackupManager({ runId, rootDir, backupDir, onRecord: (r) => ledger?.recordBackup(r) })
    : null;

  const abort = new AbortController();
  const onOuterAbort = () => abort.abort();
  opts.signal?.addEventListener("abort", onOuterAbort, { once: true });
  if (opts.signal?.aborted) abort.abort();

  const processFile = async (task: FileTask): Promise<FileReport> => {
    const commentPrefix = cfg.weave.commentPrefixes[task.ext] ?? "//";
    let bytes: Buffer;
    try {
      bytes = await fs.promises.readFile(task.abs);
    } catch (e) {
      return failedReport(task, new ScanError(task.abs, `cannot read: ${errorMessage(e)}`, { cause: e }));
    }
    const decoded = decodeSource(bytes);
    if (!decoded.ok) return failedReport(task, new ScanError(task.abs, decoded.reason));
    const text = decoded.text;

    const scanOpts = { commentPrefix, sentinel: cfg.weave.sentinel };
    const markers = [...scanMarkers(text, task.abs, scanOpts)];
    const warnings = findNearMisses(text, task.abs, scanOpts).map(
      (n) => `line ${n.line + 1} looks like a marker but is not one: ${n.raw.trim()}`,
    );

    const woven = applyWeave(text, markers, opts.catalog, {
      commentPrefix,
      sentinel: cfg.weave.sentinel,
      indent: cfg.weave.indent,
    });
    const base = {
      path: task.abs,
      relPath: task.rel,
      encoding: decoded.encoding,
      markers: toMarkerReports(woven.results),
      warnings,
    };
    if (woven.conflict) return failedReport(task, woven.conflict, base);

    const target = outputDir ? path.join(outputDir, task.rel) : task.abs;
    let out = bytes;
    if (woven.changed) {
      const encoded = encodeSource(woven.text, decoded.encoding);
      if (!encoded.ok) {
        const err = new IoError(task.abs, encoded.reason);
        return failedReport(task, err, { ...base, markers: withdrawn(base.markers, err.message) });
      }
      out = encoded.bytes;
    }

    if (!woven.changed) {
      if (!outputDir) return { ...base, status: "unchanged" };
      try {
        writeFileAtomic(target, out);
      } catch (e) {
        return failedReport(task, new IoError(target, `cannot write output: ${errorMessage(e)}`, { cause: e }), base);
      }
      return { ...base, status: "unchanged", outputPath: target };
    }

    let backupPath: string | undefined;
    if (backups) {
      const snap = backups.snapshot(task.abs);
      if (!snap.ok) {
        const err = new IoError(task.abs, `backup failed: ${snap.reason}`);
        return failedReport(task, err, { ...base, markers: withdrawn(base.markers, err.message) });
      }
      backupPath = snap.record.backupPath;
    }

    try {
      writeFileAtomic(target, out);
    } catch (e) {
      const err = new IoError(target, `write failed: ${errorMessage(e)}`, { cause: e });
      return failedReport(task, err, {
        ...base,
        markers: withdrawn(base.markers, err.message),
        ...(backupPath ? { backupPath } : {}),
      });
    }
    if (backups) ledger?.setWovenDigest(runId, task.abs, sha256(out));

    return {
      ...base,
      status: "written",
      ...(backupPath ? { backupPath } : {}),
      ...(outputDir ? { outputPath: target } : {}),
    };
  };

  const outcomes = await runPool(
    tasks,
    cfg.run.workers,
    async (task) => {
      let report: FileReport;
      try {
        report = await processFile(task);
      } catch (e) {
        report = failedReport(task, e instanceof Error ? e : new Error(String(e)));
      }
      if (report.status === "failed") {
        log.warn(`${task.rel}: ${report.error?.message ?? "failed"}`);
        if (cfg.run.failFast) abort.abort();
      } else if (report.status === "written") {
        log.info(`${task.rel}: woven`);
      }
      for (const w of report.warnings) log.warn(`${task.rel}: ${w}`);
      return report;
    },
    abort.signal,
  );
  opts.signal?.removeEventListener("abort", onOuterAbort);

  const files = outcomes.map((o, i): FileReport => {
    if (o.started) return o.value;
    const task = tasks[i];
    return {
      path: task?.abs ?? "",
      relPath: task?.rel ?? "",
      status: "cancelled",
      markers: [],
      warnings: [],
    };
  });

  const counts = summarize(files);
  const cancelled = counts.filesCancelled > 0;
  const ok = counts.failed === 0 && counts.filesFailed === 0 && !cancelled;
  const finishedAt = Date.now();
  const status = ok ? "completed" : opts.signal?.aborted ? "cancelled" : "failed";
  ledger?.finishRun(runId, status, countsRecord(counts), finishedAt);

  log.info(
    `run ${runId}: ${counts.inserted} inserted, ${counts.replaced} replaced, ` +
      `${counts.failed + counts.filesFailed} failure(s)${cancelled ? ", cancelled" : ""}`,
  );

  return {
    runId,
    rootDir,
    backupDir,
    outputDir,
    startedAt: started.getTime(),
    finishedAt,
    cancelled,
    ok,
    counts,
    files,
  };
}

// A file whose bytes no longer match what the run wrote is skipped unless forced.
export function restoreRun(opts: { ledger: Ledger; runId: string; force?: boolean; logger?: Logger }): RestoreReport {
  const log = opts.logger ?? createLogger();
  const run = opts.ledger.getRun(opts.runId);
  if (!run) throw new ConfigError(`unknown run: ${opts.runId}`);

  const report: RestoreReport = { runId: run.id, ok: true, restored: [], skipped: [], failed: [] };
  for (const row of opts.ledger.listBackups(run.id)) {
    if (!opts.force) {
      if (row.wovenSha256 === null) {
        report.skipped.push({ path: row.originalPath, reason: "the run never wrote this file" });
        log.warn(`${row.relPath}: never written by run ${run.id}, not restored`);
        continue;
      }
      let live: Buffer | null = null;
      try {
        live = fs.readFileSync(row.originalPath);
      } catch {
        live = null;
      }
      if (!live || sha256(live) !== row.wovenSha256) {
        const reason = live ? "modified since it was woven" : "missing since it was woven";
        report.skipped.push({ path: row.originalPath, reason });
        log.warn(`${row.relPath}: ${reason}, not restored (use --force to overwrite)`);
        continue;
      }
    }

    const r = restoreBackup(row);
    if (r.ok) {
      report.restored.push(row.originalPath);
      log.info(`${row.relPath}: restored`);
    } else {
      report.failed.push({ path: row.originalPath, reason: r.reason });
      log.error(`${row.relPath}: ${r.reason}`);
    }
  }
  report.ok = report.failed.length === 0;
  return report;
}
