import type { WeaveErrorKind } from "./errors.js";
import type { MarkerResult, WeaveStatus } from "./weaver.js";

export type FileStatus = "written" | "unchanged" | "failed" | "cancelled";

export type MarkerReport = {
  id: string;
  // 1-based, as editors show it.
  lineNumber: number;
  status: WeaveStatus;
  reason?: string;
};

export type FileReport = {
  path: string;
  relPath: string;
  status: FileStatus;
  // Source encoding the file was read in and written back in.
  encoding?: string;
  markers: MarkerReport[];
  warnings: string[];
  error?: { kind: WeaveErrorKind | "internal"; message: string };
  backupPath?: string;
  outputPath?: string;
};

export type RunCounts = {
  files: number;
  filesWritten: number;
  filesUnchanged: number;
  filesFailed: number;
  filesCancelled: number;
  markers: number;
  inserted: number;
  replaced: number;
  skippedNoSnippet: number;
  skippedAlreadyWoven: number;
  failed: number;
};

export type RunReport = {
  runId: string;
  rootDir: string;
  backupDir: string | null;
  outputDir: string | null;
  startedAt: number;
  finishedAt: number;
  cancelled: boolean;
  ok: boolean;
  counts: RunCounts;
  files: FileReport[];
};

export type RestoreReport = {
  runId: string;
  ok: boolean;
  restored: string[];
  // Files left alone on purpose (edited since the weave, never written).
  skipped: Array<{ path: string; reason: string }>;
  failed: Array<{ path: string; reason: string }>;
};

export function toMarkerReports(results: MarkerResult[]): MarkerReport[] {
  return results.map((r) => {
    const out: MarkerReport = { id: r.id, lineNumber: r.line + 1, status: r.result.status };
    if (r.result.status === "failed") out.reason = r.result.reason;
    return out;
  });
}

export function summarize(files: FileReport[]): RunCounts {
  const c: RunCounts = {
    files: files.length,
    filesWritten: 0,
    filesUnchanged: 0,
    filesFailed: 0,
    filesCancelled: 0,
    markers: 0,
    inserted: 0,
    replaced: 0,
    skippedNoSnippet: 0,
    skippedAlreadyWoven: 0,
    failed: 0,
  };
  for (const f of files) {
    if (f.status === "written") c.filesWritten++;
    else if (f.status === "unchanged") c.filesUnchanged++;
    else if (f.status === "failed") c.filesFailed++;
    else c.filesCancelled++;

    for (const m of f.markers) {
      c.markers++;
      if (m.status === "inserted") c.inserted++;
      else if (m.status === "replaced_existing") c.replaced++;
      else if (m.status === "skipped_no_snippet") c.skippedNoSnippet++;
      else if (m.status === "skipped_already_woven") c.skippedAlreadyWoven++;
      else c.failed++;
    }
  }
  return c;
}

export function countsRecord(c: RunCounts): Record<string, number> {
  return { ...c };
}

const STATUS_LABEL: Record<WeaveStatus, string> = {
  inserted: "inserted",
  replaced_existing: "replaced",
  skipped_no_snippet: "no snippet",
  skipped_already_woven: "already woven",
  failed: "FAILED",
};

export function formatRunReport(report: RunReport, opts?: { verbose?: boolean }): string {
  const lines: string[] = [];
  const c = report.counts;
  lines.push(`run ${report.runId}${report.cancelled ? " (cancelled)" : ""}`);
  lines.push(`root: ${report.rootDir}`);
  if (report.outputDir) lines.push(`output: ${report.outputDir}`);
  if (report.backupDir) lines.push(`backup: ${report.backupDir}`);

  for (const f of report.files) {
    const interesting = f.status === "written" || f.status === "failed" || f.warnings.length > 0;
    if (!opts?.verbose && !interesting) continue;
    lines.push(`${f.status.padEnd(9)} ${f.relPath}`);
    for (const m of f.markers) {
      if (!opts?.verbose && m.status === "skipped_already_woven") continue;
      const reason = m.reason ? `: ${m.reason}` : "";
      lines.push(`  ${String(m.lineNumber).padStart(5)}  ${m.id}  ${STATUS_LABEL[m.status]}${reason}`);
    }
    if (f.error) lines.push(`  error (${f.error.kind}): ${f.error.message}`);
    for (const w of f.warnings) lines.push(`  warning: ${w}`);
  }

  lines.push(
    `files: ${c.files} scanned, ${c.filesWritten} written, ${c.filesUnchanged} unchanged, ${c.filesFailed} failed` +
      (c.filesCancelled ? `, ${c.filesCancelled} cancelled` : ""),
  );
  lines.push(
    `markers: ${c.inserted} inserted, ${c.replaced} replaced, ${c.skippedAlreadyWoven} already woven, ` +
      `${c.skippedNoSnippet} without snippet, ${c.failed} failed`,
  );
  lines.push(report.ok ? "OK" : "FAILED");
  return lines.join("\n");
}

export function formatRestoreReport(report: RestoreReport): string {
  const lines: string[] = [`restore ${report.runId}`];
  for (const p of report.restored) lines.push(`restored  ${p}`);
  for (const s of report.skipped) lines.push(`skipped   ${s.path}: ${s.reason}`);
  for (const f of report.failed) lines.push(`FAILED    ${f.path}: ${f.reason}`);
  lines.push(`${report.restored.length} restored, ${report.skipped.length} skipped, ${report.failed.length} failed`);
  return lines.join("\n");
}
