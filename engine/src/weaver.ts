import type { IndentMode } from "./config.js";
import { WeaveConflict } from "./errors.js";
import {
  isInjectedLine,
  type MarkerKey,
  markerKeyId,
  type MarkerOccurrence,
  parseMarkerLine,
  sentinelTag,
} from "./marker_scanner.js";
import type { Snippet, SnippetCatalog } from "./snippet_catalog.js";
import { dominantEol, joinLines, type SourceLine, splitLines } from "./source_text.js";

export type WeaveResult =
  | { status: "inserted"; lines: number }
  | { status: "skipped_no_snippet" }
  | { status: "skipped_already_woven"; preserved: boolean }
  | { status: "replaced_existing"; removed: number; lines: number }
  | { status: "failed"; reason: string };

export type WeaveStatus = WeaveResult["status"];

export type MarkerResult = {
  key: MarkerKey;
  id: string;
  // 0-based line of the marker in the input text.
  line: number;
  result: WeaveResult;
};

export type WeaveOptions = {
  commentPrefix: string;
  sentinel: string;
  indent: IndentMode;
};

export type WeaveOutput = {
  text: string;
  changed: boolean;
  results: MarkerResult[];
  conflict: WeaveConflict | null;
};

export function renderSnippet(snippet: Snippet, markerIndent: string, opts: WeaveOptions): string[] {
  const indent = (snippet.indent ?? opts.indent) === "marker" ? markerIndent : "";
  const tag = sentinelTag(opts.commentPrefix, opts.sentinel);
  return snippet.lines.map((l) => `${indent}${l}  ${tag}`);
}

// Lines [start, end) directly after the marker that carry the sentinel.
function injectedBlockEnd(lines: SourceLine[], start: number, opts: WeaveOptions): number {
  let j = start;
  while (j < lines.length && isInjectedLine(lines[j]?.text ?? "", opts.commentPrefix, opts.sentinel)) j++;
  return j;
}

// An injected line after the block but before the next marker means the block was
// split or truncated by hand; replacing it cannot be done cleanly.
function findOrphanedInjectedLine(lines: SourceLine[], from: number, opts: WeaveOptions): number {
  for (let k = from; k < lines.length; k++) {
    const t = lines[k]?.text ?? "";
    if (isInjectedLine(t, opts.commentPrefix, opts.sentinel)) return k;
    if (parseMarkerLine(t, opts.commentPrefix)) return -1;
  }
  return -1;
}

function sameText(existing: SourceLine[], rendered: string[]): boolean {
  if (existing.length !== rendered.length) return false;
  return existing.every((l, i) => l.text === rendered[i]);
}

// Markers are handled top to bottom and each change shifts the markers after it.
// Only the sentinel-tagged block directly after a resolved marker is ever removed.
// A conflict anywhere withdraws every change: the input text comes back unchanged.
export function applyWeave(
  fileText: string,
  markers: Iterable<MarkerOccurrence>,
  catalog: SnippetCatalog,
  opts: WeaveOptions,
): WeaveOutput {
  const lines = splitLines(fileText);
  const eol = dominantEol(lines);
  const ordered = [...markers].sort((a, b) => a.line - b.line);
  const results: MarkerResult[] = [];
  let conflict: WeaveConflict | null = null;
  let offset = 0;

  for (const occ of ordered) {
    const base = { key: occ.key, id: markerKeyId(occ.key), line: occ.line };
    const at = occ.line + offset;
    const markerLine = lines[at];
    if (!markerLine || markerLine.text !== occ.raw) {
      const reason = `marker ${base.id} is no longer at line ${occ.line + 1}`;
      conflict ??= new WeaveConflict(occ.filePath, occ.line + 1, reason);
      results.push({ ...base, result: { status: "failed", reason } });
      continue;
    }

    const snippet = catalog.resolve(occ.key);
    if (!snippet) {
      results.push({ ...base, result: { status: "skipped_no_snippet" } });
      continue;
    }

    const blockStart = at + 1;
    const blockEnd = injectedBlockEnd(lines, blockStart, opts);
    const existing = lines.slice(blockStart, blockEnd);

    const orphan = findOrphanedInjectedLine(lines, blockEnd, opts);
    if (orphan >= 0) {
      const reason = `injected block for ${base.id} is split or truncated (stray injected line ${orphan - offset + 1})`;
      conflict ??= new WeaveConflict(occ.filePath, occ.line + 1, reason);
      results.push({ ...base, result: { status: "failed", reason } });
      continue;
    }

    const rendered = renderSnippet(snippet, occ.indent, opts);

    if (existing.length > 0) {
      if (sameText(existing, rendered)) {
        results.push({ ...base, result: { status: "skipped_already_woven", preserved: false } });
        continue;
      }
      if (snippet.policy === "preserve") {
        results.push({ ...base, result: { status: "skipped_already_woven", preserved: true } });
        continue;
      }
      const lastEol = existing[existing.length - 1]?.eol ?? eol;
      const replacement = rendered.map((text, i) => ({ text, eol: i === rendered.length - 1 ? lastEol : eol }));
      lines.splice(blockStart, existing.length, ...replacement);
      offset += replacement.length - existing.length;
      results.push({
        ...base,
        result: { status: "replaced_existing", removed: existing.length, lines: replacement.length },
      });
      continue;
    }

    // A marker on the last line without a newline keeps ending the file with none.
    const tailEol = markerLine.eol;
    if (!tailEol) markerLine.eol = eol;
    const inserted = rendered.map((text, i) => ({ text, eol: i === rendered.length - 1 ? tailEol : eol }));
    lines.splice(blockStart, 0, ...inserted);
    offset += inserted.length;
    results.push({ ...base, result: { status: "inserted", lines: inserted.length } });
  }

  if (conflict) {
    const at = conflict.line;
    const withdrawn = results.map((r): MarkerResult => {
      if (r.result.status !== "inserted" && r.result.status !== "replaced_existing") return r;
      return { ...r, result: { status: "failed", reason: `not applied: file left unmodified (conflict at line ${at})` } };
    });
    return { text: fileText, changed: false, results: withdrawn, conflict };
  }

  const text = joinLines(lines);
  return { text, changed: text !== fileText, results, conflict: null };
}

export function countByStatus(results: MarkerResult[]): Record<WeaveStatus, number> {
  const out: Record<WeaveStatus, number> = {
    inserted: 0,
    skipped_no_snippet: 0,
    skipped_already_woven: 0,
    replaced_existing: 0,
    failed: 0,
  };
  for (const r of results) out[r.result.status]++;
  return out;
}
