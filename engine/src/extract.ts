import fs from "node:fs";
import * as yaml from "js-yaml";
import type { Config } from "./config.js";
import { errorMessage } from "./errors.js";
import { isInjectedLine, markerKeyId, scanMarkers, sentinelTag } from "./marker_scanner.js";
import { listEligibleFiles } from "./run_coordinator.js";
import { decodeSource, splitLines } from "./source_text.js";

export type ExtractedSnippet = {
  id: string;
  testCaseId: string;
  stepId: string;
  segment: string;
  code: string;
  file: string;
  line: number;
};

export type ExtractReport = {
  snippets: ExtractedSnippet[];
  // Same key, different injected text somewhere else. The first occurrence wins.
  conflicts: Array<{ id: string; file: string; line: number; firstFile: string }>;
  unreadable: Array<{ file: string; reason: string }>;
};

export type CatalogDocument = Record<string, Record<string, Record<string, string>>>;

// Recover the snippet line from `<indent><line>  <prefix> <sentinel>`.
export function stripInjectedLine(line: string, indent: string, commentPrefix: string, sentinel: string): string {
  const tag = sentinelTag(commentPrefix, sentinel);
  const body = line.trimEnd();
  let code = body.slice(0, body.length - tag.length);
  if (code.endsWith("  ")) code = code.slice(0, -2);
  return indent && code.startsWith(indent) ? code.slice(indent.length) : code;
}

export function extractFromText(
  text: string,
  filePath: string,
  opts: { commentPrefix: string; sentinel: string },
): ExtractedSnippet[] {
  const lines = splitLines(text);
  const out: ExtractedSnippet[] = [];
  for (const occ of scanMarkers(text, filePath, opts)) {
    const body: string[] = [];
    for (let j = occ.line + 1; j < lines.length; j++) {
      const t = lines[j]?.text ?? "";
      if (!isInjectedLine(t, opts.commentPrefix, opts.sentinel)) break;
      body.push(stripInjectedLine(t, occ.indent, opts.commentPrefix, opts.sentinel));
    }
    if (body.length === 0) continue;
    out.push({
      id: markerKeyId(occ.key),
      testCaseId: occ.key.testCaseId,
      stepId: occ.key.stepId,
      segment: occ.key.segment,
      code: `${body.join("\n")}\n`,
      file: filePath,
      line: occ.line + 1,
    });
  }
  return out;
}

// Rebuild a catalog from the injected blocks of an already woven tree.
export async function extractCatalog(rootDir: string, config: Config): Promise<ExtractReport> {
  const report: ExtractReport = { snippets: [], conflicts: [], unreadable: [] };
  const seen = new Map<string, ExtractedSnippet>();

  for (const task of await listEligibleFiles(rootDir, config)) {
    const commentPrefix = config.weave.commentPrefixes[task.ext] ?? "//";
    let bytes: Buffer;
    try {
      bytes = fs.readFileSync(task.abs);
    } catch (e) {
      report.unreadable.push({ file: task.rel, reason: errorMessage(e) });
      continue;
    }
    const decoded = decodeSource(bytes);
    if (!decoded.ok) {
      report.unreadable.push({ file: task.rel, reason: decoded.reason });
      continue;
    }

    for (const s of extractFromText(decoded.text, task.rel, { commentPrefix, sentinel: config.weave.sentinel })) {
      const first = seen.get(s.id);
      if (!first) {
        seen.set(s.id, s);
        report.snippets.push(s);
      } else if (first.code !== s.code) {
        report.conflicts.push({ id: s.id, file: s.file, line: s.line, firstFile: first.file });
      }
    }
  }
  return report;
}

export function toCatalogDocument(snippets: ExtractedSnippet[]): CatalogDocument {
  const doc: CatalogDocument = {};
  for (const s of snippets) {
    const steps = (doc[s.testCaseId] ??= {});
    const segments = (steps[s.stepId] ??= {});
    segments[s.segment] = s.code;
  }
  return doc;
}

export function dumpCatalogYaml(doc: CatalogDocument): string {
  // lineWidth -1 keeps multi-line code in `|` blocks instead of folding it.
  return yaml.dump(doc, { lineWidth: -1, noRefs: true, sortKeys: false });
}
