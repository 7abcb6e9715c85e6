import fs from "node:fs";
import * as yaml from "js-yaml";
import type { IndentMode } from "./config.js";
import { ConfigError, errorMessage } from "./errors.js";
import { type MarkerKey, markerKeyId } from "./marker_scanner.js";

export type InsertionPolicy = "replace" | "preserve";

export type Snippet = {
  readonly key: MarkerKey;
  // Stable identity, `TC001 STEP1 segment1`.
  readonly id: string;
  readonly lines: readonly string[];
  readonly policy: InsertionPolicy;
  // Undefined means "use the run's configured indent mode".
  readonly indent?: IndentMode;
  readonly source: string;
};

export type CatalogSource = { name: string; text: string };

const TC_RE = /^TC[A-Za-z0-9]+$/;
const STEP_RE = /^STEP[A-Za-z0-9]+$/;
const SEGMENT_RE = /^[\p{L}\p{N}_]+$/u;
const ENTRY_FIELDS = new Set(["code", "policy", "indent"]);

export class SnippetCatalog {
  private readonly byId: ReadonlyMap<string, Snippet>;

  constructor(snippets: Iterable<Snippet>) {
    const m = new Map<string, Snippet>();
    for (const s of snippets) {
      const prev = m.get(s.id);
      if (prev && !sameSnippet(prev, s)) {
        throw new ConfigError(`ambiguous binding for ${s.id}: ${prev.source} and ${s.source} define different snippets`);
      }
      if (!prev) m.set(s.id, Object.freeze({ ...s, lines: Object.freeze([...s.lines]) }));
    }
    this.byId = m;
  }

  resolve(key: MarkerKey): Snippet | undefined {
    return this.byId.get(markerKeyId(key));
  }

  get size(): number {
    return this.byId.size;
  }

  snippets(): Snippet[] {
    return [...this.byId.values()];
  }

  testCaseIds(): string[] {
    const out: string[] = [];
    for (const s of this.byId.values()) if (!out.includes(s.key.testCaseId)) out.push(s.key.testCaseId);
    return out;
  }
}

function sameSnippet(a: Snippet, b: Snippet): boolean {
  if (a.policy !== b.policy || a.indent !== b.indent) return false;
  if (a.lines.length !== b.lines.length) return false;
  return a.lines.every((l, i) => l === b.lines[i]);
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

// A `|` block ends with one newline that is not part of the snippet.
export function snippetLines(code: string): string[] {
  const normalized = code.replace(/\r\n?/g, "\n");
  const body = normalized.endsWith("\n") ? normalized.slice(0, -1) : normalized;
  return body.split("\n");
}

function isPolicy(v: unknown): v is InsertionPolicy {
  return v === "replace" || v === "preserve";
}

function isIndentMode(v: unknown): v is IndentMode {
  return v === "marker" || v === "none";
}

function parseEntry(
  raw: unknown,
  where: string,
): { code: string; policy: InsertionPolicy; indent?: IndentMode } {
  if (typeof raw === "string") return { code: raw, policy: "replace" };
  if (!isRecord(raw)) throw new ConfigError(`${where}: entry must be a string or a mapping with "code"`);

  for (const field of Object.keys(raw)) {
    if (!ENTRY_FIELDS.has(field)) throw new ConfigError(`${where}: unknown field "${field}"`);
  }
  if (typeof raw.code !== "string") throw new ConfigError(`${where}: "code" must be a string`);

  const policy = raw.policy ?? "replace";
  if (!isPolicy(policy)) throw new ConfigError(`${where}: policy must be "replace" or "preserve"`);
  const indent = raw.indent;
  if (indent === undefined) return { code: raw.code, policy };
  if (!isIndentMode(indent)) throw new ConfigError(`${where}: indent must be "marker" or "none"`);
  return { code: raw.code, policy, indent };
}

export function parseCatalogDocument(source: CatalogSource): Snippet[] {
  let doc: unknown;
  try {
    doc = yaml.load(source.text, { filename: source.name });
  } catch (e) {
    throw new ConfigError(`${source.name}: ${errorMessage(e)}`, { cause: e });
  }
  if (doc === undefined || doc === null) return [];
  if (!isRecord(doc)) throw new ConfigError(`${source.name}: top level must be a mapping of test cases`);

  const out: Snippet[] = [];
  for (const [testCaseId, steps] of Object.entries(doc)) {
    if (!TC_RE.test(testCaseId)) throw new ConfigError(`${source.name}: "${testCaseId}" is not a TC<id> key`);
    if (!isRecord(steps)) throw new ConfigError(`${source.name}: ${testCaseId} must map steps to segments`);

    for (const [stepId, segments] of Object.entries(steps)) {
      if (!STEP_RE.test(stepId)) throw new ConfigError(`${source.name}: "${testCaseId}.${stepId}" is not a STEP<id> key`);
      if (!isRecord(segments)) throw new ConfigError(`${source.name}: ${testCaseId}.${stepId} must map segments to code`);

      for (const [segment, entryRaw] of Object.entries(segments)) {
        const where = `${source.name}: ${testCaseId}.${stepId}.${segment}`;
        if (!SEGMENT_RE.test(segment)) throw new ConfigError(`${where}: invalid segment name`);
        const entry = parseEntry(entryRaw, where);
        const lines = snippetLines(entry.code);
        if (lines.length === 1 && lines[0] === "") throw new ConfigError(`${where}: snippet is empty`);

        const key: MarkerKey = { testCaseId, stepId, segment };
        const snippet: Snippet = {
          key,
          id: markerKeyId(key),
          lines,
          policy: entry.policy,
          source: source.name,
          ...(entry.indent ? { indent: entry.indent } : {}),
        };
        out.push(snippet);
      }
    }
  }
  return out;
}

export function buildCatalog(sources: CatalogSource[]): SnippetCatalog {
  const all: Snippet[] = [];
  for (const src of sources) all.push(...parseCatalogDocument(src));
  return new SnippetCatalog(all);
}

export function loadCatalogFiles(paths: string[]): SnippetCatalog {
  if (paths.length === 0) throw new ConfigError("no catalog file given");
  const sources: CatalogSource[] = [];
  for (const p of paths) {
    let text: string;
    try {
      text = fs.readFileSync(p, "utf8");
    } catch (e) {
      throw new ConfigError(`cannot read catalog ${p}: ${errorMessage(e)}`, { cause: e });
    }
    sources.push({ name: p, text });
  }
  return buildCatalog(sources);
}
