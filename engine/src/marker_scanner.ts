import { leadingWhitespace, splitLines } from "./source_text.js";

export type MarkerKey = {
  readonly testCaseId: string;
  readonly stepId: string;
  readonly segment: string;
};

export type MarkerOccurrence = {
  readonly key: MarkerKey;
  readonly filePath: string;
  // 0-based index into the scanned text's lines.
  readonly line: number;
  readonly raw: string;
  readonly indent: string;
};

export type NearMiss = {
  readonly filePath: string;
  readonly line: number;
  readonly raw: string;
};

export type ScanOptions = {
  commentPrefix: string;
  // When set, lines carrying the injected-line tag are never reported.
  sentinel?: string;
};

// `TC<id> STEP<id> <segment>` with nothing after the segment name. Segment
// names are word tokens in any script (`init_1`, `初始化`).
const MARKER_RE = /^(TC[A-Za-z0-9]+)[ \t]+(STEP[A-Za-z0-9]+)[ \t]+([\p{L}\p{N}_]+)[ \t]*$/u;
const MARKER_LIKE_RE = /^TC[A-Za-z0-9]+(?:[ \t]|$)/;

export function markerKeyId(key: MarkerKey): string {
  return `${key.testCaseId} ${key.stepId} ${key.segment}`;
}

export function sentinelTag(commentPrefix: string, sentinel: string): string {
  return `${commentPrefix} ${sentinel}`;
}

export function isInjectedLine(line: string, commentPrefix: string, sentinel: string): boolean {
  return line.trimEnd().endsWith(sentinelTag(commentPrefix, sentinel));
}

function commentBody(line: string, commentPrefix: string): string | null {
  const s = line.trimStart();
  if (!s.startsWith(commentPrefix)) return null;
  return s.slice(commentPrefix.length).replace(/^[ \t]+/, "");
}

export function parseMarkerLine(line: string, commentPrefix: string): MarkerKey | null {
  const body = commentBody(line, commentPrefix);
  if (body === null) return null;
  const m = body.match(MARKER_RE);
  if (!m?.[1] || !m[2] || !m[3]) return null;
  return { testCaseId: m[1], stepId: m[2], segment: m[3] };
}

export function* scanMarkers(text: string, filePath: string, opts: ScanOptions): Generator<MarkerOccurrence> {
  const lines = splitLines(text);
  for (let i = 0; i < lines.length; i++) {
    const raw = lines[i]?.text ?? "";
    if (opts.sentinel && isInjectedLine(raw, opts.commentPrefix, opts.sentinel)) continue;
    const key = parseMarkerLine(raw, opts.commentPrefix);
    if (!key) continue;
    yield { key, filePath, line: i, raw, indent: leadingWhitespace(raw) };
  }
}

// Comment lines that open like a marker but fail the full pattern (missing STEP,
// trailing text, ...). Reported as warnings, never woven.
export function findNearMisses(text: string, filePath: string, opts: ScanOptions): NearMiss[] {
  const out: NearMiss[] = [];
  const lines = splitLines(text);
  for (let i = 0; i < lines.length; i++) {
    const raw = lines[i]?.text ?? "";
    if (opts.sentinel && isInjectedLine(raw, opts.commentPrefix, opts.sentinel)) continue;
    const body = commentBody(raw, opts.commentPrefix);
    if (body === null || !MARKER_LIKE_RE.test(body)) continue;
    if (parseMarkerLine(raw, opts.commentPrefix)) continue;
    out.push({ filePath, line: i, raw });
  }
  return out;
}
