import crypto from "node:crypto";
import { detect } from "chardet";
import iconv from "iconv-lite";

// One physical line: its text without the terminator, and the terminator itself
// ("\n", "\r\n" or "" for a final line with no newline).
export type SourceLine = { text: string; eol: string };

export function splitLines(text: string): SourceLine[] {
  const out: SourceLine[] = [];
  if (text === "") return out;
  let start = 0;
  while (start < text.length) {
    const nl = text.indexOf("\n", start);
    if (nl < 0) {
      out.push({ text: text.slice(start), eol: "" });
      break;
    }
    const crlf = nl > start && text[nl - 1] === "\r";
    out.push({ text: text.slice(start, crlf ? nl - 1 : nl), eol: crlf ? "\r\n" : "\n" });
    start = nl + 1;
  }
  return out;
}

export function joinLines(lines: SourceLine[]): string {
  let s = "";
  for (const l of lines) s += l.text + l.eol;
  return s;
}

// The terminator new lines should use: the first one the file uses, else "\n".
export function dominantEol(lines: SourceLine[]): string {
  for (const l of lines) if (l.eol) return l.eol;
  return "\n";
}

export function leadingWhitespace(line: string): string {
  const m = line.match(/^[ \t]*/);
  return m ? m[0] : "";
}

export function sha256(data: string | Uint8Array): string {
  return crypto.createHash("sha256").update(data).digest("hex");
}

const utf8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

// Tried in order after UTF-8 and the detected encoding. latin1 accepts any bytes.
const FALLBACK_ENCODINGS = ["gb18030", "latin1"];

export type DecodeResult = { ok: true; text: string; encoding: string } | { ok: false; reason: string };
export type EncodeResult = { ok: true; bytes: Buffer } | { ok: false; reason: string };

// GBK and GB2312 are subsets of GB18030.
function normalizeEncoding(name: string): string {
  const n = name.trim().toLowerCase();
  if (n === "gbk" || n === "gb2312" || n === "gb18030") return "gb18030";
  if (n === "utf8") return "utf-8";
  return n;
}

// Lossless only: the decoded text must encode back to exactly the same bytes.
function decodeAs(bytes: Uint8Array, encoding: string): string | null {
  if (!iconv.encodingExists(encoding)) return null;
  const buf = Buffer.from(bytes);
  const text = iconv.decode(buf, encoding, { stripBOM: false });
  return iconv.encode(text, encoding).equals(buf) ? text : null;
}

// UTF-8 first, then whatever chardet detects, then the fallbacks. The BOM of a
// UTF-8 file stays in the text so that re-encoding reproduces it.
export function decodeSource(bytes: Uint8Array): DecodeResult {
  if (bytes.includes(0)) return { ok: false, reason: "binary content (NUL byte)" };
  try {
    return { ok: true, text: utf8.decode(bytes), encoding: "utf-8" };
  } catch {
    // not UTF-8; try the detected encoding
  }

  const detected = detect(bytes);
  const candidates = detected ? [normalizeEncoding(detected), ...FALLBACK_ENCODINGS] : FALLBACK_ENCODINGS;
  for (const encoding of candidates) {
    if (encoding === "utf-8") continue;
    const text = decodeAs(bytes, encoding);
    if (text !== null) return { ok: true, text, encoding };
  }
  return { ok: false, reason: `cannot decode (detected ${detected ?? "nothing"})` };
}

export function encodeSource(text: string, encoding: string): EncodeResult {
  if (encoding === "utf-8") return { ok: true, bytes: Buffer.from(text, "utf8") };
  const bytes = iconv.encode(text, encoding);
  if (iconv.decode(bytes, encoding, { stripBOM: false }) !== text) {
    return { ok: false, reason: `text cannot be written as ${encoding}` };
  }
  return { ok: true, bytes };
}
