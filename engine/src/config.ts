import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import * as TOML from "@iarna/toml";
import { ConfigError, errorMessage } from "./errors.js";

export type IndentMode = "marker" | "none";

export type Config = {
  weave: {
    // Trailing tag appended (after the comment prefix) to every injected line.
    sentinel: string;
    indent: IndentMode;
    extensions: string[];
    exclude: string[];
    // Extension (with dot, lowercase) -> line comment prefix.
    commentPrefixes: Record<string, string>;
  };
  run: {
    workers: number;
    failFast: boolean;
    // Where the run ledger lives. Empty means configDir().
    stateDir: string;
    // Backup tree location. Empty means `<root>_backup_<timestamp>` next to the root.
    backupDir: string;
  };
  catalog: {
    files: string[];
  };
};

export const DEFAULT_SENTINEL = "通过桩插入";

export function configDir(): string {
  return path.join(os.homedir(), ".yamlweave");
}

export function configPath(): string {
  return path.join(configDir(), "config.toml");
}

export function defaultCommentPrefixes(): Record<string, string> {
  const out: Record<string, string> = {};
  for (const ext of [".c", ".h", ".cc", ".cpp", ".hpp", ".cs", ".java", ".js", ".ts", ".go", ".rs", ".swift", ".kt"]) {
    out[ext] = "//";
  }
  for (const ext of [".py", ".sh", ".rb", ".pl", ".yaml", ".yml", ".toml", ".cmake"]) out[ext] = "#";
  for (const ext of [".sql", ".lua"]) out[ext] = "--";
  return out;
}

export function defaultConfig(): Config {
  return {
    weave: {
      sentinel: DEFAULT_SENTINEL,
      indent: "marker",
      extensions: [".c", ".h"],
      exclude: ["node_modules/**", ".git/**"],
      commentPrefixes: defaultCommentPrefixes(),
    },
    run: { workers: 4, failFast: false, stateDir: "", backupDir: "" },
    catalog: { files: [] },
  };
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v) && !(v instanceof Date);
}

function section(raw: Record<string, unknown>, name: string): Record<string, unknown> {
  const v = raw[name];
  if (v === undefined) return {};
  if (!isRecord(v)) throw new ConfigError(`[${name}] must be a table`);
  return v;
}

function readString(sec: Record<string, unknown>, where: string, key: string, fallback: string): string {
  const v = sec[key];
  if (v === undefined) return fallback;
  if (typeof v !== "string") throw new ConfigError(`${where}.${key} must be a string`);
  return v;
}

function readBool(sec: Record<string, unknown>, where: string, key: string, fallback: boolean): boolean {
  const v = sec[key];
  if (v === undefined) return fallback;
  if (typeof v !== "boolean") throw new ConfigError(`${where}.${key} must be a boolean`);
  return v;
}

function readStringList(sec: Record<string, unknown>, where: string, key: string, fallback: string[]): string[] {
  const v = sec[key];
  if (v === undefined) return fallback;
  if (!Array.isArray(v) || !v.every((x): x is string => typeof x === "string")) {
    throw new ConfigError(`${where}.${key} must be an array of strings`);
  }
  return [...v];
}

function readWorkers(v: unknown, where: string): number {
  if (typeof v !== "number" || !Number.isInteger(v) || v < 1 || v > 256) {
    throw new ConfigError(`${where} must be an integer between 1 and 256`);
  }
  return v;
}

export function normalizeExtension(ext: string): string {
  const e = ext.trim().toLowerCase();
  if (!e) return e;
  return e.startsWith(".") ? e : `.${e}`;
}

export function parseConfigToml(raw: string): Config {
  let parsed: Record<string, unknown>;
  try {
    parsed = TOML.parse(raw);
  } catch (e) {
    throw new ConfigError(`invalid config TOML: ${errorMessage(e)}`, { cause: e });
  }

  const base = defaultConfig();
  const weave = section(parsed, "weave");
  const run = section(parsed, "run");
  const catalog = section(parsed, "catalog");

  const sentinel = readString(weave, "weave", "sentinel", base.weave.sentinel).trim();
  if (!sentinel) throw new ConfigError("weave.sentinel cannot be empty");

  const indent = readString(weave, "weave", "indent", base.weave.indent);
  if (indent !== "marker" && indent !== "none") throw new ConfigError(`weave.indent must be "marker" or "none", got "${indent}"`);

  const extensions = readStringList(weave, "weave", "extensions", base.weave.extensions).map(normalizeExtension).filter(Boolean);
  if (extensions.length === 0) throw new ConfigError("weave.extensions cannot be empty");

  const commentPrefixes = { ...base.weave.commentPrefixes };
  const prefixesRaw = weave.commentPrefixes;
  if (prefixesRaw !== undefined) {
    if (!isRecord(prefixesRaw)) throw new ConfigError("[weave.commentPrefixes] must be a table");
    for (const [ext, prefix] of Object.entries(prefixesRaw)) {
      if (typeof prefix !== "string" || !prefix.trim()) {
        throw new ConfigError(`weave.commentPrefixes."${ext}" must be a non-empty string`);
      }
      commentPrefixes[normalizeExtension(ext)] = prefix.trim();
    }
  }

  return {
    weave: {
      sentinel,
      indent,
      extensions,
      exclude: readStringList(weave, "weave", "exclude", base.weave.exclude),
      commentPrefixes,
    },
    run: {
      workers: run.workers === undefined ? base.run.workers : readWorkers(run.workers, "run.workers"),
      failFast: readBool(run, "run", "failFast", base.run.failFast),
      stateDir: readString(run, "run", "stateDir", base.run.stateDir),
      backupDir: readString(run, "run", "backupDir", base.run.backupDir),
    },
    catalog: { files: readStringList(catalog, "catalog", "files", base.catalog.files) },
  };
}

export function stringifyConfigToml(cfg: Config): string {
  return TOML.stringify({
    weave: {
      sentinel: cfg.weave.sentinel,
      indent: cfg.weave.indent,
      extensions: cfg.weave.extensions,
      exclude: cfg.weave.exclude,
      commentPrefixes: cfg.weave.commentPrefixes,
    },
    run: {
      workers: cfg.run.workers,
      failFast: cfg.run.failFast,
      stateDir: cfg.run.stateDir,
      backupDir: cfg.run.backupDir,
    },
    catalog: { files: cfg.catalog.files },
  });
}

// Runtime-only overrides (never written back to config.toml).
export function applyEnvOverrides(cfg: Config, env: NodeJS.ProcessEnv = process.env): Config {
  const out: Config = { ...cfg, weave: { ...cfg.weave }, run: { ...cfg.run }, catalog: { ...cfg.catalog } };

  const workers = typeof env.YAMLWEAVE_WORKERS === "string" ? env.YAMLWEAVE_WORKERS.trim() : "";
  if (workers) out.run.workers = readWorkers(Number(workers), "YAMLWEAVE_WORKERS");

  const failFast = typeof env.YAMLWEAVE_FAIL_FAST === "string" ? env.YAMLWEAVE_FAIL_FAST.trim().toLowerCase() : "";
  if (failFast) out.run.failFast = failFast === "1" || failFast === "true" || failFast === "yes";

  const stateDir = typeof env.YAMLWEAVE_STATE_DIR === "string" ? env.YAMLWEAVE_STATE_DIR.trim() : "";
  if (stateDir) out.run.stateDir = stateDir;

  return out;
}

export function resolveStateDir(cfg: Config): string {
  return cfg.run.stateDir ? path.resolve(cfg.run.stateDir) : configDir();
}

// An explicit path must exist; the default location is created on first use.
export function loadOrCreateConfig(explicitPath?: string): Config {
  if (explicitPath) {
    let raw: string;
    try {
      raw = fs.readFileSync(explicitPath, "utf8");
    } catch (e) {
      throw new ConfigError(`cannot read config ${explicitPath}: ${errorMessage(e)}`, { cause: e });
    }
    return applyEnvOverrides(parseConfigToml(raw));
  }

  const p = configPath();
  let cfg: Config;
  if (!fs.existsSync(p)) {
    cfg = defaultConfig();
    fs.mkdirSync(configDir(), { recursive: true });
    fs.writeFileSync(p, stringifyConfigToml(cfg), "utf8");
  } else {
    cfg = parseConfigToml(fs.readFileSync(p, "utf8"));
  }
  return applyEnvOverrides(cfg);
}
