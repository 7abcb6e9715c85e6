#!/usr/bin/env node
import fs from "node:fs";
import path from "node:path";
import {
  configPath,
  type Config,
  createLedger,
  createLogger,
  decodeSource,
  dumpCatalogYaml,
  extractCatalog,
  findNearMisses,
  formatRestoreReport,
  formatRunReport,
  loadCatalogFiles,
  loadOrCreateConfig,
  resolveStateDir,
  restoreRun,
  scanMarkers,
  toCatalogDocument,
  WeaveError,
  weaveTree,
} from "../../engine/src/index.js";

function usage() {
  console.log(`yamlweave

Commands:
  weave <root>    Insert catalog snippets after every matching marker under <root>
                  Options: --catalog <file.yaml> (repeatable; default [catalog].files)
                           --out <dir> (write a woven copy instead of weaving in place)
                           --backup-dir <dir> --workers <n> --fail-fast --json --verbose
  restore <runId> Put back the originals a run backed up
                  Options: --force (also overwrite files edited since the weave) --json
  runs            List recent runs
                  Options: --limit <n>
  scan <file>     List the markers (and near misses) in one file
  extract <root>  Rebuild a catalog from the injected blocks in a woven tree
                  Options: --out <file.yaml>
  config          Print config path

Global options: --config <config.toml>
`);
}

function readFlag(args: string[], name: string): string {
  const i = args.indexOf(name);
  if (i < 0) return "";
  return args[i + 1] ?? "";
}

function readFlags(args: string[], name: string): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i++) {
    if (args[i] === name && args[i + 1]) out.push(String(args[i + 1]));
  }
  return out;
}

function hasFlag(args: string[], name: string): boolean {
  return args.includes(name);
}

const VALUE_FLAGS = new Set(["--catalog", "--out", "--backup-dir", "--workers", "--limit", "--config"]);

function positional(args: string[]): string {
  for (let i = 0; i < args.length; i++) {
    const a = args[i] ?? "";
    if (VALUE_FLAGS.has(a)) {
      i++;
      continue;
    }
    if (!a.startsWith("--")) return a;
  }
  return "";
}

function fail(msg: string, code: number): never {
  console.error(msg);
  process.exit(code);
}

function loadConfig(args: string[]): Config {
  const cfg = loadOrCreateConfig(readFlag(args, "--config") || undefined);
  const workers = readFlag(args, "--workers");
  if (workers) {
    const n = Number(workers);
    if (!Number.isInteger(n) || n < 1) fail(`--workers must be a positive integer, got "${workers}"`, 2);
    cfg.run.workers = n;
  }
  if (hasFlag(args, "--fail-fast")) cfg.run.failFast = true;
  return cfg;
}

function commentPrefixFor(cfg: Config, file: string): string {
  const ext = path.extname(file).toLowerCase();
  const prefix = cfg.weave.commentPrefixes[ext];
  if (!prefix) fail(`no comment prefix configured for "${ext || file}"`, 2);
  return prefix;
}

async function main() {
  const cmd = process.argv[2] ?? "";
  const cmdArgs = process.argv.slice(3);

  if (!cmd || cmd === "help" || cmd === "--help" || cmd === "-h") {
    usage();
    return;
  }
  if (cmd === "config") {
    console.log(readFlag(cmdArgs, "--config") || configPath());
    return;
  }

  const cfg = loadConfig(cmdArgs);
  const json = hasFlag(cmdArgs, "--json");
  // Keep stdout clean for the JSON report.
  const logger = createLogger(json ? "warn" : undefined);

  if (cmd === "weave") {
    const root = positional(cmdArgs);
    if (!root) fail("usage: yamlweave weave <root> --catalog <file.yaml>", 2);
    const catalogFiles = readFlags(cmdArgs, "--catalog");
    const files = (catalogFiles.length > 0 ? catalogFiles : cfg.catalog.files).map((f) => path.resolve(f));
    const catalog = loadCatalogFiles(files);

    const ac = new AbortController();
    const onSigint = () => {
      if (ac.signal.aborted) process.exit(130);
      logger.warn("interrupt: finishing files in progress, no new files will be started (Ctrl+C again to quit)");
      ac.abort();
    };
    process.on("SIGINT", onSigint);

    const ledger = createLedger(resolveStateDir(cfg));
    try {
      const outDir = readFlag(cmdArgs, "--out");
      const backupDir = readFlag(cmdArgs, "--backup-dir");
      const report = await weaveTree({
        rootDir: root,
        catalog,
        config: cfg,
        catalogFiles: files,
        ledger,
        logger,
        signal: ac.signal,
        ...(outDir ? { outputDir: outDir } : {}),
        ...(backupDir ? { backupDir } : {}),
      });
      console.log(json ? JSON.stringify(report, null, 2) : formatRunReport(report, { verbose: hasFlag(cmdArgs, "--verbose") }));
      if (!report.ok) process.exitCode = 1;
    } finally {
      process.off("SIGINT", onSigint);
      ledger.close();
    }
    return;
  }

  if (cmd === "restore") {
    const runId = positional(cmdArgs);
    if (!runId) fail("usage: yamlweave restore <runId> [--force]", 2);
    const ledger = createLedger(resolveStateDir(cfg));
    try {
      const report = restoreRun({ ledger, runId, force: hasFlag(cmdArgs, "--force"), logger });
      console.log(json ? JSON.stringify(report, null, 2) : formatRestoreReport(report));
      if (!report.ok) process.exitCode = 1;
    } finally {
      ledger.close();
    }
    return;
  }

  if (cmd === "runs") {
    const limit = Number(readFlag(cmdArgs, "--limit") || 20);
    const ledger = createLedger(resolveStateDir(cfg));
    try {
      const runs = ledger.listRuns(Number.isFinite(limit) ? limit : 20);
      if (json) {
        console.log(JSON.stringify(runs, null, 2));
        return;
      }
      if (runs.length === 0) console.log("No runs recorded.");
      for (const r of runs) {
        const s = r.summary;
        console.log(
          `${r.id}  ${r.status.padEnd(9)}  ${r.rootDir}  ` +
            `inserted=${s.inserted ?? 0} replaced=${s.replaced ?? 0} failed=${(s.failed ?? 0) + (s.filesFailed ?? 0)}`,
        );
      }
    } finally {
      ledger.close();
    }
    return;
  }

  if (cmd === "scan") {
    const file = positional(cmdArgs);
    if (!file) fail("usage: yamlweave scan <file>", 2);
    const commentPrefix = commentPrefixFor(cfg, file);
    let bytes: Buffer;
    try {
      bytes = fs.readFileSync(path.resolve(file));
    } catch (e) {
      fail(e instanceof Error ? e.message : String(e), 1);
    }
    const decoded = decodeSource(bytes);
    if (!decoded.ok) fail(`${file}: ${decoded.reason}`, 1);
    const text = decoded.text;
    const opts = { commentPrefix, sentinel: cfg.weave.sentinel };
    const markers = [...scanMarkers(text, file, opts)];
    const nearMisses = findNearMisses(text, file, opts);
    if (json) {
      console.log(JSON.stringify({ markers, nearMisses }, null, 2));
      return;
    }
    for (const m of markers) console.log(`${String(m.line + 1).padStart(5)}  ${m.key.testCaseId} ${m.key.stepId} ${m.key.segment}`);
    for (const n of nearMisses) console.log(`${String(n.line + 1).padStart(5)}  (not a marker) ${n.raw.trim()}`);
    console.log(`${markers.length} marker(s), ${nearMisses.length} near miss(es)`);
    return;
  }

  if (cmd === "extract") {
    const root = positional(cmdArgs);
    const out = readFlag(cmdArgs, "--out");
    if (!root) fail("usage: yamlweave extract <root> --out <file.yaml>", 2);
    const report = await extractCatalog(path.resolve(root), cfg);
    const yamlText = dumpCatalogYaml(toCatalogDocument(report.snippets));
    if (out) {
      fs.writeFileSync(path.resolve(out), yamlText, "utf8");
      logger.info(`wrote ${report.snippets.length} snippet(s) to ${out}`);
    } else {
      process.stdout.write(yamlText);
    }
    for (const c of report.conflicts) logger.warn(`${c.file}:${c.line}: ${c.id} differs from the block in ${c.firstFile}, kept the first`);
    for (const u of report.unreadable) logger.warn(`${u.file}: ${u.reason}`);
    if (report.conflicts.length > 0 || report.unreadable.length > 0) process.exitCode = 1;
    return;
  }

  usage();
  process.exitCode = 2;
}

main().catch((e) => {
  if (e instanceof WeaveError) {
    console.error(`${e.kind} error: ${e.message}`);
    process.exit(e.kind === "config" ? 2 : 1);
  }
  console.error(e);
  process.exit(1);
});
