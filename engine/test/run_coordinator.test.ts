import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import iconv from "iconv-lite";
import { describe, expect, test } from "vitest";
import { type Config, DEFAULT_SENTINEL, defaultConfig } from "../src/config.js";
import { ConfigError } from "../src/errors.js";
import { createLedger, type Ledger } from "../src/ledger.js";
import { silentLogger } from "../src/log.js";
import { listEligibleFiles, restoreRun, weaveTree } from "../src/run_coordinator.js";
import { buildCatalog } from "../src/snippet_catalog.js";

const TAG = `// ${DEFAULT_SENTINEL}`;
const CATALOG = buildCatalog([{ name: "cases.yaml", text: 'TC001:\n  STEP1:\n    seg: "stub_step();"\n' }]);

const A_C = "void a(void) {\n  // TC001 STEP1 seg\n}\n";
const A_C_WOVEN = `void a(void) {\n  // TC001 STEP1 seg\n  stub_step();  ${TAG}\n}\n`;
const B_H = "// TC001 STEP1 seg\n";
const B_H_WOVEN = `// TC001 STEP1 seg\nstub_step();  ${TAG}\n`;
const C_C = "int c;\n";

type Env = { dir: string; root: string; backups: string; ledger: Ledger; config: Config };

function write(file: string, data: string | Uint8Array) {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, data);
}

async function withTree(fn: (env: Env) => Promise<void>) {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "yamlweave-run-"));
  const root = path.join(dir, "src");
  write(path.join(root, "a.c"), A_C);
  write(path.join(root, "lib", "b.h"), B_H);
  write(path.join(root, "lib", "c.c"), C_C);
  write(path.join(root, "notes.txt"), B_H);
  write(path.join(root, "node_modules", "dep", "d.c"), B_H);
  const ledger = createLedger(path.join(dir, "state"));
  try {
    await fn({ dir, root, backups: path.join(dir, "backups"), ledger, config: defaultConfig() });
  } finally {
    ledger.close();
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

const read = (file: string) => fs.readFileSync(file, "utf8");

describe("listEligibleFiles", () => {
  test("keeps configured extensions, skips excluded trees and sorts", async () => {
    await withTree(async ({ root, config }) => {
      const files = await listEligibleFiles(root, config);
      expect(files.map((f) => f.rel)).toEqual(["a.c", "lib/b.h", "lib/c.c"]);
      expect(files[1]?.abs).toBe(path.join(root, "lib", "b.h"));
      expect(files[1]?.ext).toBe(".h");
    });
  });
});

describe("weaveTree", () => {
  test("weaves in place, backs up originals and records the run", async () => {
    await withTree(async ({ root, backups, ledger, config }) => {
      const report = await weaveTree({ rootDir: root, catalog: CATALOG, config, backupDir: backups, ledger, logger: silentLogger });

      expect(report.ok).toBe(true);
      expect(report.backupDir).toBe(path.join(backups, report.runId));
      expect(report.files.map((f) => [f.relPath, f.status])).toEqual([
        ["a.c", "written"],
        ["lib/b.h", "written"],
        ["lib/c.c", "unchanged"],
      ]);
      expect(report.files[0]?.markers).toEqual([{ id: "TC001 STEP1 seg", lineNumber: 2, status: "inserted" }]);
      expect(report.counts).toMatchObject({ files: 3, filesWritten: 2, filesUnchanged: 1, markers: 2, inserted: 2, failed: 0 });

      expect(read(path.join(root, "a.c"))).toBe(A_C_WOVEN);
      expect(read(path.join(root, "lib", "b.h"))).toBe(B_H_WOVEN);
      expect(read(path.join(root, "lib", "c.c"))).toBe(C_C);
      expect(read(path.join(root, "node_modules", "dep", "d.c"))).toBe(B_H);

      expect(read(path.join(backups, report.runId, "a.c"))).toBe(A_C);
      expect(read(path.join(backups, report.runId, "lib", "b.h"))).toBe(B_H);
      expect(fs.existsSync(path.join(backups, report.runId, "lib", "c.c"))).toBe(false);

      const run = ledger.getRun(report.runId);
      expect(run?.status).toBe("completed");
      expect(run?.summary.inserted).toBe(2);
      expect(ledger.listBackups(report.runId).map((b) => b.relPath)).toEqual(["a.c", "lib/b.h"]);
    });
  });

  test("a second run over its own output changes nothing", async () => {
    await withTree(async ({ root, backups, ledger, config }) => {
      await weaveTree({ rootDir: root, catalog: CATALOG, config, backupDir: backups, ledger, logger: silentLogger });
      const second = await weaveTree({ rootDir: root, catalog: CATALOG, config, backupDir: backups, ledger, logger: silentLogger });

      expect(second.ok).toBe(true);
      expect(second.counts).toMatchObject({ filesWritten: 0, filesUnchanged: 3, skippedAlreadyWoven: 2, inserted: 0 });
      expect(read(path.join(root, "a.c"))).toBe(A_C_WOVEN);
      expect(ledger.listBackups(second.runId)).toEqual([]);
    });
  });

  test("defaults the backup tree to a timestamped sibling of the root", async () => {
    await withTree(async ({ root, ledger, config }) => {
      const report = await weaveTree({
        rootDir: root,
        catalog: CATALOG,
        config,
        ledger,
        logger: silentLogger,
        now: () => new Date(2024, 0, 5, 7, 8, 9),
      });
      expect(report.runId.startsWith("20240105_070809-")).toBe(true);
      expect(report.backupDir).toBe(`${root}_backup_20240105_070809`);
      expect(read(path.join(`${root}_backup_20240105_070809`, "a.c"))).toBe(A_C);
    });
  });

  test("writes a mirrored tree to the output directory and leaves sources alone", async () => {
    await withTree(async ({ root, ledger, config }) => {
      const out = path.join(root, "woven");
      const report = await weaveTree({ rootDir: root, catalog: CATALOG, config, outputDir: out, ledger, logger: silentLogger });

      expect(report.backupDir).toBeNull();
      expect(report.outputDir).toBe(out);
      expect(read(path.join(out, "a.c"))).toBe(A_C_WOVEN);
      expect(read(path.join(out, "lib", "c.c"))).toBe(C_C);
      expect(read(path.join(root, "a.c"))).toBe(A_C);

      const again = await weaveTree({ rootDir: root, catalog: CATALOG, config, outputDir: out, ledger, logger: silentLogger });
      expect(again.files.map((f) => f.relPath)).toEqual(["a.c", "lib/b.h", "lib/c.c"]);
    });
  });

  test("a binary file fails alone", async () => {
    await withTree(async ({ root, backups, ledger, config }) => {
      write(path.join(root, "bad.c"), Buffer.from([0x2f, 0x2f, 0x00, 0x0a]));
      const report = await weaveTree({ rootDir: root, catalog: CATALOG, config, backupDir: backups, ledger, logger: silentLogger });

      const bad = report.files.find((f) => f.relPath === "bad.c");
      expect(bad?.status).toBe("failed");
      expect(bad?.error).toEqual({ kind: "scan", message: "binary content (NUL byte)" });
      expect(report.counts.filesWritten).toBe(2);
      expect(report.ok).toBe(false);
      expect(ledger.getRun(report.runId)?.status).toBe("failed");
    });
  });

  test("writes a GBK file back in GBK", async () => {
    await withTree(async ({ root, backups, ledger, config }) => {
      const header = "// 这是一个测试用的源文件，用于检查中文注释的编码。\n".repeat(3);
      const original = iconv.encode(`${header}void f(void) {\n  // TC001 STEP1 seg\n}\n`, "gbk");
      write(path.join(root, "gbk.c"), original);
      const report = await weaveTree({ rootDir: root, catalog: CATALOG, config, backupDir: backups, ledger, logger: silentLogger });

      const gbk = report.files.find((f) => f.relPath === "gbk.c");
      expect(gbk?.status).toBe("written");
      expect(gbk?.encoding).toBe("gb18030");
      const expected = iconv.encode(`${header}void f(void) {\n  // TC001 STEP1 seg\n  stub_step();  ${TAG}\n}\n`, "gb18030");
      expect(fs.readFileSync(path.join(root, "gbk.c"))).toEqual(expected);
      expect(fs.readFileSync(path.join(backups, report.runId, "gbk.c"))).toEqual(original);

      const again = await weaveTree({ rootDir: root, catalog: CATALOG, config, backupDir: backups, ledger, logger: silentLogger });
      expect(again.files.find((f) => f.relPath === "gbk.c")?.status).toBe("unchanged");
      expect(fs.readFileSync(path.join(root, "gbk.c"))).toEqual(expected);
    });
  });

  test("a conflicting file is left unmodified and gets no backup", async () => {
    await withTree(async ({ root, backups, ledger, config }) => {
      const text = `  // TC001 STEP1 seg\n  old();  ${TAG}\n  mine();\n  stray();  ${TAG}\n`;
      write(path.join(root, "x.c"), text);
      const report = await weaveTree({ rootDir: root, catalog: CATALOG, config, backupDir: backups, ledger, logger: silentLogger });

      const x = report.files.find((f) => f.relPath === "x.c");
      expect(x?.status).toBe("failed");
      expect(x?.error?.kind).toBe("conflict");
      expect(read(path.join(root, "x.c"))).toBe(text);
      expect(fs.existsSync(path.join(backups, report.runId, "x.c"))).toBe(false);
    });
  });

  test("reports near-miss markers as warnings", async () => {
    await withTree(async ({ root, backups, ledger, config }) => {
      write(path.join(root, "lib", "c.c"), "// TC001 STEP1\nint c;\n");
      const report = await weaveTree({ rootDir: root, catalog: CATALOG, config, backupDir: backups, ledger, logger: silentLogger });
      expect(report.files[2]?.warnings).toEqual(["line 1 looks like a marker but is not one: // TC001 STEP1"]);
      expect(report.files[2]?.status).toBe("unchanged");
    });
  });

  test("failFast stops starting new files after the first failure", async () => {
    await withTree(async ({ root, backups, ledger }) => {
      write(path.join(root, "0bad.c"), Buffer.from([0x00]));
      const config = defaultConfig();
      config.run.workers = 1;
      config.run.failFast = true;
      const report = await weaveTree({ rootDir: root, catalog: CATALOG, config, backupDir: backups, ledger, logger: silentLogger });

      expect(report.files.map((f) => f.status)).toEqual(["failed", "cancelled", "cancelled", "cancelled"]);
      expect(report.cancelled).toBe(true);
      expect(report.ok).toBe(false);
      expect(read(path.join(root, "a.c"))).toBe(A_C);
    });
  });

  test("an aborted signal leaves every file untouched and cancelled", async () => {
    await withTree(async ({ root, backups, ledger, config }) => {
      const ac = new AbortController();
      ac.abort();
      const report = await weaveTree({
        rootDir: root,
        catalog: CATALOG,
        config,
        backupDir: backups,
        ledger,
        logger: silentLogger,
        signal: ac.signal,
      });
      expect(report.counts.filesCancelled).toBe(3);
      expect(read(path.join(root, "a.c"))).toBe(A_C);
      expect(ledger.getRun(report.runId)?.status).toBe("cancelled");
    });
  });

  test("rejects a missing root and an extension without a comment prefix", async () => {
    await withTree(async ({ dir, root, config }) => {
      await expect(weaveTree({ rootDir: path.join(dir, "nope"), catalog: CATALOG, config, logger: silentLogger })).rejects.toThrow(
        new ConfigError(`root directory does not exist: ${path.join(dir, "nope")}`),
      );
      const odd = defaultConfig();
      odd.weave.extensions = [".zz"];
      await expect(weaveTree({ rootDir: root, catalog: CATALOG, config: odd, logger: silentLogger })).rejects.toThrow(
        new ConfigError("no comment prefix configured for .zz"),
      );
    });
  });
});

describe("restoreRun", () => {
  test("puts back every original the run backed up", async () => {
    await withTree(async ({ root, backups, ledger, config }) => {
      const report = await weaveTree({ rootDir: root, catalog: CATALOG, config, backupDir: backups, ledger, logger: silentLogger });
      const restored = restoreRun({ ledger, runId: report.runId, logger: silentLogger });

      expect(restored).toEqual({
        runId: report.runId,
        ok: true,
        restored: [path.join(root, "a.c"), path.join(root, "lib", "b.h")],
        skipped: [],
        failed: [],
      });
      expect(read(path.join(root, "a.c"))).toBe(A_C);
      expect(read(path.join(root, "lib", "b.h"))).toBe(B_H);
    });
  });

  test("skips files edited since the weave unless forced", async () => {
    await withTree(async ({ root, backups, ledger, config }) => {
      const report = await weaveTree({ rootDir: root, catalog: CATALOG, config, backupDir: backups, ledger, logger: silentLogger });
      write(path.join(root, "a.c"), "edited\n");

      const gentle = restoreRun({ ledger, runId: report.runId, logger: silentLogger });
      expect(gentle.skipped).toEqual([{ path: path.join(root, "a.c"), reason: "modified since it was woven" }]);
      expect(gentle.restored).toEqual([path.join(root, "lib", "b.h")]);
      expect(read(path.join(root, "a.c"))).toBe("edited\n");

      const forced = restoreRun({ ledger, runId: report.runId, force: true, logger: silentLogger });
      expect(forced.restored).toEqual([path.join(root, "a.c"), path.join(root, "lib", "b.h")]);
      expect(read(path.join(root, "a.c"))).toBe(A_C);
    });
  });

  test("an unknown run id is a ConfigError", async () => {
    await withTree(async ({ ledger }) => {
      expect(() => restoreRun({ ledger, runId: "nope", logger: silentLogger })).toThrow(new ConfigError("unknown run: nope"));
    });
  });
});
