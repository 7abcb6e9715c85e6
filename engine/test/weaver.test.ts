import { describe, expect, test } from "vitest";
import { DEFAULT_SENTINEL } from "../src/config.js";
import { scanMarkers } from "../src/marker_scanner.js";
import { buildCatalog, type SnippetCatalog } from "../src/snippet_catalog.js";
import { applyWeave, countByStatus, type WeaveOptions } from "../src/weaver.js";

const OPTS: WeaveOptions = { commentPrefix: "//", sentinel: DEFAULT_SENTINEL, indent: "marker" };
const TAG = `// ${DEFAULT_SENTINEL}`;

function catalogOf(...yamlLines: string[]): SnippetCatalog {
  return buildCatalog([{ name: "test.yaml", text: yamlLines.join("\n") }]);
}

function weave(text: string, catalog: SnippetCatalog, opts: WeaveOptions = OPTS, file = "a.c") {
  const markers = scanMarkers(text, file, { commentPrefix: opts.commentPrefix, sentinel: opts.sentinel });
  return applyWeave(text, markers, catalog, opts);
}

const ONE_LINER = catalogOf("TC001:", "  STEP1:", '    segment1: "if (x < 0) { return 0; }"');

const BARE = ["int f(int x) {", "    // TC001 STEP1 segment1", "    return x;", "}", ""].join("\n");
const WOVEN = [
  "int f(int x) {",
  "    // TC001 STEP1 segment1",
  `    if (x < 0) { return 0; }  ${TAG}`,
  "    return x;",
  "}",
  "",
].join("\n");

describe("applyWeave", () => {
  test("leaves a file untouched when no snippet is bound to its marker", () => {
    const out = weave(BARE, catalogOf("TC009:", "  STEP1:", '    other: "x();"'));
    expect(out.text).toBe(BARE);
    expect(out.changed).toBe(false);
    expect(out.results.map((r) => r.result)).toEqual([{ status: "skipped_no_snippet" }]);
  });

  test("inserts the bound snippet after a bare marker at the marker's indent", () => {
    const out = weave(BARE, ONE_LINER);
    expect(out.text).toBe(WOVEN);
    expect(out.changed).toBe(true);
    expect(out.results).toEqual([
      {
        key: { testCaseId: "TC001", stepId: "STEP1", segment: "segment1" },
        id: "TC001 STEP1 segment1",
        line: 1,
        result: { status: "inserted", lines: 1 },
      },
    ]);
  });

  test("is idempotent on its own output", () => {
    const out = weave(WOVEN, ONE_LINER);
    expect(out.text).toBe(WOVEN);
    expect(out.changed).toBe(false);
    expect(out.results[0]?.result).toEqual({ status: "skipped_already_woven", preserved: false });
  });

  test("replaces a stale injected block when the catalog entry changed", () => {
    const updated = catalogOf(
      "TC001:",
      "  STEP1:",
      "    segment1: |",
      "      if (x < 0) {",
      "        return -1;",
      "      }",
    );
    const out = weave(WOVEN, updated);
    expect(out.text).toBe(
      [
        "int f(int x) {",
        "    // TC001 STEP1 segment1",
        `    if (x < 0) {  ${TAG}`,
        `      return -1;  ${TAG}`,
        `    }  ${TAG}`,
        "    return x;",
        "}",
        "",
      ].join("\n"),
    );
    expect(out.results[0]?.result).toEqual({ status: "replaced_existing", removed: 1, lines: 3 });
  });

  test("gives the same key identical blocks in different files", () => {
    const cat = catalogOf("TC202:", "  STEP1:", '    test_min_max: "check_min_max(a, b);"');
    const a = ["void a(void) {", "  // TC202 STEP1 test_min_max", "}", ""].join("\n");
    const b = ["static int b;", "void b_init(void) {", "  // TC202 STEP1 test_min_max", "  b = 0;", "}", ""].join("\n");
    const injectedA = weave(a, cat, OPTS, "mod_a/a.c").text.split("\n")[2];
    const injectedB = weave(b, cat, OPTS, "mod_b/b.c").text.split("\n")[3];
    expect(injectedA).toBe(`  check_min_max(a, b);  ${TAG}`);
    expect(injectedB).toBe(injectedA);
  });

  test("shifts later markers by the lines inserted before them", () => {
    const cat = catalogOf("TC001:", "  STEP1:", "    a: |", "      one();", "      two();", '    b: "three();"');
    const text = ["// TC001 STEP1 a", "mid();", "// TC001 STEP1 b", "end();", ""].join("\n");
    const out = weave(text, cat);
    expect(out.text).toBe(
      [
        "// TC001 STEP1 a",
        `one();  ${TAG}`,
        `two();  ${TAG}`,
        "mid();",
        "// TC001 STEP1 b",
        `three();  ${TAG}`,
        "end();",
        "",
      ].join("\n"),
    );
    expect(out.results.map((r) => r.line)).toEqual([0, 2]);
    expect(countByStatus(out.results)).toEqual({
      inserted: 2,
      skipped_no_snippet: 0,
      skipped_already_woven: 0,
      replaced_existing: 0,
      failed: 0,
    });
  });

  test("keeps CRLF line endings", () => {
    const cat = catalogOf("TC001:", "  STEP1:", '    a: "a();"');
    const out = weave("x;\r\n  // TC001 STEP1 a\r\ny;\r\n", cat);
    expect(out.text).toBe(`x;\r\n  // TC001 STEP1 a\r\n  a();  ${TAG}\r\ny;\r\n`);
  });

  test("a marker on the last line without a newline leaves the file ending without one", () => {
    const cat = catalogOf("TC001:", "  STEP1:", '    a: "a();"');
    const out = weave("x;\n// TC001 STEP1 a", cat);
    expect(out.text).toBe(`x;\n// TC001 STEP1 a\na();  ${TAG}`);
  });

  test("preserve policy keeps a differing injected block as it is", () => {
    const cat = catalogOf("TC001:", "  STEP1:", "    a:", '      code: "fresh();"', "      policy: preserve");
    const text = ["  // TC001 STEP1 a", `  edited_by_hand();  ${TAG}`, ""].join("\n");
    const out = weave(text, cat);
    expect(out.text).toBe(text);
    expect(out.results[0]?.result).toEqual({ status: "skipped_already_woven", preserved: true });
  });

  test("indent none writes snippet lines at column zero", () => {
    const cat = catalogOf("TC001:", "  STEP1:", "    a:", '      code: "#define TRACE 1"', "      indent: none");
    const out = weave("    // TC001 STEP1 a\n", cat);
    expect(out.text).toBe(`    // TC001 STEP1 a\n#define TRACE 1  ${TAG}\n`);
  });

  test("markers for other comment prefixes are ignored", () => {
    const cat = catalogOf("TC001:", "  STEP1:", '    a: "a();"');
    const text = "# TC001 STEP1 a\n/* TC001 STEP1 a */\n";
    const out = weave(text, cat);
    expect(out.text).toBe(text);
    expect(out.results).toEqual([]);
  });

  test("replaces an injected block indented differently from its marker", () => {
    const cat = catalogOf("TC001:", "  STEP1:", '    a: "a();"');
    const out = weave(`  // TC001 STEP1 a\nold();  ${TAG}\n`, cat);
    expect(out.text).toBe(`  // TC001 STEP1 a\n  a();  ${TAG}\n`);
    expect(out.conflict).toBeNull();
    expect(out.results[0]?.result).toEqual({ status: "replaced_existing", removed: 1, lines: 1 });
  });

  test("a split injected block withdraws every change in the file", () => {
    const cat = catalogOf("TC001:", "  STEP1:", '    a: "a();"', '    b: "b();"');
    const text = [
      "void f(void) {",
      "  // TC001 STEP1 a",
      "  // TC001 STEP1 b",
      `  b_old();  ${TAG}`,
      "  manual();",
      `  stray();  ${TAG}`,
      "}",
      "",
    ].join("\n");
    const out = weave(text, cat);
    expect(out.text).toBe(text);
    expect(out.changed).toBe(false);
    expect(out.conflict?.kind).toBe("conflict");
    expect(out.conflict?.line).toBe(3);
    expect(out.results.map((r) => r.result)).toEqual([
      { status: "failed", reason: "not applied: file left unmodified (conflict at line 3)" },
      { status: "failed", reason: "injected block for TC001 STEP1 b is split or truncated (stray injected line 6)" },
    ]);
  });

  test("weaves markers whose segment name is not ASCII", () => {
    const cat = catalogOf("TC001:", "  STEP1:", '    初始化: "init_counters();"');
    const out = weave("  // TC001 STEP1 初始化\n", cat);
    expect(out.text).toBe(`  // TC001 STEP1 初始化\n  init_counters();  ${TAG}\n`);
  });

  test("a stray injected line before the next marker is a conflict", () => {
    const cat = catalogOf("TC001:", "  STEP1:", '    a: "a2();"');
    const text = [
      "  // TC001 STEP1 a",
      `  a();  ${TAG}`,
      "  manual();",
      `  more();  ${TAG}`,
      "",
    ].join("\n");
    const out = weave(text, cat);
    expect(out.text).toBe(text);
    expect(out.conflict?.line).toBe(1);
    expect(out.results[0]?.result).toEqual({
      status: "failed",
      reason: "injected block for TC001 STEP1 a is split or truncated (stray injected line 4)",
    });
  });

  test("never removes lines that do not carry the sentinel", () => {
    const cat = catalogOf("TC001:", "  STEP1:", '    a: "new();"');
    const text = ["  // TC001 STEP1 a", "  old();  // not injected", "  keep();", ""].join("\n");
    const out = weave(text, cat);
    expect(out.text).toBe(["  // TC001 STEP1 a", `  new();  ${TAG}`, "  old();  // not injected", "  keep();", ""].join("\n"));
  });

  test("honours a custom sentinel and comment prefix", () => {
    const cat = catalogOf("TC001:", "  STEP1:", '    a: "stub_step()"');
    const opts: WeaveOptions = { commentPrefix: "#", sentinel: "stub", indent: "marker" };
    const out = weave("def f():\n    # TC001 STEP1 a\n    pass\n", cat, opts, "f.py");
    expect(out.text).toBe("def f():\n    # TC001 STEP1 a\n    stub_step()  # stub\n    pass\n");
  });
});
