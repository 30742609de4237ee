/**
 * Tests for sublisp check command behavior.
 */
import { describe, it, beforeEach, afterEach } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { runCheck } from "./cmd-check.js";

async function captureCheck(
  file: string,
  opts: { pretty?: boolean }
): Promise<{ code: number; stdout: string; stderr: string }> {
  const out: string[] = [];
  const err: string[] = [];
  const origLog = console.log;
  const origError = console.error;
  console.log = (...args: unknown[]) => out.push(args.map(String).join(" "));
  console.error = (...args: unknown[]) => err.push(args.map(String).join(" "));

  try {
    const code = await runCheck(file, opts);
    return { code, stdout: out.join("\n"), stderr: err.join("\n") };
  } finally {
    console.log = origLog;
    console.error = origError;
  }
}

describe("sublisp check", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "sublisp-cli-check-test-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  const writeProgram = (source: string): string => {
    const filePath = path.join(tmpDir, "program.scm");
    fs.writeFileSync(filePath, source, "utf-8");
    return filePath;
  };

  it("prints [] on success by default", async () => {
    const result = await captureCheck(writeProgram("((lambda (x) (car x)) '(1 2))\n"), {});
    assert.equal(result.code, 0);
    assert.equal(result.stdout, "[]");
    assert.equal(result.stderr, "");
  });

  it("prints pretty success output with --pretty", async () => {
    const result = await captureCheck(writeProgram("'(anything at all)\n"), { pretty: true });
    assert.equal(result.code, 0);
    assert.equal(result.stdout, "No errors found.");
  });

  it("does not evaluate the program", async () => {
    const result = await captureCheck(writeProgram("(car '())\n"), {});
    assert.equal(result.code, 0);
  });

  it("reports shape errors as JSON", async () => {
    const result = await captureCheck(writeProgram("(if #t 1)\n"), {});
    assert.equal(result.code, 2);
    const diags: Array<{ code: string; span?: { startLine: number } }> = JSON.parse(result.stderr);
    assert.equal(diags.length, 1);
    assert.equal(diags[0].code, "E_IF_SHAPE");
    assert.equal(diags[0].span?.startLine, 1);
  });

  it("reports errors with location and hint under --pretty", async () => {
    const filePath = writeProgram("(lambda (x x) x)\n");
    const result = await captureCheck(filePath, { pretty: true });
    assert.equal(result.code, 2);
    assert.equal(
      result.stderr,
      `error[E_DUP_PARAM]: Duplicate parameter 'x'.\n  --> ${filePath}:1:1\n  hint: Give each parameter a distinct name.`
    );
  });

  it("reports unbalanced input as a read error", async () => {
    const result = await captureCheck(writeProgram("(car '(1 2)"), {});
    assert.equal(result.code, 2);
    assert.ok(result.stderr.includes('"code":"E_PARSE"'));
  });

  it("returns exit code 4 with E_IO on file read failure", async () => {
    const result = await captureCheck(path.join(tmpDir, "missing.scm"), {});
    assert.equal(result.code, 4);
    assert.ok(result.stderr.includes('"code":"E_IO"'));
  });
});
