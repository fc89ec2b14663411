import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { appendJsonLine, writeFileAtomic, writeJsonAtomic } from "./atomicWrite.js";

describe("shared/atomicWrite", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "cadence-write-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("should create parent directories and leave no temp files", () => {
    const target = path.join(dir, "nested", "out.txt");

    writeFileAtomic(target, "hello");
    writeFileAtomic(target, "world");

    assert.equal(fs.readFileSync(target, "utf-8"), "world");
    assert.deepEqual(fs.readdirSync(path.dirname(target)), ["out.txt"]);
  });

  it("should write indented JSON with a trailing newline", () => {
    const target = path.join(dir, "state.json");

    writeJsonAtomic(target, { a: 1 });

    assert.equal(fs.readFileSync(target, "utf-8"), '{\n  "a": 1\n}\n');
  });

  it("should append one JSON document per line", () => {
    const target = path.join(dir, "log.jsonl");

    appendJsonLine(target, { n: 1 });
    appendJsonLine(target, { n: 2 });

    assert.equal(fs.readFileSync(target, "utf-8"), '{"n":1}\n{"n":2}\n');
  });
});
