import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { readFileSync } from "node:fs";
import { join } from "node:path";
import {
  clearDebugLogs,
  debugEnd,
  debugError,
  debugStart,
  DEBUG_ENV_VAR,
  getDebugLogs,
  isDebugEnabled,
  popParent,
  pushParent,
  reinitDebugMode,
  summarize,
} from "@/utils/debug";
import { readProperties } from "@/skills/loader";
import { validate } from "@/skills/validator";
import { toPrompt } from "@/skills/xml";
import {
  createSkillDir,
  makeTmpDir,
  minimalSkillMd,
  removeTmpDir,
} from "@test/helpers";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Set debug mode and reinitialize */
function setDebugMode(value: string | undefined): void {
  if (value === undefined) {
    delete process.env[DEBUG_ENV_VAR];
  } else {
    process.env[DEBUG_ENV_VAR] = value;
  }
  reinitDebugMode();
}

// ---------------------------------------------------------------------------
// Setup / Teardown
// ---------------------------------------------------------------------------

describe("debug", () => {
  beforeEach(() => {
    setDebugMode("memory");
  });

  afterEach(() => {
    vi.restoreAllMocks();
    setDebugMode(undefined);
  });

  // -------------------------------------------------------------------------
  // isDebugEnabled
  // -------------------------------------------------------------------------

  describe("isDebugEnabled", () => {
    it("returns true for memory mode", () => {
      expect(isDebugEnabled()).toBe(true);
    });

    it("returns true for '1'", () => {
      setDebugMode("1");
      expect(isDebugEnabled()).toBe(true);
    });

    it("returns true for unrecognized values", () => {
      setDebugMode("verbose");
      expect(isDebugEnabled()).toBe(true);
    });

    it("returns false when debug mode is off", () => {
      setDebugMode(undefined);
      expect(isDebugEnabled()).toBe(false);
    });
  });

  // -------------------------------------------------------------------------
  // debugStart / debugEnd / debugError
  // -------------------------------------------------------------------------

  describe("debugStart", () => {
    it("returns sequential IDs per operation", () => {
      expect(debugStart("read")).toBe("read-1");
      expect(debugStart("read")).toBe("read-2");
      expect(debugStart("validate")).toBe("validate-1");
    });

    it("returns empty string when debug is off", () => {
      setDebugMode(undefined);
      expect(debugStart("read", { path: "/skills/pdf" })).toBe("");
      expect(getDebugLogs()).toHaveLength(0);
    });

    it("emits a start event to memory logs", () => {
      const id = debugStart("read", { path: "/skills/pdf" });

      const logs = getDebugLogs();
      expect(logs).toHaveLength(1);
      expect(logs[0]).toMatchObject({
        id,
        operation: "read",
        event: "start",
        input: { path: "/skills/pdf" },
      });
      expect(logs[0].parent).toBeUndefined();
    });

    it("restarts IDs after clearing", () => {
      debugStart("read");
      clearDebugLogs();
      expect(debugStart("read")).toBe("read-1");
    });
  });

  describe("debugEnd", () => {
    it("emits an end event with summary", () => {
      const id = debugStart("validate");
      debugEnd(id, "validate", { summary: { errorCount: 2 }, duration_ms: 7 });

      expect(getDebugLogs()[1]).toMatchObject({
        id,
        operation: "validate",
        event: "end",
        summary: { errorCount: 2 },
        duration_ms: 7,
      });
    });

    it("does nothing with empty id", () => {
      debugEnd("", "validate", { duration_ms: 1 });
      expect(getDebugLogs()).toHaveLength(0);
    });
  });

  describe("debugError", () => {
    it("records Error messages", () => {
      const id = debugStart("read");
      debugError(id, "read", new Error("SKILL.md not found"));

      expect(getDebugLogs()[1]).toMatchObject({
        id,
        event: "error",
        error: "SKILL.md not found",
      });
    });

    it("records non-Error values as strings", () => {
      const id = debugStart("read");
      debugError(id, "read", 42);
      expect(getDebugLogs()[1].error).toBe("42");
    });
  });

  // -------------------------------------------------------------------------
  // Parent stack
  // -------------------------------------------------------------------------

  describe("pushParent / popParent", () => {
    it("sets parent on nested events", () => {
      const outer = debugStart("to-prompt");
      pushParent(outer);
      debugStart("read");
      popParent();
      debugStart("read");

      const logs = getDebugLogs();
      expect(logs[1].parent).toBe("to-prompt-1");
      expect(logs[2].parent).toBeUndefined();
    });

    it("ignores empty ids", () => {
      pushParent("");
      debugStart("read");
      expect(getDebugLogs()[0].parent).toBeUndefined();
    });
  });

  // -------------------------------------------------------------------------
  // summarize
  // -------------------------------------------------------------------------

  describe("summarize", () => {
    it("truncates long strings", () => {
      const result = summarize("x".repeat(1005));
      expect(result).toBe(`${"x".repeat(1000)}... [truncated, 5 more chars]`);
    });

    it("limits arrays to 10 items", () => {
      const result = summarize(Array.from({ length: 12 }, (_, i) => i));
      expect(result).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9, "[2 more items]"]);
    });

    it("stops at deep nesting", () => {
      const deep = { a: { b: { c: { d: { e: { f: { g: 1 } } } } } } };
      expect(summarize(deep)).toEqual({
        a: { b: { c: { d: { e: { f: "[nested object]" } } } } },
      });
    });

    it("passes through primitives", () => {
      expect(summarize(null)).toBeNull();
      expect(summarize(3)).toBe(3);
      expect(summarize(true)).toBe(true);
    });
  });

  // -------------------------------------------------------------------------
  // Output modes
  // -------------------------------------------------------------------------

  describe("output modes", () => {
    it("writes human-readable lines to stderr", () => {
      const write = vi
        .spyOn(process.stderr, "write")
        .mockImplementation(() => true);
      setDebugMode("stderr");

      const id = debugStart("read", { path: "/skills/pdf" });
      debugEnd(id, "read", { summary: { name: "pdf" }, duration_ms: 3 });
      debugError(id, "read", new Error("boom"));

      expect(write.mock.calls.map((call) => call[0])).toEqual([
        '[skills-ref:read] → path="/skills/pdf"\n',
        '[skills-ref:read] ← 3ms name="pdf"\n',
        "[skills-ref:read] ✗ boom\n",
      ]);
    });

    it("writes JSON lines to stderr", () => {
      const write = vi
        .spyOn(process.stderr, "write")
        .mockImplementation(() => true);
      setDebugMode("json");

      debugStart("validate", { path: "/skills/pdf" });

      expect(write).toHaveBeenCalledTimes(1);
      const line = String(write.mock.calls[0][0]);
      expect(line.endsWith("\n")).toBe(true);
      expect(JSON.parse(line)).toMatchObject({
        id: "validate-1",
        operation: "validate",
        event: "start",
        input: { path: "/skills/pdf" },
      });
    });

    it("appends JSON lines to a file", () => {
      const tmpDir = makeTmpDir();
      const tracePath = join(tmpDir, "trace.jsonl");
      try {
        setDebugMode(`file:${tracePath}`);

        const id = debugStart("read");
        debugEnd(id, "read", { duration_ms: 1 });

        const events = readFileSync(tracePath, "utf-8")
          .trim()
          .split("\n")
          .map((line) => JSON.parse(line));
        expect(events.map((e) => e.event)).toEqual(["start", "end"]);
      } finally {
        removeTmpDir(tmpDir);
      }
    });
  });

  // -------------------------------------------------------------------------
  // Skill operations
  // -------------------------------------------------------------------------

  describe("skill operations", () => {
    let tmpDir: string;

    beforeEach(() => {
      tmpDir = makeTmpDir();
    });

    afterEach(() => {
      removeTmpDir(tmpDir);
    });

    it("nests reads under to-prompt", () => {
      const dir = createSkillDir(tmpDir, "pdf", minimalSkillMd("pdf"));

      toPrompt([dir]);

      const logs = getDebugLogs();
      expect(
        logs.map(({ id, event, parent }) => ({ id, event, parent })),
      ).toEqual([
        { id: "to-prompt-1", event: "start", parent: undefined },
        { id: "read-1", event: "start", parent: "to-prompt-1" },
        { id: "read-1", event: "end", parent: undefined },
        { id: "to-prompt-1", event: "end", parent: undefined },
      ]);
      expect(logs[2].summary).toEqual({ name: "pdf" });
      expect(logs[3].summary).toEqual({ skillCount: 1 });
    });

    it("records the validate error count", () => {
      const dir = createSkillDir(tmpDir, "pdf", minimalSkillMd("pdf"));

      validate(dir);

      const logs = getDebugLogs();
      expect(logs).toHaveLength(2);
      expect(logs[1].summary).toEqual({ errorCount: 0 });
    });

    it("records read failures", () => {
      expect(() => readProperties(tmpDir)).toThrow();

      const logs = getDebugLogs();
      expect(logs[1]).toMatchObject({
        id: "read-1",
        event: "error",
        error: `SKILL.md not found in ${tmpDir}`,
      });
    });

    it("closes the to-prompt parent after a failure", () => {
      expect(() => toPrompt([join(tmpDir, "missing")])).toThrow();

      debugStart("read");
      const logs = getDebugLogs();
      expect(logs[logs.length - 1].parent).toBeUndefined();
    });
  });
});
