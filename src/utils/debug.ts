/**
 * Debug tracing for skill operations (read, validate, to-prompt, discover).
 *
 * Enable via environment variable:
 * - SKILLS_REF_DEBUG=1 or SKILLS_REF_DEBUG=stderr - Human readable output to stderr
 * - SKILLS_REF_DEBUG=json - JSON lines to stderr
 * - SKILLS_REF_DEBUG=memory - In-memory array (retrieve via getDebugLogs())
 * - SKILLS_REF_DEBUG=file:/path/to/trace.jsonl - Write to file
 */

import { appendFileSync } from "node:fs";

export const DEBUG_ENV_VAR = "SKILLS_REF_DEBUG";

/** Debug event structure for operation tracing */
export interface DebugEvent {
  /** Unique ID to correlate start/end events (e.g., "validate-1") */
  id: string;
  /** Timestamp in milliseconds */
  ts: number;
  /** Operation name */
  operation: string;
  /** Event type */
  event: "start" | "end" | "error";
  /** Input parameters (start events only, summarized) */
  input?: unknown;
  /** Output data (end events only, summarized) */
  output?: unknown;
  /** Key metrics like errorCount, skillCount, etc. */
  summary?: Record<string, unknown>;
  /** Duration in milliseconds (end events only) */
  duration_ms?: number;
  /** Parent event ID for nested operations (e.g., to-prompt → read) */
  parent?: string;
  /** Error message (error events only) */
  error?: string;
}

type DebugMode = "off" | "stderr" | "json" | "memory" | "file";

interface DebugState {
  mode: DebugMode;
  filePath?: string;
  logs: DebugEvent[];
  counters: Map<string, number>;
  parentStack: string[];
}

const state: DebugState = {
  mode: "off",
  logs: [],
  counters: new Map(),
  parentStack: [],
};

// Truncation limits
const MAX_STRING_LENGTH = 1000;
const MAX_ARRAY_ITEMS = 10;

function initDebugMode(): void {
  const envValue = process.env[DEBUG_ENV_VAR];
  state.filePath = undefined;

  if (!envValue) {
    state.mode = "off";
    return;
  }

  if (envValue === "1" || envValue === "stderr") {
    state.mode = "stderr";
  } else if (envValue === "json") {
    state.mode = "json";
  } else if (envValue === "memory") {
    state.mode = "memory";
  } else if (envValue.startsWith("file:")) {
    state.mode = "file";
    state.filePath = envValue.slice(5);
  } else {
    // Unrecognized values fall back to human-readable
    state.mode = "stderr";
  }
}

initDebugMode();

/**
 * Checks if debug mode is enabled (any mode except "off").
 */
export function isDebugEnabled(): boolean {
  return state.mode !== "off";
}

function generateId(operation: string): string {
  const count = (state.counters.get(operation) ?? 0) + 1;
  state.counters.set(operation, count);
  return `${operation}-${count}`;
}

function truncateString(str: string): string {
  if (str.length <= MAX_STRING_LENGTH) return str;
  return `${str.slice(0, MAX_STRING_LENGTH)}... [truncated, ${str.length - MAX_STRING_LENGTH} more chars]`;
}

/**
 * Summarize data for debug output.
 * - Truncates strings to 1000 chars
 * - Limits arrays to 10 items
 * - Recursively summarizes nested objects
 */
export function summarize(data: unknown, depth = 0): unknown {
  if (depth > 5) return "[nested object]";

  if (data === null || data === undefined) return data;

  if (typeof data === "string") {
    return truncateString(data);
  }

  if (typeof data === "number" || typeof data === "boolean") {
    return data;
  }

  if (Array.isArray(data)) {
    const truncated = data.length > MAX_ARRAY_ITEMS;
    const items = data
      .slice(0, MAX_ARRAY_ITEMS)
      .map((item: unknown) => summarize(item, depth + 1));
    if (truncated) {
      return [...items, `[${data.length - MAX_ARRAY_ITEMS} more items]`];
    }
    return items;
  }

  if (typeof data === "object") {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      result[key] = summarize(value, depth + 1);
    }
    return result;
  }

  return String(data);
}

function emitEvent(event: DebugEvent): void {
  switch (state.mode) {
    case "off":
      return;

    case "memory":
      state.logs.push(event);
      return;

    case "json":
      process.stderr.write(`${JSON.stringify(event)}\n`);
      return;

    case "file":
      if (state.filePath) {
        appendFileSync(state.filePath, `${JSON.stringify(event)}\n`);
      }
      return;

    case "stderr":
      formatHumanReadable(event);
      return;
  }
}

function formatPairs(record: Record<string, unknown>, limit?: number): string {
  const pairs = Object.entries(record).map(
    ([k, v]) => `${k}=${JSON.stringify(v)}`,
  );
  return (limit === undefined ? pairs : pairs.slice(0, limit)).join(" ");
}

function formatHumanReadable(event: DebugEvent): void {
  const indent = "  ".repeat(state.parentStack.length);
  const prefix = `${indent}[skills-ref:${event.operation}]`;

  if (event.event === "start") {
    const input =
      typeof event.input === "object" && event.input !== null
        ? formatPairs(Object.fromEntries(Object.entries(event.input)), 3)
        : "";
    process.stderr.write(`${prefix} → ${input}\n`);
  } else if (event.event === "end") {
    const summary = event.summary ? formatPairs(event.summary) : "";
    process.stderr.write(`${prefix} ← ${event.duration_ms}ms ${summary}\n`);
  } else {
    process.stderr.write(`${prefix} ✗ ${event.error}\n`);
  }
}

/**
 * Record the start of an operation.
 * @returns Event ID to correlate with debugEnd/debugError ("" when debug is off)
 */
export function debugStart(
  operation: string,
  input?: Record<string, unknown>,
): string {
  if (state.mode === "off") return "";

  const id = generateId(operation);
  const parent =
    state.parentStack.length > 0
      ? state.parentStack[state.parentStack.length - 1]
      : undefined;

  emitEvent({
    id,
    ts: Date.now(),
    operation,
    event: "start",
    input: input ? summarize(input) : undefined,
    parent,
  });
  return id;
}

/**
 * Record the successful end of an operation.
 */
export function debugEnd(
  id: string,
  operation: string,
  options: {
    output?: unknown;
    summary?: Record<string, unknown>;
    duration_ms: number;
  },
): void {
  if (state.mode === "off" || !id) return;

  emitEvent({
    id,
    ts: Date.now(),
    operation,
    event: "end",
    output: options.output ? summarize(options.output) : undefined,
    summary: options.summary,
    duration_ms: options.duration_ms,
  });
}

/**
 * Record an error during an operation.
 */
export function debugError(
  id: string,
  operation: string,
  error: unknown,
): void {
  if (state.mode === "off" || !id) return;

  emitEvent({
    id,
    ts: Date.now(),
    operation,
    event: "error",
    error: error instanceof Error ? error.message : String(error),
  });
}

/**
 * Push a parent context for nested operations (e.g., to-prompt reading each skill).
 */
export function pushParent(id: string): void {
  if (state.mode === "off" || !id) return;
  state.parentStack.push(id);
}

/**
 * Pop the current parent context.
 */
export function popParent(): void {
  if (state.mode === "off") return;
  state.parentStack.pop();
}

/**
 * Get all debug logs (memory mode only).
 */
export function getDebugLogs(): DebugEvent[] {
  return [...state.logs];
}

/**
 * Clear all debug logs (memory mode).
 */
export function clearDebugLogs(): void {
  state.logs = [];
  state.counters.clear();
  state.parentStack = [];
}

/**
 * Force re-initialization of debug mode from environment.
 */
export function reinitDebugMode(): void {
  clearDebugLogs();
  initDebugMode();
}
