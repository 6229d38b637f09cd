// Lightweight, opt-in debug logging utilities for hosts + tests

// Topics are enabled through the INPUT_DEBUG environment variable with values:
// "true", "1", "on", or a comma list of topics
//   e.g. INPUT_DEBUG=bindings,gamepad
// Known topics: "lifecycle", "bindings", "gamepad"

export const DEBUG_ENV_KEY = "INPUT_DEBUG";

type Env = Readonly<Record<string, string | undefined>>;

export type DebugLogger = Readonly<{
  enabled: (topic?: string) => boolean;
  log: (topic: string, message: string, data?: unknown) => void;
  table: (topic: string, label: string, rows: unknown) => void;
}>;

export function parseDebugTopics(
  raw: string | undefined,
): ReadonlyArray<string> {
  if (raw === undefined) return [];
  const v = raw.trim().toLowerCase();
  if (v === "1" || v === "true" || v === "on") return ["*"];
  const parts = v
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
  return parts;
}

function topicEnabled(topics: ReadonlyArray<string>, topic?: string): boolean {
  if (topics.length === 0) return false;
  if (topics.includes("*")) return true;
  if (topic !== undefined) return topics.includes(topic);
  return true;
}

/** Logger bound to a fixed topic list (usually `InputConfig.debugTopics`). */
export function createDebugLogger(topics: ReadonlyArray<string>): DebugLogger {
  return {
    enabled: (topic) => topicEnabled(topics, topic),
    log: (topic, message, data) => {
      if (!topicEnabled(topics, topic)) return;
      if (data !== undefined) {
        console.warn(`[DBG:${topic}] ${message}`, data);
      } else {
        console.warn(`[DBG:${topic}] ${message}`);
      }
    },
    table: (topic, label, rows) => {
      if (!topicEnabled(topics, topic)) return;
      console.warn(`[DBG:${topic}] ${label}`, rows);
    },
  };
}

// Env-backed helpers re-read INPUT_DEBUG on every call

function envLogger(env: Env): DebugLogger {
  return createDebugLogger(parseDebugTopics(env[DEBUG_ENV_KEY]));
}

export function isDebugEnabled(
  topic?: string,
  env: Env = process.env,
): boolean {
  return envLogger(env).enabled(topic);
}

export function debugLog(topic: string, message: string, data?: unknown): void {
  envLogger(process.env).log(topic, message, data);
}

export function debugTable(topic: string, label: string, rows: unknown): void {
  envLogger(process.env).table(topic, label, rows);
}
