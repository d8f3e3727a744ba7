// Lightweight, opt-in debug logging for the terminal + tests

// Topics are enabled through the TERMTRIS_DEBUG environment variable:
// - "true", "1", "on" or "*" enables every topic
// - a comma list enables only those topics, e.g. TERMTRIS_DEBUG=engine,store
// Output goes to stderr so it never lands inside a rendered frame.

export const DEBUG_ENV_VAR = "TERMTRIS_DEBUG" as const;

export function parseDebugTopics(raw: string | undefined): ReadonlyArray<string> {
  if (raw === undefined) return [];
  const v = raw.trim().toLowerCase();
  if (v === "") return [];
  if (v === "1" || v === "true" || v === "on") return ["*"];
  return v
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function readEnvTopics(): ReadonlyArray<string> {
  return parseDebugTopics(process.env[DEBUG_ENV_VAR]);
}

export function isDebugEnabled(topic?: string): boolean {
  const topics = readEnvTopics();
  if (topics.length === 0) return false;
  if (topics.includes("*")) return true;
  if (topic !== undefined) return topics.includes(topic);
  return true;
}

export function debugLog(topic: string, message: string, data?: unknown): void {
  if (!isDebugEnabled(topic)) return;
  if (data !== undefined) {
    console.warn(`[DBG:${topic}] ${message}`, data);
  } else {
    console.warn(`[DBG:${topic}] ${message}`);
  }
}
