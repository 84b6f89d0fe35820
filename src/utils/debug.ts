// Lightweight, opt-in debug logging utilities for Node + tests

// Topics can be enabled via:
// - env var PILEFALL_DEBUG with values: "true", "1", "on", or a comma list of topics
//   e.g. PILEFALL_DEBUG=shape,board
// - globalThis.__PILEFALL_DEBUG__ = { on: true } or { shape: true, board: true }

type DebugConfig = { on?: boolean } & Record<string, boolean | undefined>;

export const DEBUG_GLOBAL = "__PILEFALL_DEBUG__" as const;
const DEBUG_TOPICS = ["shape", "board", "settings"] as const;
export type DebugTopic = (typeof DEBUG_TOPICS)[number];

function isObject(u: unknown): u is Record<string, unknown> {
  return typeof u === "object" && u !== null;
}

function readGlobalDebug(): DebugConfig | null {
  const g: unknown = Reflect.get(globalThis, DEBUG_GLOBAL);
  if (!isObject(g)) return null;
  const cfg: DebugConfig = { on: g["on"] === true };
  for (const k of DEBUG_TOPICS) {
    cfg[k] = g[k] === true;
  }
  return cfg;
}

export function parseDebugTopics(raw: string | undefined): ReadonlyArray<string> {
  if (raw === undefined) return [];
  const v = raw.trim().toLowerCase();
  if (v === "1" || v === "true" || v === "on") return ["*"];
  return v
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

export function isDebugEnabled(topic?: DebugTopic): boolean {
  const globalCfg = readGlobalDebug();
  if (globalCfg !== null && globalCfg.on === true) return true;
  if (topic !== undefined && globalCfg !== null && globalCfg[topic] === true) {
    return true;
  }
  const topics = parseDebugTopics(process.env["PILEFALL_DEBUG"]);
  if (topics.length === 0) return false;
  if (topics.includes("*")) return true;
  if (topic !== undefined) return topics.includes(topic);
  return true;
}

export function debugLog(
  topic: DebugTopic,
  message: string,
  data?: unknown,
): void {
  if (!isDebugEnabled(topic)) return;
  if (data !== undefined) {
    console.warn(`[DBG:${topic}] ${message}`, data);
  } else {
    console.warn(`[DBG:${topic}] ${message}`);
  }
}
