// Settings loading: a key/value store holding one JSON document under
// STORAGE_KEY, coerced field by field into EngineSettings

import { type BoardDimensions, DEFAULT_BOARD_DIMENSIONS } from "../engine/core/types";
import { debugLog } from "../utils/debug";

export const STORAGE_KEY = "pilefall" as const;
export const SETTINGS_ENV_VAR = "PILEFALL_SETTINGS" as const;

const BOARD_WIDTH_RANGE = { max: 64, min: 4 } as const;
const BOARD_HEIGHT_RANGE = { max: 128, min: 4 } as const;

export type EngineSettings = {
  readonly board: BoardDimensions;
};

export const DEFAULT_SETTINGS: EngineSettings = {
  board: DEFAULT_BOARD_DIMENSIONS,
};

export type SettingsStore = {
  getItem(key: string): string | null;
};

type PersistedStore = Partial<{
  board: Partial<{ width: number; height: number }>;
}>;

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null;
}

function isInteger(x: unknown): x is number {
  return typeof x === "number" && Number.isInteger(x);
}

function clamp(n: number, range: { min: number; max: number }): number {
  return Math.min(range.max, Math.max(range.min, n));
}

function coerceBoard(u: unknown): PersistedStore["board"] {
  if (!isRecord(u)) return undefined;
  const board: Partial<{ width: number; height: number }> = {};
  const { height, width } = u;
  if (isInteger(width)) board.width = clamp(width, BOARD_WIDTH_RANGE);
  if (isInteger(height)) board.height = clamp(height, BOARD_HEIGHT_RANGE);
  return board;
}

export function parseSettings(raw: unknown): EngineSettings {
  const store: PersistedStore = isRecord(raw)
    ? { board: coerceBoard(raw["board"]) }
    : {};
  return {
    board: {
      height: store.board?.height ?? DEFAULT_SETTINGS.board.height,
      width: store.board?.width ?? DEFAULT_SETTINGS.board.width,
    },
  };
}

// Store backed by environment variables: STORAGE_KEY maps to PILEFALL_SETTINGS
export function envSettingsStore(
  env: Readonly<Record<string, string | undefined>> = process.env,
): SettingsStore {
  return {
    getItem: (key) =>
      key === STORAGE_KEY ? (env[SETTINGS_ENV_VAR] ?? null) : null,
  };
}

export function loadSettings(
  store: SettingsStore = envSettingsStore(),
): EngineSettings {
  const raw = store.getItem(STORAGE_KEY);
  if (raw === null) return DEFAULT_SETTINGS;
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    debugLog("settings", "ignoring malformed settings JSON", err);
    return DEFAULT_SETTINGS;
  }
  return parseSettings(parsed);
}
