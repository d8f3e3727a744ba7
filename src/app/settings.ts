// Settings: defaults, the JSON settings file, and CLI overrides
// Concerned only with the file shape and conversion to GameSettings

import { readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

import {
  DEFAULT_SPEED_POLICY,
  type SpeedPolicy,
} from "../engine/scoring/speed";
import { DEFAULT_MAX_ENTRIES } from "../highscores/table";
import { debugLog } from "../utils/debug";

export const SETTINGS_ENV_VAR = "TERMTRIS_SETTINGS" as const;

export type GameSettings = Readonly<{
  /** Driver loop interval; input is sampled once per tick. */
  tickMs: number;
  speed: SpeedPolicy;
  previewCount: number;
  maxHighScores: number;
  highScorePath: string;
  playerName: string;
  /** Empty seed means a fresh random seed per game. */
  seed: string;
  color: boolean;
}>;

export function defaultDataDir(): string {
  return join(homedir(), ".termtris");
}

export const DEFAULT_SETTINGS: GameSettings = {
  color: true,
  highScorePath: join(defaultDataDir(), "highscores.txt"),
  maxHighScores: DEFAULT_MAX_ENTRIES,
  playerName: "",
  previewCount: 1,
  seed: "",
  speed: DEFAULT_SPEED_POLICY,
  tickMs: 16,
};

export function defaultSettingsPath(): string {
  return process.env[SETTINGS_ENV_VAR] ?? join(defaultDataDir(), "settings.json");
}

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function isPositiveNumber(x: unknown): x is number {
  return typeof x === "number" && Number.isFinite(x) && x > 0;
}

function isCount(x: unknown): x is number {
  return typeof x === "number" && Number.isInteger(x) && x >= 0;
}

function isBoolean(x: unknown): x is boolean {
  return typeof x === "boolean";
}

function isString(x: unknown): x is string {
  return typeof x === "string";
}

function extractSpeed(u: unknown): Partial<SpeedPolicy> {
  if (!isRecord(u)) return {};
  const out: Partial<Mutable<SpeedPolicy>> = {};
  for (const k of ["baseMs", "stepMs", "threshold", "minMs"] as const) {
    const v = u[k];
    if (isPositiveNumber(v)) out[k] = v;
  }
  return out;
}

/**
 * Keep only fields with the right type; everything else is dropped.
 */
export function extractSettings(store: unknown): Partial<GameSettings> {
  if (!isRecord(store)) return {};
  const out: Partial<Mutable<GameSettings>> = {};

  const tickMs = store["tickMs"];
  if (isPositiveNumber(tickMs)) out.tickMs = tickMs;

  for (const k of ["previewCount", "maxHighScores"] as const) {
    const v = store[k];
    if (isCount(v)) out[k] = v;
  }
  for (const k of ["highScorePath", "playerName", "seed"] as const) {
    const v = store[k];
    if (isString(v)) out[k] = v;
  }
  const color = store["color"];
  if (isBoolean(color)) out.color = color;

  const speed = extractSpeed(store["speed"]);
  if (Object.keys(speed).length > 0) {
    out.speed = { ...DEFAULT_SPEED_POLICY, ...speed };
  }
  return out;
}

export function mergeSettings(
  base: GameSettings,
  ...overrides: ReadonlyArray<Partial<GameSettings>>
): GameSettings {
  let merged = base;
  for (const o of overrides) {
    merged = {
      ...merged,
      ...o,
      speed: { ...merged.speed, ...(o.speed ?? {}) },
    };
  }
  return merged;
}

/**
 * Read the settings file. A missing or unparsable file yields defaults.
 */
export function loadSettings(path: string = defaultSettingsPath()): GameSettings {
  let raw: string;
  try {
    raw = readFileSync(path, "utf8");
  } catch {
    debugLog("settings", `no settings file at ${path}, using defaults`);
    return DEFAULT_SETTINGS;
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return mergeSettings(DEFAULT_SETTINGS, extractSettings(parsed));
  } catch (e) {
    debugLog("settings", `ignoring invalid settings file ${path}`, e);
    return DEFAULT_SETTINGS;
  }
}
