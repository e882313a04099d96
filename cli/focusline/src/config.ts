import { existsSync, readFileSync } from "node:fs";
import { ConfigurationError } from "./errors.js";
import { ALERT_CATEGORIES, AlertCategory, PenaltyMap } from "./schema.js";
import { deepFreeze, isRecord, safeJsonParse, stripBom } from "./util.js";

export type EngineConfig = {
  penalties: PenaltyMap;
  alpha: number;
  recovery_seconds: number;
  assumed_fps: number;
  // Per-frame recovery step; derived from recovery_seconds and assumed_fps unless set.
  recovery_rate: number;
  cooldown_window: number;
  report_bucket_seconds: number;
  yaw_threshold: number;
  device_confidence_threshold: number;
  timeline_interval_seconds: number;
  timeline_max_points: number;
};

export type EngineConfigPatch = {
  penalties?: Partial<PenaltyMap>;
  alpha?: number;
  recovery_seconds?: number;
  assumed_fps?: number;
  recovery_rate?: number | null;
  cooldown_window?: number;
  report_bucket_seconds?: number;
  yaw_threshold?: number;
  device_confidence_threshold?: number;
  timeline_interval_seconds?: number;
  timeline_max_points?: number;
};

export const DEFAULT_PENALTIES: Readonly<PenaltyMap> = Object.freeze({
  device: 30,
  no_face: 20,
  multi_face: 15,
  gaze_away: 15,
  audio: 10,
});

type NumberRule = {
  min: number;
  max: number;
  minExclusive?: boolean;
  integer?: boolean;
};

const RULES = {
  alpha: { min: 0, max: 1, minExclusive: true },
  recovery_seconds: { min: 0, max: 86_400, minExclusive: true },
  assumed_fps: { min: 0, max: 1000, minExclusive: true },
  recovery_rate: { min: 0, max: 100, minExclusive: true },
  cooldown_window: { min: 0, max: 86_400 },
  report_bucket_seconds: { min: 0, max: 86_400, minExclusive: true },
  yaw_threshold: { min: 0, max: 180 },
  device_confidence_threshold: { min: 0, max: 1 },
  timeline_interval_seconds: { min: 0, max: 86_400 },
  timeline_max_points: { min: 0, max: Number.MAX_SAFE_INTEGER, integer: true },
} satisfies Record<string, NumberRule>;

const KNOWN_KEYS = new Set<string>(["penalties", ...Object.keys(RULES)]);

export function resolveConfig(patch: EngineConfigPatch = {}): EngineConfig {
  return parseConfig(patch);
}

export function parseConfig(value: unknown): EngineConfig {
  if (!isRecord(value)) {
    throw new ConfigurationError("config", "must be an object", value);
  }
  for (const key of Object.keys(value)) {
    if (!KNOWN_KEYS.has(key)) throw new ConfigurationError(key, "unknown option");
  }

  const recoverySeconds = readNumber(value, "recovery_seconds", 10);
  const assumedFps = readNumber(value, "assumed_fps", 30);
  const explicitRate = value.recovery_rate;
  const recoveryRate =
    explicitRate === undefined || explicitRate === null
      ? 100 / (recoverySeconds * assumedFps)
      : readNumber(value, "recovery_rate", 0);

  const config: EngineConfig = {
    penalties: readPenalties(value.penalties),
    alpha: readNumber(value, "alpha", 0.3),
    recovery_seconds: recoverySeconds,
    assumed_fps: assumedFps,
    recovery_rate: recoveryRate,
    cooldown_window: readNumber(value, "cooldown_window", 3),
    report_bucket_seconds: readNumber(value, "report_bucket_seconds", 60),
    yaw_threshold: readNumber(value, "yaw_threshold", 30),
    device_confidence_threshold: readNumber(value, "device_confidence_threshold", 0.5),
    timeline_interval_seconds: readNumber(value, "timeline_interval_seconds", 1),
    timeline_max_points: readNumber(value, "timeline_max_points", 0),
  };
  checkNumber("recovery_rate", config.recovery_rate, RULES.recovery_rate);
  return deepFreeze(config);
}

export function loadConfigFile(configPath: string): EngineConfig {
  if (!existsSync(configPath)) {
    return resolveConfig();
  }
  const parsed = safeJsonParse(stripBom(readFileSync(configPath, "utf8")));
  if (!parsed.ok) {
    throw new ConfigurationError("config", `malformed JSON in ${configPath}: ${parsed.error}`);
  }
  return parseConfig(parsed.value);
}

function readPenalties(raw: unknown): PenaltyMap {
  if (raw === undefined) return { ...DEFAULT_PENALTIES };
  if (!isRecord(raw)) throw new ConfigurationError("penalties", "must be an object", raw);
  const out: PenaltyMap = { ...DEFAULT_PENALTIES };
  for (const key of Object.keys(raw)) {
    if (!isCategory(key)) throw new ConfigurationError(`penalties.${key}`, "unknown category");
    const value = raw[key];
    checkNumber(`penalties.${key}`, value, { min: 0, max: 100 });
    out[key] = value;
  }
  return out;
}

function readNumber(source: Record<string, unknown>, key: keyof typeof RULES, fallback: number): number {
  const value = source[key];
  if (value === undefined) return fallback;
  checkNumber(key, value, RULES[key]);
  return value;
}

function checkNumber(field: string, value: unknown, rule: NumberRule): asserts value is number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ConfigurationError(field, "must be a finite number", value);
  }
  if (rule.integer && !Number.isInteger(value)) {
    throw new ConfigurationError(field, "must be an integer", value);
  }
  const belowMin = rule.minExclusive ? value <= rule.min : value < rule.min;
  if (belowMin || value > rule.max) {
    const lower = rule.minExclusive ? `(${rule.min}` : `[${rule.min}`;
    throw new ConfigurationError(field, `must be in ${lower}, ${rule.max}]`, value);
  }
}

function isCategory(key: string): key is AlertCategory {
  return ALERT_CATEGORIES.some((category) => category === key);
}

export const DEFAULT_CONFIG: Readonly<EngineConfig> = resolveConfig();
