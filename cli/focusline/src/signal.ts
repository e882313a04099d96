import { InvalidSignal } from "./errors.js";
import { AUDIO_TYPES, AudioType, GAZE_DIRECTIONS, GazeDirection, HeadPose, SignalRecord } from "./schema.js";
import { isFiniteNumber, isRecord } from "./util.js";

/**
 * Checks the numeric and enum fields of a record that is already typed as a
 * SignalRecord. Throws InvalidSignal on the first bad field.
 */
export function validateSignal(signal: SignalRecord): void {
  if (!isFiniteNumber(signal.timestamp)) {
    throw new InvalidSignal("timestamp", "must be a finite number", signal.timestamp);
  }
  if (typeof signal.face_detected !== "boolean") {
    throw new InvalidSignal("face_detected", "must be a boolean", signal.face_detected);
  }
  if (!Number.isInteger(signal.face_count) || signal.face_count < 0) {
    throw new InvalidSignal("face_count", "must be a non-negative integer", signal.face_count);
  }
  if (!GAZE_DIRECTIONS.includes(signal.gaze_direction)) {
    throw new InvalidSignal("gaze_direction", "unknown direction", signal.gaze_direction);
  }
  if (signal.head_pose != null) {
    for (const axis of ["pitch", "yaw", "roll"] as const) {
      const angle = signal.head_pose[axis];
      if (angle != null && !isFiniteNumber(angle)) {
        throw new InvalidSignal(`head_pose.${axis}`, "must be a finite number or absent", angle);
      }
    }
  }
  if (typeof signal.device_detected !== "boolean") {
    throw new InvalidSignal("device_detected", "must be a boolean", signal.device_detected);
  }
  if (!isFiniteNumber(signal.device_confidence) || signal.device_confidence < 0 || signal.device_confidence > 1) {
    throw new InvalidSignal("device_confidence", "must be in [0, 1]", signal.device_confidence);
  }
  if (typeof signal.audio_anomaly !== "boolean") {
    throw new InvalidSignal("audio_anomaly", "must be a boolean", signal.audio_anomaly);
  }
  if (signal.audio_type != null && !AUDIO_TYPES.includes(signal.audio_type)) {
    throw new InvalidSignal("audio_type", "unknown audio type", signal.audio_type);
  }
}

/** Builds a SignalRecord from an untrusted JSON value (one replayed line, an API body). */
export function parseSignalRecord(value: unknown): SignalRecord {
  if (!isRecord(value)) {
    throw new InvalidSignal("record", "must be an object", value);
  }
  const signal: SignalRecord = {
    timestamp: requireNumber(value, "timestamp"),
    face_detected: requireBoolean(value, "face_detected"),
    face_count: requireNumber(value, "face_count"),
    gaze_direction: parseGaze(value.gaze_direction),
    head_pose: parseHeadPose(value.head_pose),
    device_detected: requireBoolean(value, "device_detected"),
    device_type: parseOptionalString(value, "device_type"),
    device_confidence: value.device_confidence == null ? 0 : requireNumber(value, "device_confidence"),
    audio_anomaly: requireBoolean(value, "audio_anomaly"),
    audio_type: parseAudioType(value.audio_type),
  };
  validateSignal(signal);
  return signal;
}

function requireNumber(source: Record<string, unknown>, key: string): number {
  const value = source[key];
  if (!isFiniteNumber(value)) throw new InvalidSignal(key, "must be a finite number", value);
  return value;
}

function requireBoolean(source: Record<string, unknown>, key: string): boolean {
  const value = source[key];
  if (typeof value !== "boolean") throw new InvalidSignal(key, "must be a boolean", value);
  return value;
}

function parseOptionalString(source: Record<string, unknown>, key: string): string | null {
  const value = source[key];
  if (value == null) return null;
  if (typeof value !== "string") throw new InvalidSignal(key, "must be a string", value);
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function parseGaze(raw: unknown): GazeDirection {
  if (raw == null) return "UNKNOWN";
  if (typeof raw === "string") {
    const upper = raw.trim().toUpperCase();
    const match = GAZE_DIRECTIONS.find((direction) => direction === upper);
    if (match) return match;
  }
  throw new InvalidSignal("gaze_direction", "unknown direction", raw);
}

function parseAudioType(raw: unknown): AudioType | null {
  if (raw == null) return null;
  if (typeof raw === "string") {
    const upper = raw.trim().toUpperCase();
    const match = AUDIO_TYPES.find((type) => type === upper);
    if (match) return match;
  }
  throw new InvalidSignal("audio_type", "unknown audio type", raw);
}

function parseHeadPose(raw: unknown): HeadPose | null {
  if (raw == null) return null;
  if (!isRecord(raw)) throw new InvalidSignal("head_pose", "must be an object", raw);
  const pose: HeadPose = {};
  for (const axis of ["pitch", "yaw", "roll"] as const) {
    const angle = raw[axis];
    if (angle == null) {
      pose[axis] = null;
      continue;
    }
    if (!isFiniteNumber(angle)) {
      throw new InvalidSignal(`head_pose.${axis}`, "must be a finite number or absent", angle);
    }
    pose[axis] = angle;
  }
  return pose;
}
