import { EngineConfig } from "./config.js";
import { ALERT_CATEGORIES, CategoryStates, PenaltyMap, SignalRecord } from "./schema.js";

export type PenaltyConfig = Pick<EngineConfig, "penalties" | "yaw_threshold" | "device_confidence_threshold">;

/** Raw per-category penalty for one frame. The default rules ignore category state. */
export function penalty(
  signal: SignalRecord,
  _categoryStates: Readonly<CategoryStates> | null,
  config: PenaltyConfig
): PenaltyMap {
  const w = config.penalties;
  return {
    device: isDeviceVisible(signal, config) ? w.device : 0,
    no_face: signal.face_detected ? 0 : w.no_face,
    multi_face: signal.face_count > 1 ? w.multi_face : 0,
    gaze_away: isLookingAway(signal, config) ? w.gaze_away : 0,
    audio: signal.audio_anomaly && signal.audio_type === "VOICE" ? w.audio : 0,
  };
}

export function totalPenalty(penalties: Readonly<PenaltyMap>): number {
  let sum = 0;
  for (const category of ALERT_CATEGORIES) sum += penalties[category];
  return Math.min(100, sum);
}

export function isDeviceVisible(signal: SignalRecord, config: Pick<EngineConfig, "device_confidence_threshold">): boolean {
  return signal.device_detected && signal.device_confidence >= config.device_confidence_threshold;
}

export function isLookingAway(signal: SignalRecord, config: Pick<EngineConfig, "yaw_threshold">): boolean {
  const yaw = signal.head_pose?.yaw;
  if (yaw != null && Math.abs(yaw) > config.yaw_threshold) return true;
  return signal.gaze_direction !== "FORWARD" && signal.gaze_direction !== "UNKNOWN";
}
