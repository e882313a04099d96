import { EngineConfig } from "./config.js";
import {
  ALERT_CATEGORIES,
  AlertCategory,
  CategoryState,
  CategoryStates,
  FocusEvent,
  PenaltyMap,
  Severity,
  SignalRecord,
} from "./schema.js";

export const CATEGORY_SEVERITY: Readonly<Record<AlertCategory, Severity>> = Object.freeze({
  device: "ALERT",
  no_face: "WARNING",
  multi_face: "ALERT",
  gaze_away: "INFO",
  audio: "WARNING",
});

export type DedupInput = {
  timestamp: number;
  penalties: Readonly<PenaltyMap>;
  signal: SignalRecord;
  score: number;
};

/**
 * One QUIET -> FIRING -> COOLDOWN state machine per category, all sharing the
 * same transition rule. A condition still present when its window elapses
 * fires again, so a sustained condition is logged once per cooldown_window.
 */
export class AlertDeduplicator {
  private states: CategoryStates = initialStates();

  constructor(private readonly config: Pick<EngineConfig, "cooldown_window">) {}

  evaluate(input: DedupInput): FocusEvent[] {
    const events: FocusEvent[] = [];
    for (const category of ALERT_CATEGORIES) {
      const raw = input.penalties[category];
      const { state, fired } = this.step(this.states[category], raw, input.timestamp);
      this.states[category] = state;
      if (fired) {
        events.push(
          Object.freeze({
            timestamp: input.timestamp,
            category,
            severity: CATEGORY_SEVERITY[category],
            message: describeEvent(category, input.signal),
            score_at_event: input.score,
          })
        );
      }
    }
    return events;
  }

  getStates(): CategoryStates {
    const out = initialStates();
    for (const category of ALERT_CATEGORIES) out[category] = { ...this.states[category] };
    return out;
  }

  // Live view for per-frame readers; getStates() for a detached copy.
  statesView(): Readonly<CategoryStates> {
    return this.states;
  }

  cooldownRemaining(category: AlertCategory, timestamp: number): number {
    const last = this.states[category].last_fired_at;
    if (last === null) return 0;
    return Math.max(0, this.config.cooldown_window - (timestamp - last));
  }

  private step(state: CategoryState, raw: number, timestamp: number): { state: CategoryState; fired: boolean } {
    const active = raw > 0;
    const windowElapsed =
      state.last_fired_at === null || timestamp - state.last_fired_at >= this.config.cooldown_window;

    if (state.phase === "COOLDOWN" && windowElapsed && !active) {
      return { state: { phase: "QUIET", last_fired_at: state.last_fired_at, active }, fired: false };
    }
    if (active && windowElapsed) {
      // FIRING is transient: the event is emitted and the category enters COOLDOWN in one frame.
      return { state: { phase: "COOLDOWN", last_fired_at: timestamp, active }, fired: true };
    }
    return { state: { ...state, active }, fired: false };
  }
}

export function describeEvent(category: AlertCategory, signal: SignalRecord): string {
  switch (category) {
    case "device": {
      const kind = signal.device_type ?? "device";
      return `Device detected: ${kind} (${Math.round(signal.device_confidence * 100)}%)`;
    }
    case "no_face":
      return "No face detected";
    case "multi_face":
      return `Multiple people detected (${signal.face_count} faces)`;
    case "gaze_away": {
      const yaw = signal.head_pose?.yaw;
      if (signal.gaze_direction !== "FORWARD" && signal.gaze_direction !== "UNKNOWN") {
        return `Looking away (gaze ${signal.gaze_direction})`;
      }
      return yaw != null ? `Looking away (yaw ${Math.round(yaw)}°)` : "Looking away";
    }
    case "audio":
      return "Voice activity detected";
  }
}

function initialStates(): CategoryStates {
  const quiet = (): CategoryState => ({ phase: "QUIET", last_fired_at: null, active: false });
  return {
    device: quiet(),
    no_face: quiet(),
    multi_face: quiet(),
    gaze_away: quiet(),
    audio: quiet(),
  };
}
