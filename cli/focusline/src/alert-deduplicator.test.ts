import { describe, it, expect } from "vitest";
import { AlertDeduplicator, describeEvent } from "./alert-deduplicator.js";
import type { PenaltyMap, SignalRecord } from "./schema.js";

const clean: SignalRecord = {
  timestamp: 0,
  face_detected: true,
  face_count: 1,
  gaze_direction: "FORWARD",
  head_pose: { pitch: 0, yaw: 0, roll: 0 },
  device_detected: false,
  device_type: null,
  device_confidence: 0,
  audio_anomaly: false,
  audio_type: null,
};

function penalties(overrides: Partial<PenaltyMap> = {}): PenaltyMap {
  return { device: 0, no_face: 0, multi_face: 0, gaze_away: 0, audio: 0, ...overrides };
}

function evaluate(dedup: AlertDeduplicator, timestamp: number, p: PenaltyMap, signal: SignalRecord = clean) {
  return dedup.evaluate({ timestamp, penalties: p, signal: { ...signal, timestamp }, score: 80 });
}

describe("AlertDeduplicator", () => {
  it("fires once and stays silent inside the cooldown window", () => {
    const dedup = new AlertDeduplicator({ cooldown_window: 3 });
    expect(evaluate(dedup, 0, penalties({ audio: 10 }))).toHaveLength(1);
    expect(evaluate(dedup, 1, penalties({ audio: 10 }))).toHaveLength(0);
    expect(evaluate(dedup, 2.999, penalties({ audio: 10 }))).toHaveLength(0);
    expect(dedup.getStates().audio).toEqual({ phase: "COOLDOWN", last_fired_at: 0, active: true });
  });

  it("fires again once the window has elapsed while the condition persists", () => {
    const dedup = new AlertDeduplicator({ cooldown_window: 3 });
    evaluate(dedup, 0, penalties({ device: 30 }));
    const again = evaluate(dedup, 3, penalties({ device: 30 }));
    expect(again.map((e) => e.timestamp)).toEqual([3]);
    expect(dedup.getStates().device.last_fired_at).toBe(3);
  });

  it("returns to QUIET without an event when the window elapses with no penalty", () => {
    const dedup = new AlertDeduplicator({ cooldown_window: 3 });
    evaluate(dedup, 0, penalties({ no_face: 20 }));
    expect(evaluate(dedup, 1, penalties())).toHaveLength(0);
    expect(dedup.getStates().no_face.phase).toBe("COOLDOWN");
    expect(evaluate(dedup, 3.5, penalties())).toHaveLength(0);
    expect(dedup.getStates().no_face).toEqual({ phase: "QUIET", last_fired_at: 0, active: false });
    expect(evaluate(dedup, 4, penalties({ no_face: 20 }))).toHaveLength(1);
  });

  it("does not re-fire a condition that flickers inside the window", () => {
    const dedup = new AlertDeduplicator({ cooldown_window: 3 });
    const fired = [
      evaluate(dedup, 0, penalties({ multi_face: 15 })),
      evaluate(dedup, 0.5, penalties()),
      evaluate(dedup, 1, penalties({ multi_face: 15 })),
      evaluate(dedup, 1.5, penalties()),
      evaluate(dedup, 2, penalties({ multi_face: 15 })),
    ].flat();
    expect(fired).toHaveLength(1);
  });

  it("orders same-frame events by category priority", () => {
    const dedup = new AlertDeduplicator({ cooldown_window: 3 });
    const events = evaluate(
      dedup,
      0,
      penalties({ audio: 10, gaze_away: 15, multi_face: 15, no_face: 20, device: 30 })
    );
    expect(events.map((e) => e.category)).toEqual(["device", "no_face", "multi_face", "gaze_away", "audio"]);
  });

  it("keeps cooldowns independent per category", () => {
    const dedup = new AlertDeduplicator({ cooldown_window: 3 });
    evaluate(dedup, 0, penalties({ device: 30 }));
    const events = evaluate(dedup, 1, penalties({ device: 30, audio: 10 }));
    expect(events.map((e) => e.category)).toEqual(["audio"]);
    expect(dedup.cooldownRemaining("device", 1)).toBe(2);
    expect(dedup.cooldownRemaining("audio", 1)).toBe(3);
    expect(dedup.cooldownRemaining("gaze_away", 1)).toBe(0);
  });

  it("builds events with severity, message and score", () => {
    const dedup = new AlertDeduplicator({ cooldown_window: 3 });
    const signal: SignalRecord = { ...clean, device_detected: true, device_type: "cell phone", device_confidence: 0.87 };
    const [event] = evaluate(dedup, 12, penalties({ device: 30 }), signal);
    expect(event).toEqual({
      timestamp: 12,
      category: "device",
      severity: "ALERT",
      message: "Device detected: cell phone (87%)",
      score_at_event: 80,
    });
    expect(Object.isFrozen(event)).toBe(true);
  });

  it("exposes live states without copying", () => {
    const dedup = new AlertDeduplicator({ cooldown_window: 3 });
    const view = dedup.statesView();
    expect(dedup.statesView()).toBe(view);
    evaluate(dedup, 0, penalties({ device: 30 }));
    expect(dedup.statesView().device).toEqual({ phase: "COOLDOWN", last_fired_at: 0, active: true });
    expect(dedup.getStates().device).not.toBe(dedup.statesView().device);
  });

  it("fires every frame when the window is zero", () => {
    const dedup = new AlertDeduplicator({ cooldown_window: 0 });
    expect(evaluate(dedup, 0, penalties({ audio: 10 }))).toHaveLength(1);
    expect(evaluate(dedup, 0.1, penalties({ audio: 10 }))).toHaveLength(1);
  });
});

describe("describeEvent", () => {
  it("describes each category", () => {
    expect(describeEvent("no_face", clean)).toBe("No face detected");
    expect(describeEvent("multi_face", { ...clean, face_count: 3 })).toBe("Multiple people detected (3 faces)");
    expect(describeEvent("gaze_away", { ...clean, head_pose: { yaw: -44.6 } })).toBe("Looking away (yaw -45°)");
    expect(describeEvent("gaze_away", { ...clean, gaze_direction: "LEFT" })).toBe("Looking away (gaze LEFT)");
    expect(describeEvent("gaze_away", { ...clean, head_pose: null })).toBe("Looking away");
    expect(describeEvent("device", { ...clean, device_confidence: 0.5 })).toBe("Device detected: device (50%)");
    expect(describeEvent("audio", clean)).toBe("Voice activity detected");
  });
});
