import { describe, it, expect } from "vitest";
import { InvalidSignal } from "./errors.js";
import { parseSignalRecord } from "./signal.js";

const minimal = {
  timestamp: 1.5,
  face_detected: true,
  face_count: 1,
  gaze_direction: "forward",
  device_detected: false,
  audio_anomaly: false,
};

describe("parseSignalRecord", () => {
  it("fills optional fields and normalizes enums", () => {
    expect(parseSignalRecord(minimal)).toEqual({
      timestamp: 1.5,
      face_detected: true,
      face_count: 1,
      gaze_direction: "FORWARD",
      head_pose: null,
      device_detected: false,
      device_type: null,
      device_confidence: 0,
      audio_anomaly: false,
      audio_type: null,
    });
  });

  it("keeps a partial head pose", () => {
    const signal = parseSignalRecord({ ...minimal, head_pose: { yaw: 42.5 } });
    expect(signal.head_pose).toEqual({ pitch: null, yaw: 42.5, roll: null });
  });

  it("reads device and audio details", () => {
    const signal = parseSignalRecord({
      ...minimal,
      device_detected: true,
      device_type: " cell phone ",
      device_confidence: 0.82,
      audio_anomaly: true,
      audio_type: "voice",
    });
    expect(signal.device_type).toBe("cell phone");
    expect(signal.device_confidence).toBe(0.82);
    expect(signal.audio_type).toBe("VOICE");
  });

  it("defaults a missing gaze to UNKNOWN", () => {
    const { gaze_direction: _omit, ...rest } = minimal;
    expect(parseSignalRecord(rest).gaze_direction).toBe("UNKNOWN");
  });

  const rejected: Array<[unknown, string]> = [
    [null, "record"],
    [{ ...minimal, timestamp: "1.5" }, "timestamp"],
    [{ ...minimal, face_detected: 1 }, "face_detected"],
    [{ ...minimal, face_count: -2 }, "face_count"],
    [{ ...minimal, gaze_direction: "sideways" }, "gaze_direction"],
    [{ ...minimal, head_pose: { yaw: "left" } }, "head_pose.yaw"],
    [{ ...minimal, head_pose: 12 }, "head_pose"],
    [{ ...minimal, device_confidence: 2 }, "device_confidence"],
    [{ ...minimal, device_type: 7 }, "device_type"],
    [{ ...minimal, audio_type: "music" }, "audio_type"],
  ];

  it.each(rejected)("rejects %j with the offending field", (value, field) => {
    try {
      parseSignalRecord(value);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidSignal);
      if (err instanceof InvalidSignal) {
        expect(err.code).toBe("invalid_signal");
        expect(err.details.field).toBe(field);
      }
    }
  });
});
