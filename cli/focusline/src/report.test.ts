import { describe, it, expect } from "vitest";
import { FocusEngine } from "./focus-engine.js";
import { buildSessionReport, focusStatus, scoreTrend } from "./report.js";
import type { SignalRecord, TimelinePoint } from "./schema.js";

function frame(timestamp: number, overrides: Partial<SignalRecord> = {}): SignalRecord {
  return {
    timestamp,
    face_detected: true,
    face_count: 1,
    gaze_direction: "FORWARD",
    head_pose: null,
    device_detected: false,
    device_type: null,
    device_confidence: 0,
    audio_anomaly: false,
    audio_type: null,
    ...overrides,
  };
}

function points(scores: number[]): TimelinePoint[] {
  return scores.map((score, i) => ({ timestamp: i, score }));
}

describe("focusStatus", () => {
  it("maps scores onto the status bands", () => {
    expect(focusStatus(90)).toEqual({ status: "excellent", label: "Excellent Focus" });
    expect(focusStatus(89.9).status).toBe("good");
    expect(focusStatus(70).status).toBe("good");
    expect(focusStatus(50).status).toBe("fair");
    expect(focusStatus(30).status).toBe("poor");
    expect(focusStatus(29.9)).toEqual({ status: "critical", label: "Critical - Possible Cheating" });
  });
});

describe("scoreTrend", () => {
  it("keeps collecting until more than 20 points exist", () => {
    expect(scoreTrend(points(new Array<number>(20).fill(50)))).toBe("collecting");
  });

  it("compares the later half with the earlier half", () => {
    const low = new Array<number>(10).fill(50);
    const high = new Array<number>(11).fill(80);
    expect(scoreTrend(points([...low, ...high]))).toBe("improving");
    expect(scoreTrend(points([...high, ...low]))).toBe("declining");
    expect(scoreTrend(points(new Array<number>(21).fill(70)))).toBe("stable");
    expect(scoreTrend(points([...new Array<number>(11).fill(70), ...new Array<number>(10).fill(74)]))).toBe("stable");
  });
});

describe("buildSessionReport", () => {
  it("summarizes a clean session", () => {
    const engine = new FocusEngine();
    for (let t = 0; t < 10; t += 1) engine.process(frame(t));
    const report = buildSessionReport(engine, { session_id: "s-1" });
    expect(report.session).toEqual({ session_id: "s-1" });
    expect(report.summary).toEqual({
      average: 100,
      min: 100,
      max: 100,
      status: "excellent",
      status_label: "Excellent Focus",
      trend: "collecting",
      focus_time_percentage: 100,
      total_alerts: 0,
    });
    expect(report.events).toEqual([]);
    expect(report.timeline).toHaveLength(10);
    expect(report.stats.duration_seconds).toBe(9);
  });

  it("reports a dip and its grouped events", () => {
    const engine = new FocusEngine({ config: { alpha: 1 } });
    engine.process(frame(0));
    engine.process(
      frame(1, { face_detected: false, face_count: 0, device_detected: true, device_type: "laptop", device_confidence: 0.7 })
    );
    engine.process(frame(2));
    engine.process(frame(3));

    const report = buildSessionReport(engine);
    expect(report.stats).toEqual({
      frames_processed: 4,
      average_focus_score: 87.5,
      current_focus_score: 100,
      duration_seconds: 3,
      alerts: { device: 1, no_face: 1, multi_face: 0, gaze_away: 0, audio: 0 },
    });
    expect(report.summary).toMatchObject({
      average: 87.5,
      min: 50,
      max: 100,
      status: "good",
      focus_time_percentage: 75,
      total_alerts: 2,
    });
    expect(report.events.map((g) => [g.category, g.severity, g.message, g.min_score])).toEqual([
      ["device", "ALERT", "Device detected: laptop (70%)", 50],
      ["no_face", "WARNING", "No face detected", 50],
    ]);
    expect(report.timeline.map((p) => p.score)).toEqual([100, 50, 100, 100]);
  });

  it("reports zeros for a session without frames", () => {
    const report = buildSessionReport(new FocusEngine());
    expect(report.stats.current_focus_score).toBe(0);
    expect(report.summary).toMatchObject({ average: 0, min: 0, max: 0, status: "critical", focus_time_percentage: 0 });
  });
});
