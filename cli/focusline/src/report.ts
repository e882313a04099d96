import { FocusEngine, toStatsPayload } from "./focus-engine.js";
import { ALERT_CATEGORIES, GroupedEvent, SessionSnapshot, StatsPayload, TimelinePoint } from "./schema.js";
import { mean, roundTo } from "./util.js";

export type FocusStatus = "excellent" | "good" | "fair" | "poor" | "critical";
export type FocusTrend = "improving" | "declining" | "stable" | "collecting";

const STATUS_BANDS: ReadonlyArray<{ min: number; status: FocusStatus; label: string }> = [
  { min: 90, status: "excellent", label: "Excellent Focus" },
  { min: 70, status: "good", label: "Good Focus" },
  { min: 50, status: "fair", label: "Fair Focus" },
  { min: 30, status: "poor", label: "Poor Focus" },
  { min: 0, status: "critical", label: "Critical - Possible Cheating" },
];

const TREND_MIN_POINTS = 20;
const TREND_DELTA = 5;

export type SessionInfo = {
  session_id?: string;
  institution_id?: string;
  exam_id?: string;
  student_id?: string;
  created_at?: string;
  ended_at?: string | null;
  status?: string;
};

export type ReportSummary = {
  average: number;
  min: number;
  max: number;
  status: FocusStatus;
  status_label: string;
  trend: FocusTrend;
  focus_time_percentage: number;
  total_alerts: number;
};

export type SessionReport = {
  session: SessionInfo;
  stats: StatsPayload;
  summary: ReportSummary;
  events: GroupedEvent[];
  timeline: TimelinePoint[];
};

export function focusStatus(score: number): { status: FocusStatus; label: string } {
  for (const band of STATUS_BANDS) {
    if (score >= band.min) return { status: band.status, label: band.label };
  }
  return { status: "critical", label: "Critical - Possible Cheating" };
}

// Later half of the timeline against the earlier half.
export function scoreTrend(timeline: readonly TimelinePoint[]): FocusTrend {
  if (timeline.length <= TREND_MIN_POINTS) return "collecting";
  const half = Math.floor(timeline.length / 2);
  const scores = timeline.map((p) => p.score);
  const earlier = mean(scores.slice(0, half));
  const recent = mean(scores.slice(scores.length - half));
  if (recent > earlier + TREND_DELTA) return "improving";
  if (recent < earlier - TREND_DELTA) return "declining";
  return "stable";
}

export function summarize(snapshot: SessionSnapshot): ReportSummary {
  const average = snapshot.frame_count > 0 ? snapshot.average_score : 0;
  const { status, label } = focusStatus(average);
  let totalAlerts = 0;
  for (const category of ALERT_CATEGORIES) totalAlerts += snapshot.category_counts[category];
  return {
    average: roundTo(average),
    min: roundTo(snapshot.score_min ?? 0),
    max: roundTo(snapshot.score_max ?? 0),
    status,
    status_label: label,
    trend: scoreTrend(snapshot.timeline),
    focus_time_percentage:
      snapshot.frame_count > 0 ? roundTo((snapshot.focused_frames / snapshot.frame_count) * 100) : 0,
    total_alerts: totalAlerts,
  };
}

export function buildSessionReport(
  engine: FocusEngine,
  info: SessionInfo = {},
  bucketSeconds = engine.config.report_bucket_seconds
): SessionReport {
  const snapshot = engine.snapshot();
  return {
    session: { ...info },
    stats: toStatsPayload(snapshot),
    summary: summarize(snapshot),
    events: engine.groupedEvents(bucketSeconds),
    timeline: snapshot.timeline.map((p) => ({ timestamp: p.timestamp, score: roundTo(p.score) })),
  };
}
