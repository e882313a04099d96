export const GAZE_DIRECTIONS = ["FORWARD", "LEFT", "RIGHT", "UP", "DOWN", "UNKNOWN"] as const;
export type GazeDirection = (typeof GAZE_DIRECTIONS)[number];

export const AUDIO_TYPES = ["VOICE", "NOISE"] as const;
export type AudioType = (typeof AUDIO_TYPES)[number];

export type HeadPose = {
  pitch?: number | null;
  yaw?: number | null;
  roll?: number | null;
};

export type SignalRecord = {
  timestamp: number;
  face_detected: boolean;
  face_count: number;
  gaze_direction: GazeDirection;
  head_pose?: HeadPose | null;
  device_detected: boolean;
  device_type?: string | null;
  device_confidence: number;
  audio_anomaly: boolean;
  audio_type?: AudioType | null;
};

// Evaluation order when several categories fire in the same frame.
export const ALERT_CATEGORIES = ["device", "no_face", "multi_face", "gaze_away", "audio"] as const;
export type AlertCategory = (typeof ALERT_CATEGORIES)[number];

export type Severity = "INFO" | "WARNING" | "ALERT";

export type PenaltyMap = Record<AlertCategory, number>;
export type CategoryCounts = Record<AlertCategory, number>;

export type DedupPhase = "QUIET" | "FIRING" | "COOLDOWN";

export type CategoryState = {
  phase: DedupPhase;
  last_fired_at: number | null;
  active: boolean;
};

export type CategoryStates = Record<AlertCategory, CategoryState>;

export type ScoreState = {
  current_score: number;
  last_update_ts: number | null;
};

export type FocusEvent = {
  readonly timestamp: number;
  readonly category: AlertCategory;
  readonly severity: Severity;
  readonly message: string;
  readonly score_at_event: number;
};

export type TimelinePoint = {
  readonly timestamp: number;
  readonly score: number;
};

export type SessionAggregate = {
  frame_count: number;
  score_sum: number;
  score_min: number | null;
  score_max: number | null;
  focused_frames: number;
  category_counts: CategoryCounts;
  timeline: TimelinePoint[];
};

export type SessionSnapshot = {
  readonly average_score: number;
  readonly current_score: number;
  readonly frame_count: number;
  readonly score_min: number | null;
  readonly score_max: number | null;
  readonly focused_frames: number;
  readonly category_counts: Readonly<CategoryCounts>;
  readonly duration_seconds: number;
  readonly timeline: readonly TimelinePoint[];
};

export type FrameResult = {
  score: number;
  events: readonly FocusEvent[];
  snapshot: SessionSnapshot;
};

export type StatsPayload = {
  frames_processed: number;
  average_focus_score: number;
  current_focus_score: number;
  duration_seconds: number;
  alerts: CategoryCounts;
};

export type GroupedEvent = {
  category: AlertCategory;
  severity: Severity;
  message: string;
  count: number;
  bucket: number;
  first_timestamp: number;
  last_timestamp: number;
  min_score: number;
};

export function emptyCounts(): CategoryCounts {
  return { device: 0, no_face: 0, multi_face: 0, gaze_away: 0, audio: 0 };
}
