import { EngineConfig } from "./config.js";
import { INITIAL_SCORE } from "./score-smoother.js";
import { FocusEvent, SessionAggregate, SessionSnapshot, TimelinePoint, emptyCounts } from "./schema.js";

// Frames at or above this score count toward focus-time percentage.
export const FOCUSED_SCORE = 70;

export type AggregatorConfig = Pick<EngineConfig, "timeline_interval_seconds" | "timeline_max_points">;

export class SessionAggregator {
  private agg: SessionAggregate = {
    frame_count: 0,
    score_sum: 0,
    score_min: null,
    score_max: null,
    focused_frames: 0,
    category_counts: emptyCounts(),
    timeline: [],
  };
  private firstTs: number | null = null;
  private lastTs: number | null = null;
  private currentScore = INITIAL_SCORE;
  private cachedSnapshot: SessionSnapshot | null = null;
  private cachedTimeline: readonly TimelinePoint[] | null = null;

  constructor(private readonly config: AggregatorConfig) {}

  update(timestamp: number, score: number, events: readonly FocusEvent[]) {
    const agg = this.agg;
    agg.frame_count += 1;
    agg.score_sum += score;
    agg.score_min = agg.score_min === null ? score : Math.min(agg.score_min, score);
    agg.score_max = agg.score_max === null ? score : Math.max(agg.score_max, score);
    if (score >= FOCUSED_SCORE) agg.focused_frames += 1;
    for (const ev of events) agg.category_counts[ev.category] += 1;

    if (this.firstTs === null) this.firstTs = timestamp;
    this.lastTs = timestamp;
    this.currentScore = score;
    this.appendTimeline(timestamp, score);
    this.cachedSnapshot = null;
  }

  snapshot(): SessionSnapshot {
    if (this.cachedSnapshot) return this.cachedSnapshot;
    const agg = this.agg;
    if (!this.cachedTimeline) this.cachedTimeline = Object.freeze(agg.timeline.slice());
    const snap: SessionSnapshot = Object.freeze({
      average_score: agg.frame_count > 0 ? agg.score_sum / agg.frame_count : 0,
      current_score: this.currentScore,
      frame_count: agg.frame_count,
      score_min: agg.score_min,
      score_max: agg.score_max,
      focused_frames: agg.focused_frames,
      category_counts: Object.freeze({ ...agg.category_counts }),
      duration_seconds: this.firstTs === null || this.lastTs === null ? 0 : this.lastTs - this.firstTs,
      timeline: this.cachedTimeline,
    });
    this.cachedSnapshot = snap;
    return snap;
  }

  getAggregate(): SessionAggregate {
    return {
      ...this.agg,
      category_counts: { ...this.agg.category_counts },
      timeline: this.agg.timeline.slice(),
    };
  }

  private appendTimeline(timestamp: number, score: number) {
    const timeline = this.agg.timeline;
    const last = timeline[timeline.length - 1];
    if (last && timestamp - last.timestamp < this.config.timeline_interval_seconds) return;
    timeline.push(Object.freeze({ timestamp, score }));
    const cap = this.config.timeline_max_points;
    if (cap > 0 && timeline.length > cap) timeline.splice(0, timeline.length - cap);
    this.cachedTimeline = null;
  }
}
