import { AlertDeduplicator } from "./alert-deduplicator.js";
import { EngineConfig, EngineConfigPatch, resolveConfig } from "./config.js";
import { OutOfOrderInput } from "./errors.js";
import { EventLog } from "./event-log.js";
import { Logger, silentLogger } from "./logger.js";
import { penalty, totalPenalty } from "./penalty-model.js";
import {
  CategoryStates,
  FocusEvent,
  FrameResult,
  GroupedEvent,
  PenaltyMap,
  SessionSnapshot,
  SignalRecord,
  StatsPayload,
} from "./schema.js";
import { ScoreSmoother } from "./score-smoother.js";
import { SessionAggregator } from "./session-aggregator.js";
import { validateSignal } from "./signal.js";
import { roundTo } from "./util.js";

export type FocusEngineOptions = {
  config?: EngineConfigPatch;
  logger?: Logger;
};

export type EngineFrameResult = FrameResult & {
  penalties: Readonly<PenaltyMap>;
  total_penalty: number;
};

/**
 * Single-session scoring pipeline. Not safe for concurrent callers; create one
 * engine per session. A call that throws leaves the engine untouched.
 */
export class FocusEngine {
  readonly config: EngineConfig;
  private readonly logger: Logger;
  private readonly smoother: ScoreSmoother;
  private readonly dedup: AlertDeduplicator;
  private readonly log = new EventLog();
  private readonly aggregator: SessionAggregator;

  constructor(options: FocusEngineOptions = {}) {
    this.config = resolveConfig(options.config);
    this.logger = options.logger ?? silentLogger;
    this.smoother = new ScoreSmoother(this.config);
    this.dedup = new AlertDeduplicator(this.config);
    this.aggregator = new SessionAggregator(this.config);
    this.logger.debug("engine created", {
      alpha: this.config.alpha,
      recovery_rate: roundTo(this.config.recovery_rate, 3),
      cooldown_window: this.config.cooldown_window,
    });
  }

  process(signal: SignalRecord): EngineFrameResult {
    validateSignal(signal);
    const previous = this.smoother.lastUpdateTs;
    if (previous !== null && signal.timestamp <= previous) {
      throw new OutOfOrderInput(previous, signal.timestamp);
    }

    const penalties = Object.freeze(penalty(signal, this.dedup.statesView(), this.config));
    const total = totalPenalty(penalties);
    const score = this.smoother.update(total, signal.timestamp);
    const events = this.dedup.evaluate({ timestamp: signal.timestamp, penalties, signal, score });
    for (const ev of events) {
      this.log.append(ev);
      this.logger.debug("event fired", { category: ev.category, t: ev.timestamp, score: roundTo(score) });
    }
    this.aggregator.update(signal.timestamp, score, events);

    return {
      score,
      events: Object.freeze(events),
      snapshot: this.aggregator.snapshot(),
      penalties,
      total_penalty: total,
    };
  }

  get currentScore(): number {
    return this.smoother.score;
  }

  get lastTimestamp(): number | null {
    return this.smoother.lastUpdateTs;
  }

  snapshot(): SessionSnapshot {
    return this.aggregator.snapshot();
  }

  stats(): StatsPayload {
    return toStatsPayload(this.aggregator.snapshot());
  }

  events(): Iterable<FocusEvent> {
    return this.log.all();
  }

  groupedEvents(bucketSeconds = this.config.report_bucket_seconds): GroupedEvent[] {
    return this.log.groupedForReport(bucketSeconds);
  }

  categoryStates(): CategoryStates {
    return this.dedup.getStates();
  }
}

export function toStatsPayload(snapshot: SessionSnapshot): StatsPayload {
  const hasFrames = snapshot.frame_count > 0;
  return {
    frames_processed: snapshot.frame_count,
    average_focus_score: roundTo(snapshot.average_score),
    current_focus_score: hasFrames ? roundTo(snapshot.current_score) : 0,
    duration_seconds: roundTo(snapshot.duration_seconds),
    alerts: { ...snapshot.category_counts },
  };
}
