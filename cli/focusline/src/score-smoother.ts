import { EngineConfig } from "./config.js";
import { ScoreState } from "./schema.js";
import { clamp } from "./util.js";

export type SmootherConfig = Pick<EngineConfig, "alpha" | "recovery_rate">;

export const INITIAL_SCORE = 100;

// Penalized frames move toward 100 - penalty by EMA. Clean frames take the
// larger of the EMA step toward 100 and the linear recovery_rate, never both.
export class ScoreSmoother {
  private state: ScoreState = { current_score: INITIAL_SCORE, last_update_ts: null };

  constructor(private readonly config: SmootherConfig) {}

  get score(): number {
    return this.state.current_score;
  }

  get lastUpdateTs(): number | null {
    return this.state.last_update_ts;
  }

  getState(): ScoreState {
    return { ...this.state };
  }

  update(totalPenalty: number, timestamp: number): number {
    const current = this.state.current_score;
    const capped = clamp(totalPenalty, 0, 100);
    let next: number;

    if (capped === 0) {
      const emaStep = this.config.alpha * (100 - current);
      next = Math.min(100, current + Math.max(emaStep, this.config.recovery_rate));
    } else {
      const target = clamp(100 - capped, 0, 100);
      next = current + this.config.alpha * (target - current);
    }

    this.state = { current_score: clamp(next, 0, 100), last_update_ts: timestamp };
    return this.state.current_score;
  }
}
