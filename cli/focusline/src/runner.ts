import { EngineConfigPatch } from "./config.js";
import { FocusEngine } from "./focus-engine.js";
import { ReplayCounters, SignalReplay } from "./ingest.js";
import { Logger, silentLogger } from "./logger.js";
import { FocusEvent } from "./schema.js";

export type ReplayOptions = {
  config?: EngineConfigPatch;
  logger?: Logger;
  onEvent?: (ev: FocusEvent) => void;
};

export type ReplayOutcome = {
  engine: FocusEngine;
  counters: ReplayCounters;
};

// Rejected records are logged and skipped; the session continues with the next line.
export async function replaySession(path: string, options: ReplayOptions = {}): Promise<ReplayOutcome> {
  const logger = options.logger ?? silentLogger;
  const engine = new FocusEngine({ config: options.config, logger });
  const replay = new SignalReplay();
  const counters = await replay.replayFile(path, {
    onRecord: (signal) => {
      const result = engine.process(signal);
      for (const ev of result.events) options.onEvent?.(ev);
    },
    onError: (message) => logger.warn("record skipped", { reason: message }),
  });
  logger.info("replay finished", {
    path,
    records_in: counters.records_in,
    records_out: counters.records_out,
    records_rejected: counters.records_rejected,
    records_bad_json: counters.records_bad_json,
  });
  return { engine, counters };
}
