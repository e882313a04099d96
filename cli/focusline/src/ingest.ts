import { createReadStream } from "node:fs";
import { createInterface } from "node:readline";
import { Readable } from "node:stream";
import { isFocusError } from "./errors.js";
import { parseSignalRecord } from "./signal.js";
import { SignalRecord } from "./schema.js";
import { safeJsonParse, stripBom } from "./util.js";

export type ReplayCounters = {
  records_in: number;
  records_bad_json: number;
  records_rejected: number;
  records_out: number;
};

export type ReplayHandlers = {
  // Throwing a FocusError rejects the record; any other error aborts the replay.
  onRecord: (signal: SignalRecord, line: number) => void;
  onError?: (message: string, line: number) => void;
};

/** Feeds newline-delimited JSON signal records, in file order, to a handler. */
export class SignalReplay {
  private counters: ReplayCounters = {
    records_in: 0,
    records_bad_json: 0,
    records_rejected: 0,
    records_out: 0,
  };

  getCounters(): ReplayCounters {
    return { ...this.counters };
  }

  async replayFile(path: string, handlers: ReplayHandlers): Promise<ReplayCounters> {
    return this.replayStream(createReadStream(path, { encoding: "utf8" }), handlers);
  }

  async replayStream(input: Readable, handlers: ReplayHandlers): Promise<ReplayCounters> {
    const lines = createInterface({ input, crlfDelay: Infinity });
    let lineNo = 0;
    try {
      for await (const raw of lines) {
        lineNo += 1;
        this.handleLine(raw, lineNo, handlers);
      }
    } finally {
      lines.close();
      input.destroy();
    }
    return this.getCounters();
  }

  replayLines(raw: Iterable<string>, handlers: ReplayHandlers): ReplayCounters {
    let lineNo = 0;
    for (const line of raw) {
      lineNo += 1;
      this.handleLine(line, lineNo, handlers);
    }
    return this.getCounters();
  }

  private handleLine(raw: string, lineNo: number, handlers: ReplayHandlers) {
    const text = (lineNo === 1 ? stripBom(raw) : raw).trim();
    if (!text) return;
    this.counters.records_in++;

    const parsed = safeJsonParse(text);
    if (!parsed.ok) {
      this.counters.records_bad_json++;
      handlers.onError?.(`line ${lineNo}: bad json: ${parsed.error}`, lineNo);
      return;
    }

    try {
      const signal = parseSignalRecord(parsed.value);
      handlers.onRecord(signal, lineNo);
      this.counters.records_out++;
    } catch (err) {
      if (!isFocusError(err)) throw err;
      this.counters.records_rejected++;
      handlers.onError?.(`line ${lineNo}: ${err.code}: ${err.message}`, lineNo);
    }
  }
}
