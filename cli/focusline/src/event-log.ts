import { ConfigurationError, OutOfOrderInput } from "./errors.js";
import { FocusEvent, GroupedEvent } from "./schema.js";

export class EventLog {
  private events: FocusEvent[] = [];

  append(event: FocusEvent) {
    const last = this.events[this.events.length - 1];
    if (last && event.timestamp < last.timestamp) {
      throw new OutOfOrderInput(last.timestamp, event.timestamp);
    }
    this.events.push(event);
  }

  get size(): number {
    return this.events.length;
  }

  // A fresh iterator per call; appends made later are visible to iterators created later.
  all(): Iterable<FocusEvent> {
    const events = this.events;
    return {
      *[Symbol.iterator]() {
        for (let i = 0; i < events.length; i += 1) yield events[i];
      },
    };
  }

  toArray(): FocusEvent[] {
    return this.events.slice();
  }

  groupedForReport(bucketSeconds = 60): GroupedEvent[] {
    if (!(bucketSeconds > 0)) {
      throw new ConfigurationError("report_bucket_seconds", "must be positive", bucketSeconds);
    }
    const groups = new Map<string, GroupedEvent>();
    const out: GroupedEvent[] = [];
    for (const ev of this.events) {
      const bucket = Math.floor(ev.timestamp / bucketSeconds);
      const key = `${ev.category}:${bucket}`;
      const existing = groups.get(key);
      if (existing) {
        existing.count += 1;
        existing.last_timestamp = ev.timestamp;
        existing.min_score = Math.min(existing.min_score, ev.score_at_event);
        continue;
      }
      const entry: GroupedEvent = {
        category: ev.category,
        severity: ev.severity,
        message: ev.message,
        count: 1,
        bucket,
        first_timestamp: ev.timestamp,
        last_timestamp: ev.timestamp,
        min_score: ev.score_at_event,
      };
      groups.set(key, entry);
      out.push(entry);
    }
    return out;
  }
}
