import { v4 as uuidv4 } from "uuid";
import { EngineConfig, EngineConfigPatch, resolveConfig } from "./config.js";
import { SessionError } from "./errors.js";
import { EngineFrameResult, FocusEngine } from "./focus-engine.js";
import { Logger, silentLogger } from "./logger.js";
import { buildSessionReport, SessionReport } from "./report.js";
import { SignalRecord } from "./schema.js";
import { isoFromMs, nowMs } from "./util.js";

export type SessionStatus = "active" | "ended";

export type SessionOwner = {
  institution_id: string;
  exam_id: string;
  student_id: string;
  metadata?: Record<string, unknown>;
};

export type MonitoringSession = {
  readonly id: string;
  readonly owner: Readonly<SessionOwner>;
  readonly engine: FocusEngine;
  readonly created_at: number;
  last_activity: number;
  ended_at: number | null;
  status: SessionStatus;
};

export type RegistryOptions = {
  maxSessions?: number;
  idleTimeoutMs?: number;
  config?: EngineConfigPatch;
  logger?: Logger;
  clock?: () => number;
  idFactory?: () => string;
};

export type RegistryStats = {
  total: number;
  active: number;
  ended: number;
  max: number;
};

/**
 * In-memory sessions, one FocusEngine each. Engines share the registry's
 * frozen config; nothing else is shared between sessions.
 */
export class SessionRegistry {
  private sessions = new Map<string, MonitoringSession>();
  private readonly maxSessions: number;
  private readonly idleTimeoutMs: number;
  private readonly config: EngineConfig;
  private readonly logger: Logger;
  private readonly clock: () => number;
  private readonly idFactory: () => string;

  constructor(options: RegistryOptions = {}) {
    this.maxSessions = options.maxSessions ?? 100;
    this.idleTimeoutMs = options.idleTimeoutMs ?? 4 * 60 * 60 * 1000;
    this.config = resolveConfig(options.config);
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? nowMs;
    this.idFactory = options.idFactory ?? (() => uuidv4());
  }

  createSession(owner: SessionOwner): MonitoringSession {
    if (this.sessions.size >= this.maxSessions) {
      this.purgeExpired();
      if (this.sessions.size >= this.maxSessions) {
        throw new SessionError("session_limit_reached", `maximum of ${this.maxSessions} sessions reached`, {
          max: this.maxSessions,
        });
      }
    }
    const now = this.clock();
    const session: MonitoringSession = {
      id: this.idFactory(),
      owner: Object.freeze({ ...owner }),
      engine: new FocusEngine({ config: this.config, logger: this.logger }),
      created_at: now,
      last_activity: now,
      ended_at: null,
      status: "active",
    };
    this.sessions.set(session.id, session);
    this.logger.info("session created", {
      session_id: session.id,
      exam_id: owner.exam_id,
      student_id: owner.student_id,
    });
    return session;
  }

  getSession(id: string): MonitoringSession {
    const session = this.sessions.get(id);
    if (!session) {
      throw new SessionError("session_not_found", `session not found: ${id}`, { session_id: id });
    }
    return session;
  }

  processFrame(id: string, signal: SignalRecord): EngineFrameResult {
    const session = this.getSession(id);
    if (session.status !== "active") {
      throw new SessionError("session_not_active", `session ${id} is ${session.status}`, {
        session_id: id,
        status: session.status,
      });
    }
    const result = session.engine.process(signal);
    session.last_activity = this.clock();
    return result;
  }

  endSession(id: string): MonitoringSession {
    const session = this.getSession(id);
    if (session.status === "ended") return session;
    const now = this.clock();
    session.status = "ended";
    session.ended_at = now;
    session.last_activity = now;
    this.logger.info("session ended", {
      session_id: id,
      frames: session.engine.snapshot().frame_count,
    });
    return session;
  }

  deleteSession(id: string): boolean {
    const removed = this.sessions.delete(id);
    if (removed) this.logger.info("session deleted", { session_id: id });
    return removed;
  }

  report(id: string): SessionReport {
    const session = this.getSession(id);
    return buildSessionReport(session.engine, {
      session_id: session.id,
      institution_id: session.owner.institution_id,
      exam_id: session.owner.exam_id,
      student_id: session.owner.student_id,
      created_at: isoFromMs(session.created_at),
      ended_at: session.ended_at === null ? null : isoFromMs(session.ended_at),
      status: session.status,
    });
  }

  activeSessionIds(): string[] {
    const out: string[] = [];
    for (const session of this.sessions.values()) {
      if (session.status === "active") out.push(session.id);
    }
    return out;
  }

  stats(): RegistryStats {
    let active = 0;
    let ended = 0;
    for (const session of this.sessions.values()) {
      if (session.status === "active") active += 1;
      else ended += 1;
    }
    return { total: this.sessions.size, active, ended, max: this.maxSessions };
  }

  purgeExpired(): string[] {
    const now = this.clock();
    const expired: string[] = [];
    for (const session of this.sessions.values()) {
      if (now - session.last_activity > this.idleTimeoutMs) expired.push(session.id);
    }
    for (const id of expired) this.sessions.delete(id);
    if (expired.length > 0) this.logger.info("expired sessions removed", { count: expired.length });
    return expired;
  }
}
