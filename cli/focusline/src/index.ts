export * from "./schema.js";
export * from "./errors.js";
export { DEFAULT_CONFIG, DEFAULT_PENALTIES, loadConfigFile, parseConfig, resolveConfig } from "./config.js";
export type { EngineConfig, EngineConfigPatch } from "./config.js";
export { createLogger, parseLogLevel, silentLogger } from "./logger.js";
export type { LogFields, LogLevel, LogSink, Logger } from "./logger.js";
export { parseSignalRecord, validateSignal } from "./signal.js";
export { isDeviceVisible, isLookingAway, penalty, totalPenalty } from "./penalty-model.js";
export { INITIAL_SCORE, ScoreSmoother } from "./score-smoother.js";
export { AlertDeduplicator, CATEGORY_SEVERITY, describeEvent } from "./alert-deduplicator.js";
export { EventLog } from "./event-log.js";
export { FOCUSED_SCORE, SessionAggregator } from "./session-aggregator.js";
export { FocusEngine, toStatsPayload } from "./focus-engine.js";
export type { EngineFrameResult, FocusEngineOptions } from "./focus-engine.js";
export { buildSessionReport, focusStatus, scoreTrend, summarize } from "./report.js";
export type { FocusStatus, FocusTrend, ReportSummary, SessionInfo, SessionReport } from "./report.js";
export { SessionRegistry } from "./session-registry.js";
export type { MonitoringSession, RegistryOptions, RegistryStats, SessionOwner } from "./session-registry.js";
export { SignalReplay } from "./ingest.js";
export type { ReplayCounters, ReplayHandlers } from "./ingest.js";
export { replaySession } from "./runner.js";
export type { ReplayOptions, ReplayOutcome } from "./runner.js";
