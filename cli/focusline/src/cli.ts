#!/usr/bin/env node
import { resolve } from "node:path";
import { EngineConfig, loadConfigFile } from "./config.js";
import { errorMessage } from "./errors.js";
import { createLogger } from "./logger.js";
import { buildSessionReport } from "./report.js";
import { replaySession } from "./runner.js";

const args = process.argv.slice(2);
const cmd = args[0] ?? "help";
const logger = createLogger();

function getArg(flag: string, fallback?: string) {
  const idx = args.indexOf(flag);
  if (idx === -1) return fallback;
  const val = args[idx + 1];
  if (!val || val.startsWith("--")) return fallback;
  return val;
}

function hasFlag(flag: string) {
  return args.includes(flag);
}

function positional(index: number): string | undefined {
  const list: string[] = [];
  for (let i = 0; i < args.length; i += 1) {
    const a = args[i];
    if (a.startsWith("--")) {
      if (a === "--config" || a === "--bucket") i += 1;
      continue;
    }
    list.push(a);
  }
  return list[index];
}

function usage(exitCode = 0): never {
  console.log(`focusline <command> [options]

Commands:
  replay <signals.ndjson> [--config <path>] [--events]
  report <signals.ndjson> [--config <path>] [--bucket <seconds>]
  config [--config <path>]

Defaults:
  --config ./focusline.config.json (defaults apply when missing)
  --bucket report_bucket_seconds from config (60)

Environment:
  FOCUSLINE_LOG_LEVEL  debug | info | warn | error | silent (default info)
`);
  process.exit(exitCode);
}

function fail(message: string): never {
  console.error(`error: ${message}`);
  process.exit(1);
}

function loadConfig(): EngineConfig {
  const configPath = resolve(getArg("--config", "focusline.config.json") ?? "focusline.config.json");
  return loadConfigFile(configPath);
}

function requireInput(): string {
  const input = positional(1);
  if (!input) usage(1);
  return resolve(input);
}

async function cmdReplay() {
  const input = requireInput();
  const config = loadConfig();
  const printEvents = hasFlag("--events");
  const { engine } = await replaySession(input, {
    config,
    logger,
    onEvent: printEvents ? (ev) => console.log(JSON.stringify(ev)) : undefined,
  });
  console.log(JSON.stringify(engine.stats(), null, 2));
}

async function cmdReport() {
  const input = requireInput();
  const config = loadConfig();
  const bucketArg = getArg("--bucket");
  const bucket = bucketArg === undefined ? config.report_bucket_seconds : Number(bucketArg);
  if (!Number.isFinite(bucket) || bucket <= 0) fail("--bucket must be a positive number");
  const { engine } = await replaySession(input, { config, logger });
  console.log(JSON.stringify(buildSessionReport(engine, {}, bucket), null, 2));
}

function cmdConfig() {
  console.log(JSON.stringify(loadConfig(), null, 2));
}

if (hasFlag("--help") || cmd === "--help" || cmd === "help") {
  usage(0);
}

try {
  if (cmd === "replay") {
    await cmdReplay();
  } else if (cmd === "report") {
    await cmdReport();
  } else if (cmd === "config") {
    cmdConfig();
  } else {
    usage(1);
  }
} catch (err) {
  fail(errorMessage(err));
}
