#!/usr/bin/env node

import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { ProcessCaptureProvider, ProcessPlaybackProvider } from "./audio/process-devices.js";
import { parseFlags, resolveRunOptions } from "./cli-args.js";
import { loadConfig, type AppConfig } from "./config.js";
import { ConfigurationError, ConnectionError } from "./domain/errors.js";
import { TranslationEngine } from "./engine/translation-engine.js";
import { readEnvFile } from "./env-file.js";
import { makeLogger, type Logger } from "./logger.js";
import { EnvSettingsProvider, validateSettings } from "./settings.js";

type CliContext = {
  envFilePath: string;
  config: AppConfig;
  logger: Logger;
};

async function main(argv: string[]): Promise<void> {
  const [command, ...rest] = argv;
  if (command === "--version" || command === "-v" || command === "version") {
    process.stdout.write(`${cliVersion()}\n`);
    return;
  }
  if (!command || command === "help" || command === "--help" || command === "-h") {
    printHelp();
    return;
  }

  const { flags } = parseFlags(rest);
  const envFilePath = resolve(process.cwd(), flags["env-file"] ?? ".env");
  const config = loadConfig({ ...readEnvFile(envFilePath), ...process.env });
  // stdout carries translations; logs go to stderr.
  const logger = makeLogger(config.logLevel, { sink: (line) => void process.stderr.write(line) });
  const context: CliContext = { envFilePath, config, logger };

  switch (command) {
    case "run": {
      await handleRun(flags, context);
      return;
    }
    case "check": {
      handleCheck(context);
      return;
    }
    default: {
      die(`unknown command: ${command}`);
    }
  }
}

async function handleRun(flags: Record<string, string>, context: CliContext): Promise<void> {
  const { config, logger } = context;
  const options = resolveRunOptions(flags, config);

  const engine = new TranslationEngine({
    logger,
    settings: new EnvSettingsProvider(process.env, context.envFilePath),
    capture: new ProcessCaptureProvider({ logger, command: config.captureCommand }),
    playback: new ProcessPlaybackProvider({ logger, command: config.playbackCommand }),
    captureMode: options.captureMode,
    config,
  });

  let lineOpen = false;
  engine.onTranslatedText((text) => {
    process.stdout.write(text);
    lineOpen = true;
  });
  engine.onResponseCompleted(() => {
    if (!lineOpen) return;
    process.stdout.write("\n");
    lineOpen = false;
  });
  const stopped = new Promise<void>((resolveStopped) => {
    const stopEngine = (): void => {
      void engine.stop().then(resolveStopped);
    };
    engine.onError((error) => {
      process.stderr.write(`[dubline] ${error.kind} error: ${error.message}\n`);
      // A lost connection is terminal; the engine is already tearing down.
      if (error instanceof ConnectionError && engine.state !== "starting") stopEngine();
    });
    const shutdown = (signal: NodeJS.Signals): void => {
      logger.info("shutdown signal received", { signal });
      stopEngine();
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
  });

  try {
    await engine.start(options.sourceLanguage, options.targetLanguage);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      die(`not configured:\n  - ${error.problems.join("\n  - ")}`);
    }
    throw error;
  }

  await stopped;
  const stats = engine.getStats();
  process.stderr.write(
    `[dubline] stopped after ${stats.commits} commits, ${stats.responsesCompleted} responses\n`,
  );
  process.exit(0);
}

function handleCheck(context: CliContext): void {
  const settings = new EnvSettingsProvider(process.env, context.envFilePath).load();
  const problems = validateSettings(settings);
  const { config } = context;

  process.stdout.write(`[dubline] env file: ${context.envFilePath}\n`);
  process.stdout.write(`[dubline] endpoint: ${settings.endpoint ?? "(missing)"}\n`);
  process.stdout.write(`[dubline] deployment: ${settings.deployment ?? "(missing)"}\n`);
  process.stdout.write(`[dubline] api key: ${settings.apiKey ? "set" : "(missing)"}\n`);
  process.stdout.write(
    `[dubline] languages: ${settings.sourceLanguage ?? "auto"} -> ${settings.targetLanguage ?? "(missing)"}\n`,
  );
  process.stdout.write(
    `[dubline] audio: ${config.inputSampleRateHz} Hz x${config.inputChannels} in, ${config.outputSampleRateHz} Hz out\n`,
  );
  process.stdout.write(
    `[dubline] commit interval: ${config.commit.initialCommitIntervalMs}ms (${config.commit.minCommitIntervalMs}-${config.commit.maxCommitIntervalMs}ms)\n`,
  );

  if (problems.length > 0) {
    for (const problem of problems) {
      process.stdout.write(`[dubline] problem: ${problem}\n`);
    }
    process.exitCode = 1;
    return;
  }
  process.stdout.write("[dubline] configuration ok\n");
}

function die(message: string): never {
  process.stderr.write(`[dubline] ${message}\n`);
  process.stderr.write("[dubline] run `dubline help` for usage\n");
  process.exit(1);
}

function printHelp(): void {
  process.stdout.write(`dubline ${cliVersion()}\n\n`);
  process.stdout.write(`Usage:\n`);
  process.stdout.write(`  dubline run [--source LANG|auto] [--target LANG] [--mode microphone|application]\n`);
  process.stdout.write(`              [--device NAME] [--usages media,game] [--env-file PATH]\n`);
  process.stdout.write(`  dubline check [--env-file PATH]\n`);
  process.stdout.write(`  dubline version\n\n`);
  process.stdout.write(`Settings (environment or env file):\n`);
  process.stdout.write(`  REALTIME_ENDPOINT, REALTIME_API_KEY, REALTIME_DEPLOYMENT\n`);
  process.stdout.write(`  REALTIME_API_VERSION, SOURCE_LANGUAGE, TARGET_LANGUAGE (default ro)\n\n`);
  process.stdout.write(`Application mode captures another application's playback; pass its\n`);
  process.stdout.write(`monitor source with --device (e.g. alsa_output.pci.analog-stereo.monitor).\n`);
  process.stdout.write(`--usages (or CAPTURE_USAGES) limits it to media and/or game audio; custom\n`);
  process.stdout.write(`CAPTURE_COMMAND templates receive the list as {usages}.\n`);
  process.stdout.write(`\n`);
}

function cliVersion(): string {
  try {
    const pkgPath = resolve(dirname(fileURLToPath(import.meta.url)), "..", "package.json");
    const parsed: unknown = JSON.parse(readFileSync(pkgPath, "utf8"));
    if (parsed && typeof parsed === "object" && "version" in parsed && typeof parsed.version === "string") {
      return parsed.version;
    }
    return "0.0.0";
  } catch {
    return "0.0.0";
  }
}

void main(process.argv.slice(2)).catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  die(message);
});
