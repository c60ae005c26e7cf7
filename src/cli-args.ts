import { parseCaptureUsages, type AppConfig } from "./config.js";
import type { CaptureMode } from "./domain/types.js";

export type ParsedArgs = {
  flags: Record<string, string>;
  extras: string[];
};

export function parseFlags(args: string[]): ParsedArgs {
  const flags: Record<string, string> = {};
  const extras: string[] = [];

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (!arg.startsWith("--")) {
      extras.push(arg);
      continue;
    }

    const eq = arg.indexOf("=");
    if (eq !== -1) {
      flags[arg.slice(2, eq)] = arg.slice(eq + 1);
      continue;
    }

    const key = arg.slice(2);
    const next = args[i + 1];
    if (next !== undefined && !next.startsWith("--")) {
      flags[key] = next;
      i += 1;
    } else {
      flags[key] = "1";
    }
  }

  return { flags, extras };
}

export type RunOptions = {
  readonly sourceLanguage: string | null | undefined;
  readonly targetLanguage: string | undefined;
  readonly captureMode: CaptureMode;
};

/** Flags win over config; `--source auto` asks the service to detect the language. */
export function resolveRunOptions(
  flags: Record<string, string>,
  config: Pick<AppConfig, "captureMode" | "captureDevice" | "captureUsages">,
): RunOptions {
  const mode = flags.mode ?? config.captureMode;
  const device = flags.device ?? config.captureDevice;

  let captureMode: CaptureMode;
  if (mode === "microphone") {
    captureMode = device ? { kind: "microphone", device } : { kind: "microphone" };
  } else if (mode === "application") {
    const usages =
      flags.usages === undefined ? config.captureUsages : parseCaptureUsages(flags.usages, "--usages");
    captureMode = { kind: "application", capabilityToken: device ?? "", usages };
  } else {
    throw new Error(`Invalid --mode: ${mode} (expected microphone or application)`);
  }

  const source = flags.source;
  return {
    sourceLanguage: source === undefined ? undefined : source === "auto" ? null : source,
    targetLanguage: flags.target,
    captureMode,
  };
}
