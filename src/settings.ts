import type { SettingsProvider, TranslationSettings } from "./domain/providers.js";
import { readEnvFile } from "./env-file.js";

export const DEFAULT_API_VERSION = "2024-10-01-preview";
export const DEFAULT_TARGET_LANGUAGE = "ro";

function pickNonEmpty(...values: Array<string | undefined>): string | undefined {
  for (const value of values) {
    if (value && value.trim().length > 0) return value.trim();
  }
  return undefined;
}

/**
 * Reads connection settings from the process environment, falling back to an
 * optional env file. Re-read on every `load()` so edits show up on reinitialize.
 */
export class EnvSettingsProvider implements SettingsProvider {
  public constructor(
    private readonly env: NodeJS.ProcessEnv,
    private readonly envFilePath?: string,
  ) {}

  public load(): TranslationSettings {
    const file = this.envFilePath ? readEnvFile(this.envFilePath) : {};
    const pick = (key: string): string | undefined => pickNonEmpty(this.env[key], file[key]);

    return {
      endpoint: pick("REALTIME_ENDPOINT"),
      apiKey: pick("REALTIME_API_KEY"),
      deployment: pick("REALTIME_DEPLOYMENT"),
      apiVersion: pick("REALTIME_API_VERSION") ?? DEFAULT_API_VERSION,
      targetLanguage: pick("TARGET_LANGUAGE") ?? DEFAULT_TARGET_LANGUAGE,
      sourceLanguage: pick("SOURCE_LANGUAGE"),
    };
  }
}

export class StaticSettingsProvider implements SettingsProvider {
  public constructor(private readonly settings: TranslationSettings) {}

  public load(): TranslationSettings {
    return this.settings;
  }
}

/** Returns human-readable problems; an empty list means the settings are usable. */
export function validateSettings(settings: TranslationSettings): string[] {
  const problems: string[] = [];
  if (!settings.endpoint) {
    problems.push("REALTIME_ENDPOINT is missing");
  } else if (!/^(https?|wss?):\/\//i.test(settings.endpoint)) {
    problems.push(`REALTIME_ENDPOINT must be an http(s) or ws(s) URL: ${settings.endpoint}`);
  } else {
    try {
      new URL(settings.endpoint);
    } catch {
      problems.push(`REALTIME_ENDPOINT is not a valid URL: ${settings.endpoint}`);
    }
  }
  if (!settings.apiKey) problems.push("REALTIME_API_KEY is missing");
  if (!settings.deployment) problems.push("REALTIME_DEPLOYMENT is missing");
  if (!settings.targetLanguage) problems.push("TARGET_LANGUAGE is missing");
  return problems;
}
