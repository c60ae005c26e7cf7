import assert from "node:assert/strict";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import test from "node:test";
import { EnvSettingsProvider, StaticSettingsProvider, validateSettings } from "../settings.js";

test("EnvSettingsProvider fills defaults for api version and target language", () => {
  const settings = new EnvSettingsProvider({
    REALTIME_ENDPOINT: " https://example.openai.azure.com ",
    REALTIME_API_KEY: "test-secret",
    REALTIME_DEPLOYMENT: "gpt-4o-realtime",
    SOURCE_LANGUAGE: "   ",
  }).load();

  assert.deepEqual(settings, {
    endpoint: "https://example.openai.azure.com",
    apiKey: "test-secret",
    deployment: "gpt-4o-realtime",
    apiVersion: "2024-10-01-preview",
    targetLanguage: "ro",
    sourceLanguage: undefined,
  });
});

test("EnvSettingsProvider prefers the environment and re-reads the file on load", () => {
  const dir = mkdtempSync(join(tmpdir(), "dubline-settings-"));
  const path = join(dir, ".env");
  try {
    writeFileSync(path, ["REALTIME_DEPLOYMENT=from-file", "TARGET_LANGUAGE=de"].join("\n"));
    const provider = new EnvSettingsProvider({ TARGET_LANGUAGE: "fr" }, path);

    assert.equal(provider.load().deployment, "from-file");
    assert.equal(provider.load().targetLanguage, "fr");

    writeFileSync(path, "REALTIME_DEPLOYMENT=edited\n");
    assert.equal(provider.load().deployment, "edited");
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

test("StaticSettingsProvider returns what it was given", () => {
  const settings = { endpoint: "https://example.test", targetLanguage: "es" };
  assert.equal(new StaticSettingsProvider(settings).load(), settings);
});

test("validateSettings lists every missing value", () => {
  assert.deepEqual(validateSettings({}), [
    "REALTIME_ENDPOINT is missing",
    "REALTIME_API_KEY is missing",
    "REALTIME_DEPLOYMENT is missing",
    "TARGET_LANGUAGE is missing",
  ]);
});

test("validateSettings checks the endpoint scheme", () => {
  const base = { apiKey: "test-secret", deployment: "d", targetLanguage: "ro" };
  assert.deepEqual(validateSettings({ ...base, endpoint: "ftp://example.test" }), [
    "REALTIME_ENDPOINT must be an http(s) or ws(s) URL: ftp://example.test",
  ]);
  assert.deepEqual(validateSettings({ ...base, endpoint: "wss://example.test" }), []);
});
