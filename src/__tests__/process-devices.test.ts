import assert from "node:assert/strict";
import { EventEmitter } from "node:events";
import { PassThrough } from "node:stream";
import test from "node:test";
import {
  buildCommand,
  ProcessCaptureProvider,
  ProcessPlaybackProvider,
  type DeviceProcess,
} from "../audio/process-devices.js";
import { CaptureError } from "../domain/errors.js";
import type { AudioFormat } from "../domain/types.js";
import { makeLogger } from "../logger.js";

const logger = makeLogger("error");
const format: AudioFormat = { sampleRateHz: 16000, channels: 1, encoding: "pcm_s16le" };

class FakeProcess extends EventEmitter implements DeviceProcess {
  public readonly stdin = new PassThrough();
  public readonly stdout = new PassThrough();
  public readonly stderr = new PassThrough();
  public readonly signals: NodeJS.Signals[] = [];

  public kill(signal: NodeJS.Signals = "SIGTERM"): boolean {
    this.signals.push(signal);
    setImmediate(() => this.emit("exit", null, signal));
    return true;
  }
}

function recordingSpawn() {
  const spawned: Array<{ command: string; args: readonly string[]; child: FakeProcess }> = [];
  const spawnProcess = (command: string, args: readonly string[]): FakeProcess => {
    const child = new FakeProcess();
    spawned.push({ command, args, child });
    return child;
  };
  return { spawned, spawnProcess };
}

test("buildCommand fills placeholders and drops device arguments without a device", () => {
  assert.deepEqual(
    buildCommand("parec --rate={rate} --channels={channels} --device={device}", { rate: 16000, channels: 1 }),
    { command: "parec", args: ["--rate=16000", "--channels=1"] },
  );
  assert.deepEqual(
    buildCommand("  rec  -r {rate} -d {device} ", { rate: 24000, channels: 2, device: "mon" }),
    { command: "rec", args: ["-r", "24000", "-d", "mon"] },
  );
  assert.throws(() => buildCommand("   ", { rate: 1, channels: 1 }), /Invalid command template/);
});

test("microphone capture spawns the recorder and streams its stdout", async () => {
  const { spawned, spawnProcess } = recordingSpawn();
  const provider = new ProcessCaptureProvider({ logger, spawnProcess });
  const data: Buffer[] = [];
  const errors: Error[] = [];

  provider.start(format, { kind: "microphone" }, {
    onData: (chunk) => data.push(chunk),
    onError: (error) => errors.push(error),
  });

  assert.equal(spawned.length, 1);
  assert.equal(spawned[0]?.command, "parec");
  assert.deepEqual(spawned[0]?.args, ["--raw", "--format=s16le", "--rate=16000", "--channels=1"]);

  spawned[0]?.child.stdout.write(Buffer.from([1, 2, 3, 4]));
  await new Promise((resolve) => setImmediate(resolve));
  assert.deepEqual(data, [Buffer.from([1, 2, 3, 4])]);

  await provider.stop();
  assert.deepEqual(spawned[0]?.child.signals, ["SIGTERM"]);
  assert.deepEqual(errors, []);
});

test("application capture targets the monitor device and needs a token", () => {
  const { spawned, spawnProcess } = recordingSpawn();
  const provider = new ProcessCaptureProvider({ logger, spawnProcess });
  const handlers = { onData: () => undefined, onError: () => undefined };

  assert.throws(
    () => provider.start(format, { kind: "application", capabilityToken: " ", usages: ["media"] }, handlers),
    CaptureError,
  );
  assert.equal(spawned.length, 0);

  provider.start(
    format,
    { kind: "application", capabilityToken: "speakers.monitor", usages: ["media", "game"] },
    handlers,
  );
  assert.equal(spawned[0]?.args.at(-1), "--device=speakers.monitor");
});

test("application capture refuses an empty usage list", () => {
  const { spawned, spawnProcess } = recordingSpawn();
  const provider = new ProcessCaptureProvider({ logger, spawnProcess });
  const handlers = { onData: () => undefined, onError: () => undefined };

  assert.throws(
    () => provider.start(format, { kind: "application", capabilityToken: "speakers.monitor", usages: [] }, handlers),
    { name: "CaptureError", message: "application capture requires at least one usage (media, game)" },
  );
  assert.equal(spawned.length, 0);
});

test("capture usages reach recorders that take a {usages} argument", () => {
  const { spawned, spawnProcess } = recordingSpawn();
  const command = "pw-filter-rec --rate={rate} --source={device} --roles={usages}";
  const handlers = { onData: () => undefined, onError: () => undefined };

  const app = new ProcessCaptureProvider({ logger, spawnProcess, command });
  app.start(
    format,
    { kind: "application", capabilityToken: "speakers.monitor", usages: ["game", "media", "game"] },
    handlers,
  );
  assert.deepEqual(spawned[0]?.args, ["--rate=16000", "--source=speakers.monitor", "--roles=game,media"]);

  const mic = new ProcessCaptureProvider({ logger, spawnProcess, command });
  mic.start(format, { kind: "microphone" }, handlers);
  assert.deepEqual(spawned[1]?.args, ["--rate=16000"]);
});

test("an unexpected recorder exit is reported as a capture error", () => {
  const { spawned, spawnProcess } = recordingSpawn();
  const provider = new ProcessCaptureProvider({ logger, spawnProcess });
  const errors: Error[] = [];
  provider.start(format, { kind: "microphone" }, { onData: () => undefined, onError: (e) => errors.push(e) });

  spawned[0]?.child.emit("exit", 1, null);

  assert.equal(errors.length, 1);
  assert.ok(errors[0] instanceof CaptureError);
  assert.equal(errors[0]?.message, "capture process exited unexpectedly (code=1, signal=null)");
});

test("playback writes pcm to the player's stdin", async () => {
  const { spawned, spawnProcess } = recordingSpawn();
  const provider = new ProcessPlaybackProvider({ logger, spawnProcess, command: "play {rate}" });
  const device = provider.open({ sampleRateHz: 24000, channels: 1, encoding: "pcm_s16le" });
  assert.deepEqual(spawned[0]?.args, ["24000"]);

  const stdin = spawned[0]?.child.stdin;
  const received: Buffer[] = [];
  stdin?.on("data", (chunk: Buffer) => received.push(chunk));

  await device.write(Buffer.from([5, 6]));
  await new Promise((resolve) => setImmediate(resolve));
  assert.deepEqual(received, [Buffer.from([5, 6])]);

  spawned[0]?.child.emit("exit", 0, null);
  await device.close();
  assert.equal(stdin?.writableEnded, true);
});
