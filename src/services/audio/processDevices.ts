/**
 * Audio devices backed by the ALSA command-line tools. Capture reads raw
 * PCM from `arecord` stdout; playback feeds `aplay` stdin.
 */

import { execFile, spawn, type ChildProcess } from "node:child_process";
import { nanoid } from "nanoid";

import { bytesForLatency } from "@/lib/bufferPolicy";
import { ByteQueue } from "@/lib/byteQueue";
import { LinkError, toLinkError } from "@/lib/errors";
import type { Logger } from "@/lib/logger";
import type {
  AudioConditioner,
  AudioDevices,
  AudioFormat,
  CaptureSource,
  PlaybackSink,
} from "@/types/audio";
import { createNoiseGate } from "./noiseGate";

export interface ProcessAudioOptions {
  captureCommand?: string;
  playbackCommand?: string;
  /** null disables the noise gate */
  noiseGateDbfs: number | null;
  logger: Logger;
}

const SAMPLE_FORMATS: Record<number, string> = {
  2: "S16_LE",
};

function pcmArgs(format: AudioFormat): string[] {
  const sampleFormat = SAMPLE_FORMATS[format.bytesPerSample];
  if (!sampleFormat) {
    throw new LinkError("resource-init-failed", undefined, {
      detail: `${format.bytesPerSample}-byte samples not supported`,
    });
  }
  return [
    "-q",
    "-t",
    "raw",
    "-f",
    sampleFormat,
    "-r",
    String(format.sampleRate),
    "-c",
    String(format.channels),
  ];
}

function probe(command: string): Promise<void> {
  return new Promise((resolve, reject) => {
    execFile(command, ["--version"], (error) => {
      if (error && "code" in error && error.code === "ENOENT") {
        reject(new LinkError("resource-init-failed", undefined, { detail: `${command} not found` }));
        return;
      }
      resolve();
    });
  });
}

function deviceError(detail: string): LinkError {
  return new LinkError("audio-device-error", undefined, { detail });
}

// ─────────────────────────────────────────────────────────────────────────────
// Capture
// ─────────────────────────────────────────────────────────────────────────────

class ProcessCaptureSource implements CaptureSource {
  readonly sessionId = nanoid(8);
  private child: ChildProcess | null = null;
  private queue = new ByteQueue();

  constructor(
    private readonly command: string,
    private readonly args: string[],
    private readonly logger: Logger,
  ) {}

  start(): void {
    if (this.child) return;
    const queue = new ByteQueue();
    const child = spawn(this.command, this.args, { stdio: ["ignore", "pipe", "pipe"] });
    this.queue = queue;
    this.child = child;

    child.stdout?.on("data", (chunk: Buffer) => queue.push(chunk));
    child.stderr?.on("data", (chunk: Buffer) => {
      this.logger.debug(`${this.command}: ${chunk.toString("utf8").trim()}`);
    });
    child.on("error", (error) => {
      this.logger.error(`❌ ${this.command} failed:`, error.message);
      queue.fail(toLinkError(error, "audio-device-error"));
    });
    child.on("exit", (code, signal) => {
      if (this.child === child) this.child = null;
      // An exit we did not ask for ends the capture for good.
      queue.fail(deviceError(`${this.command} exited (${code ?? signal})`));
    });
  }

  stop(): void {
    const child = this.child;
    if (!child) return;
    this.child = null;
    child.kill("SIGTERM");
  }

  read(into: Uint8Array, signal?: AbortSignal): Promise<number> {
    return this.queue.read(into, signal);
  }

  release(): void {
    this.stop();
    this.queue.clear();
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Playback
// ─────────────────────────────────────────────────────────────────────────────

class ProcessPlaybackSink implements PlaybackSink {
  private child: ChildProcess | null = null;
  private failure: LinkError | null = null;

  constructor(
    private readonly command: string,
    private readonly args: string[],
    private readonly logger: Logger,
  ) {}

  play(): void {
    if (this.child) return;
    const child = spawn(this.command, this.args, { stdio: ["pipe", "ignore", "pipe"] });
    this.child = child;
    this.failure = null;

    child.stdin?.on("error", (error) => {
      this.logger.debug(`${this.command} stdin:`, error.message);
    });
    child.stderr?.on("data", (chunk: Buffer) => {
      this.logger.debug(`${this.command}: ${chunk.toString("utf8").trim()}`);
    });
    child.on("error", (error) => {
      this.logger.error(`❌ ${this.command} failed:`, error.message);
      this.failure = toLinkError(error, "audio-device-error");
    });
    child.on("exit", (code, signal) => {
      if (this.child !== child) return;
      this.child = null;
      this.failure ??= deviceError(`${this.command} exited (${code ?? signal})`);
    });
  }

  write(data: Uint8Array, count: number): Promise<void> {
    if (this.failure) return Promise.reject(this.failure);
    const stdin = this.child?.stdin;
    if (!stdin || !stdin.writable) {
      return Promise.reject(deviceError("playback not started"));
    }
    // Copy: the caller reuses its frame for the next read.
    const chunk = Buffer.from(data.subarray(0, count));
    return new Promise<void>((resolve, reject) => {
      stdin.write(chunk, (error) => {
        if (error) {
          reject(toLinkError(error, "audio-device-error"));
        } else {
          resolve();
        }
      });
    });
  }

  stop(): void {
    const child = this.child;
    if (!child) return;
    this.child = null;
    child.stdin?.end();
    child.kill("SIGTERM");
  }

  release(): void {
    this.stop();
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Devices
// ─────────────────────────────────────────────────────────────────────────────

export class ProcessAudioDevices implements AudioDevices {
  private readonly captureCommand: string;
  private readonly playbackCommand: string;

  constructor(private readonly options: ProcessAudioOptions) {
    this.captureCommand = options.captureCommand ?? "arecord";
    this.playbackCommand = options.playbackCommand ?? "aplay";
  }

  /** Zero for formats the tools are not driven with; the buffer plan rejects it */
  minBufferSize(format: AudioFormat): number {
    if (!SAMPLE_FORMATS[format.bytesPerSample]) return 0;
    return bytesForLatency(format);
  }

  async openCapture(format: AudioFormat): Promise<CaptureSource> {
    const args = pcmArgs(format);
    await probe(this.captureCommand);
    return new ProcessCaptureSource(this.captureCommand, args, this.options.logger.child("arecord"));
  }

  async openPlayback(format: AudioFormat, bufferBytes: number): Promise<PlaybackSink> {
    const args = pcmArgs(format);
    await probe(this.playbackCommand);
    const bufferSamples = Math.max(1, Math.floor(bufferBytes / (format.channels * format.bytesPerSample)));
    return new ProcessPlaybackSink(
      this.playbackCommand,
      [...args, `--buffer-size=${bufferSamples * 4}`],
      this.options.logger.child("aplay"),
    );
  }

  createConditioners(): AudioConditioner[] {
    const { noiseGateDbfs } = this.options;
    return noiseGateDbfs === null ? [] : [createNoiseGate({ thresholdDbfs: noiseGateDbfs })];
  }
}
