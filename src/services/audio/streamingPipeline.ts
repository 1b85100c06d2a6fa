import { allocateFrame, createBufferPlan } from "@/lib/bufferPolicy";
import { LinkError, toLinkError } from "@/lib/errors";
import type { Logger } from "@/lib/logger";
import type { AudioDevices, AudioFormat, BufferPlan, PlaybackSink } from "@/types/audio";
import { ensureMicrophone, type CapabilityGate } from "../capabilityGate";
import type { ByteStream } from "../transport/types";
import { CaptureSession } from "./captureSession";
import { runInboundPump, runOutboundPump, type PumpExit } from "./pumps";

export type PumpDirection = "inbound" | "outbound";

/** A pump that ended on its own, for a reason other than being stopped */
export type PipelineExit = Exclude<PumpExit, { reason: "stopped" }> & { direction: PumpDirection };

export interface StreamingPipelineOptions {
  stream: ByteStream;
  devices: AudioDevices;
  gate: CapabilityGate;
  format: AudioFormat;
  logger: Logger;
  /** Called once per pump that ends by itself */
  onExit(exit: PipelineExit): void;
}

interface RunningPump {
  controller: AbortController;
  done: Promise<void>;
}

/**
 * The two pumps bound to one connection. The inbound pump runs from
 * open() to stop(); the outbound pump runs only while transmitting.
 *
 * The pipeline borrows the stream: it reads and writes but never closes
 * it. stop() returns once both pumps have exited, so the owner can close
 * the stream right after.
 */
export class StreamingPipeline {
  private plan: BufferPlan | null = null;
  private capture: CaptureSession | null = null;
  private playback: PlaybackSink | null = null;
  private inbound: RunningPump | null = null;
  private outbound: RunningPump | null = null;
  private outboundFrame: Uint8Array | null = null;
  private stopped = false;

  constructor(private readonly options: StreamingPipelineOptions) {}

  get transmitting(): boolean {
    return this.outbound !== null;
  }

  get isOpen(): boolean {
    return this.capture !== null && !this.stopped;
  }

  get frameBytes(): number | null {
    return this.plan?.frameBytes ?? null;
  }

  /**
   * Acquires the audio devices and starts the inbound pump. On failure
   * nothing stays acquired.
   *
   * @throws LinkError `permission-denied` or `resource-init-failed`
   */
  async open(): Promise<void> {
    if (this.stopped) throw new LinkError("invalid-state", "Pipeline stopped");
    if (this.capture) return;

    const { devices, gate, format, logger } = this.options;
    ensureMicrophone(gate);

    const plan = createBufferPlan(format, devices.minBufferSize(format));
    const capture = await CaptureSession.open(devices, plan, logger.child("capture"));

    let playback: PlaybackSink;
    try {
      playback = await devices.openPlayback(plan.format, plan.frameBytes);
      playback.play();
    } catch (error) {
      capture.release();
      throw toLinkError(error, "resource-init-failed");
    }

    if (this.stopped) {
      // stop() ran while the devices were opening.
      capture.release();
      playback.release();
      throw new LinkError("invalid-state", "Pipeline stopped");
    }

    this.plan = plan;
    this.capture = capture;
    this.playback = playback;
    this.outboundFrame = allocateFrame(plan);
    this.inbound = this.launch("inbound", (signal) =>
      runInboundPump(this.options.stream, playback, allocateFrame(plan), signal),
    );
    logger.info(`🎧 Pipeline open (${plan.frameBytes}-byte frames)`);
  }

  /** Starts or stops capture-and-send. The stream is left alone either way. */
  async setTransmitting(enabled: boolean): Promise<void> {
    const { capture, outboundFrame } = this;
    if (!capture || !outboundFrame || this.stopped) {
      if (enabled) throw new LinkError("invalid-state", "Pipeline not open");
      return;
    }

    if (enabled) {
      if (this.outbound) return;
      capture.start();
      this.outbound = this.launch("outbound", (signal) =>
        runOutboundPump(capture, this.options.stream, outboundFrame, signal),
      );
      this.options.logger.info("🎙️ Transmitting");
      return;
    }

    const running = this.outbound;
    if (!running) return;
    running.controller.abort();
    await running.done;
    capture.stop();
    this.options.logger.info("🔇 Muted");
  }

  /** Ends both pumps, waits for them, then releases the devices once */
  async stop(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;

    const running = [this.outbound, this.inbound].filter((p): p is RunningPump => p !== null);
    for (const pump of running) pump.controller.abort();
    await Promise.all(running.map((pump) => pump.done));

    this.capture?.release();
    this.capture = null;
    if (this.playback) {
      this.playback.stop();
      this.playback.release();
      this.playback = null;
    }
    this.options.logger.debug("Pipeline stopped");
  }

  private launch(
    direction: PumpDirection,
    run: (signal: AbortSignal) => Promise<PumpExit>,
  ): RunningPump {
    const controller = new AbortController();
    const pump: RunningPump = {
      controller,
      done: run(controller.signal)
        .catch((error: unknown): PumpExit => ({
          reason: "failed",
          error: toLinkError(error, direction === "inbound" ? "stream-error" : "audio-device-error"),
        }))
        .then((exit) => this.finish(direction, pump, exit)),
    };
    return pump;
  }

  private finish(direction: PumpDirection, pump: RunningPump, exit: PumpExit): void {
    if (direction === "outbound" && this.outbound === pump) this.outbound = null;
    if (direction === "inbound" && this.inbound === pump) this.inbound = null;
    if (exit.reason === "stopped") return;

    this.options.logger.debug(`${direction} pump ended: ${exit.reason}`);
    this.options.onExit({ ...exit, direction });
  }
}
