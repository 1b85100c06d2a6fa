import { LinkError, toLinkError } from "@/lib/errors";
import type { Logger } from "@/lib/logger";
import type { AudioConditioner, AudioDevices, BufferPlan, CaptureSource } from "@/types/audio";

/**
 * A capture source together with the conditioning bound to it. Every frame
 * read goes through the conditioners in order; both are released together,
 * exactly once.
 */
export class CaptureSession {
  private released = false;

  private constructor(
    private readonly source: CaptureSource,
    private readonly conditioners: readonly AudioConditioner[],
    private readonly logger: Logger,
  ) {}

  /**
   * @throws LinkError `resource-init-failed` when the device cannot be opened
   */
  static async open(devices: AudioDevices, plan: BufferPlan, logger: Logger): Promise<CaptureSession> {
    let source: CaptureSource;
    try {
      source = await devices.openCapture(plan.format, plan.frameBytes);
    } catch (error) {
      throw toLinkError(error, "resource-init-failed");
    }

    let conditioners: AudioConditioner[];
    try {
      conditioners = devices.createConditioners?.(source) ?? [];
    } catch (error) {
      source.release();
      throw toLinkError(error, "resource-init-failed");
    }

    if (conditioners.length > 0) {
      logger.info(`🎚️ Conditioning: ${conditioners.map((c) => c.name).join(", ")}`);
    } else {
      logger.debug("No conditioning available for this capture source");
    }
    return new CaptureSession(source, conditioners, logger);
  }

  get sessionId(): string {
    return this.source.sessionId;
  }

  get conditionerNames(): string[] {
    return this.conditioners.map((c) => c.name);
  }

  get isReleased(): boolean {
    return this.released;
  }

  start(): void {
    if (this.released) throw new LinkError("invalid-state", "Capture session released");
    this.source.start();
  }

  stop(): void {
    if (this.released) return;
    this.source.stop();
  }

  /** Reads one frame and conditions the captured bytes in place */
  async read(frame: Uint8Array, signal?: AbortSignal): Promise<number> {
    if (this.released) throw new LinkError("invalid-state", "Capture session released");
    const count = await this.source.read(frame, signal);
    if (count > 0) {
      const captured = frame.subarray(0, count);
      for (const conditioner of this.conditioners) conditioner.process(captured);
    }
    return count;
  }

  release(): void {
    if (this.released) return;
    this.released = true;
    for (const conditioner of this.conditioners) {
      try {
        conditioner.release();
      } catch (error) {
        this.logger.warn(`Failed to release ${conditioner.name}:`, error);
      }
    }
    this.source.stop();
    this.source.release();
    this.logger.debug(`Capture session ${this.source.sessionId} released`);
  }
}
