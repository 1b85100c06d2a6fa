import type { AudioFormat, BufferPlan } from "@/types/audio";
import { AUDIO_CONSTANTS } from "@/types/audio";
import { LinkError } from "./errors";

/** Bytes in one sample frame (all channels) */
export function blockAlign(format: AudioFormat): number {
  return format.channels * format.bytesPerSample;
}

/** Bytes needed to hold `latencyMs` of audio, rounded up to a whole block */
export function bytesForLatency(
  format: AudioFormat,
  latencyMs: number = AUDIO_CONSTANTS.DEFAULT_LATENCY_MS,
): number {
  const align = blockAlign(format);
  const samples = Math.ceil((format.sampleRate * latencyMs) / 1000);
  return samples * align;
}

/**
 * Fixes the frame size for a streaming session from the device's reported
 * minimum. Computed once per capture initialization and reused for every
 * frame in both directions; it is never renegotiated mid-stream.
 *
 * A non-positive or non-finite minimum means the device rejected the format.
 */
export function createBufferPlan(format: AudioFormat, reportedMinimum: number): BufferPlan {
  if (!Number.isFinite(reportedMinimum) || reportedMinimum <= 0) {
    throw new LinkError("resource-init-failed", undefined, {
      detail: `unsupported format (${format.sampleRate} Hz, ${format.channels} ch)`,
    });
  }

  const align = blockAlign(format);
  const frameBytes = Math.ceil(reportedMinimum / align) * align;

  return Object.freeze({ format: { ...format }, frameBytes });
}

export function allocateFrame(plan: BufferPlan): Uint8Array {
  return new Uint8Array(plan.frameBytes);
}
