import type { AudioConditioner } from "@/types/audio";

const FULL_SCALE = 32_768;

export interface NoiseGateOptions {
  /** Frames whose RMS level is below this are silenced */
  thresholdDbfs: number;
}

/** Linear 16-bit amplitude for a level in dBFS */
export function thresholdAmplitude(dbfs: number): number {
  return Math.round(FULL_SCALE * 10 ** (dbfs / 20));
}

/** RMS of the signed 16-bit little-endian samples in `frame` */
export function frameRms(frame: Uint8Array): number {
  const samples = Math.floor(frame.length / 2);
  if (samples === 0) return 0;

  const view = new DataView(frame.buffer, frame.byteOffset, samples * 2);
  let sum = 0;
  for (let i = 0; i < samples; i++) {
    const s = view.getInt16(i * 2, true);
    sum += s * s;
  }
  return Math.sqrt(sum / samples);
}

/**
 * Frame-level noise gate for PCM16LE capture: a frame that stays under the
 * threshold is replaced by silence, anything louder passes untouched.
 */
export function createNoiseGate({ thresholdDbfs }: NoiseGateOptions): AudioConditioner {
  const threshold = thresholdAmplitude(thresholdDbfs);
  let released = false;

  return {
    name: "noise-gate",
    process(frame) {
      if (released) return;
      if (frameRms(frame) < threshold) frame.fill(0);
    },
    release() {
      released = true;
    },
  };
}
