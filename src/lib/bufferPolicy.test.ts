import { describe, it, expect } from "vitest";

import { AUDIO_CONSTANTS } from "@/types/audio";
import { allocateFrame, blockAlign, bytesForLatency, createBufferPlan } from "./bufferPolicy";
import { LinkError } from "./errors";

const voice = AUDIO_CONSTANTS.FORMAT;
const stereo = { sampleRate: 44_100, channels: 2, bytesPerSample: 2 };

describe("blockAlign", () => {
  it("multiplies channels by sample width", () => {
    expect(blockAlign(voice)).toBe(2);
    expect(blockAlign(stereo)).toBe(4);
  });
});

describe("bytesForLatency", () => {
  it("sizes 40 ms of 16 kHz mono 16-bit audio by default", () => {
    expect(bytesForLatency(voice)).toBe(1280);
  });

  it("rounds partial samples up", () => {
    // 44.1 samples per ms → 44.1 * 10 = 441 samples of 4 bytes
    expect(bytesForLatency(stereo, 10)).toBe(1764);
    // 44.1 * 1 = 44.1 → 45 samples
    expect(bytesForLatency(stereo, 1)).toBe(180);
  });
});

describe("createBufferPlan", () => {
  it("keeps an aligned minimum as is", () => {
    const plan = createBufferPlan(voice, 640);
    expect(plan.frameBytes).toBe(640);
    expect(plan.format).toEqual(voice);
  });

  it("rounds an unaligned minimum up to a whole sample frame", () => {
    expect(createBufferPlan(voice, 641).frameBytes).toBe(642);
    expect(createBufferPlan(stereo, 1001).frameBytes).toBe(1004);
  });

  it("is frozen", () => {
    expect(Object.isFrozen(createBufferPlan(voice, 640))).toBe(true);
  });

  it.each([0, -1, Number.NaN, Number.POSITIVE_INFINITY])(
    "rejects a reported minimum of %s",
    (minimum) => {
      let thrown: unknown;
      try {
        createBufferPlan(voice, minimum);
      } catch (error) {
        thrown = error;
      }
      expect(thrown).toBeInstanceOf(LinkError);
      expect(thrown).toMatchObject({
        code: "resource-init-failed",
        detail: "unsupported format (16000 Hz, 1 ch)",
      });
    },
  );

  it("allocates frames of the planned size", () => {
    const plan = createBufferPlan(voice, 1280);
    expect(allocateFrame(plan).length).toBe(1280);
  });
});
