import { describe, it, expect, vi, beforeEach } from "vitest";

import { silentLogger } from "@/lib/logger";
import { CountingConditioner, FakeAudioDevices } from "@/test/fakes";
import { AUDIO_CONSTANTS } from "@/types/audio";
import { StaticCapabilityGate } from "../capabilityGate";
import { LoopbackStream } from "../loopback";
import { StreamingPipeline, type PipelineExit } from "./streamingPipeline";

describe("StreamingPipeline", () => {
  let devices: FakeAudioDevices;
  let local: LoopbackStream;
  let remote: LoopbackStream;
  let exits: PipelineExit[];
  let pipeline: StreamingPipeline;

  function createPipeline(gate = new StaticCapabilityGate()): StreamingPipeline {
    return new StreamingPipeline({
      stream: local,
      devices,
      gate,
      format: AUDIO_CONSTANTS.FORMAT,
      logger: silentLogger,
      onExit: (exit) => exits.push(exit),
    });
  }

  beforeEach(() => {
    devices = new FakeAudioDevices();
    [local, remote] = LoopbackStream.pair();
    exits = [];
    pipeline = createPipeline();
  });

  it("sizes both directions from one buffer plan", async () => {
    devices.minimum = 1001;
    await pipeline.open();

    expect(pipeline.frameBytes).toBe(1002);
    expect(devices.requestedBytes).toEqual([1002, 1002]);
    expect(devices.playbacks[0].playing).toBe(true);
    expect(pipeline.transmitting).toBe(false);
  });

  it("plays inbound bytes while muted", async () => {
    await pipeline.open();

    await remote.write(Uint8Array.of(1, 2, 3, 4));

    await vi.waitFor(() => expect(devices.playbacks[0].bytes).toEqual([1, 2, 3, 4]));
    expect(devices.captures[0].started).toBe(false);
  });

  it("sends captured bytes while transmitting", async () => {
    await pipeline.open();
    await pipeline.setTransmitting(true);

    devices.captures[0].feed(Uint8Array.of(9, 8));

    const into = new Uint8Array(4);
    await expect(remote.read(into)).resolves.toBe(2);
    expect(Array.from(into.subarray(0, 2))).toEqual([9, 8]);
    expect(pipeline.transmitting).toBe(true);
  });

  it("mutes without releasing capture or touching the stream", async () => {
    await pipeline.open();
    await pipeline.setTransmitting(true);
    await pipeline.setTransmitting(false);
    await pipeline.setTransmitting(true);

    const capture = devices.captures[0];
    expect(capture.startCount).toBe(2);
    expect(capture.stopCount).toBe(1);
    expect(capture.releaseCount).toBe(0);
    expect(devices.captures).toHaveLength(1);
    expect(local.isClosed).toBe(false);
    expect(exits).toEqual([]);
  });

  it("stops both pumps and releases devices once, leaving the stream open", async () => {
    const gate = new CountingConditioner("noise-gate");
    devices.conditioners = () => [gate];
    await pipeline.open();
    await pipeline.setTransmitting(true);

    await pipeline.stop();
    await pipeline.stop();

    expect(pipeline.transmitting).toBe(false);
    expect(devices.captures[0].releaseCount).toBe(1);
    expect(devices.playbacks[0].releaseCount).toBe(1);
    expect(devices.playbacks[0].playing).toBe(false);
    expect(gate.releaseCount).toBe(1);
    expect(local.isClosed).toBe(false);
    expect(exits).toEqual([]);
  });

  it("reports end of stream from the inbound pump", async () => {
    await pipeline.open();

    await remote.close();

    await vi.waitFor(() => expect(exits).toEqual([{ direction: "inbound", reason: "end-of-stream" }]));
  });

  it("reports a failed write and stops transmitting", async () => {
    await pipeline.open();
    await pipeline.setTransmitting(true);
    local.breakWrites();

    devices.captures[0].feed(Uint8Array.of(1));

    await vi.waitFor(() => expect(exits).toHaveLength(1));
    expect(exits[0]).toMatchObject({
      direction: "outbound",
      reason: "failed",
      error: { code: "stream-error" },
    });
    expect(pipeline.transmitting).toBe(false);
  });

  it("rejects a device that reports no usable buffer size", async () => {
    devices.minimum = 0;

    await expect(pipeline.open()).rejects.toMatchObject({ code: "resource-init-failed" });
    expect(devices.captures).toHaveLength(0);
  });

  it("releases capture when playback cannot be opened", async () => {
    devices.playbackFailure = new Error("no output device");

    await expect(pipeline.open()).rejects.toMatchObject({
      code: "resource-init-failed",
      detail: "no output device",
    });
    expect(devices.captures[0].releaseCount).toBe(1);
    expect(pipeline.isOpen).toBe(false);
  });

  it("requires the microphone permission", async () => {
    const denied = createPipeline(
      new StaticCapabilityGate({ radio: true, microphone: false, radioEnabled: true }),
    );

    await expect(denied.open()).rejects.toMatchObject({ code: "permission-denied" });
    expect(devices.captures).toHaveLength(0);
  });

  it("cannot transmit before it is open", async () => {
    await expect(pipeline.setTransmitting(true)).rejects.toMatchObject({ code: "invalid-state" });
    await expect(pipeline.setTransmitting(false)).resolves.toBeUndefined();
  });
});
