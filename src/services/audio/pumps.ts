import { toLinkError, type LinkError } from "@/lib/errors";
import type { PlaybackSink } from "@/types/audio";
import type { ByteStream } from "../transport/types";

export type PumpExit =
  | { reason: "stopped" }
  | { reason: "end-of-stream" }
  | { reason: "failed"; error: LinkError };

/** Anything a frame can be captured from */
export interface FrameSource {
  read(frame: Uint8Array, signal?: AbortSignal): Promise<number>;
}

const STOPPED: PumpExit = { reason: "stopped" };

/** Playback that drops every frame, for reading a stream with no output device */
export const DISCARD_SINK: PlaybackSink = {
  play: () => {},
  write: () => Promise.resolve(),
  stop: () => {},
  release: () => {},
};

// ─────────────────────────────────────────────────────────────────────────────
// Capture → stream
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Moves captured frames onto the stream until the signal aborts or
 * something fails. Empty reads are skipped. A failed write ends the pump;
 * it is never retried, since the stream gives no resumption point.
 */
export async function runOutboundPump(
  capture: FrameSource,
  stream: ByteStream,
  frame: Uint8Array,
  signal: AbortSignal,
): Promise<PumpExit> {
  while (!signal.aborted) {
    let count: number;
    try {
      count = await capture.read(frame, signal);
    } catch (error) {
      if (signal.aborted) return STOPPED;
      return { reason: "failed", error: toLinkError(error, "audio-device-error") };
    }
    if (signal.aborted) return STOPPED;
    if (count === 0) continue;

    try {
      await stream.write(frame.subarray(0, count));
    } catch (error) {
      return { reason: "failed", error: toLinkError(error, "stream-error") };
    }
  }
  return STOPPED;
}

// ─────────────────────────────────────────────────────────────────────────────
// Stream → playback
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Forwards whatever each stream read returns to the playback sink. A read
 * of zero bytes means the remote side closed.
 */
export async function runInboundPump(
  stream: ByteStream,
  playback: PlaybackSink,
  frame: Uint8Array,
  signal: AbortSignal,
): Promise<PumpExit> {
  while (!signal.aborted) {
    let count: number;
    try {
      count = await stream.read(frame, signal);
    } catch (error) {
      if (signal.aborted) return STOPPED;
      return { reason: "failed", error: toLinkError(error, "stream-error") };
    }
    if (count === 0) return { reason: "end-of-stream" };

    try {
      await playback.write(frame, count);
    } catch (error) {
      if (signal.aborted) return STOPPED;
      return { reason: "failed", error: toLinkError(error, "audio-device-error") };
    }
  }
  return STOPPED;
}
