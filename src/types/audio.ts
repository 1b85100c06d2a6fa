/**
 * Raw PCM format shared by both peers. Agreed out of band: nothing about the
 * format travels on the wire.
 */
export interface AudioFormat {
  sampleRate: number;
  channels: number;
  /** Bytes per sample for a single channel */
  bytesPerSample: number;
}

export const AUDIO_CONSTANTS = {
  /** Voice-quality capture: 16 kHz, mono, signed 16-bit little-endian */
  FORMAT: { sampleRate: 16_000, channels: 1, bytesPerSample: 2 } satisfies AudioFormat,

  /** Device latency used to size buffers when the device reports no minimum */
  DEFAULT_LATENCY_MS: 40,

  /** Noise gate threshold applied to captured frames */
  DEFAULT_NOISE_GATE_DBFS: -50,
} as const;

export interface BufferPlan {
  readonly format: AudioFormat;
  /** Size of every frame, both directions, for the lifetime of the session */
  readonly frameBytes: number;
}

export interface CaptureSource {
  /** Identifies the capture session; conditioning stages attach to it */
  readonly sessionId: string;
  start(): void;
  stop(): void;
  /**
   * Blocks until captured bytes are available and copies at most
   * `into.length` of them. Zero means nothing was captured this time.
   */
  read(into: Uint8Array, signal?: AbortSignal): Promise<number>;
  release(): void;
}

export interface PlaybackSink {
  play(): void;
  /** Plays the first `count` bytes of `data`; `data` may be reused once this resolves */
  write(data: Uint8Array, count: number): Promise<void>;
  stop(): void;
  release(): void;
}

/**
 * Post-capture processing stage (noise suppression, echo cancellation).
 * Configured once when created; processes frames in place.
 */
export interface AudioConditioner {
  readonly name: string;
  process(frame: Uint8Array): void;
  release(): void;
}

export interface AudioDevices {
  /** Smallest buffer the device accepts for this format, in bytes */
  minBufferSize(format: AudioFormat): number;
  openCapture(format: AudioFormat, bufferBytes: number): Promise<CaptureSource>;
  openPlayback(format: AudioFormat, bufferBytes: number): Promise<PlaybackSink>;
  /** Conditioning available for this capture source, if any */
  createConditioners?(source: CaptureSource): AudioConditioner[];
}
