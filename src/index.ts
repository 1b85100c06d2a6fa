export { ConnectionManager } from "./services/connectionManager";
export type {
  ConnectionManagerConfig,
  ConnectionManagerEvents,
  ConnectionManagerOptions,
} from "./services/connectionManager";

export { Announcer } from "./services/discovery/announcer";
export { Seeker } from "./services/discovery/seeker";
export { UdpBeaconMedium, decodeBeacon, encodeBeacon } from "./services/discovery/udpBeacon";
export type { AdvertisingMedium, AdvertiseCallbacks, ScanCallbacks } from "./services/discovery/types";

export { WsTransport, WsByteStream } from "./services/transport/wsTransport";
export type { ByteStream, StreamAcceptor, StreamTransport, AcceptedStream } from "./services/transport/types";
export { LoopbackAir, LoopbackStream } from "./services/loopback";

export { StreamingPipeline } from "./services/audio/streamingPipeline";
export type { PipelineExit } from "./services/audio/streamingPipeline";
export { CaptureSession } from "./services/audio/captureSession";
export { createNoiseGate } from "./services/audio/noiseGate";
export { ProcessAudioDevices } from "./services/audio/processDevices";
export { runInboundPump, runOutboundPump } from "./services/audio/pumps";
export type { PumpExit } from "./services/audio/pumps";

export {
  NetworkInterfaceGate,
  StaticCapabilityGate,
  ensureMicrophone,
  ensureRadio,
} from "./services/capabilityGate";
export type { Capability, CapabilityGate } from "./services/capabilityGate";

export { LinkError, ConfigError, describeLinkError, isLinkError } from "./lib/errors";
export type { LinkErrorCode } from "./lib/errors";
export { loadConfig, LINK_DEFAULTS } from "./lib/config";
export type { LinkConfig } from "./lib/config";
export { createLogger, silentLogger } from "./lib/logger";
export type { Logger, LogLevel } from "./lib/logger";
export { createBufferPlan, bytesForLatency } from "./lib/bufferPolicy";
export { deriveSnapshot, statusText } from "./lib/linkView";

export { AUDIO_CONSTANTS } from "./types/audio";
export type {
  AudioConditioner,
  AudioDevices,
  AudioFormat,
  BufferPlan,
  CaptureSource,
  PlaybackSink,
} from "./types/audio";
export type * from "./types/link";
