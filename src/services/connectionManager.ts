/**
 * Connection Manager
 *
 * Owns the single link this device can have: who hosts, who connects, the
 * established stream and the streaming pipeline bound to it.
 *
 * Commands from the caller and callbacks from discovery, the acceptor, the
 * connect call and the pumps are all posted to one message queue and
 * handled one at a time; nothing else mutates the model. Callbacks that
 * belong to an attempt or connection that no longer exists are recognised
 * by id and dropped, closing any stream they carry.
 */

import { withTimeout } from "@/lib/async";
import { LinkError, describeLinkError, toLinkError } from "@/lib/errors";
import { TypedEmitter } from "@/lib/events";
import type { LinkConfig } from "@/lib/config";
import { INITIAL_MODEL, deriveSnapshot, type LinkModel } from "@/lib/linkView";
import { createLogger, type Logger } from "@/lib/logger";
import { generateAttemptId, generateConnectionId, peerLabel } from "@/lib/peerUtils";
import type { AudioDevices } from "@/types/audio";
import type {
  ConnectionState,
  ConnectionStateKind,
  LinkRole,
  LinkSnapshot,
  PeerCandidate,
  PeerId,
} from "@/types/link";
import { DISCARD_SINK, runInboundPump, type PumpExit } from "./audio/pumps";
import { StreamingPipeline, type PipelineExit } from "./audio/streamingPipeline";
import { ensureRadio, type CapabilityGate } from "./capabilityGate";
import { Announcer } from "./discovery/announcer";
import { Seeker } from "./discovery/seeker";
import type { AdvertisingMedium } from "./discovery/types";
import type { AcceptedStream, ByteStream, StreamAcceptor, StreamTransport } from "./transport/types";

export type ConnectionManagerConfig = Pick<
  LinkConfig,
  "deviceName" | "marker" | "serviceId" | "connectTimeoutMs" | "transmitOnConnect" | "format"
>;

export interface ConnectionManagerOptions {
  config: ConnectionManagerConfig;
  medium: AdvertisingMedium;
  transport: StreamTransport;
  gate: CapabilityGate;
  devices: AudioDevices;
  logger?: Logger;
}

export type ConnectionManagerEvents = {
  change: LinkSnapshot;
};

// ─── Messages ───────────────────────────────────────────────────────────────

type Command =
  | { type: "host" }
  | { type: "scan" }
  | { type: "connect"; peer: PeerId }
  | { type: "disconnect" }
  | { type: "stop-hosting" }
  | { type: "stop-scan" }
  | { type: "transmit"; enabled: boolean | "toggle" }
  | { type: "shutdown" };

type Notification =
  | { type: "announcing"; value: boolean }
  | { type: "announce-failed"; attemptId: string; error: LinkError }
  | { type: "accepted"; attemptId: string; accepted: AcceptedStream }
  | { type: "accept-failed"; attemptId: string; error: unknown }
  | { type: "candidates"; scanId: string; candidates: readonly PeerCandidate[] }
  | { type: "scan-failed"; scanId: string; error: LinkError }
  | { type: "stream-opened"; attemptId: string; stream: ByteStream }
  | { type: "connect-failed"; attemptId: string; error: unknown }
  | { type: "pump-exit"; connectionId: string; exit: PipelineExit };

type Message = Command | Notification;

interface QueueEntry {
  message: Message;
  resolve: () => void;
  reject: (error: unknown) => void;
}

/** Read size used to watch a stream that has no pipeline on it */
const WATCH_FRAME_BYTES = 1_024;

interface Attempt {
  id: string;
  role: LinkRole;
  acceptor: StreamAcceptor | null;
  /** Cancels the dial of a client attempt */
  abort: AbortController | null;
}

interface StreamWatch {
  controller: AbortController;
  done: Promise<void>;
}

interface ActiveConnection {
  id: string;
  peer: PeerId;
  role: LinkRole;
  stream: ByteStream;
  pipeline: StreamingPipeline | null;
  watcher: StreamWatch | null;
}

export class ConnectionManager {
  private model: LinkModel = INITIAL_MODEL;
  private current: LinkSnapshot = deriveSnapshot(INITIAL_MODEL);

  private attempt: Attempt | null = null;
  private connection: ActiveConnection | null = null;
  private scanId: string | null = null;
  private isShutDown = false;

  private messageQueue: QueueEntry[] = [];
  private isProcessingQueue = false;

  private readonly announcer: Announcer;
  private readonly seeker: Seeker;
  private readonly events: TypedEmitter<ConnectionManagerEvents>;
  private readonly logger: Logger;

  constructor(private readonly options: ConnectionManagerOptions) {
    this.logger = options.logger ?? createLogger("ConnectionManager");
    this.events = new TypedEmitter(this.logger);
    this.announcer = new Announcer(options.medium, options.gate, this.logger.child("announcer"));
    this.seeker = new Seeker(options.medium, options.gate, this.logger.child("seeker"));
    this.announcer.onChange((value) => this.notify({ type: "announcing", value }));
  }

  // =========================================================================
  // Public API
  // =========================================================================

  get snapshot(): LinkSnapshot {
    return this.current;
  }

  on<K extends keyof ConnectionManagerEvents>(
    event: K,
    handler: (payload: ConnectionManagerEvents[K]) => void,
  ): () => void {
    return this.events.on(event, handler);
  }

  /** Become discoverable and wait for one peer to connect */
  requestHost(): Promise<void> {
    return this.send({ type: "host" });
  }

  /** Start (or restart) a discovery pass */
  requestScan(): Promise<void> {
    return this.send({ type: "scan" });
  }

  /** Connect to a discovered host. Rejected while another attempt or link exists. */
  requestConnect(peer: PeerId): Promise<void> {
    return this.send({ type: "connect", peer });
  }

  disconnect(): Promise<void> {
    return this.send({ type: "disconnect" });
  }

  stopHosting(): Promise<void> {
    return this.send({ type: "stop-hosting" });
  }

  stopScan(): Promise<void> {
    return this.send({ type: "stop-scan" });
  }

  toggleTransmit(): Promise<void> {
    return this.send({ type: "transmit", enabled: "toggle" });
  }

  setTransmitting(enabled: boolean): Promise<void> {
    return this.send({ type: "transmit", enabled });
  }

  /** Ends every role and releases every resource; the manager is unusable after */
  shutdown(): Promise<void> {
    return this.send({ type: "shutdown" });
  }

  /**
   * Resolves with the first snapshot, current or future, that satisfies
   * `predicate`.
   */
  waitFor(predicate: (snapshot: LinkSnapshot) => boolean, timeoutMs = 15_000): Promise<LinkSnapshot> {
    if (predicate(this.current)) return Promise.resolve(this.current);

    return new Promise<LinkSnapshot>((resolve, reject) => {
      const timer = setTimeout(() => {
        off();
        reject(new Error(`Timed out after ${timeoutMs} ms waiting for link state`));
      }, timeoutMs);
      const off = this.events.on("change", (snapshot) => {
        if (!predicate(snapshot)) return;
        clearTimeout(timer);
        off();
        resolve(snapshot);
      });
    });
  }

  // =========================================================================
  // Queue
  // =========================================================================

  private send(command: Command): Promise<void> {
    if (this.isShutDown) {
      return Promise.reject(new LinkError("invalid-state", "Link has been shut down"));
    }
    return new Promise<void>((resolve, reject) => {
      this.messageQueue.push({ message: command, resolve, reject });
      void this.processMessageQueue();
    });
  }

  private notify(message: Notification): void {
    this.messageQueue.push({
      message,
      resolve: () => {},
      reject: (error) => this.logger.error(`Error handling "${message.type}":`, error),
    });
    void this.processMessageQueue();
  }

  private async processMessageQueue(): Promise<void> {
    if (this.isProcessingQueue) return;

    this.isProcessingQueue = true;
    while (this.messageQueue.length > 0) {
      const entry = this.messageQueue.shift();
      if (!entry) continue;
      try {
        await this.handle(entry.message);
        entry.resolve();
      } catch (error) {
        entry.reject(error);
      }
    }
    this.isProcessingQueue = false;
  }

  private async handle(message: Message): Promise<void> {
    switch (message.type) {
      case "host":
        return this.handleHost();
      case "scan":
        return this.handleScan();
      case "connect":
        return this.handleConnect(message.peer);
      case "disconnect":
        return this.handleDisconnect();
      case "stop-hosting":
        return this.handleStopHosting();
      case "stop-scan":
        return this.handleStopScan();
      case "transmit":
        return this.handleTransmit(
          message.enabled === "toggle" ? !this.model.transmitting : message.enabled,
        );
      case "shutdown":
        return this.handleShutdown();
      case "announcing":
        this.update({ announcing: message.value });
        return;
      case "announce-failed":
        return this.onAnnounceFailed(message.attemptId, message.error);
      case "accepted":
        return this.onAccepted(message.attemptId, message.accepted);
      case "accept-failed":
        return this.onAcceptFailed(message.attemptId, message.error);
      case "candidates":
        if (message.scanId === this.scanId) this.update({ candidates: message.candidates });
        return;
      case "scan-failed":
        return this.onScanFailed(message.scanId, message.error);
      case "stream-opened":
        return this.onStreamOpened(message.attemptId, message.stream);
      case "connect-failed":
        return this.onConnectFailed(message.attemptId, message.error);
      case "pump-exit":
        return this.onPumpExit(message.connectionId, message.exit);
    }
  }

  // =========================================================================
  // Hosting
  // =========================================================================

  private async handleHost(): Promise<void> {
    this.expectState(["idle"], "Cannot host");
    await this.requireRadio();

    const { config, transport } = this.options;
    const attempt: Attempt = { id: generateAttemptId(), role: "host", acceptor: null, abort: null };
    this.attempt = attempt;
    this.transition({ kind: "announcing" }, { notice: null, candidates: [] });

    let acceptor: StreamAcceptor;
    try {
      acceptor = await transport.listen(config.serviceId);
      attempt.acceptor = acceptor;
      await this.announcer.start(config.marker, config.deviceName, {
        onFailed: (error) => this.notify({ type: "announce-failed", attemptId: attempt.id, error }),
      });
    } catch (error) {
      const reason = toLinkError(error, "transport-error");
      await this.cancelHost();
      this.fail(reason);
      throw reason;
    }

    this.transition({ kind: "listening" });
    void acceptor.accept().then(
      (accepted) => this.notify({ type: "accepted", attemptId: attempt.id, accepted }),
      (error: unknown) => this.notify({ type: "accept-failed", attemptId: attempt.id, error }),
    );
  }

  private async onAccepted(attemptId: string, accepted: AcceptedStream): Promise<void> {
    const attempt = this.attempt;
    if (attempt?.id !== attemptId || this.model.state.kind !== "listening") {
      this.logger.debug("Dropping connection from a cancelled host attempt");
      await this.closeQuietly(accepted.stream);
      return;
    }

    this.logger.info(`🤝 ${peerLabel(accepted.peer)} connected`);
    await this.cancelHost();
    this.transition({ kind: "connecting", peer: accepted.peer, role: "host" });
    await this.establish(accepted.peer, "host", accepted.stream);
  }

  private async onAcceptFailed(attemptId: string, error: unknown): Promise<void> {
    if (this.attempt?.id !== attemptId) return;
    await this.cancelHost();
    this.fail(toLinkError(error, "transport-error"));
  }

  private async onAnnounceFailed(attemptId: string, error: LinkError): Promise<void> {
    if (this.attempt?.id !== attemptId) return;
    const { kind } = this.model.state;
    if (kind !== "announcing" && kind !== "listening") return;
    await this.cancelHost();
    this.fail(error);
  }

  private async handleStopHosting(): Promise<void> {
    const { kind } = this.model.state;
    if (kind !== "announcing" && kind !== "listening") return;
    await this.cancelHost();
    this.transition({ kind: "idle" }, { notice: null });
  }

  /** Stops announcing and closes the acceptor of the current host attempt */
  private async cancelHost(): Promise<void> {
    const attempt = this.attempt;
    this.announcer.stop();
    this.model = { ...this.model, announcing: false };
    if (attempt?.role !== "host") return;

    this.attempt = null;
    if (attempt.acceptor) {
      try {
        await attempt.acceptor.close();
      } catch (error) {
        this.logger.warn("Failed to close acceptor:", error);
      }
    }
  }

  // =========================================================================
  // Scanning
  // =========================================================================

  private async handleScan(): Promise<void> {
    this.expectState(["idle", "scanning"], "Cannot scan");

    const scanId = generateAttemptId();
    this.scanId = scanId;
    this.transition({ kind: "scanning" }, { notice: null, candidates: [], discovering: false });

    try {
      await this.seeker.start(this.options.config.marker, {
        onCandidates: (candidates) => this.notify({ type: "candidates", scanId, candidates }),
        onFailed: (error) => this.notify({ type: "scan-failed", scanId, error }),
      });
    } catch (error) {
      const reason = toLinkError(error, "discovery-failed");
      this.endScan();
      this.fail(reason);
      throw reason;
    }
    this.update({ discovering: true });
  }

  private onScanFailed(scanId: string, error: LinkError): void {
    if (scanId !== this.scanId) return;
    this.endScan();
    this.fail(error);
  }

  private handleStopScan(): void {
    if (this.model.state.kind !== "scanning") return;
    this.endScan();
    this.transition({ kind: "idle" });
  }

  private endScan(): void {
    this.seeker.stop();
    this.scanId = null;
    this.model = { ...this.model, discovering: false };
  }

  // =========================================================================
  // Connecting
  // =========================================================================

  private async handleConnect(peer: PeerId): Promise<void> {
    this.expectState(["idle", "scanning"], "Already connecting or connected");
    if (this.model.state.kind === "scanning") this.endScan();
    await this.requireRadio();

    const { config, transport } = this.options;
    const abort = new AbortController();
    const attempt: Attempt = { id: generateAttemptId(), role: "client", acceptor: null, abort };
    this.attempt = attempt;
    this.transition({ kind: "connecting", peer, role: "client" }, { notice: null });
    this.logger.info(`🔗 Connecting to ${peerLabel(peer)}...`);

    void withTimeout(
      transport.connect(peer, config.serviceId, abort.signal),
      config.connectTimeoutMs,
      () => {
        abort.abort();
        return new LinkError("connect-timeout", undefined, { detail: `${config.connectTimeoutMs} ms` });
      },
      (late) => {
        this.logger.debug("Closing stream that arrived after the connect timeout");
        void this.closeQuietly(late);
      },
    ).then(
      (stream) => this.notify({ type: "stream-opened", attemptId: attempt.id, stream }),
      (error: unknown) => this.notify({ type: "connect-failed", attemptId: attempt.id, error }),
    );
  }

  /** Drops the current attempt; a client attempt's dial is cancelled */
  private abandonAttempt(): void {
    this.attempt?.abort?.abort();
    this.attempt = null;
  }

  private async onStreamOpened(attemptId: string, stream: ByteStream): Promise<void> {
    const { state } = this.model;
    if (this.attempt?.id !== attemptId || state.kind !== "connecting") {
      this.logger.debug("Dropping stream from a cancelled connect attempt");
      await this.closeQuietly(stream);
      return;
    }
    this.attempt = null;
    await this.establish(state.peer, "client", stream);
  }

  private onConnectFailed(attemptId: string, error: unknown): void {
    if (this.attempt?.id !== attemptId) return;
    this.attempt = null;
    this.fail(toLinkError(error, "connection-refused"));
  }

  // =========================================================================
  // Connected
  // =========================================================================

  private async establish(peer: PeerId, role: LinkRole, stream: ByteStream): Promise<void> {
    const connectionId = generateConnectionId();
    const connection: ActiveConnection = {
      id: connectionId,
      peer,
      role,
      stream,
      pipeline: null,
      watcher: null,
    };
    this.connection = connection;
    this.transition({ kind: "connected", peer, role, connectionId }, { transmitting: false });
    this.logger.info(`✅ Connected to ${peerLabel(peer)} as ${role}`);

    try {
      connection.pipeline = await this.openPipeline(connection);
    } catch (error) {
      this.watchStream(connection);
      this.update({ notice: toLinkError(error, "resource-init-failed") });
      return;
    }

    if (this.options.config.transmitOnConnect) {
      try {
        await this.applyTransmitting(connection, true);
      } catch (error) {
        this.update({ notice: toLinkError(error, "audio-device-error") });
      }
    }
  }

  private async openPipeline(connection: ActiveConnection): Promise<StreamingPipeline> {
    const { devices, gate, config } = this.options;
    const pipeline = new StreamingPipeline({
      stream: connection.stream,
      devices,
      gate,
      format: config.format,
      logger: this.logger.child("pipeline"),
      onExit: (exit) => this.notify({ type: "pump-exit", connectionId: connection.id, exit }),
    });
    try {
      await pipeline.open();
    } catch (error) {
      const reason = toLinkError(error, "resource-init-failed");
      this.logger.warn(`⚠️ Audio unavailable: ${describeLinkError(reason)}`);
      throw reason;
    }
    return pipeline;
  }

  private async handleTransmit(enabled: boolean): Promise<void> {
    const connection = this.connection;
    if (!connection || this.model.state.kind !== "connected") {
      if (enabled) throw new LinkError("invalid-state", "Not connected");
      return;
    }

    try {
      // A pipeline that could not open is retried on the next unmute.
      if (!connection.pipeline) {
        if (!enabled) return;
        await this.stopWatching(connection);
        try {
          connection.pipeline = await this.openPipeline(connection);
        } catch (error) {
          this.watchStream(connection);
          throw error;
        }
      }
      await this.applyTransmitting(connection, enabled);
    } catch (error) {
      const reason = toLinkError(error, "resource-init-failed");
      this.update({ notice: reason });
      throw reason;
    }
  }

  private async applyTransmitting(connection: ActiveConnection, enabled: boolean): Promise<void> {
    const pipeline = connection.pipeline;
    if (!pipeline) return;
    await pipeline.setTransmitting(enabled);
    this.update({ transmitting: pipeline.transmitting, notice: null });
  }

  /**
   * Reads and discards the stream of a connection that has no pipeline, so
   * a remote close or a stream failure still ends the link.
   */
  private watchStream(connection: ActiveConnection): void {
    const controller = new AbortController();
    const frame = new Uint8Array(WATCH_FRAME_BYTES);
    const done = runInboundPump(connection.stream, DISCARD_SINK, frame, controller.signal)
      .catch((error: unknown): PumpExit => ({
        reason: "failed",
        error: toLinkError(error, "stream-error"),
      }))
      .then((exit) => {
        if (exit.reason === "stopped") return;
        this.notify({
          type: "pump-exit",
          connectionId: connection.id,
          exit: { ...exit, direction: "inbound" },
        });
      });
    connection.watcher = { controller, done };
  }

  private async stopWatching(connection: ActiveConnection): Promise<void> {
    const watcher = connection.watcher;
    if (!watcher) return;
    connection.watcher = null;
    watcher.controller.abort();
    await watcher.done;
  }

  private async onPumpExit(connectionId: string, exit: PipelineExit): Promise<void> {
    if (this.connection?.id !== connectionId) return;

    const reason =
      exit.reason === "end-of-stream" ? new LinkError("connection-lost") : exit.error;
    this.logger.warn(`⚠️ ${exit.direction} pump ended: ${describeLinkError(reason)}`);
    // Nothing can be sent into a dead link.
    this.update({ transmitting: false });
    await this.teardown(reason);
  }

  private async handleDisconnect(): Promise<void> {
    const { state } = this.model;
    switch (state.kind) {
      case "connected":
        await this.teardown(null);
        return;
      case "connecting":
        this.abandonAttempt();
        this.transition({ kind: "closing", peer: state.peer });
        this.transition({ kind: "idle" }, { notice: null });
        return;
      case "announcing":
      case "listening":
        return this.handleStopHosting();
      case "scanning":
        return this.handleStopScan();
      default:
        return;
    }
  }

  /**
   * Closing → Idle. The pipeline (or the stream watch) is stopped, and its
   * pumps awaited, before the stream is closed.
   */
  private async teardown(reason: LinkError | null): Promise<void> {
    const connection = this.connection;
    if (!connection) return;

    this.transition({ kind: "closing", peer: connection.peer }, { transmitting: false });
    await this.stopWatching(connection);
    if (connection.pipeline) {
      try {
        await connection.pipeline.stop();
      } catch (error) {
        this.logger.error("Failed to stop pipeline:", error);
      }
    }
    await this.closeQuietly(connection.stream);
    this.connection = null;

    this.transition({ kind: "idle" }, { notice: reason });
    this.logger.info(
      reason ? `🔌 Link closed: ${describeLinkError(reason)}` : "🔌 Disconnected",
    );
  }

  private async handleShutdown(): Promise<void> {
    this.logger.info("🛑 Shutting down link...");
    this.isShutDown = true;
    this.endScan();
    await this.cancelHost();
    this.abandonAttempt();
    await this.teardown(null);
    if (this.model.state.kind !== "idle") this.transition({ kind: "idle" });
    this.events.clear();
  }

  // =========================================================================
  // Model
  // =========================================================================

  /** Radio precondition for hosting and connecting; failure ends in Failed → Idle */
  private async requireRadio(): Promise<void> {
    try {
      await ensureRadio(this.options.gate);
    } catch (error) {
      const reason = toLinkError(error, "permission-denied");
      this.fail(reason);
      throw reason;
    }
  }

  private expectState(allowed: ConnectionStateKind[], action: string): void {
    const { kind } = this.model.state;
    if (!allowed.includes(kind)) {
      throw new LinkError("invalid-state", `${action} while ${kind}`);
    }
  }

  /** Failed(reason), then straight back to Idle with the reason kept */
  private fail(error: LinkError): void {
    this.logger.warn(`❌ ${describeLinkError(error)}`);
    this.transition({ kind: "failed", error }, { discovering: false, transmitting: false });
    this.transition({ kind: "idle" }, { notice: error });
  }

  private transition(state: ConnectionState, patch: Partial<Omit<LinkModel, "state">> = {}): void {
    const previous = this.model.state.kind;
    this.model = { ...this.model, ...patch, state };
    this.logger.debug(`State: ${previous} → ${state.kind}`);
    this.publish();
  }

  private update(patch: Partial<Omit<LinkModel, "state">>): void {
    this.model = { ...this.model, ...patch };
    this.publish();
  }

  private publish(): void {
    this.current = deriveSnapshot(this.model);
    this.events.emit("change", this.current);
  }

  private async closeQuietly(stream: ByteStream): Promise<void> {
    try {
      await stream.close();
    } catch (error) {
      this.logger.debug("Stream close failed:", error);
    }
  }
}
