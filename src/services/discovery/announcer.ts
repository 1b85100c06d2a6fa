import { LinkError } from "@/lib/errors";
import { TypedEmitter } from "@/lib/events";
import type { Logger } from "@/lib/logger";
import { ensureRadio, type CapabilityGate } from "../capabilityGate";
import type { AdvertisingMedium } from "./types";

export interface AnnounceCallbacks {
  /** Broadcasting could not begin, or stopped on its own */
  onFailed(error: LinkError): void;
}

/**
 * Makes this device findable by periodically broadcasting the marker and
 * the local display name. The advertisement is non-connectable; the host's
 * acceptor is opened separately.
 */
export class Announcer {
  private announcing = false;
  private pending = false;
  // Bumped by stop() so callbacks of an abandoned start are ignored.
  private generation = 0;
  private readonly events: TypedEmitter<{ change: boolean }>;

  constructor(
    private readonly medium: AdvertisingMedium,
    private readonly gate: CapabilityGate,
    private readonly logger: Logger,
  ) {
    this.events = new TypedEmitter(logger);
  }

  get isAnnouncing(): boolean {
    return this.announcing;
  }

  onChange(handler: (announcing: boolean) => void): () => void {
    return this.events.on("change", handler);
  }

  /**
   * Resolves once the broadcast has been requested. No-op while already
   * announcing or while a start is pending.
   *
   * @throws LinkError `permission-denied` or `radio-disabled`
   */
  async start(marker: string, name: string, callbacks: AnnounceCallbacks): Promise<void> {
    if (this.announcing || this.pending) return;

    this.pending = true;
    const generation = ++this.generation;

    try {
      await ensureRadio(this.gate);
    } catch (error) {
      if (generation === this.generation) this.pending = false;
      throw error;
    }
    // stop() was called while the radio check was in flight.
    if (generation !== this.generation) return;

    this.medium.startAdvertising(
      { marker, name },
      {
        onStarted: () => {
          if (generation !== this.generation) return;
          this.pending = false;
          this.setAnnouncing(true);
          this.logger.info(`📣 Announcing as "${name}"`);
        },
        onFailed: (code) => {
          if (generation !== this.generation) return;
          this.pending = false;
          this.setAnnouncing(false);
          this.logger.warn(`⚠️ Announcing failed (${code})`);
          callbacks.onFailed(new LinkError("discovery-failed", undefined, { detail: code }));
        },
      },
    );
  }

  stop(): void {
    if (!this.announcing && !this.pending) return;
    this.generation++;
    this.pending = false;
    this.medium.stopAdvertising();
    this.setAnnouncing(false);
    this.logger.debug("Announcing stopped");
  }

  private setAnnouncing(value: boolean): void {
    if (this.announcing === value) return;
    this.announcing = value;
    this.events.emit("change", value);
  }
}
