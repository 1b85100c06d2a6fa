import { LinkError } from "@/lib/errors";
import type { Logger } from "@/lib/logger";
import { makePeerId } from "@/lib/peerUtils";
import type { PeerCandidate, Sighting } from "@/types/link";
import { ensureRadio, type CapabilityGate } from "../capabilityGate";
import type { AdvertisingMedium } from "./types";

export interface SeekCallbacks {
  /** Receives the whole list every time it changes */
  onCandidates(candidates: readonly PeerCandidate[]): void;
  onFailed(error: LinkError): void;
}

/**
 * Scans for peers advertising the marker and keeps a deduplicated list of
 * them in first-seen order. Repeat sightings refresh `lastSeenOrder` in
 * place; nothing is ever re-sorted.
 */
export class Seeker {
  private candidates: PeerCandidate[] = [];
  private scanning = false;
  private generation = 0;
  private sightingCount = 0;

  constructor(
    private readonly medium: AdvertisingMedium,
    private readonly gate: CapabilityGate,
    private readonly logger: Logger,
  ) {}

  get isScanning(): boolean {
    return this.scanning;
  }

  getCandidates(): readonly PeerCandidate[] {
    return [...this.candidates];
  }

  /**
   * Starts a new discovery pass. The candidate list is cleared and reported
   * empty before anything else happens; calling this while scanning
   * restarts the pass.
   *
   * @throws LinkError `permission-denied` or `radio-disabled`
   */
  async start(marker: string, callbacks: SeekCallbacks): Promise<void> {
    this.halt();
    const generation = ++this.generation;
    this.candidates = [];
    this.sightingCount = 0;
    callbacks.onCandidates([]);

    await ensureRadio(this.gate);
    if (generation !== this.generation) return;

    this.scanning = true;
    this.medium.startScan({
      onSighting: (sighting) => {
        if (generation !== this.generation) return;
        if (this.accept(marker, sighting)) callbacks.onCandidates(this.getCandidates());
      },
      onFailed: (code) => {
        if (generation !== this.generation) return;
        this.scanning = false;
        this.logger.warn(`⚠️ Scan failed (${code})`);
        callbacks.onFailed(new LinkError("discovery-failed", undefined, { detail: code }));
      },
    });
    this.logger.info("🔍 Scanning for hosts");
  }

  /** Stops scanning; found candidates stay until the next start() */
  stop(): void {
    const wasScanning = this.scanning;
    this.halt();
    if (wasScanning) this.logger.debug("Scan stopped");
  }

  private halt(): void {
    this.generation++;
    if (!this.scanning) return;
    this.scanning = false;
    this.medium.stopScan();
  }

  private accept(marker: string, sighting: Sighting): boolean {
    if (sighting.marker !== marker) return false;
    const name = sighting.name?.trim();
    if (!name) {
      this.logger.debug(`Dropping nameless sighting from ${sighting.address}`);
      return false;
    }

    const order = ++this.sightingCount;
    const index = this.candidates.findIndex((c) => c.peer.address === sighting.address);
    if (index >= 0) {
      const updated = [...this.candidates];
      updated[index] = { ...updated[index], lastSeenOrder: order };
      this.candidates = updated;
      return true;
    }

    this.candidates = [...this.candidates, { peer: makePeerId(sighting.address, name), lastSeenOrder: order }];
    this.logger.info(`✨ Found ${name} (${sighting.address})`);
    return true;
  }
}
