/**
 * In-process link layer.
 *
 * A LoopbackAir stands in for the radio shared by several devices: every
 * medium created from it hears the advertisements of the others, and every
 * transport created from it can reach the acceptors the others registered.
 * Callbacks and connects complete on a later turn of the event loop, the
 * way platform callbacks do.
 *
 * Used by the test suite and by embedders that run both ends in one
 * process.
 */

import { ByteQueue } from "@/lib/byteQueue";
import { LinkError } from "@/lib/errors";
import type { Advertisement, PeerId } from "@/types/link";
import type { AdvertiseCallbacks, AdvertisingMedium, ScanCallbacks } from "./discovery/types";
import type { AcceptedStream, ByteStream, StreamAcceptor, StreamTransport } from "./transport/types";

function later(fn: () => void): void {
  setImmediate(fn);
}

// ─────────────────────────────────────────────────────────────────────────────
// Streams
// ─────────────────────────────────────────────────────────────────────────────

export class LoopbackStream implements ByteStream {
  private readonly incoming = new ByteQueue();
  private remote: LoopbackStream | null = null;
  private closed = false;
  private writeFailure: LinkError | null = null;

  static pair(): [LoopbackStream, LoopbackStream] {
    const a = new LoopbackStream();
    const b = new LoopbackStream();
    a.remote = b;
    b.remote = a;
    return [a, b];
  }

  get isClosed(): boolean {
    return this.closed;
  }

  read(into: Uint8Array, signal?: AbortSignal): Promise<number> {
    if (this.closed) {
      return Promise.reject(new LinkError("stream-error", "Stream closed"));
    }
    return this.incoming.read(into, signal);
  }

  async write(data: Uint8Array): Promise<void> {
    if (this.closed) throw new LinkError("stream-error", "Stream closed");
    if (this.writeFailure) throw this.writeFailure;
    if (!this.remote || this.remote.closed) {
      throw new LinkError("stream-error", undefined, { detail: "broken pipe" });
    }
    this.remote.incoming.push(data.slice());
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.incoming.fail(new LinkError("stream-error", "Stream closed"));
    this.remote?.incoming.end();
  }

  /** Makes every following write fail, as a dropped link would */
  breakWrites(error: LinkError = new LinkError("stream-error", undefined, { detail: "broken pipe" })): void {
    this.writeFailure = error;
  }

  /** Makes the pending and following reads fail */
  breakReads(error: LinkError = new LinkError("stream-error", undefined, { detail: "reset" })): void {
    this.incoming.fail(error);
  }
}

export interface LoopbackLink {
  client: LoopbackStream;
  host: LoopbackStream;
  clientPeer: PeerId;
  hostAddress: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Acceptor
// ─────────────────────────────────────────────────────────────────────────────

class LoopbackAcceptor implements StreamAcceptor {
  private accepted: AcceptedStream | null = null;
  private failure: LinkError | null = null;
  private handedOut = false;
  private waiter: {
    resolve: (value: AcceptedStream) => void;
    reject: (reason: LinkError) => void;
  } | null = null;

  constructor(private readonly unregister: () => void) {}

  /** Returns false when the acceptor can no longer take a connection */
  offer(accepted: AcceptedStream): boolean {
    if (this.accepted || this.failure) return false;
    this.accepted = accepted;
    this.unregister();
    this.deliver();
    return true;
  }

  accept(): Promise<AcceptedStream> {
    if (this.failure) return Promise.reject(this.failure);
    if (this.handedOut || this.waiter) {
      return Promise.reject(new LinkError("invalid-state", "Acceptor is one-shot"));
    }
    return new Promise<AcceptedStream>((resolve, reject) => {
      this.waiter = { resolve, reject };
      this.deliver();
    });
  }

  async close(): Promise<void> {
    this.unregister();
    if (this.accepted) return;
    if (!this.failure) {
      this.failure = new LinkError("transport-error", "Acceptor closed");
    }
    this.waiter?.reject(this.failure);
    this.waiter = null;
  }

  private deliver(): void {
    if (!this.accepted || !this.waiter) return;
    this.handedOut = true;
    this.waiter.resolve(this.accepted);
    this.waiter = null;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Air
// ─────────────────────────────────────────────────────────────────────────────

interface Advertiser {
  advertisement: Advertisement;
}

export class LoopbackAir {
  private readonly advertisers = new Map<string, Advertiser>();
  private readonly scanners = new Map<string, ScanCallbacks>();
  private readonly acceptors = new Map<string, LoopbackAcceptor>();
  private readonly pendingAdvertisements = new Map<string, AdvertiseCallbacks>();
  private advertiseFailure: string | null = null;
  private scanFailure: string | null = null;

  /** Every connection established through this air, oldest first */
  readonly links: LoopbackLink[] = [];

  createMedium(address: string): AdvertisingMedium {
    return {
      startAdvertising: (advertisement, callbacks) =>
        this.startAdvertising(address, advertisement, callbacks),
      stopAdvertising: () => {
        this.pendingAdvertisements.delete(address);
        this.advertisers.delete(address);
      },
      startScan: (callbacks) => this.startScan(address, callbacks),
      stopScan: () => {
        this.scanners.delete(address);
      },
    };
  }

  createTransport(local: PeerId): StreamTransport {
    return {
      listen: async (serviceId) => {
        const key = `${local.address}/${serviceId}`;
        if (this.acceptors.has(key)) {
          throw new LinkError("transport-error", undefined, { detail: "address in use" });
        }
        const acceptor = new LoopbackAcceptor(() => {
          if (this.acceptors.get(key) === acceptor) this.acceptors.delete(key);
        });
        this.acceptors.set(key, acceptor);
        return acceptor;
      },
      connect: (peer, serviceId, signal) =>
        new Promise<ByteStream>((resolve, reject) => {
          later(() => {
            if (signal?.aborted) {
              reject(new LinkError("transport-error", "Connect cancelled"));
              return;
            }
            const acceptor = this.acceptors.get(`${peer.address}/${serviceId}`);
            const [client, host] = LoopbackStream.pair();
            if (!acceptor || !acceptor.offer({ stream: host, peer: local })) {
              reject(new LinkError("connection-refused", undefined, { detail: "no such service" }));
              return;
            }
            this.links.push({ client, host, clientPeer: local, hostAddress: peer.address });
            resolve(client);
          });
        }),
    };
  }

  /** Delivers every current advertisement to every scanner again */
  rebroadcast(): void {
    for (const [address, advertiser] of this.advertisers) {
      this.deliverToScanners(address, advertiser.advertisement);
    }
  }

  /** Next advertise start fails with `code`; pass null to clear */
  failAdvertising(code: string | null): void {
    this.advertiseFailure = code;
  }

  /** Next scan start fails with `code`; pass null to clear */
  failScanning(code: string | null): void {
    this.scanFailure = code;
  }

  isAdvertising(address: string): boolean {
    return this.advertisers.has(address);
  }

  isListening(address: string, serviceId: string): boolean {
    return this.acceptors.has(`${address}/${serviceId}`);
  }

  private startAdvertising(
    address: string,
    advertisement: Advertisement,
    callbacks: AdvertiseCallbacks,
  ): void {
    const failure = this.advertiseFailure;
    this.advertiseFailure = null;
    this.pendingAdvertisements.set(address, callbacks);
    later(() => {
      // Stopped (or restarted) before the start completed.
      if (this.pendingAdvertisements.get(address) !== callbacks) return;
      this.pendingAdvertisements.delete(address);
      if (failure) {
        callbacks.onFailed(failure);
        return;
      }
      this.advertisers.set(address, { advertisement });
      callbacks.onStarted();
      this.deliverToScanners(address, advertisement);
    });
  }

  private startScan(address: string, callbacks: ScanCallbacks): void {
    const failure = this.scanFailure;
    this.scanFailure = null;
    if (!failure) this.scanners.set(address, callbacks);
    later(() => {
      if (failure) {
        callbacks.onFailed(failure);
        return;
      }
      for (const [advertiserAddress, advertiser] of this.advertisers) {
        if (advertiserAddress === address) continue;
        if (this.scanners.get(address) !== callbacks) return;
        callbacks.onSighting({ address: advertiserAddress, ...advertiser.advertisement });
      }
    });
  }

  private deliverToScanners(address: string, advertisement: Advertisement): void {
    for (const [scannerAddress, callbacks] of this.scanners) {
      if (scannerAddress === address) continue;
      callbacks.onSighting({ address, ...advertisement });
    }
  }
}
