/**
 * UDP broadcast beacons on the local segment.
 *
 * The announcer sends a small JSON datagram every `intervalMs` to the
 * broadcast address; scanners bind the discovery port and report each
 * datagram as a sighting whose address is `<sender ip>:<advertised port>`,
 * i.e. where the host's acceptor can be dialled.
 *
 * Beacons are non-connectable: they carry no session state and nobody
 * answers them.
 */

import { createSocket, type RemoteInfo, type Socket } from "node:dgram";

import type { Logger } from "@/lib/logger";
import type { Advertisement, Sighting } from "@/types/link";
import type { AdvertiseCallbacks, AdvertisingMedium, ScanCallbacks } from "./types";

const BEACON_VERSION = 1;
const MAX_BEACON_BYTES = 512;
const MAX_FIELD_LENGTH = 64;

export interface Beacon {
  v: typeof BEACON_VERSION;
  marker: string;
  name: string;
  /** Port of the host's stream acceptor */
  port: number;
}

export interface UdpBeaconOptions {
  discoveryPort: number;
  broadcastAddress: string;
  intervalMs: number;
  /** Port advertised for the stream acceptor */
  linkPort: number;
  logger: Logger;
}

function isField(v: unknown): v is string {
  return typeof v === "string" && v.length <= MAX_FIELD_LENGTH;
}

export function encodeBeacon(advertisement: Advertisement, port: number): Buffer {
  const beacon: Beacon = {
    v: BEACON_VERSION,
    marker: advertisement.marker,
    name: advertisement.name,
    port,
  };
  return Buffer.from(JSON.stringify(beacon), "utf8");
}

/**
 * Parses a datagram. Anything that is not a well-formed beacon of the
 * current version yields null.
 */
export function decodeBeacon(datagram: Uint8Array): Beacon | null {
  if (datagram.length === 0 || datagram.length > MAX_BEACON_BYTES) return null;

  let body: unknown;
  try {
    body = JSON.parse(Buffer.from(datagram).toString("utf8"));
  } catch {
    return null;
  }
  if (typeof body !== "object" || body === null) return null;

  const { v, marker, name, port } = body as Record<string, unknown>;
  if (v !== BEACON_VERSION) return null;
  if (!isField(marker) || marker.length === 0) return null;
  if (!isField(name)) return null;
  if (typeof port !== "number" || !Number.isInteger(port) || port < 1 || port > 65_535) {
    return null;
  }
  return { v: BEACON_VERSION, marker, name, port };
}

export function sightingFromBeacon(beacon: Beacon, sender: Pick<RemoteInfo, "address">): Sighting {
  return {
    address: `${sender.address}:${beacon.port}`,
    marker: beacon.marker,
    name: beacon.name,
  };
}

function closeSocket(socket: Socket, logger: Logger): void {
  try {
    socket.close();
  } catch (error) {
    logger.debug("Socket already closed:", error);
  }
}

export class UdpBeaconMedium implements AdvertisingMedium {
  private advertiser: { socket: Socket; timer: ReturnType<typeof setInterval> | null } | null =
    null;
  private scanner: Socket | null = null;

  constructor(private readonly options: UdpBeaconOptions) {}

  startAdvertising(advertisement: Advertisement, callbacks: AdvertiseCallbacks): void {
    if (this.advertiser) return;
    const { discoveryPort, broadcastAddress, intervalMs, linkPort, logger } = this.options;

    const socket = createSocket({ type: "udp4", reuseAddr: true });
    const state: { socket: Socket; timer: ReturnType<typeof setInterval> | null } = {
      socket,
      timer: null,
    };
    this.advertiser = state;

    const payload = encodeBeacon(advertisement, linkPort);
    const send = () => {
      socket.send(payload, discoveryPort, broadcastAddress, (error) => {
        if (error) logger.debug("Beacon send failed:", error.message);
      });
    };

    socket.on("error", (error: NodeJS.ErrnoException) => {
      logger.error("❌ Beacon socket error:", error.message);
      if (this.advertiser !== state) return;
      this.stopAdvertising();
      callbacks.onFailed(error.code ?? "EUNKNOWN");
    });

    socket.bind(0, () => {
      if (this.advertiser !== state) return;
      socket.setBroadcast(true);
      send();
      state.timer = setInterval(send, intervalMs);
      logger.info(`📡 Beaconing "${advertisement.name}" every ${intervalMs} ms`);
      callbacks.onStarted();
    });
  }

  stopAdvertising(): void {
    const advertiser = this.advertiser;
    if (!advertiser) return;
    this.advertiser = null;
    if (advertiser.timer) clearInterval(advertiser.timer);
    closeSocket(advertiser.socket, this.options.logger);
  }

  startScan(callbacks: ScanCallbacks): void {
    if (this.scanner) return;
    const { discoveryPort, logger } = this.options;

    const socket = createSocket({ type: "udp4", reuseAddr: true });
    this.scanner = socket;

    socket.on("message", (datagram: Buffer, rinfo: RemoteInfo) => {
      const beacon = decodeBeacon(datagram);
      if (!beacon) {
        logger.debug(`Ignoring malformed datagram from ${rinfo.address}`);
        return;
      }
      callbacks.onSighting(sightingFromBeacon(beacon, rinfo));
    });

    socket.on("error", (error: NodeJS.ErrnoException) => {
      logger.error("❌ Scan socket error:", error.message);
      if (this.scanner !== socket) return;
      this.stopScan();
      callbacks.onFailed(error.code ?? "EUNKNOWN");
    });

    socket.bind(discoveryPort, () => {
      logger.info(`🔍 Listening for beacons on UDP ${discoveryPort}`);
    });
  }

  stopScan(): void {
    const socket = this.scanner;
    if (!socket) return;
    this.scanner = null;
    closeSocket(socket, this.options.logger);
  }
}
