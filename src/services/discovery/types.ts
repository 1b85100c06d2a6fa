import type { Advertisement, Sighting } from "@/types/link";

export interface AdvertiseCallbacks {
  onStarted(): void;
  /** `code` is the medium's own failure code, e.g. a socket errno */
  onFailed(code: string): void;
}

export interface ScanCallbacks {
  onSighting(sighting: Sighting): void;
  onFailed(code: string): void;
}

/**
 * The broadcast side of the link layer. Start calls return immediately;
 * outcomes and sightings arrive later through the callbacks.
 */
export interface AdvertisingMedium {
  startAdvertising(advertisement: Advertisement, callbacks: AdvertiseCallbacks): void;
  stopAdvertising(): void;
  startScan(callbacks: ScanCallbacks): void;
  stopScan(): void;
}
