import type { LinkError } from "@/lib/errors";

/**
 * Remote device identity. Equality is by address only; the name is a label
 * and may be missing.
 */
export interface PeerId {
  address: string;
  name?: string;
}

export interface PeerCandidate {
  peer: PeerId;
  /** Sighting sequence number of the most recent advertisement seen */
  lastSeenOrder: number;
}

export type LinkRole = "host" | "client";

export type ConnectionState =
  | { kind: "idle" }
  | { kind: "announcing" }
  | { kind: "listening" }
  | { kind: "scanning" }
  | { kind: "connecting"; peer: PeerId; role: LinkRole }
  | { kind: "connected"; peer: PeerId; role: LinkRole; connectionId: string }
  | { kind: "closing"; peer: PeerId }
  | { kind: "failed"; error: LinkError };

export type ConnectionStateKind = ConnectionState["kind"];

/**
 * Read-only view handed to observers. A new object is built for every
 * transition; nothing in it is ever mutated after publication.
 */
export interface LinkSnapshot {
  readonly state: ConnectionState;
  readonly statusText: string;
  readonly candidates: readonly PeerCandidate[];
  readonly isAnnouncing: boolean;
  readonly isDiscovering: boolean;
  readonly isTransmitting: boolean;
  /** Last failure or close reason, cleared by the next user command */
  readonly notice: LinkError | null;
}

/** Payload of a discovery advertisement */
export interface Advertisement {
  marker: string;
  name: string;
}

/** One received advertisement, as reported by the medium */
export interface Sighting {
  address: string;
  marker: string;
  name?: string;
}
