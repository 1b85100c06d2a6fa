import { nanoid } from "nanoid";

import type { PeerId } from "@/types/link";

const CONNECTION_ID_LENGTH = 12;
const ATTEMPT_ID_LENGTH = 8;

/**
 * Generate a random connection ID
 */
export function generateConnectionId(): string {
  return nanoid(CONNECTION_ID_LENGTH);
}

/**
 * Generate an ID for one host or connect attempt
 */
export function generateAttemptId(): string {
  return nanoid(ATTEMPT_ID_LENGTH);
}

/**
 * Human-readable label, falling back to the address
 */
export function peerLabel(peer: PeerId): string {
  const name = peer.name?.trim();
  return name ? name : peer.address;
}

/**
 * Build a PeerId, dropping blank names
 */
export function makePeerId(address: string, name?: string | null): PeerId {
  const trimmed = name?.trim();
  return trimmed ? { address, name: trimmed } : { address };
}
