import type { ConnectionState, LinkSnapshot, PeerCandidate } from "@/types/link";
import { describeLinkError, type LinkError } from "./errors";
import { peerLabel } from "./peerUtils";

/**
 * Everything the Connection Manager tracks. Observers never see this
 * directly; they get the derived snapshot.
 */
export interface LinkModel {
  state: ConnectionState;
  candidates: readonly PeerCandidate[];
  announcing: boolean;
  discovering: boolean;
  transmitting: boolean;
  notice: LinkError | null;
}

export const INITIAL_MODEL: LinkModel = {
  state: { kind: "idle" },
  candidates: [],
  announcing: false,
  discovering: false,
  transmitting: false,
  notice: null,
};

export function statusText(state: ConnectionState, notice: LinkError | null): string {
  switch (state.kind) {
    case "idle":
      return notice ? describeLinkError(notice) : "Not connected";
    case "announcing":
      return "Starting host...";
    case "listening":
      return "Waiting for a peer...";
    case "scanning":
      return "Scanning for hosts...";
    case "connecting":
      return `Connecting to ${peerLabel(state.peer)}...`;
    case "connected":
      return `Connected to ${peerLabel(state.peer)}`;
    case "closing":
      return "Disconnecting...";
    case "failed":
      return describeLinkError(state.error);
  }
}

/**
 * Projects the model onto the observer view. Flags that cannot hold in the
 * current state are forced off, so "transmitting while not connected" or
 * "discovering while connected" is never published.
 */
export function deriveSnapshot(model: LinkModel): LinkSnapshot {
  const { state } = model;
  const hosting = state.kind === "announcing" || state.kind === "listening";

  return Object.freeze({
    state,
    statusText: statusText(state, model.notice),
    candidates: Object.freeze([...model.candidates]),
    isAnnouncing: hosting && model.announcing,
    isDiscovering: state.kind === "scanning" && model.discovering,
    isTransmitting: state.kind === "connected" && model.transmitting,
    notice: model.notice,
  });
}
