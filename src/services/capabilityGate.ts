import { networkInterfaces } from "node:os";

import { LinkError } from "@/lib/errors";
import type { Logger } from "@/lib/logger";

export type Capability = "radio" | "microphone";

/**
 * Externally supplied permission and radio state. The core never blocks on
 * it: "not granted" is an immediate failure.
 */
export interface CapabilityGate {
  isGranted(capability: Capability): boolean;
  isRadioEnabled(): boolean;
  /** Ask the user (or platform) to enable the radio. Resolves false on denial. */
  requestRadioEnable(): Promise<boolean>;
}

/**
 * Precondition for discovery and connection calls. When the radio is off the
 * enable request is made first and the caller proceeds only if it succeeds.
 */
export async function ensureRadio(gate: CapabilityGate): Promise<void> {
  if (!gate.isGranted("radio")) {
    throw new LinkError("permission-denied", "Radio permission required");
  }
  if (gate.isRadioEnabled()) return;

  const enabled = await gate.requestRadioEnable();
  if (!enabled) {
    throw new LinkError("radio-disabled");
  }
}

export function ensureMicrophone(gate: CapabilityGate): void {
  if (!gate.isGranted("microphone")) {
    throw new LinkError("permission-denied", "Microphone permission required");
  }
}

/**
 * Gate with fixed answers. Used by embedders that resolve permissions
 * before constructing the link, and by tests.
 */
export class StaticCapabilityGate implements CapabilityGate {
  constructor(
    private readonly grants: { radio: boolean; microphone: boolean; radioEnabled: boolean } = {
      radio: true,
      microphone: true,
      radioEnabled: true,
    },
  ) {}

  isGranted(capability: Capability): boolean {
    return this.grants[capability];
  }

  isRadioEnabled(): boolean {
    return this.grants.radioEnabled;
  }

  async requestRadioEnable(): Promise<boolean> {
    return this.grants.radioEnabled;
  }
}

/**
 * On a desktop host the "radio" is the local network: it counts as enabled
 * when at least one non-internal IPv4 interface is up. Enabling cannot be
 * requested programmatically, so the request re-checks after a hint.
 */
export class NetworkInterfaceGate implements CapabilityGate {
  constructor(private readonly logger: Logger) {}

  isGranted(): boolean {
    return true;
  }

  isRadioEnabled(): boolean {
    return Object.values(networkInterfaces()).some((entries) =>
      (entries ?? []).some((entry) => entry.family === "IPv4" && !entry.internal),
    );
  }

  async requestRadioEnable(): Promise<boolean> {
    this.logger.warn("📶 No active network interface. Connect to the local network and retry.");
    return this.isRadioEnabled();
  }
}
