import { hostname } from "node:os";

import type { AudioFormat } from "@/types/audio";
import { AUDIO_CONSTANTS } from "@/types/audio";
import { ConfigError } from "./errors";
import { isLogLevel, type LogLevel } from "./logger";

/**
 * Well-known identifiers shared by both peers. Discovery surfaces a
 * candidate only when the marker matches exactly, and the client locates
 * the host's acceptor by the service identifier.
 */
export const LINK_DEFAULTS = {
  MARKER: "8ce255c0-200a-11e0-ac64-0800200c9a66",
  SERVICE_ID: "AudioShareService",
  LINK_PORT: 47_800,
  DISCOVERY_PORT: 47_801,
  BROADCAST_ADDRESS: "255.255.255.255",
  BEACON_INTERVAL_MS: 1_000,
  CONNECT_TIMEOUT_MS: 15_000,
} as const;

export interface LinkConfig {
  deviceName: string;
  marker: string;
  serviceId: string;
  linkPort: number;
  discoveryPort: number;
  broadcastAddress: string;
  beaconIntervalMs: number;
  connectTimeoutMs: number;
  transmitOnConnect: boolean;
  /** null disables the noise gate */
  noiseGateDbfs: number | null;
  format: AudioFormat;
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

function readString(env: Env, name: string, fallback: string, maxLen = 64): string {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  if (raw.length > maxLen) {
    throw new ConfigError(name, `must be at most ${maxLen} characters`);
  }
  return raw;
}

function readInt(env: Env, name: string, fallback: number, min: number, max: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(name, `expected an integer, got "${raw}"`);
  }
  const value = parseInt(raw, 10);
  if (value < min || value > max) {
    throw new ConfigError(name, `must be between ${min} and ${max}`);
  }
  return value;
}

function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (["1", "true", "yes", "on"].includes(raw)) return true;
  if (["0", "false", "no", "off"].includes(raw)) return false;
  throw new ConfigError(name, `expected a boolean, got "${raw}"`);
}

function readNoiseGate(env: Env, name: string): number | null {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return AUDIO_CONSTANTS.DEFAULT_NOISE_GATE_DBFS;
  if (raw === "off") return null;
  const value = Number(raw);
  if (!Number.isFinite(value) || value >= 0 || value < -96) {
    throw new ConfigError(name, `expected a level in dBFS between -96 and 0, or "off"`);
  }
  return value;
}

function readLogLevel(env: Env): LogLevel {
  const raw = env.LOG_LEVEL?.trim().toLowerCase();
  if (!raw) return "info";
  if (!isLogLevel(raw)) {
    throw new ConfigError("LOG_LEVEL", `unknown level "${raw}"`);
  }
  return raw;
}

/**
 * Builds the runtime configuration from environment variables.
 *
 * @throws ConfigError naming the offending variable
 */
export function loadConfig(env: Env = process.env): LinkConfig {
  const linkPort = readInt(env, "AUDIO_LINK_PORT", LINK_DEFAULTS.LINK_PORT, 1, 65_535);
  const discoveryPort = readInt(
    env,
    "AUDIO_LINK_DISCOVERY_PORT",
    LINK_DEFAULTS.DISCOVERY_PORT,
    1,
    65_535,
  );
  if (linkPort === discoveryPort) {
    throw new ConfigError("AUDIO_LINK_DISCOVERY_PORT", "must differ from AUDIO_LINK_PORT");
  }

  return {
    deviceName: readString(env, "AUDIO_LINK_NAME", hostname() || "audio-link"),
    marker: readString(env, "AUDIO_LINK_MARKER", LINK_DEFAULTS.MARKER),
    serviceId: readString(env, "AUDIO_LINK_SERVICE", LINK_DEFAULTS.SERVICE_ID),
    linkPort,
    discoveryPort,
    broadcastAddress: readString(env, "AUDIO_LINK_BROADCAST", LINK_DEFAULTS.BROADCAST_ADDRESS),
    beaconIntervalMs: readInt(
      env,
      "AUDIO_LINK_BEACON_MS",
      LINK_DEFAULTS.BEACON_INTERVAL_MS,
      100,
      60_000,
    ),
    connectTimeoutMs: readInt(
      env,
      "AUDIO_LINK_CONNECT_TIMEOUT_MS",
      LINK_DEFAULTS.CONNECT_TIMEOUT_MS,
      100,
      120_000,
    ),
    transmitOnConnect: readBoolean(env, "AUDIO_LINK_TRANSMIT_ON_CONNECT", false),
    noiseGateDbfs: readNoiseGate(env, "AUDIO_LINK_NOISE_GATE_DBFS"),
    format: { ...AUDIO_CONSTANTS.FORMAT },
    logLevel: readLogLevel(env),
  };
}
