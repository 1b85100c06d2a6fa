import { emitKeypressEvents } from "node:readline";

import { CliUsageError, USAGE, matchesFilter, parseCliArgs, type CliCommand } from "@/lib/cli";
import { ConfigError } from "@/lib/errors";
import { loadConfig, type LinkConfig } from "@/lib/config";
import { createLogger } from "@/lib/logger";
import { peerLabel } from "@/lib/peerUtils";
import { ProcessAudioDevices } from "@/services/audio/processDevices";
import { NetworkInterfaceGate } from "@/services/capabilityGate";
import { ConnectionManager } from "@/services/connectionManager";
import { UdpBeaconMedium } from "@/services/discovery/udpBeacon";
import { WsTransport } from "@/services/transport/wsTransport";
import type { LinkSnapshot } from "@/types/link";

const JOIN_SEARCH_TIMEOUT_MS = 30_000;
const FORCED_EXIT_MS = 10_000;

function readCommand(): CliCommand | null {
  try {
    return parseCliArgs(process.argv.slice(2));
  } catch (error) {
    if (!(error instanceof CliUsageError)) throw error;
    console.error(`❌ ${error.message}\n`);
    console.error(USAGE);
    process.exitCode = 2;
    return null;
  }
}

function readConfig(): LinkConfig | null {
  try {
    return loadConfig();
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error;
    console.error(`❌ Invalid configuration: ${error.message}`);
    process.exitCode = 1;
    return null;
  }
}

async function main(): Promise<void> {
  const command = readCommand();
  if (!command) return;
  if (command.kind === "help") {
    console.log(USAGE);
    return;
  }

  const config = readConfig();
  if (!config) return;

  const logger = createLogger("audio-link", config.logLevel);
  const manager = new ConnectionManager({
    config,
    medium: new UdpBeaconMedium({
      discoveryPort: config.discoveryPort,
      broadcastAddress: config.broadcastAddress,
      intervalMs: config.beaconIntervalMs,
      linkPort: config.linkPort,
      logger: logger.child("beacon"),
    }),
    transport: new WsTransport({
      localName: config.deviceName,
      port: config.linkPort,
      handshakeTimeoutMs: config.connectTimeoutMs,
      logger: logger.child("transport"),
    }),
    gate: new NetworkInterfaceGate(logger.child("gate")),
    devices: new ProcessAudioDevices({
      noiseGateDbfs: config.noiseGateDbfs,
      logger: logger.child("audio"),
    }),
    logger: logger.child("link"),
  });

  console.log(`🚀 audio-link started`);
  console.log(`🏷️  Device name: ${config.deviceName}`);
  console.log(`🔌 Link port: ${config.linkPort}, discovery port: ${config.discoveryPort}`);
  console.log(
    `🎚️  Noise gate: ${config.noiseGateDbfs === null ? "off" : `${config.noiseGateDbfs} dBFS`}`,
  );

  // ─── Graceful shutdown ─────────────────────────────────────────────────────

  let shuttingDown = false;
  const shutdown = (code = 0) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log("\n🛑 Shutting down audio-link...");

    setTimeout(() => {
      console.error("⚠️ Forced shutdown after timeout");
      process.exit(1);
    }, FORCED_EXIT_MS).unref();

    void manager.shutdown().then(
      () => {
        console.log("✅ Link closed gracefully");
        process.exit(code);
      },
      (error: unknown) => {
        console.error("❌ Shutdown failed:", error);
        process.exit(1);
      },
    );
  };

  process.on("SIGINT", () => shutdown());
  process.on("SIGTERM", () => shutdown());
  process.on("uncaughtException", (error: Error) => {
    console.error("❌ Uncaught Exception:", error);
    shutdown(1);
  });
  process.on("unhandledRejection", (reason: unknown) => {
    console.error("❌ Unhandled Rejection:", reason);
  });

  // ─── Status output ─────────────────────────────────────────────────────────

  let lastStatus = "";
  let listed = 0;
  let previous: LinkSnapshot = manager.snapshot;
  manager.on("change", (snapshot) => {
    if (snapshot.statusText !== lastStatus) {
      lastStatus = snapshot.statusText;
      console.log(`📶 ${snapshot.statusText}`);
    }

    if (snapshot.candidates.length < listed) listed = 0;
    for (const candidate of snapshot.candidates.slice(listed)) {
      console.log(`   • ${peerLabel(candidate.peer)} (${candidate.peer.address})`);
    }
    listed = snapshot.candidates.length;

    if (snapshot.isTransmitting !== previous.isTransmitting) {
      console.log(snapshot.isTransmitting ? "🎙️ Microphone on" : "🔇 Microphone muted");
    }

    // The acceptor is one-shot: host again once a link has gone away.
    if (
      command.kind === "host" &&
      previous.state.kind === "closing" &&
      snapshot.state.kind === "idle" &&
      !shuttingDown
    ) {
      void manager.requestHost().catch((error: unknown) => {
        console.error("❌ Could not host again:", error);
      });
    }
    previous = snapshot;
  });

  // ─── Keys ──────────────────────────────────────────────────────────────────

  if (process.stdin.isTTY) {
    emitKeypressEvents(process.stdin);
    process.stdin.setRawMode(true);
    process.stdin.resume();
    process.stdin.on("keypress", (_text: string | undefined, key?: { name?: string; ctrl?: boolean }) => {
      if (key?.name === "q" || (key?.ctrl && key.name === "c")) {
        shutdown();
      } else if (key?.name === "m") {
        void manager.toggleTransmit().catch((error: unknown) => {
          console.error("❌ Could not toggle microphone:", error instanceof Error ? error.message : error);
        });
      }
    });
    console.log("⌨️  Press m to mute/unmute, q to quit");
  }

  // ─── Command ───────────────────────────────────────────────────────────────

  switch (command.kind) {
    case "host":
      await manager.requestHost();
      return;
    case "scan":
      await manager.requestScan();
      return;
    case "join": {
      const { filter } = command;
      await manager.requestScan();
      console.log(filter ? `🔍 Looking for a host matching "${filter}"...` : "🔍 Looking for a host...");
      const found = await manager.waitFor(
        (s) => s.candidates.some((c) => matchesFilter(c.peer, filter)),
        JOIN_SEARCH_TIMEOUT_MS,
      );
      const target = found.candidates.find((c) => matchesFilter(c.peer, filter));
      if (target) await manager.requestConnect(target.peer);
      return;
    }
  }
}

main().catch((error: unknown) => {
  console.error("❌ Fatal:", error instanceof Error ? error.message : error);
  process.exit(1);
});
