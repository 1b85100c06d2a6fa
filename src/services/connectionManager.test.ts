/**
 * Connection Manager Tests
 *
 * Two or more devices share one in-process LoopbackAir, so discovery,
 * accept and connect run through the same code paths as on a real link.
 */

import { describe, it, expect, vi, afterEach } from "vitest";

import { LinkError } from "@/lib/errors";
import { silentLogger } from "@/lib/logger";
import { FakeAudioDevices } from "@/test/fakes";
import { AUDIO_CONSTANTS } from "@/types/audio";
import type { ConnectionStateKind, LinkSnapshot } from "@/types/link";
import { StaticCapabilityGate, type CapabilityGate } from "./capabilityGate";
import { ConnectionManager, type ConnectionManagerConfig } from "./connectionManager";
import { LoopbackAir, LoopbackStream } from "./loopback";
import type { ByteStream, StreamTransport } from "./transport/types";

const MARKER = "test-marker";
const SERVICE = "TestService";
const WAIT_MS = 2_000;

interface Device {
  manager: ConnectionManager;
  devices: FakeAudioDevices;
  kinds: ConnectionStateKind[];
}

const managers: ConnectionManager[] = [];

function createDevice(
  air: LoopbackAir,
  address: string,
  name: string,
  overrides: {
    gate?: CapabilityGate;
    transport?: StreamTransport;
    config?: Partial<ConnectionManagerConfig>;
  } = {},
): Device {
  const devices = new FakeAudioDevices();
  const manager = new ConnectionManager({
    config: {
      deviceName: name,
      marker: MARKER,
      serviceId: SERVICE,
      connectTimeoutMs: 1_000,
      transmitOnConnect: false,
      format: { ...AUDIO_CONSTANTS.FORMAT },
      ...overrides.config,
    },
    medium: air.createMedium(address),
    transport: overrides.transport ?? air.createTransport({ address, name }),
    gate: overrides.gate ?? new StaticCapabilityGate(),
    devices,
    logger: silentLogger,
  });
  managers.push(manager);

  const kinds: ConnectionStateKind[] = [];
  manager.on("change", (snapshot) => {
    if (kinds[kinds.length - 1] !== snapshot.state.kind) kinds.push(snapshot.state.kind);
  });
  return { manager, devices, kinds };
}

const isConnected = (s: LinkSnapshot) => s.state.kind === "connected";
const isIdle = (s: LinkSnapshot) => s.state.kind === "idle";

function connectionId(snapshot: LinkSnapshot): string | null {
  return snapshot.state.kind === "connected" ? snapshot.state.connectionId : null;
}

/** Host on A, scan and connect from B */
async function connectPair(air: LoopbackAir): Promise<{ a: Device; b: Device }> {
  const a = createDevice(air, "A", "Alpha");
  const b = createDevice(air, "B", "Bravo");

  await a.manager.requestHost();
  await b.manager.requestScan();
  const found = await b.manager.waitFor((s) => s.candidates.length > 0, WAIT_MS);
  await b.manager.requestConnect(found.candidates[0].peer);

  await b.manager.waitFor(isConnected, WAIT_MS);
  await a.manager.waitFor(isConnected, WAIT_MS);
  await audioReady(a);
  await audioReady(b);
  return { a, b };
}

/** Connected is published before the pipeline opens; this waits for playback */
async function audioReady(device: Device): Promise<void> {
  await vi.waitFor(() => expect(device.devices.playbacks[0]?.playing).toBe(true));
}

interface ManualTransport {
  transport: StreamTransport;
  /** Completes the pending connect call with `stream` */
  deliver: (stream: ByteStream) => void;
  /** The signal the last connect call was given */
  signal: () => AbortSignal | undefined;
}

/** Stream transport whose connect call completes only when the test says so */
function manualTransport(): ManualTransport {
  let deliver: (stream: ByteStream) => void = () => {};
  let lastSignal: AbortSignal | undefined;
  const transport: StreamTransport = {
    listen: () => Promise.reject(new LinkError("transport-error")),
    connect: (_peer, _serviceId, signal) => {
      lastSignal = signal;
      return new Promise<ByteStream>((resolve) => {
        deliver = resolve;
      });
    },
  };
  return { transport, deliver: (stream) => deliver(stream), signal: () => lastSignal };
}

afterEach(async () => {
  await Promise.all(managers.map((m) => m.shutdown().catch(() => undefined)));
  managers.length = 0;
});

describe("ConnectionManager", () => {
  // ==========================================================================
  // Host / scan / connect
  // ==========================================================================

  describe("pairing", () => {
    it("connects a host and a client that found it by scanning", async () => {
      const air = new LoopbackAir();
      const a = createDevice(air, "A", "Alpha");
      const b = createDevice(air, "B", "Bravo");

      await a.manager.requestHost();
      expect(a.manager.snapshot.state.kind).toBe("listening");
      await a.manager.waitFor((s) => s.isAnnouncing, WAIT_MS);

      await b.manager.requestScan();
      const found = await b.manager.waitFor((s) => s.candidates.length > 0, WAIT_MS);
      expect(found.candidates).toEqual([{ peer: { address: "A", name: "Alpha" }, lastSeenOrder: 1 }]);
      expect(found.isDiscovering).toBe(true);

      await b.manager.requestConnect(found.candidates[0].peer);
      const client = await b.manager.waitFor(isConnected, WAIT_MS);
      const host = await a.manager.waitFor(isConnected, WAIT_MS);

      expect(client.state).toMatchObject({ peer: { address: "A", name: "Alpha" }, role: "client" });
      expect(client.statusText).toBe("Connected to Alpha");
      expect(client.isDiscovering).toBe(false);
      expect(host.state).toMatchObject({ peer: { address: "B", name: "Bravo" }, role: "host" });
      expect(a.manager.snapshot.isAnnouncing).toBe(false);
      expect(air.isAdvertising("A")).toBe(false);
      expect(air.isListening("A", SERVICE)).toBe(false);
    });

    it("never skips Connecting on the way to Connected", async () => {
      const { a, b } = await connectPair(new LoopbackAir());

      expect(a.kinds).toEqual(["announcing", "listening", "connecting", "connected"]);
      expect(b.kinds).toEqual(["scanning", "connecting", "connected"]);
    });

    it("opens the audio pipeline muted on both ends", async () => {
      const { a, b } = await connectPair(new LoopbackAir());

      expect(a.manager.snapshot.isTransmitting).toBe(false);
      expect(b.manager.snapshot.isTransmitting).toBe(false);
      expect(a.devices.playbacks[0].playing).toBe(true);
      expect(b.devices.playbacks[0].playing).toBe(true);
    });

    it("unmutes on connect when configured to", async () => {
      const air = new LoopbackAir();
      const a = createDevice(air, "A", "Alpha", { config: { transmitOnConnect: true } });

      await a.manager.requestHost();
      const client = createDevice(air, "B", "Bravo");
      await client.manager.requestConnect({ address: "A" });

      await a.manager.waitFor((s) => s.isTransmitting, WAIT_MS);
      expect(a.devices.captures[0].started).toBe(true);
    });
  });

  // ==========================================================================
  // One attempt at a time
  // ==========================================================================

  describe("attempt rules", () => {
    it("rejects requestConnect while connected and leaves the link alone", async () => {
      const air = new LoopbackAir();
      const { b } = await connectPair(air);
      const before = b.manager.snapshot;

      await expect(b.manager.requestConnect({ address: "A" })).rejects.toMatchObject({
        code: "invalid-state",
      });

      expect(b.manager.snapshot).toBe(before);
      expect(air.links).toHaveLength(1);
      expect(air.links[0].client.isClosed).toBe(false);
    });

    it("rejects requestConnect while connecting", async () => {
      const air = new LoopbackAir();
      const c = createDevice(air, "C", "Charlie", { transport: manualTransport().transport });

      const first = c.manager.requestConnect({ address: "Z" });
      const second = c.manager.requestConnect({ address: "Y" });

      await first;
      await expect(second).rejects.toMatchObject({ code: "invalid-state" });
      expect(c.manager.snapshot.state).toMatchObject({ kind: "connecting", peer: { address: "Z" } });
    });

    it("rejects requestHost unless idle", async () => {
      const air = new LoopbackAir();
      const b = createDevice(air, "B", "Bravo");
      await b.manager.requestScan();

      await expect(b.manager.requestHost()).rejects.toMatchObject({ code: "invalid-state" });
      expect(b.manager.snapshot.state.kind).toBe("scanning");
    });

    it("restarting a scan starts from an empty list", async () => {
      const air = new LoopbackAir();
      const a = createDevice(air, "A", "Alpha");
      const b = createDevice(air, "B", "Bravo");
      await a.manager.requestHost();
      await b.manager.requestScan();
      await b.manager.waitFor((s) => s.candidates.length === 1, WAIT_MS);

      await b.manager.requestScan();

      expect(b.manager.snapshot.candidates).toEqual([]);
      expect(b.manager.snapshot.state.kind).toBe("scanning");
      await b.manager.waitFor((s) => s.candidates.length === 1, WAIT_MS);
    });
  });

  // ==========================================================================
  // Failures
  // ==========================================================================

  describe("failures", () => {
    it("surfaces a refused connection, then returns to idle", async () => {
      const c = createDevice(new LoopbackAir(), "C", "Charlie");

      await c.manager.requestConnect({ address: "Z", name: "Zulu" });
      const idle = await c.manager.waitFor((s) => isIdle(s) && s.notice !== null, WAIT_MS);

      expect(idle.notice).toMatchObject({ code: "connection-refused", detail: "no such service" });
      expect(idle.statusText).toBe("Connection refused (no such service)");
      expect(c.kinds).toEqual(["connecting", "failed", "idle"]);
    });

    it("times out a connect that never completes and closes the late stream", async () => {
      const manual = manualTransport();
      const c = createDevice(new LoopbackAir(), "C", "Charlie", {
        transport: manual.transport,
        config: { connectTimeoutMs: 50 },
      });

      await c.manager.requestConnect({ address: "Z" });
      expect(manual.signal()?.aborted).toBe(false);
      const idle = await c.manager.waitFor((s) => isIdle(s) && s.notice !== null, WAIT_MS);
      expect(idle.notice).toMatchObject({ code: "connect-timeout", detail: "50 ms" });
      expect(manual.signal()?.aborted).toBe(true);

      const [late] = LoopbackStream.pair();
      manual.deliver(late);
      await vi.waitFor(() => expect(late.isClosed).toBe(true));
    });

    it("cancels a pending connect on disconnect", async () => {
      const manual = manualTransport();
      const c = createDevice(new LoopbackAir(), "C", "Charlie", { transport: manual.transport });

      await c.manager.requestConnect({ address: "Z" });
      await c.manager.disconnect();
      expect(c.manager.snapshot.statusText).toBe("Not connected");
      expect(c.kinds).toEqual(["connecting", "closing", "idle"]);
      expect(manual.signal()?.aborted).toBe(true);

      const [late] = LoopbackStream.pair();
      manual.deliver(late);
      await vi.waitFor(() => expect(late.isClosed).toBe(true));
      expect(c.manager.snapshot.state.kind).toBe("idle");
    });

    it("cancels a pending connect on shutdown", async () => {
      const manual = manualTransport();
      const c = createDevice(new LoopbackAir(), "C", "Charlie", { transport: manual.transport });

      await c.manager.requestConnect({ address: "Z" });
      await c.manager.shutdown();

      expect(manual.signal()?.aborted).toBe(true);
      expect(c.manager.snapshot.state.kind).toBe("idle");
    });

    it("fails immediately without the radio permission", async () => {
      const air = new LoopbackAir();
      const transport = air.createTransport({ address: "A", name: "Alpha" });
      const listen = vi.spyOn(transport, "listen");
      const a = createDevice(air, "A", "Alpha", {
        transport,
        gate: new StaticCapabilityGate({ radio: false, microphone: true, radioEnabled: true }),
      });

      await expect(a.manager.requestHost()).rejects.toMatchObject({ code: "permission-denied" });

      expect(listen).not.toHaveBeenCalled();
      expect(a.kinds).toEqual(["failed", "idle"]);
      expect(a.manager.snapshot.state.kind).toBe("idle");
      expect(a.manager.snapshot.statusText).toBe("Permission required");
      expect(air.isListening("A", SERVICE)).toBe(false);
    });

    it("fails immediately when the radio stays off", async () => {
      const b = createDevice(new LoopbackAir(), "B", "Bravo", {
        gate: new StaticCapabilityGate({ radio: true, microphone: true, radioEnabled: false }),
      });

      await expect(b.manager.requestScan()).rejects.toMatchObject({ code: "radio-disabled" });
      expect(b.manager.snapshot.statusText).toBe("Radio must be enabled");
      expect(b.manager.snapshot.isDiscovering).toBe(false);
    });

    it("gives up hosting when announcing fails", async () => {
      const air = new LoopbackAir();
      air.failAdvertising("EADDRINUSE");
      const a = createDevice(air, "A", "Alpha");

      await a.manager.requestHost();
      const idle = await a.manager.waitFor((s) => isIdle(s) && s.notice !== null, WAIT_MS);

      expect(idle.notice).toMatchObject({ code: "discovery-failed", detail: "EADDRINUSE" });
      expect(idle.statusText).toBe("Discovery failed (EADDRINUSE)");
      expect(air.isListening("A", SERVICE)).toBe(false);
    });

    it("surfaces a scan failure", async () => {
      const air = new LoopbackAir();
      air.failScanning("SCAN_FAILED_INTERNAL_ERROR");
      const b = createDevice(air, "B", "Bravo");

      await b.manager.requestScan();
      const idle = await b.manager.waitFor((s) => isIdle(s) && s.notice !== null, WAIT_MS);

      expect(idle.notice).toMatchObject({
        code: "discovery-failed",
        detail: "SCAN_FAILED_INTERNAL_ERROR",
      });
    });
  });

  // ==========================================================================
  // Streaming
  // ==========================================================================

  describe("streaming", () => {
    it("carries audio from one side's capture to the other side's playback", async () => {
      const { a, b } = await connectPair(new LoopbackAir());

      await b.manager.setTransmitting(true);
      b.devices.captures[0].feed(Uint8Array.of(5, 6, 7, 8));

      await vi.waitFor(() => expect(a.devices.playbacks[0].bytes).toEqual([5, 6, 7, 8]));
    });

    it("mute and unmute keep the same connection", async () => {
      const air = new LoopbackAir();
      const { a, b } = await connectPair(air);
      const before = connectionId(b.manager.snapshot);

      await b.manager.toggleTransmit();
      expect(b.manager.snapshot.isTransmitting).toBe(true);
      await b.manager.toggleTransmit();
      expect(b.manager.snapshot.isTransmitting).toBe(false);
      await b.manager.toggleTransmit();

      expect(connectionId(b.manager.snapshot)).toBe(before);
      expect(before).not.toBeNull();
      expect(air.links).toHaveLength(1);
      expect(air.links[0].client.isClosed).toBe(false);
      expect(b.devices.captures).toHaveLength(1);
      expect(b.devices.captures[0].releaseCount).toBe(0);

      b.devices.captures[0].feed(Uint8Array.of(1, 2));
      await vi.waitFor(() => expect(a.devices.playbacks[0].bytes).toEqual([1, 2]));
    });

    it("a failed write closes the link and stops both pumps", async () => {
      const air = new LoopbackAir();
      const { a, b } = await connectPair(air);
      await b.manager.setTransmitting(true);
      const link = air.links[0];

      link.client.breakWrites();
      b.devices.captures[0].feed(Uint8Array.of(1, 2));

      const idle = await b.manager.waitFor(isIdle, WAIT_MS);
      expect(idle.notice).toMatchObject({ code: "stream-error" });
      expect(idle.isTransmitting).toBe(false);
      expect(b.kinds.slice(-2)).toEqual(["closing", "idle"]);
      expect(b.devices.captures[0].releaseCount).toBe(1);
      expect(b.devices.playbacks[0].releaseCount).toBe(1);
      expect(link.client.isClosed).toBe(true);

      const peerIdle = await a.manager.waitFor(isIdle, WAIT_MS);
      expect(peerIdle.statusText).toBe("Connection lost");
    });

    it("a closed peer stops transmitting and the host can host again", async () => {
      const air = new LoopbackAir();
      const { a, b } = await connectPair(air);
      await a.manager.setTransmitting(true);

      await b.manager.disconnect();
      expect(b.manager.snapshot.statusText).toBe("Not connected");

      const idle = await a.manager.waitFor(isIdle, WAIT_MS);
      expect(idle.notice).toMatchObject({ code: "connection-lost" });
      expect(idle.isTransmitting).toBe(false);
      expect(a.devices.captures[0].releaseCount).toBe(1);

      await a.manager.requestHost();
      expect(a.manager.snapshot.state.kind).toBe("listening");
      expect(air.isListening("A", SERVICE)).toBe(true);

      await b.manager.requestConnect({ address: "A", name: "Alpha" });
      await a.manager.waitFor(isConnected, WAIT_MS);
      expect(air.links).toHaveLength(2);
    });

    it("a capture device failure closes the link", async () => {
      const { b } = await connectPair(new LoopbackAir());
      await b.manager.setTransmitting(true);

      b.devices.captures[0].breakDevice(new Error("unplugged"));

      const idle = await b.manager.waitFor(isIdle, WAIT_MS);
      expect(idle.statusText).toBe("Audio device failed (unplugged)");
    });

    it("keeps the link when audio cannot start, and retries on unmute", async () => {
      const air = new LoopbackAir();
      const a = createDevice(air, "A", "Alpha");
      a.devices.captureFailure = new Error("device busy");
      await a.manager.requestHost();
      const b = createDevice(air, "B", "Bravo");
      await b.manager.requestConnect({ address: "A" });

      const degraded = await a.manager.waitFor((s) => isConnected(s) && s.notice !== null, WAIT_MS);
      expect(degraded.notice).toMatchObject({ code: "resource-init-failed", detail: "device busy" });
      expect(degraded.statusText).toBe("Connected to Bravo");
      expect(degraded.isTransmitting).toBe(false);

      await expect(a.manager.toggleTransmit()).rejects.toMatchObject({ code: "resource-init-failed" });
      expect(isConnected(a.manager.snapshot)).toBe(true);

      a.devices.captureFailure = null;
      await a.manager.toggleTransmit();

      expect(a.manager.snapshot.isTransmitting).toBe(true);
      expect(a.manager.snapshot.notice).toBeNull();
      expect(air.links).toHaveLength(1);

      await audioReady(b);
      await b.manager.setTransmitting(true);
      b.devices.captures[0].feed(Uint8Array.of(3, 4));
      await vi.waitFor(() => expect(a.devices.playbacks[0].bytes).toEqual([3, 4]));
    });

    it("notices the peer hanging up while audio is unavailable", async () => {
      const air = new LoopbackAir();
      const a = createDevice(air, "A", "Alpha");
      a.devices.captureFailure = new Error("device busy");
      await a.manager.requestHost();
      const b = createDevice(air, "B", "Bravo");
      await b.manager.requestConnect({ address: "A" });
      await a.manager.waitFor((s) => isConnected(s) && s.notice !== null, WAIT_MS);
      await b.manager.waitFor(isConnected, WAIT_MS);

      await b.manager.disconnect();

      const idle = await a.manager.waitFor(isIdle, WAIT_MS);
      expect(idle.notice).toMatchObject({ code: "connection-lost" });
      expect(idle.statusText).toBe("Connection lost");
      expect(air.links[0].host.isClosed).toBe(true);
      expect(a.kinds.slice(-2)).toEqual(["closing", "idle"]);
    });

    it("rejects unmute when not connected", async () => {
      const c = createDevice(new LoopbackAir(), "C", "Charlie");

      await expect(c.manager.setTransmitting(true)).rejects.toMatchObject({ code: "invalid-state" });
      await expect(c.manager.setTransmitting(false)).resolves.toBeUndefined();
    });
  });

  // ==========================================================================
  // Cancelling roles
  // ==========================================================================

  describe("stopping", () => {
    it("stopHosting closes the acceptor and stops announcing", async () => {
      const air = new LoopbackAir();
      const a = createDevice(air, "A", "Alpha");
      await a.manager.requestHost();
      await a.manager.waitFor((s) => s.isAnnouncing, WAIT_MS);

      await a.manager.stopHosting();

      expect(a.manager.snapshot).toMatchObject({ state: { kind: "idle" }, isAnnouncing: false });
      expect(air.isAdvertising("A")).toBe(false);
      expect(air.isListening("A", SERVICE)).toBe(false);
    });

    it("stopScan keeps the candidates visible", async () => {
      const air = new LoopbackAir();
      const a = createDevice(air, "A", "Alpha");
      const b = createDevice(air, "B", "Bravo");
      await a.manager.requestHost();
      await b.manager.requestScan();
      await b.manager.waitFor((s) => s.candidates.length === 1, WAIT_MS);

      await b.manager.stopScan();

      expect(b.manager.snapshot.state.kind).toBe("idle");
      expect(b.manager.snapshot.isDiscovering).toBe(false);
      expect(b.manager.snapshot.candidates).toHaveLength(1);
    });

    it("shutdown tears everything down and refuses further commands", async () => {
      const air = new LoopbackAir();
      const { b } = await connectPair(air);

      await b.manager.shutdown();

      expect(b.manager.snapshot.state.kind).toBe("idle");
      expect(air.links[0].client.isClosed).toBe(true);
      expect(b.devices.playbacks[0].releaseCount).toBe(1);
      await expect(b.manager.requestScan()).rejects.toMatchObject({ code: "invalid-state" });
    });
  });
});
