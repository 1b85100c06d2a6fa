/**
 * WebSocket stream transport.
 *
 * The host opens a WebSocketServer whose path is the service identifier;
 * the client dials `ws://<address>/<serviceId>?name=<display name>`. After
 * the upgrade only binary messages flow, and each one is treated as a run
 * of raw bytes; message boundaries carry no meaning.
 *
 * The acceptor is one-shot: it hands out the first peer that connects and
 * turns every later one away with 1013 until its owner closes it.
 */

import type { IncomingMessage } from "node:http";
import { WebSocket, WebSocketServer, type RawData } from "ws";

import { ByteQueue } from "@/lib/byteQueue";
import { LinkError, toLinkError } from "@/lib/errors";
import type { Logger } from "@/lib/logger";
import { makePeerId } from "@/lib/peerUtils";
import type { PeerId } from "@/types/link";
import type { AcceptedStream, ByteStream, StreamAcceptor, StreamTransport } from "./types";

/** How long close() waits for the closing handshake before terminating */
const CLOSE_GRACE_MS = 1_000;

/** Close code sent to a second client while the host already has its peer */
const CLOSE_TRY_AGAIN_LATER = 1013;

export interface WsTransportOptions {
  /** Sent to the host so it can label the connection */
  localName: string;
  port: number;
  /** Interface to bind the acceptor to; all interfaces by default */
  host?: string;
  handshakeTimeoutMs?: number;
  logger: Logger;
}

function toBytes(data: RawData): Uint8Array {
  if (Array.isArray(data)) return Buffer.concat(data);
  if (data instanceof ArrayBuffer) return new Uint8Array(data);
  return data;
}

function peerFromRequest(req: IncomingMessage): PeerId {
  const url = new URL(req.url ?? "/", "ws://localhost");
  const rawAddress = req.socket.remoteAddress ?? "unknown";
  return makePeerId(rawAddress.replace(/^::ffff:/, ""), url.searchParams.get("name"));
}

export class WsByteStream implements ByteStream {
  private readonly incoming = new ByteQueue();

  constructor(
    private readonly ws: WebSocket,
    private readonly logger: Logger,
  ) {
    ws.on("message", (data: RawData, isBinary: boolean) => {
      if (!isBinary) return;
      this.incoming.push(toBytes(data));
    });
    ws.on("close", (code: number) => {
      this.logger.debug(`Stream closed by link (code ${code})`);
      this.incoming.end();
    });
    ws.on("error", (error: Error) => {
      this.logger.warn("⚠️ Stream error:", error.message);
      this.incoming.fail(toLinkError(error, "stream-error"));
    });
  }

  read(into: Uint8Array, signal?: AbortSignal): Promise<number> {
    return this.incoming.read(into, signal);
  }

  write(data: Uint8Array): Promise<void> {
    if (this.ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(new LinkError("stream-error", "Socket is not open"));
    }
    // Buffer.from copies, so the caller may reuse its frame immediately.
    const payload = Buffer.from(data);
    return new Promise<void>((resolve, reject) => {
      this.ws.send(payload, { binary: true }, (error?: Error) => {
        if (error) {
          reject(toLinkError(error, "stream-error"));
        } else {
          resolve();
        }
      });
    });
  }

  async close(): Promise<void> {
    if (this.ws.readyState === WebSocket.CLOSED) return;

    await new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        this.ws.terminate();
        resolve();
      }, CLOSE_GRACE_MS);
      this.ws.once("close", () => {
        clearTimeout(timer);
        resolve();
      });
      this.ws.close(1000, "Link closed");
    });
  }
}

export class WsAcceptor implements StreamAcceptor {
  private accepted: AcceptedStream | null = null;
  private handedOut = false;
  private failure: LinkError | null = null;
  private waiter: {
    resolve: (value: AcceptedStream) => void;
    reject: (reason: LinkError) => void;
  } | null = null;
  private serverClosed = false;

  constructor(
    private readonly wss: WebSocketServer,
    /** The bound port, which differs from the requested one when that was 0 */
    readonly port: number,
    private readonly logger: Logger,
  ) {
    wss.on("connection", (ws: WebSocket, req: IncomingMessage) => {
      if (this.accepted || this.failure) {
        this.logger.info("🚫 Turning away extra connection, already paired");
        ws.close(CLOSE_TRY_AGAIN_LATER, "Host busy");
        return;
      }

      const peer = peerFromRequest(req);
      this.accepted = { stream: new WsByteStream(ws, logger), peer };
      this.logger.info(`✅ Accepted connection from ${peer.name ?? peer.address}`);
      this.deliver();
    });
    wss.on("error", (error: Error) => {
      this.logger.error("Acceptor error:", error);
    });
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
    if (!this.accepted && !this.failure) {
      this.failure = new LinkError("transport-error", "Acceptor closed");
      this.waiter?.reject(this.failure);
      this.waiter = null;
    }
    this.closeServer();
  }

  private deliver(): void {
    if (!this.accepted || !this.waiter) return;
    this.handedOut = true;
    this.waiter.resolve(this.accepted);
    this.waiter = null;
  }

  /**
   * Stops listening right away. The server's close callback only fires once
   * the accepted socket has ended too, so it is not awaited.
   */
  private closeServer(): void {
    if (this.serverClosed) return;
    this.serverClosed = true;
    this.wss.close((error?: Error) => {
      if (error) this.logger.debug("Acceptor already closed:", error.message);
    });
  }
}

export class WsTransport implements StreamTransport {
  constructor(private readonly options: WsTransportOptions) {}

  async listen(serviceId: string): Promise<WsAcceptor> {
    const { port, host, logger } = this.options;
    const wss = new WebSocketServer({
      port,
      host,
      path: `/${encodeURIComponent(serviceId)}`,
      perMessageDeflate: false,
      clientTracking: true,
    });

    try {
      await new Promise<void>((resolve, reject) => {
        const onError = (error: Error) => {
          wss.off("listening", onListening);
          reject(toLinkError(error, "transport-error"));
        };
        const onListening = () => {
          wss.off("error", onError);
          resolve();
        };
        wss.once("error", onError);
        wss.once("listening", onListening);
      });
    } catch (error) {
      wss.close();
      throw error;
    }

    const address = wss.address();
    const boundPort = typeof address === "object" && address !== null ? address.port : port;
    logger.info(`👂 Listening for "${serviceId}" on port ${boundPort}`);
    return new WsAcceptor(wss, boundPort, logger.child("acceptor"));
  }

  connect(peer: PeerId, serviceId: string, signal?: AbortSignal): Promise<ByteStream> {
    const { localName, handshakeTimeoutMs, logger } = this.options;
    if (signal?.aborted) {
      return Promise.reject(new LinkError("transport-error", "Connect cancelled"));
    }

    const url =
      `ws://${peer.address}/${encodeURIComponent(serviceId)}` +
      `?name=${encodeURIComponent(localName)}`;
    const ws = new WebSocket(url, { perMessageDeflate: false, handshakeTimeout: handshakeTimeoutMs });

    return new Promise<ByteStream>((resolve, reject) => {
      const settle = () => {
        ws.off("open", onOpen);
        ws.off("error", onError);
        signal?.removeEventListener("abort", onAbort);
      };
      // Late errors from the dead socket must not go unhandled.
      const discard = () => {
        ws.on("error", (late: Error) => logger.debug("Discarded socket error:", late.message));
        ws.terminate();
      };
      const onOpen = () => {
        settle();
        resolve(new WsByteStream(ws, logger.child("stream")));
      };
      const onError = (error: Error) => {
        settle();
        discard();
        reject(toLinkError(error, "connection-refused"));
      };
      const onAbort = () => {
        settle();
        discard();
        logger.debug(`Connect to ${peer.address} cancelled`);
        reject(new LinkError("transport-error", "Connect cancelled"));
      };
      ws.once("open", onOpen);
      ws.once("error", onError);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }
}
