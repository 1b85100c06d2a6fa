import type { PeerId } from "@/types/link";

/**
 * Raw duplex byte pipe. No framing is added on top: the reader gets
 * whatever chunk sizes the underlying link delivers.
 */
export interface ByteStream {
  /**
   * Blocks until bytes arrive. Resolves with the number copied into `into`,
   * or 0 once the remote side has closed. Rejects with a `stream-error`
   * LinkError on failure, or with the signal's reason when aborted.
   */
  read(into: Uint8Array, signal?: AbortSignal): Promise<number>;
  /** Resolves once the bytes are handed to the link; `data` may be reused after */
  write(data: Uint8Array): Promise<void>;
  close(): Promise<void>;
}

export interface AcceptedStream {
  stream: ByteStream;
  peer: PeerId;
}

/**
 * One-shot acceptor: resolves the first inbound connection and turns any
 * later one away. Closing it rejects a pending `accept()` promptly.
 */
export interface StreamAcceptor {
  accept(): Promise<AcceptedStream>;
  close(): Promise<void>;
}

export interface StreamTransport {
  listen(serviceId: string): Promise<StreamAcceptor>;
  /**
   * Dials the host's acceptor. Aborting `signal` drops the attempt and
   * rejects promptly; a stream that opens anyway is closed.
   */
  connect(peer: PeerId, serviceId: string, signal?: AbortSignal): Promise<ByteStream>;
}
