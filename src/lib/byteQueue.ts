interface PendingRead {
  into: Uint8Array;
  resolve: (count: number) => void;
  reject: (reason: unknown) => void;
  detach: () => void;
}

/**
 * Turns pushed chunks into blocking `read(into)` calls with stream
 * semantics: a read returns as soon as any bytes are available, copies at
 * most `into.length` of them and keeps the rest for the next read.
 *
 * After `end()` reads drain what is buffered and then return 0. After
 * `fail()` they drain what is buffered and then reject. Only one read may be
 * pending at a time (one reader per direction).
 */
export class ByteQueue {
  private chunks: Uint8Array[] = [];
  private bufferedBytes = 0;
  private ended = false;
  private failure: unknown = null;
  private pending: PendingRead | null = null;

  /** Takes ownership of `chunk`; the caller must not reuse it */
  push(chunk: Uint8Array): void {
    if (this.ended || this.failure !== null || chunk.length === 0) return;

    if (this.pending) {
      const reader = this.pending;
      this.settle();
      const count = Math.min(reader.into.length, chunk.length);
      reader.into.set(chunk.subarray(0, count));
      if (count < chunk.length) this.enqueue(chunk.subarray(count));
      reader.resolve(count);
      return;
    }

    this.enqueue(chunk);
  }

  end(): void {
    if (this.ended || this.failure !== null) return;
    this.ended = true;
    if (this.pending) {
      const reader = this.pending;
      this.settle();
      reader.resolve(0);
    }
  }

  fail(error: unknown): void {
    if (this.ended || this.failure !== null) return;
    this.failure = error;
    if (this.pending) {
      const reader = this.pending;
      this.settle();
      reader.reject(error);
    }
  }

  /** Drops buffered bytes without ending the queue */
  clear(): void {
    this.chunks = [];
    this.bufferedBytes = 0;
  }

  get buffered(): number {
    return this.bufferedBytes;
  }

  get isClosed(): boolean {
    return this.ended || this.failure !== null;
  }

  read(into: Uint8Array, signal?: AbortSignal): Promise<number> {
    if (signal?.aborted) return Promise.reject(signal.reason);
    if (into.length === 0) return Promise.resolve(0);

    if (this.chunks.length > 0) return Promise.resolve(this.take(into));
    if (this.failure !== null) return Promise.reject(this.failure);
    if (this.ended) return Promise.resolve(0);
    if (this.pending) {
      return Promise.reject(new Error("ByteQueue already has a pending read"));
    }

    return new Promise<number>((resolve, reject) => {
      const onAbort = () => {
        this.settle();
        reject(signal?.reason);
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.pending = {
        into,
        resolve,
        reject,
        detach: () => signal?.removeEventListener("abort", onAbort),
      };
    });
  }

  private settle(): void {
    this.pending?.detach();
    this.pending = null;
  }

  private enqueue(chunk: Uint8Array): void {
    this.chunks.push(chunk);
    this.bufferedBytes += chunk.length;
  }

  private take(into: Uint8Array): number {
    let written = 0;
    // Fill from as many queued chunks as fit; order is preserved.
    while (written < into.length && this.chunks.length > 0) {
      const head = this.chunks[0];
      const count = Math.min(into.length - written, head.length);
      into.set(head.subarray(0, count), written);
      written += count;
      if (count < head.length) {
        this.chunks[0] = head.subarray(count);
      } else {
        this.chunks.shift();
      }
    }
    this.bufferedBytes -= written;
    return written;
  }
}
