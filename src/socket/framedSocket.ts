import { createConnection } from "node:net";
import type { Socket } from "node:net";

const HEADER_SIZE = 4;

export interface SocketHandle {
  send(payload: Buffer): Promise<void>;
  /** Resolves with exactly one frame's payload. */
  receive(): Promise<Buffer>;
  close(): void;
}

export interface SocketTransport {
  open(path: string): Promise<SocketHandle>;
}

export type FramedSocketOptions = {
  /** Idle time after which a pending receive fails. Unset means wait forever. */
  timeoutMs?: number | null;
};

type Waiter = {
  resolve: (frame: Buffer) => void;
  reject: (err: Error) => void;
};

export class SocketClosedError extends Error {
  constructor(message = "socket closed before a complete frame was received") {
    super(message);
    this.name = "SocketClosedError";
  }
}

export class SocketTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`no data received within ${timeoutMs}ms`);
    this.name = "SocketTimeoutError";
  }
}

/**
 * Unix stream socket speaking length-prefixed frames: a 4-byte little-endian
 * payload size followed by the payload.
 */
export class FramedSocket implements SocketHandle {
  private buffer: Buffer = Buffer.alloc(0);
  private waiter: Waiter | null = null;
  private failure: Error | null = null;
  private ended = false;

  private constructor(
    private readonly socket: Socket,
    options: FramedSocketOptions
  ) {
    socket.on("data", (chunk: Buffer) => {
      this.buffer = Buffer.concat([this.buffer, chunk]);
      this.settle();
    });
    socket.on("end", () => {
      this.ended = true;
      this.settle();
    });
    socket.on("close", () => {
      this.ended = true;
      this.settle();
    });
    socket.on("error", (err) => {
      this.failure = err;
      this.settle();
    });

    const { timeoutMs } = options;
    if (timeoutMs) {
      socket.setTimeout(timeoutMs, () => {
        if (!this.waiter) return;
        this.failure = new SocketTimeoutError(timeoutMs);
        this.settle();
      });
    }
  }

  static connect(path: string, options: FramedSocketOptions = {}): Promise<FramedSocket> {
    return new Promise((resolve, reject) => {
      const socket = createConnection(path);
      const handleError = (err: Error) => {
        socket.destroy();
        reject(err);
      };
      socket.once("error", handleError);
      socket.once("connect", () => {
        socket.off("error", handleError);
        resolve(new FramedSocket(socket, options));
      });
    });
  }

  send(payload: Buffer): Promise<void> {
    const header = Buffer.alloc(HEADER_SIZE);
    header.writeUInt32LE(payload.length, 0);
    return new Promise((resolve, reject) => {
      this.socket.write(Buffer.concat([header, payload]), (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  receive(): Promise<Buffer> {
    if (this.waiter) {
      return Promise.reject(new Error("a receive is already pending on this socket"));
    }
    return new Promise((resolve, reject) => {
      this.waiter = { resolve, reject };
      this.settle();
    });
  }

  close(): void {
    this.socket.destroy();
  }

  private settle(): void {
    const waiter = this.waiter;
    if (!waiter) return;

    const frame = this.takeFrame();
    if (frame) {
      this.waiter = null;
      if (frame.length === 0) waiter.reject(new SocketClosedError("received an empty frame"));
      else waiter.resolve(frame);
      return;
    }
    if (this.failure || this.ended) {
      this.waiter = null;
      waiter.reject(this.failure ?? new SocketClosedError());
    }
  }

  private takeFrame(): Buffer | null {
    if (this.buffer.length < HEADER_SIZE) return null;
    const size = this.buffer.readUInt32LE(0);
    const end = HEADER_SIZE + size;
    if (this.buffer.length < end) return null;
    const frame = this.buffer.subarray(HEADER_SIZE, end);
    this.buffer = this.buffer.subarray(end);
    return frame;
  }
}

export function createUnixSocketTransport(options: FramedSocketOptions = {}): SocketTransport {
  return {
    open: (path) => FramedSocket.connect(path, options),
  };
}
