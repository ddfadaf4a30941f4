import type { Writable } from "node:stream";
import { TransportError } from "./errors";
import type { SessionTransport } from "./types/types";

/**
 * Adapts a socket to the "write some bytes, return count accepted"
 * primitive. A write resolves once the socket has taken the whole buffer,
 * waiting for `drain` under backpressure. Takes a `net.Socket` in
 * production and any writable stream in tests.
 */
export class SocketTransport implements SessionTransport {
  private failure?: Error;

  constructor(private readonly socket: Writable) {
    // an error between writes is reported by the next write
    socket.on("error", err => {
      this.failure ??= err;
    });
  }

  isWritable(): boolean {
    return (
      !this.socket.destroyed &&
      !this.socket.writableEnded &&
      !this.socket.writableFinished
    );
  }

  write(bytes: Buffer): Promise<number> {
    if (this.failure) {
      return Promise.reject(
        new TransportError(`socket error: ${this.failure.message}`, {
          cause: this.failure,
        }),
      );
    }
    if (!this.isWritable()) return Promise.resolve(0);
    if (bytes.length === 0) return Promise.resolve(0);

    return new Promise<number>((resolve, reject) => {
      const socket = this.socket;
      let settled = false;

      const settle = (fn: () => void) => {
        if (settled) return;
        settled = true;
        cleanup();
        fn();
      };

      const accepted = () =>
        settle(() => resolve(bytes.length));
      const onError = (err: Error) =>
        settle(() =>
          reject(new TransportError(`socket error: ${err.message}`, { cause: err })),
        );
      const onClose = () =>
        settle(() => reject(new TransportError("socket closed during write")));

      const cleanup = () => {
        socket.off("error", onError);
        socket.off("close", onClose);
        socket.off("drain", accepted);
      };

      socket.on("error", onError);
      socket.on("close", onClose);

      const canContinue = socket.write(bytes);
      if (canContinue) {
        // let a synchronous write error surface first
        setImmediate(accepted);
      } else {
        socket.on("drain", accepted);
      }
    });
  }

  /**
   * Flush and half-close, then destroy. A failed or backed-up socket is
   * destroyed at once.
   */
  close(): void {
    const socket = this.socket;
    if (socket.destroyed) return;
    if (this.failure || socket.writableNeedDrain) {
      socket.destroy();
      return;
    }
    socket.end(() => socket.destroy());
  }
}
