import net from "node:net";
import { FrameStimulusError, errorMessage } from "./errors";
import { SocketTransport } from "./socket-transport";
import { delay } from "./timers";
import type { Connector, ReconnectAttempt } from "./types/types";

export type Dialer = (options: { host: string; port: number }) => net.Socket;

export interface TcpConnectorOptions {
  host: string;
  port: number;
  /** Per-attempt timeout (ms); 0 disables it. */
  connectTimeoutMs?: number;
  /** Fixed pause between attempts (ms). */
  reconnectDelayMs?: number;
  /** Give up after this many failed attempts. Unbounded by default. */
  maxAttempts?: number;
  dial?: Dialer;
  sleep?: (ms: number) => Promise<void>;
  onReconnecting?: (attempt: ReconnectAttempt) => void;
}

const defaultDialer: Dialer = options => net.createConnection(options);

/**
 * Opens the session's TCP connection, retrying with a fixed backoff until it
 * succeeds.
 */
export class TcpConnector implements Connector {
  private readonly options: Required<
    Omit<TcpConnectorOptions, "onReconnecting">
  > &
    Pick<TcpConnectorOptions, "onReconnecting">;

  constructor(options: TcpConnectorOptions) {
    this.options = {
      host: options.host,
      port: options.port,
      connectTimeoutMs: options.connectTimeoutMs ?? 3_000,
      reconnectDelayMs: options.reconnectDelayMs ?? 1_000,
      maxAttempts: options.maxAttempts ?? Number.POSITIVE_INFINITY,
      dial: options.dial ?? defaultDialer,
      sleep: options.sleep ?? delay,
      onReconnecting: options.onReconnecting,
    };
  }

  get target(): string {
    return `${this.options.host}:${this.options.port}`;
  }

  async connect(): Promise<SocketTransport> {
    let attempt = 0;
    for (;;) {
      attempt += 1;
      try {
        const socket = await this.connectOnce();
        return new SocketTransport(socket);
      } catch (err) {
        const error = err instanceof Error ? err : new Error(errorMessage(err));
        if (attempt >= this.options.maxAttempts) throw error;
        const delayMs = this.options.reconnectDelayMs;
        this.options.onReconnecting?.({ attempt, delayMs, error });
        await this.options.sleep(delayMs);
      }
    }
  }

  private connectOnce(): Promise<net.Socket> {
    return new Promise<net.Socket>((resolve, reject) => {
      let settled = false;
      let connectTimer: NodeJS.Timeout | undefined;

      const socket = this.options.dial({
        host: this.options.host,
        port: this.options.port,
      });

      const finish = (err?: Error) => {
        if (settled) return;
        settled = true;
        if (connectTimer) clearTimeout(connectTimer);
        socket.off("connect", onConnect);
        socket.off("error", onError);
        if (err) {
          socket.destroy();
          reject(err);
        } else {
          resolve(socket);
        }
      };

      const onConnect = () => finish();
      const onError = (err: Error) => finish(err);

      socket.once("connect", onConnect);
      socket.once("error", onError);

      if (this.options.connectTimeoutMs > 0) {
        connectTimer = setTimeout(
          () =>
            finish(
              new FrameStimulusError(
                "E_CONNECT_TIMEOUT",
                `connection to ${this.target} timed out after ${this.options.connectTimeoutMs}ms`,
              ),
            ),
          this.options.connectTimeoutMs,
        );
      }
    });
  }
}
