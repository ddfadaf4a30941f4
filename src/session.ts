import { DeliverySimulator } from "./delivery";
import { errorMessage } from "./errors";
import { mathRandom } from "./rng";
import { resolveScenario, responseCodeFor } from "./scenarios";
import { createConsoleLogger, formatDeliveryReport } from "./telemetry-logger";
import type {
  Connector,
  DeliveryConfig,
  FrameSource,
  Logger,
  RandomSource,
  Scenario,
  SessionTransport,
} from "./types/types";

export interface PublisherSessionOptions {
  connector: Connector;
  encode: FrameSource;
  delivery: DeliveryConfig;
  rng?: RandomSource;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
  /** First sequence number handed out. */
  initialSeqNo?: number;
}

export type CommandOutcome =
  | { status: "ignored" }
  | { status: "delivered"; scenario: Scenario; res: number; nextSeqNo: number }
  | { status: "failed"; scenario: Scenario; res: number; error: Error };

export const BANNER = [
  "1=AtomicFrame 2=FragmentedFrame 3=IncompleteFrame 4=CoalescedFrames",
  "res cycles as [0,1,2,99] by input count",
  "Ctrl+D to exit.",
];

interface ActiveConnection {
  transport: SessionTransport;
  simulator: DeliverySimulator;
}

/**
 * Interactive driver: one command at a time, one connection at a time.
 * A failed delivery drops the connection; the next command reconnects.
 */
export class PublisherSession {
  private seq: number;
  private commands = 0;
  private active?: ActiveConnection;
  private tail: Promise<unknown> = Promise.resolve();
  private readonly logger: Logger;
  private readonly rng: RandomSource;

  constructor(private readonly options: PublisherSessionOptions) {
    this.seq = options.initialSeqNo ?? 1;
    this.logger = options.logger ?? createConsoleLogger();
    this.rng = options.rng ?? mathRandom;
  }

  get seqNo(): number {
    return this.seq;
  }

  get commandCount(): number {
    return this.commands;
  }

  isConnected(): boolean {
    return this.active !== undefined;
  }

  /**
   * Commands run one at a time in call order; an overlapping call waits for
   * the previous one to finish.
   */
  handleCommand(line: string): Promise<CommandOutcome> {
    const run = this.tail.then(() => this.execute(line));
    this.tail = run.catch(() => undefined);
    return run;
  }

  private async execute(line: string): Promise<CommandOutcome> {
    const scenario = resolveScenario(line);
    if (!scenario) {
      this.logger.info("input must be 1/2/3/4");
      return { status: "ignored" };
    }

    this.commands += 1;
    const res = responseCodeFor(this.commands);

    try {
      const { simulator } = await this.ensureConnected();
      this.seq = await simulator.deliver(
        scenario,
        this.seq,
        res,
        this.options.delivery,
      );
      return { status: "delivered", scenario, res, nextSeqNo: this.seq };
    } catch (err) {
      const error = err instanceof Error ? err : new Error(errorMessage(err));
      this.logger.error(`connection lost: ${error.message}`);
      this.close();
      return { status: "failed", scenario, res, error };
    }
  }

  async run(lines: AsyncIterable<string>): Promise<void> {
    for (const line of BANNER) this.logger.info(line);
    try {
      for await (const line of lines) {
        await this.handleCommand(line);
      }
      this.logger.info("EOF received. exit.");
    } finally {
      this.close();
    }
  }

  close(): void {
    const active = this.active;
    this.active = undefined;
    active?.transport.close();
  }

  private async ensureConnected(): Promise<ActiveConnection> {
    if (this.active) return this.active;

    const transport = await this.options.connector.connect();
    this.logger.info(`connected to ${this.options.connector.target}`);
    const simulator = new DeliverySimulator({
      transport,
      encode: this.options.encode,
      rng: this.rng,
      sleep: this.options.sleep,
      onDelivered: report => this.logger.info(formatDeliveryReport(report)),
    });
    this.active = { transport, simulator };
    return this.active;
  }
}
