import { InvalidArgumentError } from "./errors";
import { PacedWriter, type PacedWriterOptions } from "./paced-writer";
import { mathRandom, randomInt } from "./rng";
import {
  INCOMPLETE_WITHHOLD_MAX,
  INCOMPLETE_WITHHOLD_MIN,
  isScenario,
} from "./scenarios";
import { splitIntoChunks } from "./splitter";
import type {
  ByteTransport,
  DeliveryConfig,
  DeliveryReport,
  FrameSource,
  RandomSource,
  Scenario,
  WriteStats,
} from "./types/types";

export interface DeliverySimulatorOptions {
  transport: ByteTransport;
  encode: FrameSource;
  rng?: RandomSource;
  sleep?: PacedWriterOptions["sleep"];
  /** Called after every successful delivery. */
  onDelivered?: (report: DeliveryReport) => void;
}

export function validateDeliveryConfig(config: DeliveryConfig): void {
  const { minChunk, maxChunk, jitterMs } = config;
  if (!Number.isInteger(minChunk) || minChunk < 1) {
    throw new InvalidArgumentError(`minChunk must be an integer >= 1, got ${minChunk}`);
  }
  if (!Number.isInteger(maxChunk) || maxChunk < minChunk) {
    throw new InvalidArgumentError(
      `maxChunk must be an integer >= minChunk (${minChunk}), got ${maxChunk}`,
    );
  }
  if (!Number.isFinite(jitterMs) || jitterMs < 0) {
    throw new InvalidArgumentError(`jitterMs must be >= 0, got ${jitterMs}`);
  }
}

/**
 * Turns one logical command into the exact byte chunks and pauses written to
 * the wire. Calls are serialized: a delivery never interleaves with another
 * on the same transport.
 */
export class DeliverySimulator {
  private readonly writer: PacedWriter;
  private readonly rng: RandomSource;
  private readonly encode: FrameSource;
  private readonly onDelivered?: (report: DeliveryReport) => void;
  private tail: Promise<unknown> = Promise.resolve();

  constructor(options: DeliverySimulatorOptions) {
    this.rng = options.rng ?? mathRandom;
    this.encode = options.encode;
    this.onDelivered = options.onDelivered;
    this.writer = new PacedWriter(options.transport, {
      rng: this.rng,
      sleep: options.sleep,
    });
  }

  /**
   * Deliver `scenario` starting at `seqNo` and resolve the next sequence
   * number.
   */
  deliver(
    scenario: Scenario,
    seqNo: number,
    res: number,
    config: DeliveryConfig,
  ): Promise<number> {
    const run = this.tail.then(
      () => this.run(scenario, seqNo, res, config),
      () => this.run(scenario, seqNo, res, config),
    );
    this.tail = run.catch(() => undefined);
    return run.then(report => {
      this.onDelivered?.(report);
      return report.nextSeqNo;
    });
  }

  private async run(
    scenario: Scenario,
    seqNo: number,
    res: number,
    config: DeliveryConfig,
  ): Promise<DeliveryReport> {
    if (!isScenario(scenario)) {
      throw new InvalidArgumentError(`unknown scenario: ${String(scenario)}`);
    }
    validateDeliveryConfig(config);

    switch (scenario) {
      case "AtomicFrame": {
        const frame = this.encode(seqNo, res);
        const stats = await this.writer.writeChunks([frame]);
        return this.report(scenario, res, [seqNo], frame.length, stats);
      }
      case "FragmentedFrame": {
        const frame = this.encode(seqNo, res);
        const count = randomInt(this.rng, config.minChunk, config.maxChunk);
        const chunks = splitIntoChunks(frame, count);
        const stats = await this.writer.writeChunks(chunks, config.jitterMs);
        return this.report(scenario, res, [seqNo], frame.length, stats);
      }
      case "IncompleteFrame": {
        const frame = this.encode(seqNo, res);
        if (frame.length === 0) {
          throw new InvalidArgumentError("cannot truncate an empty frame");
        }
        const withheld = randomInt(
          this.rng,
          INCOMPLETE_WITHHOLD_MIN,
          INCOMPLETE_WITHHOLD_MAX,
        );
        const cut = Math.max(1, frame.length - withheld);
        const stats = await this.writer.writeChunks([frame.subarray(0, cut)]);
        return this.report(scenario, res, [seqNo], frame.length, stats);
      }
      case "CoalescedFrames": {
        const first = this.encode(seqNo, res);
        const second = this.encode(seqNo + 1, res);
        const joined = Buffer.concat([first, second]);
        const stats = await this.writer.writeChunks([joined]);
        return this.report(
          scenario,
          res,
          [seqNo, seqNo + 1],
          joined.length,
          stats,
        );
      }
    }
  }

  private report(
    scenario: Scenario,
    res: number,
    seqNos: number[],
    fullBytes: number,
    stats: WriteStats,
  ): DeliveryReport {
    return {
      scenario,
      res,
      seqNos,
      bytes: stats.bytes,
      fullBytes,
      chunkCount: stats.chunks,
      handoffs: stats.handoffs,
      nextSeqNo: seqNos[seqNos.length - 1] + 1,
    };
  }
}
