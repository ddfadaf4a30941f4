import { TransportError } from "./errors";
import { delay } from "./timers";
import { mathRandom, randomUniform } from "./rng";
import type { ByteTransport, RandomSource, WriteStats } from "./types/types";

export interface PacedWriterOptions {
  rng?: RandomSource;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Writes chunks to a transport strictly in order, one complete chunk at a
 * time, with an optional random pause between chunks.
 */
export class PacedWriter {
  private readonly rng: RandomSource;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly transport: ByteTransport,
    options: PacedWriterOptions = {},
  ) {
    this.rng = options.rng ?? mathRandom;
    this.sleep = options.sleep ?? delay;
  }

  /**
   * Hand off `chunk` until every byte is accepted. Returns the number of
   * hand-offs it took.
   */
  async writeAll(chunk: Buffer): Promise<number> {
    let offset = 0;
    let handoffs = 0;
    while (offset < chunk.length) {
      const accepted = await this.transport.write(chunk.subarray(offset));
      handoffs += 1;
      if (!Number.isFinite(accepted) || accepted <= 0) {
        throw new TransportError(
          `transport accepted ${accepted} bytes (${chunk.length - offset} pending)`,
        );
      }
      offset += Math.min(accepted, chunk.length - offset);
    }
    return handoffs;
  }

  async writeChunks(
    chunks: readonly Buffer[],
    jitterMs = 0,
  ): Promise<WriteStats> {
    const stats: WriteStats = { chunks: 0, bytes: 0, handoffs: 0 };
    for (let i = 0; i < chunks.length; i++) {
      const chunk = chunks[i];
      stats.handoffs += await this.writeAll(chunk);
      stats.chunks += 1;
      stats.bytes += chunk.length;

      if (jitterMs > 0 && i !== chunks.length - 1) {
        await this.sleep(randomUniform(this.rng, 0, jitterMs));
      }
    }
    return stats;
  }
}
