import { encodeFrame } from "./codecs";
import { mathRandom, randomChoice, randomInt } from "./rng";
import type {
  FrameSource,
  RandomSource,
  SampleMessage,
  TerminatorMode,
} from "./types/types";

export interface SampleGeneratorOptions {
  driverInstanceId?: number;
  note?: string;
  rng?: RandomSource;
  /** Milliseconds since epoch. */
  now?: () => number;
}

const COMMANDS = [0, 3] as const;
const MEASURES = [0, 1] as const;
const WORK_TYPES = [0, 1, 2] as const;

export class SampleGenerator {
  private readonly driverInstanceId: number;
  private readonly note: string;
  private readonly rng: RandomSource;
  private readonly now: () => number;

  constructor(options: SampleGeneratorOptions = {}) {
    this.driverInstanceId = options.driverInstanceId ?? 1;
    this.note = options.note ?? "hello_tablet";
    this.rng = options.rng ?? mathRandom;
    this.now = options.now ?? Date.now;
  }

  next(seqNo: number, res: number): SampleMessage {
    return {
      res,
      driver_instance_id: this.driverInstanceId,
      seq_no: seqNo,
      pub_timestamp: Math.trunc(this.now()),
      command: randomChoice(this.rng, COMMANDS),
      measure: randomChoice(this.rng, MEASURES),
      work_type: randomChoice(this.rng, WORK_TYPES),
      payload: {
        fork_height_mm: randomInt(this.rng, 0, 1500),
        fork_forward_mm: randomInt(this.rng, 0, 3000),
        note: this.note,
      },
    };
  }
}

/**
 * Bind a generator to the frame encoder so the simulator only sees bytes.
 */
export const createSampleEncoder = (
  generator: SampleGenerator,
  terminator: TerminatorMode,
): FrameSource => {
  return (seqNo, res) => encodeFrame(generator.next(seqNo, res), terminator);
};
