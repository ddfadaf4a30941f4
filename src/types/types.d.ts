//@preserve
export type Scenario =
  | "AtomicFrame"
  | "FragmentedFrame"
  | "IncompleteFrame"
  | "CoalescedFrames";

export type TerminatorMode = "none" | "newline";

/**
 * Source of uniform floats in [0, 1). Every randomized decision in the
 * delivery path goes through one of these.
 */
export interface RandomSource {
  next(): number;
}

/**
 * Ordered byte stream the simulator writes to. `write` returns how many
 * bytes the transport accepted; zero or less means the connection stalled.
 */
export interface ByteTransport {
  write(bytes: Buffer): number | Promise<number>;
}

/**
 * A transport owned by a session, released when the connection is dropped.
 */
export interface SessionTransport extends ByteTransport {
  close(): void;
}

export interface Connector {
  connect(): Promise<SessionTransport>;
  /** Human-readable peer label, e.g. `127.0.0.1:8051`. */
  readonly target: string;
}

export interface DeliveryConfig {
  /** Inclusive lower bound of the fragment count. */
  minChunk: number;
  /** Inclusive upper bound of the fragment count. */
  maxChunk: number;
  /** Upper bound of the pause between fragments (ms). 0 disables jitter. */
  jitterMs: number;
}

export interface SampleMessage {
  res: number;
  driver_instance_id: number;
  seq_no: number;
  pub_timestamp: number;
  command: number;
  measure: number;
  work_type: number;
  payload: {
    fork_height_mm: number;
    fork_forward_mm: number;
    note: string;
  };
}

/**
 * Produces the serialized frame for a sequence number and response code.
 */
export type FrameSource = (seqNo: number, res: number) => Buffer;

export interface ChunkRange {
  offset: number;
  length: number;
}

export interface WriteStats {
  chunks: number;
  bytes: number;
  handoffs: number;
}

export interface DeliveryReport {
  scenario: Scenario;
  res: number;
  seqNos: number[];
  /** Bytes actually put on the wire. */
  bytes: number;
  /** Length of the encoded frame(s) before truncation. */
  fullBytes: number;
  chunkCount: number;
  /** Transport write calls it took, including partial accepts. */
  handoffs: number;
  nextSeqNo: number;
}

export interface ReconnectAttempt {
  attempt: number;
  delayMs: number;
  error: Error;
}

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}
