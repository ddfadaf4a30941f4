export { planChunks, splitIntoChunks } from "./splitter";
export { PacedWriter, type PacedWriterOptions } from "./paced-writer";
export {
  DeliverySimulator,
  validateDeliveryConfig,
  type DeliverySimulatorOptions,
} from "./delivery";
export { compactJsonSerializer, encodeFrame } from "./codecs";
export {
  SampleGenerator,
  createSampleEncoder,
  type SampleGeneratorOptions,
} from "./sample";
export {
  SCENARIOS,
  SCENARIO_BY_KEY,
  RESPONSE_CODE_CYCLE,
  INCOMPLETE_WITHHOLD_MIN,
  INCOMPLETE_WITHHOLD_MAX,
  isScenario,
  resolveScenario,
  responseCodeFor,
} from "./scenarios";
export {
  SeededRandom,
  mathRandom,
  randomChoice,
  randomInt,
  randomUniform,
} from "./rng";
export { SocketTransport } from "./socket-transport";
export { TcpConnector, type Dialer, type TcpConnectorOptions } from "./connector";
export {
  PublisherSession,
  BANNER,
  type CommandOutcome,
  type PublisherSessionOptions,
} from "./session";
export {
  publisherConfigSchema,
  terminatorModeSchema,
  resolvePublisherConfig,
  toDeliveryConfig,
  type PublisherConfig,
  type PublisherConfigInput,
} from "./config";
export { parseCliArgs, USAGE } from "./cli-args";
export { createConsoleLogger, formatDeliveryReport } from "./telemetry-logger";
export {
  FrameStimulusError,
  InvalidArgumentError,
  TransportError,
  EncodingError,
  errorMessage,
} from "./errors";
export type { FrameStimulusErrorCode } from "./errors";
export type {
  ByteTransport,
  ChunkRange,
  Connector,
  DeliveryConfig,
  DeliveryReport,
  FrameSource,
  Logger,
  RandomSource,
  ReconnectAttempt,
  SampleMessage,
  Scenario,
  SessionTransport,
  TerminatorMode,
  WriteStats,
} from "./types/types";
