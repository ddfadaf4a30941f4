#!/usr/bin/env node
import readline from "node:readline";
import { USAGE, parseCliArgs } from "./cli-args";
import { toDeliveryConfig, type PublisherConfig } from "./config";
import { TcpConnector } from "./connector";
import { errorMessage } from "./errors";
import { SeededRandom, mathRandom } from "./rng";
import { SampleGenerator, createSampleEncoder } from "./sample";
import { PublisherSession } from "./session";
import { createConsoleLogger } from "./telemetry-logger";

async function main(): Promise<number> {
  const logger = createConsoleLogger("publisher");

  let config: PublisherConfig;
  try {
    config = parseCliArgs(process.argv.slice(2));
  } catch (err) {
    logger.error(errorMessage(err));
    logger.error(USAGE);
    return 2;
  }

  const rng = config.seed === undefined ? mathRandom : new SeededRandom(config.seed);
  const generator = new SampleGenerator({
    driverInstanceId: config.driverInstanceId,
    note: config.note,
    rng,
  });

  const connector = new TcpConnector({
    host: config.host,
    port: config.port,
    connectTimeoutMs: config.connectTimeoutMs,
    reconnectDelayMs: config.reconnectDelayMs,
    onReconnecting: ({ error, delayMs }) =>
      logger.warn(`connect failed: ${error.message} -> retry in ${delayMs / 1000}s`),
  });

  const session = new PublisherSession({
    connector,
    encode: createSampleEncoder(generator, config.terminator),
    delivery: toDeliveryConfig(config),
    rng,
    logger,
  });

  const rl = readline.createInterface({ input: process.stdin, terminal: false });
  try {
    await session.run(rl);
  } finally {
    rl.close();
  }
  return 0;
}

main().then(
  code => process.exit(code),
  err => {
    console.error(`[publisher] unexpected error: ${errorMessage(err)}`);
    process.exit(1);
  },
);
