import { describe, expect, it } from "vitest";
import { BANNER, PublisherSession } from "../src/session";
import { TransportError } from "../src/errors";
import type { DeliveryConfig } from "../src/types/types";
import { FakeConnector, memoryLogger, recordSleep, scriptedRandom } from "./fakes";

const delivery: DeliveryConfig = { minChunk: 1, maxChunk: 1, jitterMs: 0 };

// {"seq":1,"res":0} is 17 bytes
const encode = (seq: number, res: number) =>
  Buffer.from(JSON.stringify({ seq, res }), "utf8");

async function* linesOf(...lines: string[]): AsyncIterable<string> {
  for (const line of lines) yield line;
}

const setup = (...plans: number[][]) => {
  const connector = new FakeConnector(...plans);
  const { lines, logger } = memoryLogger();
  const session = new PublisherSession({
    connector,
    encode,
    delivery,
    rng: scriptedRandom(0),
    sleep: recordSleep().sleep,
    logger,
  });
  return { connector, lines, session };
};

describe("PublisherSession", () => {
  it("runs commands in order and logs each delivery", async () => {
    const { connector, lines, session } = setup();

    await session.run(linesOf("x", "1", "4", "1"));

    expect(lines).toEqual([
      ...BANNER.map(line => `info ${line}`),
      "info input must be 1/2/3/4",
      "info connected to 127.0.0.1:8051",
      "info AtomicFrame res=0 seq_no=1 bytes=17",
      "info CoalescedFrames CONCAT res=1 seq_no=2,3 bytes=34",
      "info AtomicFrame res=2 seq_no=4 bytes=17",
      "info EOF received. exit.",
    ]);
    expect(session.seqNo).toBe(5);
    expect(session.commandCount).toBe(3);
    expect(connector.opened).toHaveLength(1);
    expect(connector.opened[0].closed).toBe(true);
    expect(session.isConnected()).toBe(false);
  });

  it("ignores unknown input without touching counters", async () => {
    const { connector, lines, session } = setup();

    const outcome = await session.handleCommand("  9 ");

    expect(outcome).toEqual({ status: "ignored" });
    expect(lines).toEqual(["info input must be 1/2/3/4"]);
    expect(session.commandCount).toBe(0);
    expect(connector.opened).toHaveLength(0);
  });

  it("accepts scenario names", async () => {
    const { session } = setup();

    const outcome = await session.handleCommand("fragmentedframe");

    expect(outcome).toEqual({
      status: "delivered",
      scenario: "FragmentedFrame",
      res: 0,
      nextSeqNo: 2,
    });
  });

  it("drops the connection on failure and reconnects on the next command", async () => {
    const { connector, lines, session } = setup([0]);

    const failed = await session.handleCommand("1");

    expect(failed).toMatchObject({ status: "failed", scenario: "AtomicFrame", res: 0 });
    expect(failed.status === "failed" && failed.error).toBeInstanceOf(TransportError);
    expect(lines.at(-1)).toBe("error connection lost: transport accepted 0 bytes (17 pending)");
    expect(connector.opened[0].closed).toBe(true);
    expect(session.isConnected()).toBe(false);
    expect(session.seqNo).toBe(1);

    const delivered = await session.handleCommand("1");

    expect(delivered).toEqual({
      status: "delivered",
      scenario: "AtomicFrame",
      res: 1,
      nextSeqNo: 2,
    });
    expect(connector.opened).toHaveLength(2);
    expect(connector.opened[1].wire.toString()).toBe('{"seq":1,"res":1}');
  });

  it("cycles the response code every four commands", async () => {
    const { session } = setup();
    const codes: number[] = [];

    for (let i = 0; i < 5; i++) {
      const outcome = await session.handleCommand("1");
      if (outcome.status === "delivered") codes.push(outcome.res);
    }

    expect(codes).toEqual([0, 1, 2, 99, 0]);
  });

  it("queues overlapping commands on one connection", async () => {
    const { connector, session } = setup();

    const outcomes = await Promise.all([
      session.handleCommand("1"),
      session.handleCommand("1"),
    ]);

    expect(outcomes).toEqual([
      { status: "delivered", scenario: "AtomicFrame", res: 0, nextSeqNo: 2 },
      { status: "delivered", scenario: "AtomicFrame", res: 1, nextSeqNo: 3 },
    ]);
    expect(connector.opened).toHaveLength(1);
    expect(connector.opened[0].wire.toString()).toBe(
      '{"seq":1,"res":0}{"seq":2,"res":1}',
    );
    expect(session.seqNo).toBe(3);
  });
});
