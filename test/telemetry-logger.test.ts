import { describe, expect, it, vi } from "vitest";
import {
  createConsoleLogger,
  formatDeliveryReport,
} from "../src/telemetry-logger";
import type { DeliveryReport } from "../src/types/types";

describe("console logger", () => {
  it("prefixes lines and routes errors to stderr", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = createConsoleLogger("TEST");

    logger.info("hello");
    logger.error("boom");

    expect(log).toHaveBeenCalledWith("[TEST] hello");
    expect(error).toHaveBeenCalledWith("[TEST] boom");
    log.mockRestore();
    error.mockRestore();
  });

  it("defaults to the publisher prefix", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    createConsoleLogger().warn("slow");
    expect(warn).toHaveBeenCalledWith("[publisher] slow");
    warn.mockRestore();
  });
});

describe("formatDeliveryReport", () => {
  const base: DeliveryReport = {
    scenario: "AtomicFrame",
    res: 0,
    seqNos: [1],
    bytes: 180,
    fullBytes: 180,
    chunkCount: 1,
    handoffs: 1,
    nextSeqNo: 2,
  };

  it("formats each scenario", () => {
    expect(formatDeliveryReport(base)).toBe("AtomicFrame res=0 seq_no=1 bytes=180");
    expect(
      formatDeliveryReport({ ...base, scenario: "FragmentedFrame", chunkCount: 6 }),
    ).toBe("FragmentedFrame res=0 seq_no=1 bytes=180 chunk_count=6");
    expect(
      formatDeliveryReport({ ...base, scenario: "IncompleteFrame", bytes: 171 }),
    ).toBe("IncompleteFrame PARTIAL res=0 seq_no=1 bytes=171 (cut from 180)");
    expect(
      formatDeliveryReport({
        ...base,
        scenario: "CoalescedFrames",
        res: 99,
        seqNos: [4, 5],
        bytes: 360,
      }),
    ).toBe("CoalescedFrames CONCAT res=99 seq_no=4,5 bytes=360");
  });
});
