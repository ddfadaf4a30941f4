import { describe, expect, it } from "vitest";
import { SampleGenerator, createSampleEncoder } from "../src/sample";
import type { RandomSource } from "../src/types/types";

const fixed = (value: number): RandomSource => ({ next: () => value });

describe("SampleGenerator", () => {
  it("fills every field from the injected clock and random source", () => {
    const generator = new SampleGenerator({ rng: fixed(0), now: () => 1_700_000_000_123.9 });
    expect(generator.next(7, 2)).toEqual({
      res: 2,
      driver_instance_id: 1,
      seq_no: 7,
      pub_timestamp: 1_700_000_000_123,
      command: 0,
      measure: 0,
      work_type: 0,
      payload: { fork_height_mm: 0, fork_forward_mm: 0, note: "hello_tablet" },
    });
  });

  it("draws the upper choices when the source is near 1", () => {
    const generator = new SampleGenerator({
      rng: fixed(0.9999999),
      now: () => 0,
      driverInstanceId: 4,
      note: "bay-2",
    });
    const message = generator.next(1, 99);
    expect(message.command).toBe(3);
    expect(message.measure).toBe(1);
    expect(message.work_type).toBe(2);
    expect(message.payload).toEqual({
      fork_height_mm: 1500,
      fork_forward_mm: 3000,
      note: "bay-2",
    });
    expect(message.driver_instance_id).toBe(4);
  });
});

describe("createSampleEncoder", () => {
  it("serializes in a stable key order", () => {
    const generator = new SampleGenerator({ rng: fixed(0), now: () => 5 });
    const encode = createSampleEncoder(generator, "newline");
    expect(encode(3, 1).toString("utf8")).toBe(
      '{"res":1,"driver_instance_id":1,"seq_no":3,"pub_timestamp":5,' +
        '"command":0,"measure":0,"work_type":0,' +
        '"payload":{"fork_height_mm":0,"fork_forward_mm":0,"note":"hello_tablet"}}\n',
    );
  });
});
