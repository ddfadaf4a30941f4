import { z } from "zod";
import { InvalidArgumentError } from "./errors";
import type { DeliveryConfig } from "./types/types";

const countSchema = z.number().int();

export const terminatorModeSchema = z.enum(["none", "newline"]);

export const publisherConfigSchema = z
  .object({
    host: z.string().min(1).default("127.0.0.1"),
    port: z.number().int().min(1).max(65_535).default(8051),
    terminator: terminatorModeSchema.default("none"),
    /** Fragment count range for FragmentedFrame, inclusive. */
    minChunk: countSchema.min(1).default(1),
    maxChunk: countSchema.min(1).default(16),
    /** Upper bound of the pause between fragments (ms). */
    jitterMs: z.number().nonnegative().default(5),
    connectTimeoutMs: z.number().int().nonnegative().default(3_000),
    reconnectDelayMs: z.number().int().nonnegative().default(1_000),
    driverInstanceId: z.number().int().default(1),
    note: z.string().default("hello_tablet"),
    seed: z.number().int().optional(),
  })
  .refine(config => config.maxChunk >= config.minChunk, {
    message: "maxChunk must be >= minChunk",
    path: ["maxChunk"],
  });

export type PublisherConfig = z.infer<typeof publisherConfigSchema>;
export type PublisherConfigInput = z.input<typeof publisherConfigSchema>;

export const resolvePublisherConfig = (
  input: PublisherConfigInput = {},
): PublisherConfig => {
  const parsed = publisherConfigSchema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new InvalidArgumentError(`invalid configuration: ${details}`);
  }
  return parsed.data;
};

export const toDeliveryConfig = (config: PublisherConfig): DeliveryConfig => ({
  minChunk: config.minChunk,
  maxChunk: config.maxChunk,
  jitterMs: config.jitterMs,
});
