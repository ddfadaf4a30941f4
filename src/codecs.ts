import { EncodingError, errorMessage } from "./errors";
import type { TerminatorMode } from "./types/types";

const NEWLINE = Buffer.from("\n", "utf8");

/**
 * Compact JSON, UTF-8, no inserted whitespace. Non-ASCII text is written
 * as-is rather than \u-escaped.
 */
export const compactJsonSerializer = (message: unknown): Buffer => {
  let text: string | undefined;
  try {
    text = JSON.stringify(message);
  } catch (err) {
    throw new EncodingError(`failed to serialize message: ${errorMessage(err)}`, {
      cause: err,
    });
  }
  if (typeof text !== "string") {
    throw new EncodingError(
      `message of type ${typeof message} has no JSON representation`,
    );
  }
  return Buffer.from(text, "utf8");
};

/**
 * Serialize one logical message into its frame payload.
 */
export const encodeFrame = (
  message: unknown,
  terminator: TerminatorMode,
): Buffer => {
  const body = compactJsonSerializer(message);
  return terminator === "newline" ? Buffer.concat([body, NEWLINE]) : body;
};
