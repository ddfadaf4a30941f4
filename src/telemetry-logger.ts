import type { DeliveryReport, Logger } from "./types/types";

/**
 * Console logger; info lines go to stdout, warnings and errors to stderr.
 */
export const createConsoleLogger = (prefix = "publisher"): Logger => {
  const tag = `[${prefix}]`;
  return {
    info: message => console.log(`${tag} ${message}`),
    warn: message => console.warn(`${tag} ${message}`),
    error: message => console.error(`${tag} ${message}`),
  };
};

/**
 * One line per delivery, e.g.
 * `IncompleteFrame PARTIAL res=2 seq_no=7 bytes=171 (cut from 180)`.
 */
export const formatDeliveryReport = (report: DeliveryReport): string => {
  const fields = `res=${report.res} seq_no=${report.seqNos.join(",")} bytes=${report.bytes}`;
  switch (report.scenario) {
    case "FragmentedFrame":
      return `${report.scenario} ${fields} chunk_count=${report.chunkCount}`;
    case "IncompleteFrame":
      return `${report.scenario} PARTIAL ${fields} (cut from ${report.fullBytes})`;
    case "CoalescedFrames":
      return `${report.scenario} CONCAT ${fields}`;
    default:
      return `${report.scenario} ${fields}`;
  }
};
