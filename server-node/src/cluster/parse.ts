import { z } from "zod";
import type { ClusterPrinterStatus } from "types/cluster";
import { ClusterStatusSchema, PrinterStatusSchema } from "../schemas";

export type PayloadIssue = { path: string; message: string };

export class ClusterPayloadError extends Error {
  readonly issues: PayloadIssue[];

  constructor(message: string, issues: PayloadIssue[]) {
    super(message);
    this.name = "ClusterPayloadError";
    this.issues = issues;
  }
}

function toIssues(error: z.ZodError): PayloadIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.length ? issue.path.join(".") : "<root>",
    message: issue.message,
  }));
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object") {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Validate a single printer entry of a cluster status payload and return it as
 * an immutable snapshot. Keys the schema does not know are dropped.
 */
export function parsePrinterStatus(input: unknown): ClusterPrinterStatus {
  const result = PrinterStatusSchema.safeParse(input);
  if (!result.success) {
    throw new ClusterPayloadError("Invalid printer status payload", toIssues(result.error));
  }
  return deepFreeze(result.data);
}

export function parseClusterStatus(input: unknown): ClusterPrinterStatus[] {
  const result = ClusterStatusSchema.safeParse(input);
  if (!result.success) {
    throw new ClusterPayloadError("Invalid cluster status payload", toIssues(result.error));
  }
  return deepFreeze(result.data.printers);
}
