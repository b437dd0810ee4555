import { z } from "zod";

/**
 * Ingest endpoint reply for one record. Every field is optional; servers
 * answer either `{ success: true }` or `{ status: "accepted", id, ... }`.
 */
export const DeliveryReceiptSchema = z
  .object({
    success: z.boolean().optional(),
    status: z.string().optional(),
    id: z.union([z.number(), z.string()]).optional(),
    timestamp: z.union([z.number(), z.string()]).optional(),
    message: z.string().optional(),
  })
  .passthrough();

export type DeliveryReceipt = z.infer<typeof DeliveryReceiptSchema>;

export function isAccepted(receipt: DeliveryReceipt): boolean {
  return receipt.success === true || receipt.status === "accepted";
}

/**
 * Transport the pipeline hands one serialized, already-encrypted record to.
 *
 * One instance is shared by every worker, so `send` must tolerate
 * concurrent calls. Failures must be thrown as errors the retry
 * classifier can read: a `DeliveryError` with the right code, or an error
 * carrying a socket code.
 */
export interface DeliveryPort {
  send(serializedEntry: string, signal?: AbortSignal): Promise<DeliveryReceipt>;
  close?(): Promise<void> | void;
}
