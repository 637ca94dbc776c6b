import { z } from "zod";

export interface OrderLineRequest {
  menuItemId: number;
  quantity: number;
}

/** Typed form of a submitted order: one line per `quantity_<id>` field with a positive integer. */
export interface OrderRequest {
  lines: OrderLineRequest[];
}

const QUANTITY_FIELD = /^quantity_(\d+)$/;

const quantitySchema = z
  .string()
  .trim()
  .regex(/^\d+$/)
  .transform(Number)
  .pipe(z.number().int().positive().safe());

/**
 * Builds an order request from a form field bag. Fields that are not
 * `quantity_<id>`, and quantities that are zero, negative, fractional,
 * non-numeric or empty, are skipped rather than rejecting the submission.
 */
export function parseOrderRequest(fields: Record<string, string>): OrderRequest {
  const lines: OrderLineRequest[] = [];

  for (const [key, value] of Object.entries(fields)) {
    const match = QUANTITY_FIELD.exec(key);
    if (!match) continue;

    const menuItemId = Number(match[1]);
    if (!Number.isSafeInteger(menuItemId)) continue;

    const quantity = quantitySchema.safeParse(value);
    if (!quantity.success) continue;

    lines.push({ menuItemId, quantity: quantity.data });
  }

  return { lines };
}
