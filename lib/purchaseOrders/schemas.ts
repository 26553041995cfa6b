/**
 * Response shapes requested from the language model.
 *
 * These are sent as structured-output schemas, so every key is required and
 * optional values are expressed as nullable.
 */

import { z } from "zod";

export const classificationResultSchema = z.object({
  is_valid_po: z.boolean(),
  po_id: z.string().nullable(),
  reason: z.string(),
});

export type ClassificationResult = z.infer<typeof classificationResultSchema>;

export const extractionResponseSchema = z.object({
  data: z.object({
    order_id: z.string().nullable(),
    customer: z.string().nullable(),
    pickup_location: z.string().nullable(),
    delivery_location: z.string().nullable(),
    delivery_datetime: z.string().nullable(),
    driver_name: z.string().nullable(),
    driver_phone: z.string().nullable(),
  }),
  field_confidences: z.object({
    order_id: z.number(),
    customer: z.number(),
    pickup_location: z.number(),
    delivery_location: z.number(),
    delivery_datetime: z.number(),
    driver_name: z.number(),
    driver_phone: z.number(),
  }),
  warnings: z.array(z.string()),
});

export type ExtractionResponse = z.infer<typeof extractionResponseSchema>;
