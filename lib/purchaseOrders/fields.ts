/**
 * Canonical purchase order fields.
 *
 * The order of PO_FIELDS is significant: validation results, sheet rows and
 * prompts all follow it.
 */

export const PO_FIELDS = [
  "order_id",
  "customer",
  "pickup_location",
  "delivery_location",
  "delivery_datetime",
  "driver_name",
  "driver_phone",
] as const;

export type PoField = (typeof PO_FIELDS)[number];

/**
 * Extracted values keyed by canonical field. A field may be absent from a
 * partially populated map; validation treats absent and null the same way.
 */
export type ExtractedFields = Partial<Record<PoField, string | null>>;

/**
 * Per-field extraction confidence, 0..1.
 */
export type FieldConfidences = Partial<Record<PoField, number>>;
