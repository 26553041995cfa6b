import type { ExtractedFields, FieldConfidences } from "@/lib/purchaseOrders/fields";
import type { ExtractionResponse } from "@/lib/purchaseOrders/schemas";
import { createInitialState, type WorkflowState } from "@/lib/workflow/state";

export const FULL_DATA = {
  order_id: "PO-2025-001",
  customer: "Acme Corp",
  pickup_location: "Warehouse A, Madrid",
  delivery_location: "Retail Hub B, Barcelona",
  delivery_datetime: "2025-01-18T08:00:00",
  driver_name: "Juan Perez",
  driver_phone: "+34 600 000 000",
} satisfies ExtractedFields;

export const FULL_CONFIDENCES = {
  order_id: 0.95,
  customer: 0.9,
  pickup_location: 0.85,
  delivery_location: 0.8,
  delivery_datetime: 0.75,
  driver_name: 0.7,
  driver_phone: 0.65,
} satisfies FieldConfidences;

export function extractionResponse(
  overrides: {
    data?: Partial<ExtractionResponse["data"]>;
    confidences?: Partial<ExtractionResponse["field_confidences"]>;
    warnings?: string[];
  } = {}
): ExtractionResponse {
  return {
    data: { ...FULL_DATA, ...overrides.data },
    field_confidences: { ...FULL_CONFIDENCES, ...overrides.confidences },
    warnings: overrides.warnings ?? [],
  };
}

export const FAKE_PDF = Buffer.from("%PDF-1.4 fake purchase order document");

export function poEmailState(overrides: Partial<WorkflowState> = {}): WorkflowState {
  return {
    ...createInitialState({
      emailSubject: "Purchase Order PO-2025-001",
      emailBody: "Please find attached the purchase order.",
      emailSender: "orders@acme.test",
      emailMessageId: "msg-001",
      pdfBytes: FAKE_PDF,
      threadId: "thread-001",
    }),
    ...overrides,
  };
}
