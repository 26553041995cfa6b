/**
 * Unit tests for the classify stage
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { LocalPromptStore } from "@/lib/services/prompts/localPromptStore";
import { createClassifyStage } from "@/lib/workflow/stages/classify";
import { MockLlm } from "../../helpers/mocks";
import { poEmailState } from "../../helpers/fixtures";

const prompts = new LocalPromptStore({ promptsDir: "prompts" });

describe("classify stage", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  it("records a valid PO with its id and reason", async () => {
    const llm = new MockLlm({
      structured: {
        classification_result: { is_valid_po: true, po_id: "PO-2025-001", reason: "Order with PDF" },
      },
    });
    const stage = createClassifyStage({ llm, prompts });

    const update = await stage(poEmailState());

    expect(update).toEqual({
      isValidPo: true,
      poId: "PO-2025-001",
      classificationReason: "Order with PDF",
      trajectory: ["classify"],
    });
  });

  it("clears the PO id for a non-PO email", async () => {
    const llm = new MockLlm({
      structured: {
        classification_result: { is_valid_po: false, po_id: "PO-9", reason: "Newsletter" },
      },
    });
    const stage = createClassifyStage({ llm, prompts });

    const update = await stage(poEmailState());

    expect(update.isValidPo).toBe(false);
    expect(update.poId).toBeNull();
    expect(update.classificationReason).toBe("Newsletter");
  });

  it("sends the email fields to the model", async () => {
    const llm = new MockLlm({
      structured: { classification_result: { is_valid_po: false, po_id: null, reason: "n/a" } },
    });
    const stage = createClassifyStage({ llm, prompts });

    await stage(poEmailState({ hasAttachment: false }));

    expect(llm.structuredCalls).toHaveLength(1);
    const [call] = llm.structuredCalls;
    expect(call.schemaName).toBe("classification_result");
    expect(call.messages[0].role).toBe("system");
    expect(call.messages[1].content).toBe(
      "Classify this email.\n\n" +
        "Subject: Purchase Order PO-2025-001\n" +
        "From: orders@acme.test\n" +
        "Has attachment: no\n\n" +
        "Body:\n" +
        "Please find attached the purchase order."
    );
  });

  it("turns a model failure into an error outcome", async () => {
    const llm = new MockLlm({ errors: { classification_result: new Error("model timeout") } });
    const stage = createClassifyStage({ llm, prompts });

    const update = await stage(poEmailState());

    expect(update).toEqual({
      finalStatus: "error",
      errorMessage: "ClassifyStage failed: model timeout",
      trajectory: ["classify"],
    });
  });

  it("treats a malformed model response as a failure", async () => {
    const llm = new MockLlm({ structured: { classification_result: { reason: "no verdict" } } });
    const stage = createClassifyStage({ llm, prompts });

    const update = await stage(poEmailState());

    expect(update.finalStatus).toBe("error");
    expect(update.errorMessage).toMatch(/^ClassifyStage failed: /);
  });
});
