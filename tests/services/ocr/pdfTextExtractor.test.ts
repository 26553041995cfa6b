/**
 * Unit tests for PDF text layer extraction
 */

import { describe, it, expect, vi, beforeEach } from "vitest";

const { getDocumentMock } = vi.hoisted(() => ({ getDocumentMock: vi.fn() }));

vi.mock("pdfjs-dist/legacy/build/pdf.mjs", () => ({
  getDocument: getDocumentMock,
}));

import { assertPdfBuffer, PdfTextExtractor } from "@/lib/services/ocr/pdfTextExtractor";
import { FAKE_PDF } from "../../helpers/fixtures";

function fakePdf(pages: { str?: string }[][]) {
  const destroy = vi.fn().mockResolvedValue(undefined);
  const doc = {
    numPages: pages.length,
    getPage: vi.fn(async (pageNum: number) => ({
      getTextContent: async () => ({ items: pages[pageNum - 1] }),
    })),
    destroy,
  };
  getDocumentMock.mockReturnValue({ promise: Promise.resolve(doc) });
  return doc;
}

describe("assertPdfBuffer", () => {
  it("accepts a buffer starting with the PDF header", () => {
    expect(() => assertPdfBuffer(FAKE_PDF)).not.toThrow();
  });

  it("rejects a buffer that is too small", () => {
    expect(() => assertPdfBuffer(Buffer.from("%PDF"))).toThrow("PDF_BUFFER_EMPTY_OR_TOO_SMALL (size=4)");
  });

  it("rejects a buffer without the PDF header", () => {
    expect(() => assertPdfBuffer(Buffer.from("PK\u0003\u0004 zip archive"))).toThrow(/^NOT_A_PDF_BUFFER/);
  });
});

describe("PdfTextExtractor", () => {
  beforeEach(() => {
    getDocumentMock.mockReset();
  });

  it("joins items with spaces and pages with newlines", async () => {
    const doc = fakePdf([
      [{ str: "PO-2025-001" }, { str: "Acme Corp" }],
      [{ str: "" }, {}, { str: " Driver: Juan Perez " }],
    ]);

    const text = await new PdfTextExtractor().extractText(FAKE_PDF);

    expect(text).toBe("PO-2025-001 Acme Corp\nDriver: Juan Perez");
    expect(doc.destroy).toHaveBeenCalledTimes(1);
    const [params] = getDocumentMock.mock.calls[0];
    expect(params.isEvalSupported).toBe(false);
    expect(params.data).toBeInstanceOf(Uint8Array);
  });

  it("returns an empty string for a PDF with no text layer", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    fakePdf([[], []]);

    const text = await new PdfTextExtractor().extractText(FAKE_PDF);

    expect(text).toBe("");
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("releases the document when a page fails", async () => {
    const doc = fakePdf([[{ str: "x" }]]);
    doc.getPage.mockRejectedValueOnce(new Error("bad xref"));

    await expect(new PdfTextExtractor().extractText(FAKE_PDF)).rejects.toThrow("bad xref");
    expect(doc.destroy).toHaveBeenCalledTimes(1);
  });

  it("does not load pdf.js for a non-PDF buffer", async () => {
    await expect(new PdfTextExtractor().extractText(Buffer.from("hello world, not a pdf"))).rejects.toThrow(
      /^NOT_A_PDF_BUFFER/
    );
    expect(getDocumentMock).not.toHaveBeenCalled();
  });
});
