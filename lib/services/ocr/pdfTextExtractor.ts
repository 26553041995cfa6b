/**
 * PDF text extraction on pdfjs-dist.
 *
 * Uses the legacy build, which is the one that runs on Node without a DOM.
 * Text items on a page are joined with a space and pages with a newline.
 */

import type { DocumentTextExtractor } from "./types";

/**
 * pdfjs-dist ships ESM only; load it lazily so importing this module stays
 * cheap for callers that never extract text.
 */
async function loadPdfJsLegacy() {
  return await import("pdfjs-dist/legacy/build/pdf.mjs");
}

export function assertPdfBuffer(buffer: Buffer): void {
  if (buffer.length < 10) {
    throw new Error(`PDF_BUFFER_EMPTY_OR_TOO_SMALL (size=${buffer.length})`);
  }

  const header = buffer.subarray(0, 5).toString("utf8");
  if (header !== "%PDF-") {
    throw new Error(`NOT_A_PDF_BUFFER (header=${JSON.stringify(header)})`);
  }
}

export class PdfTextExtractor implements DocumentTextExtractor {
  async extractText(document: Buffer): Promise<string> {
    assertPdfBuffer(document);

    const pdfjsLib = await loadPdfJsLegacy();
    const loadingTask = pdfjsLib.getDocument({
      data: new Uint8Array(document),
      stopAtErrors: false,
      isEvalSupported: false,
      verbosity: 0,
    });

    const pdf = await loadingTask.promise;
    const pages: string[] = [];

    try {
      for (let pageNum = 1; pageNum <= pdf.numPages; pageNum++) {
        const page = await pdf.getPage(pageNum);
        const content = await page.getTextContent();

        const pageText = content.items
          .map((item) => ("str" in item ? item.str : ""))
          .filter(Boolean)
          .join(" ");

        pages.push(pageText.trim());
      }
    } finally {
      await pdf.destroy();
    }

    const text = pages.filter(Boolean).join("\n").trim();
    if (!text) {
      console.warn("[PDF] No text layer found (likely scanned/image-only PDF)", {
        pages: pages.length,
      });
    }
    return text;
  }
}
