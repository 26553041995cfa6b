/**
 * Turns document bytes into raw text. Returns "" for a blank or image-only
 * document; throws when the bytes cannot be read as a document at all.
 */
export interface DocumentTextExtractor {
  extractText(document: Buffer): Promise<string>;
}
