/// <reference types="node" />
/**
 * Tests page splitting and cleanup of pdf-parse output.
 */

import assert from "node:assert";
import test from "node:test";
import { PdfDocumentLoader } from "../api/services/pdfParser";

test("splitPages restores one entry per page, including empty pages", () => {
  assert.deepStrictEqual(PdfDocumentLoader.splitPages("\n\nA\n\n\n\nC", 3), ["A", "", "C"]);
});

test("splitPages falls back to one section when separators do not match the page count", () => {
  assert.deepStrictEqual(PdfDocumentLoader.splitPages("\n\nonly text", 2), ["only text"]);
});

test("cleanText normalizes line endings and drops page footers", () => {
  assert.strictEqual(PdfDocumentLoader.cleanText("Intro\r\nPage 2 of 5\r\nBody   text\f"), "Intro\n\nBody text");
});

test("load rejects a file that cannot be read", async () => {
  await assert.rejects(
    new PdfDocumentLoader().load("/nonexistent/missing.pdf"),
    (error: Error) => error.name === "DocumentLoadError" && error.message === "Failed to read /nonexistent/missing.pdf",
  );
});
