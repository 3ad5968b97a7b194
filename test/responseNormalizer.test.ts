/// <reference types="node" />
/**
 * Tests coercion of free-text LLM replies into syllabus results.
 */

import assert from "node:assert";
import test from "node:test";
import { ResponseNormalizer } from "../api/services/responseNormalizer";

test("normalize reads the object between the sentinel markers and adds braces", () => {
  const result = ResponseNormalizer.normalize('<startJson>"subject":"X","syllabus":["a","b"]</endJson>');
  assert.deepStrictEqual(result, { kind: "ok", subject: "X", syllabus: ["a", "b"] });
});

test("normalize keeps braces already present between the markers", () => {
  const result = ResponseNormalizer.normalize('Here:<startJson> {"subject":"Y","syllabus":[]} </endJson> done');
  assert.deepStrictEqual(result, { kind: "ok", subject: "Y", syllabus: [] });
});

test("normalize reads to the end of the text when the end marker is missing", () => {
  const result = ResponseNormalizer.normalize('<startJson> "subject":"Z","syllabus":["t"]');
  assert.deepStrictEqual(result, { kind: "ok", subject: "Z", syllabus: ["t"] });
});

test("normalize ignores trailing noise after a flat object", () => {
  const result = ResponseNormalizer.normalize('{"subject":"X","syllabus":["a"]} trailing noise');
  assert.deepStrictEqual(result, { kind: "ok", subject: "X", syllabus: ["a"] });
});

test("normalize finds an object spread over several lines", () => {
  const raw = 'Sure!\n{\n"subject": "Databases",\n"syllabus": ["SQL", "Normalization"]\n}';
  const result = ResponseNormalizer.normalize(raw);
  assert.deepStrictEqual(result, { kind: "ok", subject: "Databases", syllabus: ["SQL", "Normalization"] });
});

test("normalize returns a structured error with the raw text when there is no JSON", () => {
  const result = ResponseNormalizer.normalize("garbage with no json");
  assert.deepStrictEqual(result, {
    kind: "error",
    error: "Could not extract JSON from response",
    rawResponse: "garbage with no json",
  });
});

test("normalize reports a parse failure instead of throwing", () => {
  const result = ResponseNormalizer.normalize("{subject: X}");
  assert.strictEqual(result.kind, "error");
  if (result.kind !== "error") return;
  assert.strictEqual(result.error, "Failed to parse JSON response");
  assert.strictEqual(typeof result.details, "string");
  assert.strictEqual(result.rawResponse, "{subject: X}");
});

test("normalize does not recover objects with nested braces", () => {
  const raw = '{"subject":"X","meta":{"a":1},"syllabus":["a"]}';
  const result = ResponseNormalizer.normalize(raw);
  assert.strictEqual(result.kind, "error");
  if (result.kind !== "error") return;
  assert.strictEqual(result.error, "Failed to parse JSON response");
  assert.strictEqual(result.rawResponse, raw);
});

test("normalize rejects JSON without a subject and topic list", () => {
  const result = ResponseNormalizer.normalize('{"title":"X"}');
  assert.strictEqual(result.kind, "error");
  if (result.kind !== "error") return;
  assert.strictEqual(result.error, "Unexpected JSON shape in response");
  assert.strictEqual(result.rawResponse, '{"title":"X"}');
});
