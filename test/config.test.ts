/// <reference types="node" />
/**
 * Tests environment parsing and fail-fast startup checks.
 */

import assert from "node:assert";
import test from "node:test";
import { loadConfig } from "../api/config";
import { ConfigError } from "../api/errors";

test("loadConfig fails when the LLM credential is missing or blank", () => {
  assert.throws(() => loadConfig({}), (error: unknown) => error instanceof ConfigError && error.message === "OPENAI_API_KEY is not set");
  assert.throws(() => loadConfig({ OPENAI_API_KEY: "   " }), ConfigError);
});

test("loadConfig applies defaults", () => {
  assert.deepStrictEqual(loadConfig({ OPENAI_API_KEY: "test-secret" }), {
    llm: {
      apiKey: "test-secret",
      baseURL: undefined,
      model: "gpt-4o-mini",
      temperature: 0.5,
      chatMaxTokens: 512,
    },
    embedding: {
      apiKey: "test-secret",
      baseURL: undefined,
      model: "text-embedding-3-small",
    },
    server: { host: "0.0.0.0", port: 7860 },
    uploadDir: "pdfs",
  });
});

test("embedding settings default to the LLM endpoint but can be overridden", () => {
  const shared = loadConfig({ OPENAI_API_KEY: "test-secret", OPENAI_BASE_URL: "http://localhost:9999/v1" });
  assert.strictEqual(shared.embedding.baseURL, "http://localhost:9999/v1");

  const separate = loadConfig({
    OPENAI_API_KEY: "test-secret",
    OPENAI_BASE_URL: "http://localhost:9999/v1",
    EMBEDDING_API_KEY: "test-embedding-secret",
    EMBEDDING_BASE_URL: "http://localhost:8888/v1",
    EMBEDDING_MODEL: "test-embedding-model",
  });
  assert.deepStrictEqual(separate.embedding, {
    apiKey: "test-embedding-secret",
    baseURL: "http://localhost:8888/v1",
    model: "test-embedding-model",
  });
});

test("loadConfig rejects malformed numbers", () => {
  assert.throws(() => loadConfig({ OPENAI_API_KEY: "test-secret", PORT: "eighty" }), ConfigError);
  assert.throws(() => loadConfig({ OPENAI_API_KEY: "test-secret", PORT: "70000" }), ConfigError);
  assert.throws(() => loadConfig({ OPENAI_API_KEY: "test-secret", LLM_TEMPERATURE: "warm" }), ConfigError);
  assert.strictEqual(loadConfig({ OPENAI_API_KEY: "test-secret", PORT: "8080" }).server.port, 8080);
});
