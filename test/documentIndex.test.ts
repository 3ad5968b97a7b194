/// <reference types="node" />
/**
 * Tests document indexing, similarity search and whole-index replacement.
 *
 * Assumptions:
 * - PDF loading and embeddings are stubbed; vectors count vocabulary words.
 */

import assert from "node:assert";
import test from "node:test";
import { cosineSimilarity, DocumentIndexer } from "../api/services/documentIndex";
import { RecursiveTextSplitter } from "../api/services/textSplitter";
import { ChatSession } from "../api/services/chatSession";
import type { Embedder } from "../api/services/embeddings";
import { FailingEmbedder, FakeLoader, KeywordEmbedder } from "./fakes";

const PAGES = {
  "/docs/biology.pdf": [
    "Photosynthesis uses chlorophyll in plants.",
    "Mitochondria produce energy with enzyme help.",
  ],
  "/docs/physics.pdf": ["Newton described gravity and orbit motion."],
  "/docs/blank.pdf": ["   ", ""],
};

function makeIndexer(embedder: Embedder = new KeywordEmbedder()) {
  return new DocumentIndexer({
    loader: new FakeLoader(PAGES),
    splitter: new RecursiveTextSplitter(),
    embedder,
  });
}

test("cosineSimilarity scores identical directions 1 and orthogonal ones 0", () => {
  assert.strictEqual(cosineSimilarity([3, 4], [3, 4]), 1);
  assert.strictEqual(cosineSimilarity([1, 0], [0, 1]), 0);
  assert.strictEqual(cosineSimilarity([1, 2], [1, 2, 3]), 0);
  assert.strictEqual(cosineSimilarity([0, 0], [1, 1]), 0);
});

test("buildIndex embeds one chunk per short page and names the index after the file", async () => {
  const embedder = new KeywordEmbedder();
  const index = await makeIndexer(embedder).buildIndex("/docs/biology.pdf");

  assert.strictEqual(index.documentName, "biology.pdf");
  assert.strictEqual(index.size, 2);
  assert.deepStrictEqual(index.chunks.map((chunk) => chunk.metadata), [
    { source: "biology.pdf", page: 0, chunkIndex: 0 },
    { source: "biology.pdf", page: 1, chunkIndex: 1 },
  ]);
  assert.deepStrictEqual(embedder.inputs, [PAGES["/docs/biology.pdf"]]);
});

test("search returns the most similar chunk first", async () => {
  const index = await makeIndexer().buildIndex("/docs/biology.pdf");
  const results = await index.search("How does chlorophyll drive photosynthesis?");

  assert.strictEqual(results.length, 2);
  assert.strictEqual(results[0].chunk.text, "Photosynthesis uses chlorophyll in plants.");
  assert.ok(Math.abs(results[0].score - 1) < 1e-9);
  assert.strictEqual(results[1].score, 0);
});

test("query honours k", async () => {
  const index = await makeIndexer().buildIndex("/docs/biology.pdf");
  const results = index.query([0, 0, 1, 1, 0, 0, 0], 1);

  assert.deepStrictEqual(results.map((result) => result.chunk.text), ["Mitochondria produce energy with enzyme help."]);
});

test("chunks handed out by the index cannot change it", async () => {
  const index = await makeIndexer().buildIndex("/docs/biology.pdf");

  const listed = index.chunks;
  listed[0].text = "edited";
  listed[0].metadata.page = 99;
  const [hit] = index.query([0, 0, 1, 1, 0, 0, 0], 1);
  hit.chunk.metadata.source = "elsewhere.pdf";

  assert.deepStrictEqual(index.chunks, [
    { text: "Photosynthesis uses chlorophyll in plants.", metadata: { source: "biology.pdf", page: 0, chunkIndex: 0 } },
    { text: "Mitochondria produce energy with enzyme help.", metadata: { source: "biology.pdf", page: 1, chunkIndex: 1 } },
  ]);
});

test("replacing the document means queries never see the previous chunks", async () => {
  const indexer = makeIndexer();
  const session = new ChatSession("session-1");
  session.replaceIndex(await indexer.buildIndex("/docs/biology.pdf"));
  session.replaceIndex(await indexer.buildIndex("/docs/physics.pdf"));

  const index = session.index;
  assert.ok(index);
  const results = await index.search("chlorophyll photosynthesis mitochondria");
  assert.deepStrictEqual(results.map((result) => result.chunk.metadata.source), ["physics.pdf"]);
  assert.strictEqual(session.documentName, "physics.pdf");
});

test("a failed rebuild rejects and leaves the previous index in place", async () => {
  const indexer = makeIndexer();
  const session = new ChatSession("session-2");
  const original = await indexer.buildIndex("/docs/biology.pdf");
  session.replaceIndex(original);

  await assert.rejects(indexer.buildIndex("/docs/missing.pdf"), /Failed to parse PDF/);
  assert.strictEqual(session.index, original);
});

test("a document without text is rejected", async () => {
  await assert.rejects(makeIndexer().buildIndex("/docs/blank.pdf"), /Document contains no extractable text/);
});

test("an embedding failure rejects the whole build", async () => {
  await assert.rejects(makeIndexer(new FailingEmbedder()).buildIndex("/docs/biology.pdf"), /embedding service unavailable/);
});
