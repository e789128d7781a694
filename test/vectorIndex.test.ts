import test from "node:test";
import assert from "node:assert/strict";
import { isIn } from "../src/services/filterPredicate.js";
import { VectorIndex, reconcileDimension } from "../src/services/vectorIndex.js";
import { assertClose } from "./fixtures.js";

function makeIndex(): VectorIndex {
  const index = new VectorIndex("test");
  index.add(
    ["doc a", "doc b", "doc c"],
    [
      { title: "A", dietary_tags: ["vegan"], health_benefits: ["heart_healthy"] },
      { title: "B", dietary_tags: ["keto"], health_benefits: ["low_carb", "heart_healthy"] },
      { title: "C", dietary_tags: ["vegan", "keto"], health_benefits: [] }
    ],
    [
      [1, 0],
      [0, 1],
      [0.6, 0.8]
    ]
  );
  return index;
}

test("search on an empty index returns four empty lists", () => {
  const index = new VectorIndex();
  assert.deepEqual(index.search([1, 0], 5), { ids: [], documents: [], metadatas: [], distances: [] });
});

test("add rejects a text/embedding count mismatch", () => {
  const index = new VectorIndex();
  assert.throws(() => index.add(["a", "b"], undefined, [[1, 0]]), /Expected 2 embeddings, received 1/);
});

test("search ranks by cosine distance and honours k", () => {
  const hits = makeIndex().search([1, 0], 2);

  assert.deepEqual(hits.documents, ["doc a", "doc c"]);
  assert.equal(hits.ids.length, 2);
  assertClose(hits.distances[0] ?? -1, 0);
  assertClose(hits.distances[1] ?? -1, 0.4);
});

test("search applies metadata filters before ranking", () => {
  const hits = makeIndex().search([1, 0], 5, { dietary_tags: isIn(["keto"]) });
  assert.deepEqual(
    hits.metadatas.map((metadata) => metadata.title),
    ["C", "B"]
  );
});

test("search reconciles the query dimension", () => {
  const hits = makeIndex().search([0, 1, 5], 1);
  assert.deepEqual(hits.documents, ["doc b"]);
});

test("missing metadata defaults to the document text", () => {
  const index = new VectorIndex();
  const [id] = index.add(["plain text"], undefined, [[1]]);

  assert.ok(id);
  assert.deepEqual(index.getById(id)?.metadata, { text: "plain text" });
});

test("filterByDietaryRestriction returns matching documents in insertion order", () => {
  const hits = makeIndex().filterByDietaryRestriction("vegan");

  assert.deepEqual(hits.documents, ["doc a", "doc c"]);
  assert.deepEqual(hits.distances, [1, 1]);
});

test("filterByHealthBenefit returns documents listing the benefit", () => {
  const index = makeIndex();

  assert.deepEqual(index.filterByHealthBenefit("heart_healthy").documents, ["doc a", "doc b"]);
  assert.deepEqual(index.filterByHealthBenefit("low_carb", 1).documents, ["doc b"]);
  assert.deepEqual(index.filterByHealthBenefit("diabetes_friendly").ids, []);
});

test("stats, getById and clear reflect index state", () => {
  const index = makeIndex();
  assert.deepEqual(index.stats(), { totalDocuments: 3, dimension: 2, collectionName: "test" });
  assert.equal(index.getById("missing"), null);

  index.clear();
  assert.equal(index.size(), 0);
  assert.deepEqual(index.stats(), { totalDocuments: 0, dimension: null, collectionName: "test" });
});

test("reconcileDimension truncates or zero-pads", () => {
  assert.deepEqual(reconcileDimension([1, 2, 3], 2), [1, 2]);
  assert.deepEqual(reconcileDimension([1], 3), [1, 0, 0]);
  assert.deepEqual(reconcileDimension([4, 5], 2), [4, 5]);
});
