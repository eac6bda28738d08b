import test from "node:test";
import assert from "node:assert/strict";
import { AuditLog } from "../src/audit.js";
import { dedupeRecords } from "../src/dedupe.js";
import { classifyTurns } from "../src/ingest.js";
import { emptyOntology } from "../src/ontology/builder.js";
import { promoteWikiCategories } from "../src/ontology/promote.js";
import {
  discoverSources,
  mergeSources,
  suggestSourceImprovements,
  withSeedSources,
} from "../src/ontology/sources.js";
import type { AuthorSeed, SourceRecord } from "../src/types.js";
import { makeRecord, testConfig } from "./fixtures.js";

const homer: AuthorSeed = {
  name: "Homer",
  isbns: ["0-14-044913-2"],
  bookPatterns: ["odyssey"],
  subjects: ["epic"],
};

const records = [
  makeRecord({
    excerpt:
      "See https://en.wikipedia.org/wiki/Category:Roman_history and https://en.wikipedia.org/wiki/Malta plus [URL:example.com]",
    provenanceId: "c1 | t1",
    timestamp: "2024-01-01T00:00:00Z",
  }),
  makeRecord({
    excerpt: "ISBN 0-14-044913-2 by someone",
    provenanceId: "c2 | t2",
    timestamp: "2024-02-01T00:00:00Z",
  }),
  makeRecord({
    excerpt: "the Odyssey again",
    provenanceId: "c3 | t3 || c4 | t4",
    timestamp: null,
  }),
];

function counts(sources: readonly SourceRecord[]): Record<string, number> {
  return Object.fromEntries(sources.map((s) => [`${s.type}:${s.id}`, s.count]));
}

test("discoverSources finds wiki, domain, ISBN and author references", () => {
  const sources = discoverSources(records, [homer], new AuditLog());
  assert.deepEqual(counts(sources), {
    "wikipedia_category:Roman_history": 1,
    "wikipedia_page:Malta": 1,
    "url_domain:example.com": 1,
    "isbn:0140449132": 1,
    "author:homer": 3,
  });

  const category = sources.find((s) => s.type === "wikipedia_category");
  assert.equal(category?.label, "Roman history");
  assert.equal(category?.url, "https://en.wikipedia.org/wiki/Category:Roman_history");

  const author = sources.find((s) => s.type === "author");
  assert.equal(author?.label, "Homer");
  assert.deepEqual(author?.subjects, ["epic"]);
  assert.equal(author?.lastSeen, "2024-02-01T00:00:00Z");
});

test("re-merging the same log leaves counts unchanged", () => {
  const audit = new AuditLog();
  const registry = discoverSources(records, [homer], audit);
  const again = mergeSources(registry, discoverSources(records, [homer], audit));
  assert.deepEqual(counts(again), counts(registry));
});

test("a new turn adds to the count", () => {
  const audit = new AuditLog();
  const registry = discoverSources(records, [homer], audit);
  const more = discoverSources(
    [makeRecord({ excerpt: "ISBN 0140449132 again", provenanceId: "c9 | t9", timestamp: "2024-03-01T00:00:00Z" })],
    [],
    audit,
  );
  const merged = mergeSources(registry, more);
  const isbn = merged.find((s) => s.type === "isbn");
  assert.equal(isbn?.count, 2);
  assert.equal(isbn?.lastSeen, "2024-03-01T00:00:00Z");
});

test("entries without observations add their counts", () => {
  const base: SourceRecord = {
    type: "url_domain",
    id: "example.com",
    label: "example.com",
    count: 2,
    lastSeen: "",
    observations: [],
  };
  const merged = mergeSources([base], [{ ...base, count: 3, url: "https://example.com" }]);
  assert.equal(merged[0]?.count, 5);
  assert.equal(merged[0]?.url, "https://example.com");
});

test("seed sources only add entries the registry lacks", () => {
  const isbn: SourceRecord = { type: "isbn", id: "X", label: "ISBN X", count: 4, lastSeen: "", observations: ["k"] };
  const seeded = withSeedSources(
    [isbn],
    [
      { ...isbn, count: 10, observations: [] },
      { type: "url_domain", id: "y.org", label: "y.org", count: 1, lastSeen: "", observations: [] },
    ],
  );
  assert.deepEqual(counts(seeded), { "isbn:X": 4, "url_domain:y.org": 1 });
});

test("suggestSourceImprovements proposes categories and lists unmapped ISBNs", () => {
  const sources: SourceRecord[] = [
    {
      type: "wikipedia_category",
      id: "Roman_history",
      label: "Roman history",
      count: 3,
      lastSeen: "",
      url: "https://en.wikipedia.org/wiki/Category:Roman_history",
      observations: [],
    },
    { type: "isbn", id: "0140449132", label: "ISBN 0140449132", count: 2, lastSeen: "", observations: [] },
    { type: "isbn", id: "123456789X", label: "ISBN 123456789X", count: 1, lastSeen: "", observations: [] },
  ];
  const s = suggestSourceImprovements(sources, [homer], 3);
  assert.deepEqual(s.categoryProposals, [
    {
      slug: "roman-history",
      title: "Roman history",
      count: 3,
      url: "https://en.wikipedia.org/wiki/Category:Roman_history",
    },
  ]);
  assert.deepEqual(
    s.unmappedIsbns.map((i) => i.id),
    ["123456789X"],
  );
});

test("undated turns of one conversation count as separate observations", () => {
  const link = "https://en.wikipedia.org/wiki/Category:Roman_history";
  const records = dedupeRecords(
    classifyTurns(
      [
        { conversationId: "Rome", timestamp: "", author: "user", text: `See ${link}` },
        { conversationId: "Rome", timestamp: "", author: "assistant", text: `See ${link}` },
        { conversationId: "Rome", timestamp: "", author: "user", text: `Also ${link} again` },
        { conversationId: "Rome", timestamp: "", author: "user", text: `See ${link}` },
      ],
      testConfig(),
    ),
  );
  assert.deepEqual(
    records.map((r) => r.provenanceId),
    ["Rome |  || Rome | ", "Rome | ", "Rome | "],
  );

  const audit = new AuditLog();
  const sources = discoverSources(records, [], audit);
  const category = sources.find((s) => s.type === "wikipedia_category");
  assert.equal(category?.count, 4);
  assert.deepEqual(counts(mergeSources(sources, discoverSources(records, [], audit))), counts(sources));

  assert.deepEqual(promoteWikiCategories(emptyOntology(), sources, 3).created, ["roman-history"]);
});
