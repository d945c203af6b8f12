import { describe, it, expect } from "vitest";
import { SourceRegistry } from "../../src/systems/research/utils/source-registry.js";
import { makeFindingsSource } from "../fixtures.js";

describe("SourceRegistry", () => {
  it("merges same-URL sources to max credibility and the union of notes", () => {
    const registry = new SourceRegistry();
    registry.add(makeFindingsSource("https://example.org/report", 3, { relevance: "cited by worker 1" }));
    registry.add(makeFindingsSource("https://example.org/report", 5, { relevance: "cited by worker 2" }));

    const source = registry.get("https://example.org/report");
    expect(registry.size).toBe(1);
    expect(registry.rawCount).toBe(2);
    expect(source?.credibility).toBe(5);
    expect(source?.relevanceNotes).toEqual(["cited by worker 1", "cited by worker 2"]);
  });

  it("is idempotent when the same source is added again", () => {
    const registry = new SourceRegistry();
    const input = makeFindingsSource("https://example.org/a", 4, { relevance: "note" });

    registry.add(input);
    const before = structuredClone(registry.get(input.url));
    registry.add(input);

    expect(registry.get(input.url)).toEqual(before);
  });

  it("never lowers credibility", () => {
    const registry = new SourceRegistry();
    registry.add(makeFindingsSource("https://example.org/a", 5));
    registry.add(makeFindingsSource("https://example.org/a", 2));

    expect(registry.get("https://example.org/a")?.credibility).toBe(5);
  });

  it("fills missing attribution from later reports", () => {
    const registry = new SourceRegistry();
    registry.add(makeFindingsSource("https://example.org/a", 3));
    registry.add(makeFindingsSource("https://example.org/a", 3, { author: " Ada Lovelace " }));

    expect(registry.get("https://example.org/a")?.author).toBe("Ada Lovelace");
    expect(registry.get("https://example.org/a")?.domain).toBe("example.org");
  });

  it("cross-references same-domain sources with similar titles without merging", () => {
    const registry = new SourceRegistry();
    registry.add(makeFindingsSource("https://news.example.com/a", 3, { title: "Raft consensus in production" }));
    registry.add(makeFindingsSource("https://blog.example.com/b", 3, { title: "Raft consensus in production systems" }));
    registry.add(makeFindingsSource("https://other.org/c", 3, { title: "Raft consensus in production" }));

    registry.linkRelated(0.5);

    expect(registry.size).toBe(3);
    expect(registry.get("https://news.example.com/a")?.relatedUrls).toEqual(["https://blog.example.com/b"]);
    expect(registry.get("https://blog.example.com/b")?.relatedUrls).toEqual(["https://news.example.com/a"]);
    expect(registry.get("https://other.org/c")?.relatedUrls).toEqual([]);
  });

  it("snapshot keeps first-seen order", () => {
    const registry = new SourceRegistry();
    registry.add(makeFindingsSource("https://b.org", 3));
    registry.add(makeFindingsSource("https://a.org", 3));
    registry.add(makeFindingsSource("https://b.org", 4));

    expect(Array.from(registry.snapshot().keys())).toEqual(["https://b.org", "https://a.org"]);
  });
});
