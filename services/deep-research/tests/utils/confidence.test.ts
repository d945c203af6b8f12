import { describe, it, expect } from "vitest";
import {
  areIndependent,
  isRepublication,
  scoreConfidence,
} from "../../src/systems/research/utils/confidence.js";
import { makeSource } from "../fixtures.js";

describe("scoreConfidence", () => {
  it("is high with two independent credible sources", () => {
    const citations = [
      makeSource("https://aws.com/raft", "aws.com", 4),
      makeSource("https://sre.google/raft", "sre.google", 4),
    ];
    expect(scoreConfidence(citations)).toBe("high");
  });

  it("is low for a single weak source", () => {
    expect(scoreConfidence([makeSource("https://blog.example/post", "blog.example", 2)])).toBe("low");
    expect(scoreConfidence([])).toBe("low");
  });

  it("is medium for one credible source or several weak ones", () => {
    expect(scoreConfidence([makeSource("https://a.org", "a.org", 3)])).toBe("medium");
    expect(
      scoreConfidence([makeSource("https://a.org", "a.org", 1), makeSource("https://b.org", "b.org", 2)])
    ).toBe("medium");
  });

  it("is medium when credible sources share a domain", () => {
    const citations = [
      makeSource("https://example.com/a", "example.com", 5),
      makeSource("https://example.com/b", "example.com", 5),
    ];
    expect(scoreConfidence(citations)).toBe("medium");
  });

  it("is medium when one source republishes the other", () => {
    const citations = [
      makeSource("https://wire.org/story", "wire.org", 4),
      makeSource("https://paper.com/story", "paper.com", 4, { republishedFrom: "https://wire.org/story/" }),
    ];
    expect(scoreConfidence(citations)).toBe("medium");
  });

  it("depends only on the citations", () => {
    const citations = [makeSource("https://a.org", "a.org", 3), makeSource("https://b.org", "b.org", 3)];
    expect(scoreConfidence(citations)).toBe(scoreConfidence([...citations].reverse()));
  });
});

describe("areIndependent", () => {
  it("rejects the same organization on different domains", () => {
    const a = makeSource("https://a.org", "a.org", 4, { organization: "Acme Corp" });
    const b = makeSource("https://b.org", "b.org", 4, { organization: "acme  corp" });
    expect(areIndependent(a, b)).toBe(false);
  });

  it("accepts the same organization when authors differ", () => {
    const a = makeSource("https://a.org", "a.org", 4, { organization: "Acme", author: "Kim" });
    const b = makeSource("https://b.org", "b.org", 4, { organization: "Acme", author: "Lee" });
    expect(areIndependent(a, b)).toBe(true);
  });

  it("treats two republications of one original as dependent", () => {
    const a = makeSource("https://a.org", "a.org", 4, { republishedFrom: "https://origin.net/x" });
    const b = makeSource("https://b.org", "b.org", 4, { republishedFrom: "https://origin.net/x" });
    expect(isRepublication(a, b)).toBe(true);
    expect(areIndependent(a, b)).toBe(false);
  });
});
