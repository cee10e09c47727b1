import * as core from "@actions/core";
import { beforeEach, describe, it, expect, vi } from "vitest";
import { filterCandidates, filterClients } from "../../src/filter/thresholds.js";
import { makeCandidate, makeClient } from "../fixtures/helpers.js";

vi.mock("@actions/core", () => ({
  info: vi.fn(),
  warning: vi.fn(),
  debug: vi.fn(),
}));

const open = { min_score: 0, industries: [], require_contact: false };

beforeEach(() => {
  vi.clearAllMocks();
});

describe("filterClients", () => {
  it("passes everything through with the default filters", () => {
    const leads = [makeClient({ score: 0 }), makeClient({ score: 0.9 })];
    expect(filterClients(leads, open)).toEqual(leads);
    expect(core.info).not.toHaveBeenCalled();
  });

  it("compares min_score on a 0-100 scale", () => {
    const leads = [makeClient({ title: "low", score: 0.3999 }), makeClient({ title: "high", score: 0.4 })];
    const kept = filterClients(leads, { ...open, min_score: 40 });
    expect(kept.map((l) => l.title)).toEqual(["high"]);
    expect(core.info).toHaveBeenCalledWith("Client filters: 2 → 1");
  });

  it("keeps only allowed industries when a list is given", () => {
    const leads = [
      makeClient({ title: "health", industry: "Healthtech" }),
      makeClient({ title: "money", industry: "Fintech" }),
      makeClient({ title: "unknown" }),
    ];
    const kept = filterClients(leads, { ...open, industries: ["Healthtech", "SaaS"] });
    expect(kept.map((l) => l.title)).toEqual(["health"]);
  });

  it("drops leads without any contact when required", () => {
    const leads = [
      makeClient({ title: "mail", emails: ["ops@acme.io"] }),
      makeClient({ title: "phone", phones: ["+1 213 373 4253"] }),
      makeClient({ title: "none" }),
    ];
    const kept = filterClients(leads, { ...open, require_contact: true });
    expect(kept.map((l) => l.title)).toEqual(["mail", "phone"]);
  });
});

describe("filterCandidates", () => {
  it("applies only the score threshold", () => {
    const leads = [
      makeCandidate({ title: "a", score: 0.1 }),
      makeCandidate({ title: "b", score: 0.6 }),
    ];
    const kept = filterCandidates(leads, {
      min_score: 50,
      industries: ["Fintech"],
      require_contact: true,
    });
    expect(kept.map((l) => l.title)).toEqual(["b"]);
    expect(core.info).toHaveBeenCalledWith("Candidate filters: 2 → 1");
  });
});
