import * as core from "@actions/core";
import { beforeEach, describe, it, expect, vi } from "vitest";
import { serializeReport, writeReport } from "../../src/output/report.js";
import type { LeadReport } from "../../src/sources/types.js";
import { NOW, ctx, makeCandidate, makeClient } from "../fixtures/helpers.js";

vi.mock("@actions/core", () => ({
  info: vi.fn(),
  warning: vi.fn(),
  debug: vi.fn(),
}));

const report: LeadReport = {
  generatedAt: NOW.toISOString(),
  windowStart: ctx.earliest.toISOString(),
  clients: [makeClient({ title: "Need help", companyName: "Acme", score: 0.4567 })],
  candidates: [makeCandidate({ title: "For hire", author: "dev", score: 0.3 })],
  stats: {
    itemsCollected: 4,
    itemsDropped: 2,
    clientsClassified: 1,
    candidatesClassified: 1,
    clientsEnriched: 0,
    duplicatesRemoved: 0,
  },
};

beforeEach(() => {
  vi.clearAllMocks();
});

describe("serializeReport", () => {
  it("writes indented JSON with a trailing newline", () => {
    const text = serializeReport(report);
    expect(text.startsWith('{\n  "generatedAt": "2026-03-31T12:00:00.000Z",\n')).toBe(true);
    expect(text.endsWith("}\n")).toBe(true);
  });

  it("serializes dates as ISO strings", () => {
    const parsed: unknown = JSON.parse(serializeReport(report));
    expect(parsed).toMatchObject({
      windowStart: "2026-03-01T12:00:00.000Z",
      clients: [{ title: "Need help", createdAt: "2026-03-30T12:00:00.000Z", label: "client" }],
      stats: { itemsCollected: 4 },
    });
  });
});

describe("writeReport", () => {
  it("writes the serialized report to the output path", () => {
    const writeFileFn = vi.fn();
    writeReport(report, "out/leads.json", false, writeFileFn);
    expect(writeFileFn).toHaveBeenCalledWith("out/leads.json", serializeReport(report), "utf-8");
    expect(core.info).toHaveBeenCalledWith("Wrote report to out/leads.json");
  });

  it("only logs a summary in dry-run mode", () => {
    const writeFileFn = vi.fn();
    writeReport(report, "leads.json", true, writeFileFn);
    expect(writeFileFn).not.toHaveBeenCalled();
    expect(vi.mocked(core.info).mock.calls.map(([message]) => message)).toEqual([
      "[dry-run] Would write 1 clients and 1 candidates to leads.json",
      "  client 0.4567 Acme: Need help",
      "  candidate 0.3000 dev: For hire",
    ]);
  });
});
