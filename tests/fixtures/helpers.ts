import { createRunContext } from "../../src/filter/recency.js";
import { createHttpClient, type HttpClient } from "../../src/sources/http.js";
import type {
  CandidateLead,
  ClientLead,
  RawItem,
} from "../../src/sources/types.js";

export const NOW = new Date("2026-03-31T12:00:00Z");
export const ctx = createRunContext(NOW, 30);

const DAY_MS = 86_400_000;

export function daysAgo(days: number): Date {
  return new Date(NOW.getTime() - days * DAY_MS);
}

export interface StubPage {
  status?: number;
  body: string;
}

function requestUrl(input: string | URL | Request): string {
  if (typeof input === "string") return input;
  if (input instanceof URL) return input.href;
  return input.url;
}

/** Serves pages by exact URL; anything else is a 404. */
export function routeFetch(pages: Record<string, string | StubPage>): typeof fetch {
  return async (input) => {
    const page = pages[requestUrl(input)];
    if (page === undefined) return new Response("not found", { status: 404 });
    if (typeof page === "string") return new Response(page, { status: 200 });
    return new Response(page.body, { status: page.status ?? 200 });
  };
}

/** Answers calls in order; once exhausted every call is a 404. */
export function sequenceFetch(pages: StubPage[]): typeof fetch {
  const queue = [...pages];
  return async () => {
    const page = queue.shift();
    if (!page) return new Response("not found", { status: 404 });
    return new Response(page.body, { status: page.status ?? 200 });
  };
}

export function stubHttp(fetchFn: typeof fetch): HttpClient {
  return createHttpClient({ userAgent: "LeadRadarTest/1.0", timeoutMs: 1000, fetchFn });
}

export function makeRaw(overrides: Partial<RawItem> = {}): RawItem {
  return {
    source: "reddit",
    sourceName: "Reddit r/forhire",
    title: "Untitled",
    body: "",
    url: "https://www.reddit.com/r/forhire/comments/abc/untitled/",
    author: "someone",
    createdAt: daysAgo(1),
    channel: "forhire",
    ...overrides,
  };
}

export function makeClient(overrides: Partial<ClientLead> = {}): ClientLead {
  return {
    ...makeRaw(),
    urls: [],
    emailsInline: [],
    phonesInline: [],
    emails: [],
    phones: [],
    score: 0.5,
    ...overrides,
    label: "client",
  };
}

export function makeCandidate(overrides: Partial<CandidateLead> = {}): CandidateLead {
  return {
    ...makeRaw(),
    urls: [],
    emailsInline: [],
    phonesInline: [],
    skills: [],
    availability: "NoticePeriod",
    location: "Remote/Unspecified",
    portfolioUrls: [],
    score: 0.5,
    ...overrides,
    label: "candidate",
  };
}
