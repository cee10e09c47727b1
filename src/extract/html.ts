import { decode } from "html-entities";

export function decodeEntities(text: string): string {
  return decode(text);
}

/** Visible text of an HTML document or fragment, whitespace-normalized. */
export function htmlToText(html: string): string {
  if (!html) return "";
  let text = html;

  text = text.replace(/<script[\s\S]*?<\/script>/gi, " ");
  text = text.replace(/<style[\s\S]*?<\/style>/gi, " ");
  text = text.replace(/<noscript[\s\S]*?<\/noscript>/gi, " ");
  text = text.replace(/<!--[\s\S]*?-->/g, " ");

  text = text.replace(/<[^>]+>/g, " ");
  text = decode(text);

  return text.replace(/\s+/g, " ").trim();
}

const ANCHOR_HREF_REGEX = /<a\s(?:[^>]*?\s)?href\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s>]+))/gi;

export function extractHrefs(html: string): string[] {
  const hrefs: string[] = [];
  for (const match of html.matchAll(ANCHOR_HREF_REGEX)) {
    const href = match[1] ?? match[2] ?? match[3];
    if (href) hrefs.push(decode(href).trim());
  }
  return hrefs;
}

export interface ContactLinks {
  emails: string[];
  phones: string[];
}

function stripScheme(href: string): string {
  const target = href.slice(href.indexOf(":") + 1);
  const queryStart = target.indexOf("?");
  return (queryStart === -1 ? target : target.slice(0, queryStart)).trim();
}

/** `mailto:` and `tel:` anchor targets, in document order. */
export function extractContactLinks(html: string): ContactLinks {
  const emails: string[] = [];
  const phones: string[] = [];

  for (const href of extractHrefs(html)) {
    const lower = href.toLowerCase();
    if (lower.startsWith("mailto:")) {
      const email = stripScheme(href);
      if (email) emails.push(email);
    } else if (lower.startsWith("tel:")) {
      const phone = stripScheme(href);
      if (phone) phones.push(phone);
    }
  }

  return { emails, phones };
}

export function extractTitle(html: string): string | undefined {
  const match = html.match(/<title[^>]*>([\s\S]*?)<\/title>/i);
  if (!match) return undefined;
  const title = decode(match[1]).replace(/\s+/g, " ").trim();
  return title || undefined;
}

const META_TAG_REGEX = /<meta\s[^>]*>/gi;

function attribute(tag: string, name: string): string | undefined {
  const match = tag.match(
    new RegExp(`\\s${name}\\s*=\\s*(?:"([^"]*)"|'([^']*)'|([^\\s>]+))`, "i")
  );
  if (!match) return undefined;
  return match[1] ?? match[2] ?? match[3];
}

export function extractMetaDescription(html: string): string | undefined {
  for (const tag of html.match(META_TAG_REGEX) ?? []) {
    if (attribute(tag, "name")?.toLowerCase() !== "description") continue;
    const content = attribute(tag, "content");
    const description = content ? decode(content).trim() : "";
    return description || undefined;
  }
  return undefined;
}
