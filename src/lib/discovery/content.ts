import * as cheerio from "cheerio";
import { AnyNode, hasChildren, isTag, isText } from "domhandler";
import { isHiddenElement, visibleText } from "../extraction/dom";

const SKIPPED_TAGS = new Set(["script", "style", "noscript", "template", "head", "svg", "iframe"]);
const BLOCK_TAGS = new Set([
  "article", "aside", "div", "footer", "form", "header", "li", "main", "nav",
  "ol", "p", "section", "table", "tr", "ul", "br",
]);
const HEADING_LEVEL: Record<string, number> = { h1: 1, h2: 2, h3: 3, h4: 4, h5: 5, h6: 6 };

function absoluteHref(href: string, baseUrl: string): string | null {
  const trimmed = href.trim();
  if (!trimmed || /^(?:javascript|mailto|tel|data):/i.test(trimmed) || trimmed.startsWith("#")) return null;
  try {
    return new URL(trimmed, baseUrl).href;
  } catch {
    return null;
  }
}

function render(node: AnyNode, baseUrl: string, out: string[]): void {
  if (isText(node)) {
    out.push(node.data);
    return;
  }
  if (!isTag(node)) {
    if (hasChildren(node)) for (const child of node.children) render(child, baseUrl, out);
    return;
  }
  if (SKIPPED_TAGS.has(node.tagName) || isHiddenElement(node)) return;

  if (node.tagName === "a") {
    const href = absoluteHref(node.attribs.href ?? "", baseUrl);
    const label = visibleText(node).replace(/\n/g, " ");
    if (href) out.push(` [${label}](${href}) `);
    else out.push(` ${label} `);
    return;
  }

  if (node.tagName === "input" || node.tagName === "textarea") {
    const hint = node.attribs.placeholder || node.attribs["aria-label"] || node.attribs.name;
    if (hint) out.push(` [input: ${hint}] `);
    return;
  }

  const level = HEADING_LEVEL[node.tagName];
  if (level) {
    out.push(`\n${"#".repeat(level)} ${visibleText(node).replace(/\n/g, " ")}\n`);
    return;
  }

  const block = BLOCK_TAGS.has(node.tagName);
  if (block) out.push("\n");
  for (const child of node.children) render(child, baseUrl, out);
  if (block) out.push("\n");
}

/**
 * Reader-style rendering of a page for the model: visible text, headings as
 * `#` lines, links as `[text](absolute-url)`, inputs as `[input: hint]`.
 */
export function htmlToContent(html: string, baseUrl: string): string {
  const $ = cheerio.load(html);
  const parts: string[] = [];
  const title = $("title").first().text().trim();
  if (title) parts.push(`Title: ${title}\n`);
  render($.root()[0], baseUrl, parts);

  return parts
    .join("")
    .split("\n")
    .map((line) => line.replace(/[ \t\u00a0]+/g, " ").trim())
    .filter(Boolean)
    .join("\n");
}

/** Every distinct http(s) link target on the page, absolute, in document order. */
export function extractLinks(html: string, baseUrl: string): string[] {
  const $ = cheerio.load(html);
  const links: string[] = [];
  $("a[href]").each((_, el) => {
    const href = absoluteHref($(el).attr("href") ?? "", baseUrl);
    if (href && /^https?:/i.test(href)) links.push(href);
  });
  return [...new Set(links)];
}

/** Reader output for a missing page rather than a real one. */
export function isNotFoundContent(content: string): boolean {
  if (!content) return false;
  const lower = content.toLowerCase();
  return (
    lower.includes("target url returned error 404") ||
    lower.includes("\n404\n") ||
    /^(?:title: )?404\b/.test(lower) ||
    lower.includes("sorry! this page does not exist")
  );
}
