import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";
import { AnyNode, Element, hasChildren, isTag, isText } from "domhandler";

/**
 * What the pipeline needs from a page element, whatever produced it. All
 * selector methods throw on a selector the engine cannot parse.
 */
export interface PageElement {
  find(selector: string): PageElement | null;
  findAll(selector: string): PageElement[];
  /** Visible text, one line per block element, whitespace collapsed. */
  text(): string;
  attr(name: string): string | null;
  isVisible(): boolean;
  /** Outer HTML, for samples shown to the model. */
  html(): string;
}

const SKIPPED_TAGS = new Set(["script", "style", "noscript", "template", "head", "svg"]);

const BLOCK_TAGS = new Set([
  "address", "article", "aside", "blockquote", "br", "dd", "div", "dl", "dt",
  "fieldset", "figcaption", "figure", "footer", "form", "h1", "h2", "h3", "h4",
  "h5", "h6", "header", "hr", "li", "main", "nav", "ol", "p", "pre", "section",
  "table", "tbody", "td", "tfoot", "th", "thead", "tr", "ul",
]);

export function isHiddenElement(el: Element): boolean {
  if ("hidden" in el.attribs) return true;
  if (el.attribs["aria-hidden"] === "true") return true;
  if (el.tagName === "input" && el.attribs.type === "hidden") return true;
  const style = (el.attribs.style ?? "").replace(/\s+/g, "").toLowerCase();
  return style.includes("display:none") || style.includes("visibility:hidden");
}

function collectText(node: AnyNode, out: string[]): void {
  if (isText(node)) {
    out.push(node.data);
    return;
  }
  if (isTag(node)) {
    if (SKIPPED_TAGS.has(node.tagName) || isHiddenElement(node)) return;
    const block = BLOCK_TAGS.has(node.tagName);
    if (block) out.push("\n");
    for (const child of node.children) collectText(child, out);
    if (block) out.push("\n");
    return;
  }
  if (hasChildren(node)) {
    for (const child of node.children) collectText(child, out);
  }
}

/** Visible text of a node: hidden subtrees skipped, one line per block. */
export function visibleText(node: AnyNode): string {
  const parts: string[] = [];
  collectText(node, parts);
  return parts
    .join("")
    .split("\n")
    .map((line) => line.replace(/\s+/g, " ").trim())
    .filter(Boolean)
    .join("\n");
}

export class CheerioPageElement implements PageElement {
  constructor(
    private readonly $: CheerioAPI,
    private readonly node: AnyNode
  ) {}

  find(selector: string): PageElement | null {
    const found = this.$(this.node).find(selector).get(0);
    return found ? new CheerioPageElement(this.$, found) : null;
  }

  findAll(selector: string): PageElement[] {
    return this.$(this.node)
      .find(selector)
      .toArray()
      .map((el) => new CheerioPageElement(this.$, el));
  }

  text(): string {
    return visibleText(this.node);
  }

  attr(name: string): string | null {
    return isTag(this.node) ? this.node.attribs[name] ?? null : null;
  }

  /** Hidden when the element or any ancestor is hidden by attribute or inline style. */
  isVisible(): boolean {
    let current: AnyNode | null = this.node;
    while (current) {
      if (isTag(current) && (SKIPPED_TAGS.has(current.tagName) || isHiddenElement(current))) return false;
      current = current.parent;
    }
    return true;
  }

  html(): string {
    return this.$.html(this.node);
  }
}

/** Root element of an HTML snapshot. */
export function loadDocument(html: string): PageElement {
  const $ = cheerio.load(html);
  return new CheerioPageElement($, $.root()[0]);
}
