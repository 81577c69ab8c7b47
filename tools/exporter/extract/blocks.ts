import { HTMLElement, parse, TextNode, type Node } from "node-html-parser";
import { ParseError } from "../pipeline/errors.js";
import type { ExtractedBlock, TagKind } from "../pipeline/types.js";

export interface ExtractBlocksOptions {
  tags: readonly TagKind[];
  sourceUrl: string;
}

const SKIPPED_ELEMENTS = new Set(["script", "style", "noscript", "template", "svg"]);

// Children that read as separate words even when their parent is one block.
const SPACED_ELEMENTS = new Set([
  "br",
  "div",
  "section",
  "article",
  "ul",
  "ol",
  "table",
  "tr",
  "td",
  "th",
  "blockquote",
]);

export const MAX_NESTING_DEPTH = 512;

// Void elements never nest; the others close implicitly on their next sibling.
const NON_NESTING_ELEMENTS = new Set([
  "area",
  "base",
  "br",
  "col",
  "embed",
  "hr",
  "img",
  "input",
  "link",
  "meta",
  "source",
  "track",
  "wbr",
  "p",
  "li",
  "dt",
  "dd",
  "option",
  "optgroup",
  "tr",
  "td",
  "th",
  "thead",
  "tbody",
  "tfoot",
  "colgroup",
]);

const RAW_TEXT_PATTERN = /<!--[\s\S]*?-->|<(script|style|noscript|template)\b[\s\S]*?<\/\1\s*>/gi;
const TAG_PATTERN = /<(\/?)([a-zA-Z][a-zA-Z0-9-]*)\b[^>]*?(\/?)>/g;

/**
 * Deepest element nesting in the markup, counted from tags alone. The parser
 * slows down sharply on deep unclosed nesting, so this runs first.
 */
export function markupDepth(html: string): number {
  const markup = html.replace(RAW_TEXT_PATTERN, "");
  let depth = 0;
  let deepest = 0;
  for (const match of markup.matchAll(TAG_PATTERN)) {
    const [, closing, name, selfClosing] = match;
    if (NON_NESTING_ELEMENTS.has(name.toLowerCase()) || selfClosing) {
      continue;
    }
    if (closing) {
      depth = Math.max(0, depth - 1);
      continue;
    }
    depth += 1;
    deepest = Math.max(deepest, depth);
  }
  return deepest;
}

export function classifyTag(name: string): TagKind | "ignored" {
  switch (name.toLowerCase()) {
    case "title":
      return "title";
    case "h1":
      return "h1";
    case "h2":
      return "h2";
    case "h3":
      return "h3";
    case "p":
      return "p";
    case "li":
      return "li";
    default:
      return "ignored";
  }
}

/**
 * Walks the parsed document and returns one block per selected element, in
 * document order. Text inside a nested selected element belongs to that
 * element only.
 */
export function extractBlocks(html: string, options: ExtractBlocksOptions): ExtractedBlock[] {
  const selected = new Set<TagKind>(options.tags);
  const depth = markupDepth(html);
  if (depth > MAX_NESTING_DEPTH) {
    throw new ParseError(
      `Markup from ${options.sourceUrl} nests ${depth} elements deep (limit ${MAX_NESTING_DEPTH})`
    );
  }

  let root: HTMLElement;
  try {
    root = parse(html, { comment: false });
  } catch (error) {
    throw new ParseError(
      `Could not parse HTML from ${options.sourceUrl}: ${error instanceof Error ? error.message : String(error)}`,
      error
    );
  }

  const blocks: ExtractedBlock[] = [];
  walk(root, selected, options.sourceUrl, blocks);
  return blocks;
}

function walk(node: Node, selected: Set<TagKind>, sourceUrl: string, out: ExtractedBlock[]): void {
  for (const child of node.childNodes) {
    if (!(child instanceof HTMLElement)) {
      continue;
    }
    const name = elementName(child);
    if (SKIPPED_ELEMENTS.has(name)) {
      continue;
    }

    const kind = selectedKind(name, selected);
    if (kind) {
      const parts: string[] = [];
      collectOwnText(child, selected, parts);
      const text = normalizeText(parts.join(""));
      if (text) {
        out.push({ tag: kind, text, sourceUrl });
      }
    }

    walk(child, selected, sourceUrl, out);
  }
}

function collectOwnText(element: HTMLElement, selected: Set<TagKind>, parts: string[]): void {
  for (const child of element.childNodes) {
    if (child instanceof TextNode) {
      parts.push(child.text);
      continue;
    }
    if (!(child instanceof HTMLElement)) {
      continue;
    }
    const name = elementName(child);
    if (SKIPPED_ELEMENTS.has(name) || selectedKind(name, selected)) {
      parts.push(" ");
      continue;
    }
    const spaced = SPACED_ELEMENTS.has(name);
    if (spaced) {
      parts.push(" ");
    }
    collectOwnText(child, selected, parts);
    if (spaced) {
      parts.push(" ");
    }
  }
}

function selectedKind(name: string, selected: Set<TagKind>): TagKind | undefined {
  const kind = classifyTag(name);
  if (kind === "ignored" || !selected.has(kind)) {
    return undefined;
  }
  return kind;
}

function elementName(element: HTMLElement): string {
  return (element.rawTagName ?? "").toLowerCase();
}

export function normalizeText(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}
