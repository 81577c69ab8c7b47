import { readFileSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { describe, expect, test } from "vitest";
import { classifyTag, extractBlocks, markupDepth, MAX_NESTING_DEPTH, normalizeText } from "../extract/blocks.js";
import { ParseError } from "../pipeline/errors.js";
import { DEFAULT_TAGS, type TagKind } from "../pipeline/types.js";

const FIXTURE_DIR = join(dirname(fileURLToPath(import.meta.url)), "..", "fixtures", "pages");
const SOURCE = "https://ok.example/article";

function texts(html: string, tags: readonly TagKind[] = DEFAULT_TAGS) {
  return extractBlocks(html, { tags, sourceUrl: SOURCE }).map((block) => [block.tag, block.text]);
}

describe("classifyTag", () => {
  test("maps selected tag names case-insensitively", () => {
    expect(classifyTag("H1")).toBe("h1");
    expect(classifyTag("li")).toBe("li");
    expect(classifyTag("title")).toBe("title");
  });

  test("ignores everything else", () => {
    expect(classifyTag("div")).toBe("ignored");
    expect(classifyTag("h4")).toBe("ignored");
  });
});

describe("normalizeText", () => {
  test("collapses whitespace runs and trims", () => {
    expect(normalizeText("  a\n\t b   c  ")).toBe("a b c");
  });
});

describe("extractBlocks", () => {
  test("extracts headings, paragraphs and list items from a page in document order", () => {
    const html = readFileSync(join(FIXTURE_DIR, "article.html"), "utf-8");

    expect(texts(html)).toEqual([
      ["h1", "Sample Article"],
      ["p", "The first paragraph has a link and bold words."],
      ["h2", "Checklist"],
      ["li", "Gather the inputs"],
      ["li", "Run the export"],
      ["li", "Check the log"],
      ["p", "Nested in a div."],
    ]);
  });

  test("returns title and h3 only when asked for", () => {
    const html = readFileSync(join(FIXTURE_DIR, "article.html"), "utf-8");

    expect(texts(html, ["title", "h3"])).toEqual([
      ["title", "Sample Article"],
      ["h3", "Fine print"],
    ]);
  });

  test("keeps text of a list item nested in a paragraph out of the paragraph", () => {
    expect(texts("<p>Intro<li>Item one</li><li>Item two</li></p>")).toEqual([
      ["p", "Intro"],
      ["li", "Item one"],
      ["li", "Item two"],
    ]);
  });

  test("skips empty elements and script content", () => {
    expect(texts("<p></p><p> \n </p><h2><span></span></h2><script>var p = 1;</script>")).toEqual([]);
  });

  test("decodes entities in text", () => {
    expect(texts("<p>Fish &amp; Chips&nbsp;today</p>")).toEqual([["p", "Fish & Chips today"]]);
  });

  test("only returns the selected tags", () => {
    expect(texts("<h1>Head</h1><p>Body</p><li>Item</li>", ["li"])).toEqual([["li", "Item"]]);
  });

  test("attaches the source URL to every block", () => {
    const blocks = extractBlocks("<h1>A</h1><p>b</p>", { tags: DEFAULT_TAGS, sourceUrl: SOURCE });

    expect(blocks.map((block) => block.sourceUrl)).toEqual([SOURCE, SOURCE]);
  });

  test("tolerates malformed markup", () => {
    expect(() => texts("<h1>Unclosed <p>text <li>item")).not.toThrow();
  });

  test("rejects markup nested past the depth limit before parsing it", () => {
    const html = `${"<span>".repeat(MAX_NESTING_DEPTH + 88)}<p>deep</p>`;

    expect(() => texts(html)).toThrow(ParseError);
    expect(() => texts(html)).toThrow(
      "Markup from https://ok.example/article nests 600 elements deep (limit 512)"
    );
  });

  test("parses markup nested exactly to the depth limit", () => {
    const html = `${"<div>".repeat(MAX_NESTING_DEPTH)}<p>ok</p>${"</div>".repeat(MAX_NESTING_DEPTH)}`;

    expect(texts(html)).toEqual([["p", "ok"]]);
  });
});

describe("markupDepth", () => {
  test("counts nested container elements", () => {
    expect(markupDepth("<div><section><p>x</p></section></div>")).toBe(2);
  });

  test("does not count implicitly closed or void elements", () => {
    expect(markupDepth(`<ul>${"<li>item<br>".repeat(2000)}</ul>`)).toBe(1);
    expect(markupDepth("<p>one<p>two<p>three<img src=x>")).toBe(0);
  });

  test("ignores tags inside scripts and comments", () => {
    expect(markupDepth("<script>var s = '<div><div><div>';</script><!-- <div><div> --><div></div>")).toBe(1);
  });
});
