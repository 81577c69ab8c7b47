import { displayTimestamp } from "../lib/paths.js";
import type {
  ExtractedBlock,
  FetchFailure,
  ReportSection,
  RunReport,
  RunSummary,
  TagKind,
  UrlOutcome,
} from "../pipeline/types.js";

export interface AssembleInput {
  outcomes: readonly UrlOutcome[];
  inputName: string;
  generatedAt: Date;
}

const BLOCK_PREFIX: Record<TagKind, string> = {
  title: "#",
  h1: "#",
  h2: "##",
  h3: "###",
  p: "",
  li: "-",
};

const SECTION_SEPARATOR = "\n\n---\n\n";
const EMPTY_PAGE_LINE = "_No matching text found._";

export function assembleReport(input: AssembleInput): RunReport {
  const summary = summarize(input.outcomes);
  const sections = input.outcomes
    .filter((outcome) => outcome.fetch !== undefined)
    .map(renderSection);
  const logLines = input.outcomes.map(renderLogLine);

  const summaryText = renderSummary(summary, input.inputName, input.generatedAt).join("\n");
  const document = `${[summaryText, ...sections.map((section) => section.lines.join("\n"))].join(SECTION_SEPARATOR)}\n`;
  const log = logLines.length > 0 ? `${logLines.join("\n")}\n` : "";

  return { summary, sections, logLines, document, log };
}

export function summarize(outcomes: readonly UrlOutcome[]): RunSummary {
  const succeeded = outcomes.filter((outcome) => outcome.fetch?.ok === true).length;
  return {
    total: outcomes.length,
    succeeded,
    failed: outcomes.length - succeeded,
  };
}

function renderSummary(summary: RunSummary, inputName: string, generatedAt: Date): string[] {
  return [
    "## Summary Report",
    "",
    `- Run date: ${displayTimestamp(generatedAt)}`,
    `- Input file: ${inputName}`,
    `- Total URLs scanned: ${summary.total}`,
    `- Pages successfully scraped: ${summary.succeeded}`,
    `- Pages skipped or failed: ${summary.failed}`,
  ];
}

function renderSection(outcome: UrlOutcome): ReportSection {
  const url = outcome.record.url ?? outcome.record.raw.trim();
  const lines = [`### URL: [${url}](${url})`, ""];
  const ok = outcome.fetch?.ok === true;

  if (!ok) {
    lines.push(`**Error accessing ${url}**: ${describeFailure(outcome.failure)}`);
  } else if (outcome.blocks.length === 0) {
    lines.push(EMPTY_PAGE_LINE);
  } else {
    lines.push(...outcome.blocks.map(renderBlock));
  }

  return { url, ok, lines };
}

export function renderBlock(block: ExtractedBlock): string {
  const prefix = BLOCK_PREFIX[block.tag];
  return prefix ? `${prefix} ${block.text}` : block.text;
}

export function renderLogLine(outcome: UrlOutcome): string {
  const target = outcome.record.url ?? (outcome.record.raw.trim() || "(empty line)");

  if (outcome.fetch?.ok) {
    const count = outcome.blocks.length;
    const status = outcome.fetch.status === undefined ? "" : `HTTP ${outcome.fetch.status}, `;
    return `[OK] ${target} | ${status}${count} ${count === 1 ? "block" : "blocks"}`;
  }

  const failure = outcome.failure;
  if (!failure) {
    return `[FetchConnectionError] ${target} | No result recorded`;
  }
  return `[${failure.kind}] ${target} | ${failure.message}`;
}

function describeFailure(failure: FetchFailure | undefined): string {
  if (!failure) {
    return "unknown error";
  }
  return `${failure.kind}: ${failure.message}`;
}
