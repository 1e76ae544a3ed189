/**
 * Figure DSL Parser
 *
 * Reads the lightweight markdown-flavoured figure format:
 *
 *   # Scientific Workflow
 *
 *   ## Nodes
 *   - ingest | Data Ingest | io
 *   - train | Model Training
 *   - evaluate | Evaluation | decision
 *
 *   ## Edges
 *   - ingest -> train
 *   - train -> evaluate | accuracy report
 *
 * Bullets may be `-` or `*`. Blank lines and lines starting with `#` inside a
 * section are ignored.
 */

import type { FigureEdge, FigureNode, FigurePlan } from "../types";
import { createLogger } from "../logging";

const log = createLogger("parser");

export interface ParseConfig {
  /** Category given to nodes whose line omits one */
  defaultNodeType: string;
}

export const DEFAULT_PARSE_CONFIG: Readonly<ParseConfig> = Object.freeze({
  defaultNodeType: "process",
});

const NODE_PATTERN = /^[-*]\s*(?<id>[\w-]+)\s*\|\s*(?<label>[^|]+?)(?:\s*\|\s*(?<type>[^|]+))?\s*$/;
const EDGE_PATTERN = /^[-*]\s*(?<src>[\w-]+)\s*->\s*(?<tgt>[\w-]+)(?:\s*\|\s*(?<label>.+))?\s*$/;

export class FigureParseError extends Error {
  public readonly code = "PARSE_ERROR";

  constructor(
    message: string,
    /** 1-based line number within the document, when known */
    public readonly line?: number
  ) {
    super(line === undefined ? message : `Line ${line}: ${message}`);
    this.name = "FigureParseError";
  }
}

interface SourceLine {
  text: string;
  number: number;
}

/**
 * Split a document into named sections.
 *
 * `## Name` opens a section keyed by the lower-cased name; `# Heading` opens
 * the title section and replaces its content with the heading. Lines before
 * any heading belong to `body`.
 */
export function splitSections(text: string): Map<string, SourceLine[]> {
  let current = "body";
  const sections = new Map<string, SourceLine[]>([[current, []]]);

  const section = (name: string): SourceLine[] => {
    let lines = sections.get(name);
    if (!lines) {
      lines = [];
      sections.set(name, lines);
    }
    return lines;
  };

  text.split(/\r?\n/).forEach((raw, index) => {
    const line = raw.trim();
    const number = index + 1;

    if (line.startsWith("## ")) {
      current = line.slice(3).trim().toLowerCase();
      section(current);
      return;
    }
    if (line.startsWith("# ")) {
      current = "title";
      sections.set(current, [{ text: line.slice(2).trim(), number }]);
      return;
    }
    section(current).push({ text: raw, number });
  });

  return sections;
}

function sectionText(lines: SourceLine[] | undefined): string | undefined {
  if (!lines) return undefined;
  const joined = lines.map((l) => l.text).join("\n").trim();
  return joined || undefined;
}

export function parseNodeLine(line: string, config: ParseConfig = DEFAULT_PARSE_CONFIG): FigureNode {
  const groups = NODE_PATTERN.exec(line)?.groups;
  const id = groups?.id;
  const label = groups?.label;
  if (!id || label === undefined) {
    throw new FigureParseError(`Invalid node line: "${line}"`);
  }
  return {
    id,
    label: label.trim(),
    type: (groups?.type ?? config.defaultNodeType).trim(),
    metadata: {},
  };
}

export function parseEdgeLine(line: string): FigureEdge {
  const groups = EDGE_PATTERN.exec(line)?.groups;
  const source = groups?.src;
  const target = groups?.tgt;
  if (!source || !target) {
    throw new FigureParseError(`Invalid edge line: "${line}"`);
  }
  const label = groups?.label?.trim();
  return label ? { source, target, label } : { source, target };
}

function parseLines<T>(lines: SourceLine[], parse: (line: string) => T): Array<{ value: T; line: number }> {
  const results: Array<{ value: T; line: number }> = [];
  for (const { text, number } of lines) {
    const stripped = text.trim();
    if (!stripped || stripped.startsWith("#")) continue;
    try {
      results.push({ value: parse(stripped), line: number });
    } catch (err) {
      if (err instanceof FigureParseError && err.line === undefined) {
        throw new FigureParseError(err.message, number);
      }
      throw err;
    }
  }
  return results;
}

/**
 * Parse figure DSL text into a plan
 *
 * @throws FigureParseError when the Nodes section is missing, a line matches
 *   neither pattern, or a node identifier repeats
 */
export function parseFigureSpec(
  text: string,
  options: { config?: Partial<ParseConfig> } = {}
): FigurePlan {
  const config: ParseConfig = { ...DEFAULT_PARSE_CONFIG, ...options.config };
  const sections = splitSections(text);

  const nodeLines = sections.get("nodes");
  if (!sectionText(nodeLines)) {
    throw new FigureParseError("A figure specification must include a 'Nodes' section.");
  }

  const parsedNodes = parseLines(nodeLines ?? [], (line) => parseNodeLine(line, config));
  const edges = parseLines(sections.get("edges") ?? [], parseEdgeLine).map((e) => e.value);

  const seen = new Set<string>();
  for (const { value, line } of parsedNodes) {
    if (seen.has(value.id)) {
      throw new FigureParseError(`Duplicate node identifier "${value.id}"`, line);
    }
    seen.add(value.id);
  }
  const nodes = parsedNodes.map((n) => n.value);

  const title = sectionText(sections.get("title"));
  const description = sectionText(sections.get("description") ?? sections.get("body"));

  log.debug("Parsed figure spec", { nodes: nodes.length, edges: edges.length });

  return {
    nodes,
    edges,
    ...(title !== undefined ? { title } : {}),
    ...(description !== undefined ? { description } : {}),
  };
}
