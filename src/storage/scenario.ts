/**
 * Scenario input: the line-oriented text protocol and YAML scenario files.
 *
 * Text input is three blocks: router labels terminated by START, initial
 * `src dest cost` links terminated by UPDATE, and update triples
 * terminated by END.
 */

import { readFileSync, writeFileSync } from 'fs';
import { extname } from 'path';
import { parse, stringify } from 'yaml';
import { z } from 'zod';
import { DELETE_LINK, type Link, type LinkEdit, type RouterId, type Scenario } from '../core/types.js';
import { InvalidLinkError, ParseError, UnknownRouterError } from '../core/errors.js';
import { assertLinkCost } from '../graph/topology.js';

export const START_MARKER = 'START';
export const UPDATE_MARKER = 'UPDATE';
export const END_MARKER = 'END';

type Triple = [RouterId, RouterId, number];

const LabelSchema = z
  .union([z.string(), z.number()])
  .transform(String)
  .pipe(z.string().regex(/^\S+$/, 'Router labels must be a single token'));

const TripleSchema = z.tuple([LabelSchema, LabelSchema, z.number().int()]);

export const ScenarioFileSchema = z.object({
  routers: z.array(LabelSchema).min(1),
  links: z.array(TripleSchema).default([]),
  updates: z.array(TripleSchema).default([]),
});

export type ScenarioFile = z.infer<typeof ScenarioFileSchema>;

/**
 * Check a triple against the router set and the link rules.
 */
function checkTriple([src, dest, cost]: Triple, known: Set<RouterId>): void {
  for (const router of [src, dest]) {
    if (!known.has(router)) throw new UnknownRouterError(router);
  }
  assertLinkCost(cost);
  if (src === dest) {
    throw new InvalidLinkError(`Self-loop on router ${src} is not allowed`);
  }
}

function assemble(routers: RouterId[], links: Triple[], updates: Triple[]): Scenario {
  const known = new Set(routers);
  for (const triple of [...links, ...updates]) {
    checkTriple(triple, known);
  }
  return {
    routers,
    links: links
      .filter(([, , cost]) => cost !== DELETE_LINK)
      .map(([a, b, cost]): Link => ({ a, b, cost })),
    updates: updates.map(([src, dest, cost]): LinkEdit => ({ src, dest, cost })),
  };
}

function parseTriple(line: string, lineNumber: number): Triple {
  const tokens = line.split(/\s+/);
  if (tokens.length !== 3) {
    throw new ParseError(
      `Expected "src dest cost", got ${tokens.length} token(s)`,
      lineNumber
    );
  }
  const [src, dest, rawCost] = tokens;
  if (!/^-?\d+$/.test(rawCost)) {
    throw new ParseError(`Cost must be an integer, got "${rawCost}"`, lineNumber);
  }
  return [src, dest, Number.parseInt(rawCost, 10)];
}

/**
 * Parse the text protocol. Blank lines are skipped and anything after END
 * is ignored.
 */
export function parseScenarioText(text: string): Scenario {
  const routers: RouterId[] = [];
  const links: Triple[] = [];
  const updates: Triple[] = [];
  const blocks = [
    { terminator: START_MARKER },
    { terminator: UPDATE_MARKER, triples: links },
    { terminator: END_MARKER, triples: updates },
  ];
  let block = 0;

  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length && block < blocks.length; i++) {
    const line = lines[i].trim();
    const lineNumber = i + 1;
    if (line === '') continue;

    const current = blocks[block];
    if (line === current.terminator) {
      block++;
      continue;
    }

    if (current.triples) {
      current.triples.push(parseTriple(line, lineNumber));
      continue;
    }

    if (/\s/.test(line)) {
      throw new ParseError(`Router label "${line}" must be a single token`, lineNumber);
    }
    if (routers.includes(line)) {
      throw new ParseError(`Duplicate router: ${line}`, lineNumber);
    }
    routers.push(line);
  }

  if (block < blocks.length) {
    throw new ParseError(`Missing ${blocks[block].terminator} terminator`);
  }
  if (routers.length === 0) {
    throw new ParseError('No routers declared');
  }

  return assemble(routers, links, updates);
}

/**
 * Parse a YAML scenario document.
 */
export function parseScenarioYaml(text: string): Scenario {
  let raw: unknown;
  try {
    raw = parse(text);
  } catch (error) {
    throw new ParseError(`Invalid YAML: ${error instanceof Error ? error.message : String(error)}`);
  }

  const result = ScenarioFileSchema.safeParse(raw);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ParseError(`Invalid scenario file: ${detail}`);
  }

  const { routers, links, updates } = result.data;
  const seen = new Set<RouterId>();
  for (const router of routers) {
    if (seen.has(router)) throw new ParseError(`Duplicate router: ${router}`);
    seen.add(router);
  }
  return assemble(routers, links, updates);
}

/**
 * Serialize a scenario as a YAML scenario document.
 */
export function stringifyScenario(scenario: Scenario): string {
  const file: ScenarioFile = {
    routers: scenario.routers,
    links: scenario.links.map((link): Triple => [link.a, link.b, link.cost]),
    updates: scenario.updates.map((edit): Triple => [edit.src, edit.dest, edit.cost]),
  };
  return stringify(file, { lineWidth: 0 });
}

function isYamlPath(filePath: string): boolean {
  const ext = extname(filePath).toLowerCase();
  return ext === '.yaml' || ext === '.yml';
}

/**
 * Load a scenario from a file, choosing the format by extension.
 */
export function loadScenario(filePath: string): Scenario {
  const content = readFileSync(filePath, 'utf-8');
  return isYamlPath(filePath) ? parseScenarioYaml(content) : parseScenarioText(content);
}

/**
 * Load a scenario from a path, or from stdin when the path is missing or "-".
 */
export function readScenario(source?: string): Scenario {
  if (source === undefined || source === '-') {
    return parseScenarioText(readFileSync(0, 'utf-8'));
  }
  return loadScenario(source);
}

/**
 * Save a scenario as YAML.
 */
export function saveScenario(filePath: string, scenario: Scenario): void {
  writeFileSync(filePath, stringifyScenario(scenario), 'utf-8');
}
