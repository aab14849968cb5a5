/**
 * Protocol Parser: ASCCONV / XProtocol text to a nested tree
 *
 * Handles lines such as
 *   sSliceArray.asSlice[0].dThickness = 1.5
 *   sProtConsistencyInfo.tBaselineString = ""N4_VB17""
 * Everything that is not an assignment (XProtocol markup, comments, blank
 * lines) is skipped.
 */

import type { ProtocolBlock, ProtocolNode, ProtocolScalar } from './types';

const BEGIN_MARKER = /^[ \t]*### ASCCONV BEGIN(.*?)###[ \t]*$/m;
const END_MARKER = /^[ \t]*### ASCCONV END ###/m;
const ASSIGNMENT = /^\s*([A-Za-z_][\w.[\]]*)\s*=\s*(.*?)\s*$/;
const SEGMENT = /^([A-Za-z_]\w*)((?:\[\d+\])*)$/;
const INDEX = /\[(\d+)\]/g;
/** Characters that end an empty `""` string rather than open a doubled one */
const AFTER_EMPTY_STRING = /[\s,\]}#]/;

/** Keys that would reach Object.prototype */
const FORBIDDEN_KEYS = new Set(['__proto__', 'constructor', 'prototype']);
/** Pseudo key carrying array metadata instead of values */
const ATTRIBUTE_KEY = '__attribute__';
/** Largest array index accepted; assignments past it are skipped */
export const MAX_ARRAY_INDEX = 0xffff;

/**
 * Decoded protocol plus the attributes of its BEGIN marker
 */
export interface ProtocolParseResult {
  protocol: ProtocolBlock;
  attributes: Record<string, string>;
}

type PathStep = { kind: 'key'; key: string } | { kind: 'index'; index: number };

/**
 * Decode ASCCONV or XProtocol text into a nested tree
 */
export function parseProtocol(text: string): ProtocolBlock {
  return parseProtocolDetailed(text).protocol;
}

/**
 * Decode protocol text and return the BEGIN marker's attributes as well
 */
export function parseProtocolDetailed(text: string): ProtocolParseResult {
  const { body, attributes } = extractAssignmentRegion(text);
  const protocol: ProtocolBlock = {};

  for (const line of body.split(/\r?\n/)) {
    applyLine(protocol, line);
  }

  return { protocol, attributes };
}

/**
 * Isolate the text between the ASCCONV markers; the whole text when absent
 */
export function extractAssignmentRegion(text: string): { body: string; attributes: Record<string, string> } {
  const begin = BEGIN_MARKER.exec(text);
  if (!begin) {
    return { body: text, attributes: {} };
  }

  const start = begin.index + begin[0].length;
  const rest = text.slice(start);
  const end = END_MARKER.exec(rest);
  return {
    body: end ? rest.slice(0, end.index) : rest,
    attributes: parseMarkerAttributes(begin[1] ?? ''),
  };
}

function parseMarkerAttributes(source: string): Record<string, string> {
  const attributes: Record<string, string> = {};
  for (const pair of source.trim().split(/\s+/)) {
    const separator = pair.indexOf('=');
    if (separator > 0) {
      attributes[pair.slice(0, separator)] = pair.slice(separator + 1);
    }
  }
  return attributes;
}

/**
 * Apply one `path = value` line to the tree; other lines are ignored
 */
function applyLine(root: ProtocolBlock, rawLine: string): void {
  const line = stripComment(rawLine);
  const match = ASSIGNMENT.exec(line);
  if (!match || match[2].length === 0) {
    return;
  }

  const steps = parsePath(match[1]);
  if (!steps) {
    return;
  }

  assignPath(root, steps, parseLiteral(match[2]));
}

/**
 * Drop a trailing `#` comment that is not inside quotes
 */
function stripComment(line: string): string {
  for (let i = 0; i < line.length; i++) {
    const char = line[i];
    if (char === '"') {
      const quoted = readQuoted(line, i);
      if (quoted === undefined) {
        return line;
      }
      i = quoted.end - 1;
    } else if (char === '#') {
      return line.slice(0, i);
    }
  }
  return line;
}

/**
 * Quoted text starting at `start`: `"text"`, or the doubled `""text""` used
 * inside XProtocol. A `""` that is followed by a separator, the end of the
 * text, or has no closing `""` is an empty string.
 */
function readQuoted(text: string, start: number): { value: string; end: number } | undefined {
  if (text.startsWith('""', start)) {
    const following = text[start + 2];
    const close = text.indexOf('""', start + 2);
    if (following === undefined || AFTER_EMPTY_STRING.test(following) || close === -1) {
      return { value: '', end: start + 2 };
    }
    return { value: text.slice(start + 2, close), end: close + 2 };
  }
  const close = text.indexOf('"', start + 1);
  if (close === -1) {
    return undefined;
  }
  return { value: text.slice(start + 1, close), end: close + 1 };
}

/**
 * Split `a.b[1][2].c` into key and index steps
 */
export function parsePath(path: string): PathStep[] | null {
  const steps: PathStep[] = [];

  for (const segment of path.split('.')) {
    const match = SEGMENT.exec(segment);
    if (!match) {
      return null;
    }
    const key = match[1];
    if (key === ATTRIBUTE_KEY || FORBIDDEN_KEYS.has(key)) {
      return null;
    }
    steps.push({ kind: 'key', key });
    for (const index of match[2].matchAll(INDEX)) {
      const value = parseInt(index[1], 10);
      if (value > MAX_ARRAY_INDEX) {
        return null;
      }
      steps.push({ kind: 'index', index: value });
    }
  }

  return steps;
}

function isBlock(node: ProtocolNode | undefined): node is ProtocolBlock {
  return typeof node === 'object' && node !== null && !Array.isArray(node);
}

/**
 * Return the container the next step needs, replacing scalars and
 * placeholders of the wrong shape
 */
function containerFor(existing: ProtocolNode | undefined, next: PathStep): ProtocolBlock | ProtocolNode[] {
  if (next.kind === 'index') {
    return Array.isArray(existing) ? existing : [];
  }
  return isBlock(existing) ? existing : {};
}

/**
 * Walk (creating as needed) the path and store the value at its end
 */
function assignPath(root: ProtocolBlock, steps: PathStep[], value: ProtocolNode): void {
  let current: ProtocolBlock | ProtocolNode[] = root;

  for (let i = 0; i < steps.length; i++) {
    const step = steps[i];
    const next = steps[i + 1];

    if (step.kind === 'key') {
      if (Array.isArray(current)) {
        return;
      }
      if (next === undefined) {
        current[step.key] = value;
        return;
      }
      const child = containerFor(current[step.key], next);
      current[step.key] = child;
      current = child;
    } else {
      if (!Array.isArray(current)) {
        return;
      }
      while (current.length <= step.index) {
        current.push({});
      }
      if (next === undefined) {
        current[step.index] = value;
        return;
      }
      const child = containerFor(current[step.index], next);
      current[step.index] = child;
      current = child;
    }
  }
}

/**
 * Parse the right-hand side of an assignment
 *
 * Grammar:
 *   literal := string | list | number | raw
 *   list    := ('[' | '{') [literal (',' literal)*] (']' | '}')
 *   number  := sign? (hex | decimal)
 */
export function parseLiteral(source: string): ProtocolNode {
  const trimmed = source.trim();
  const parser = new LiteralParser(trimmed);
  const value = parser.parseValue();
  return value !== undefined && parser.atEnd() ? value : trimmed;
}

class LiteralParser {
  private pos = 0;

  constructor(private readonly source: string) {}

  atEnd(): boolean {
    this.skipWhitespace();
    return this.pos >= this.source.length;
  }

  parseValue(): ProtocolNode | undefined {
    this.skipWhitespace();
    const char = this.source[this.pos];
    if (char === '"') {
      return this.parseString();
    }
    if (char === '[' || char === '{') {
      return this.parseList(char === '[' ? ']' : '}');
    }
    return this.parseNumber();
  }

  private parseString(): string | undefined {
    const quoted = readQuoted(this.source, this.pos);
    if (quoted === undefined) {
      return undefined;
    }
    this.pos = quoted.end;
    return quoted.value;
  }

  private parseList(close: string): ProtocolNode[] | undefined {
    this.pos++;
    const items: ProtocolNode[] = [];

    this.skipWhitespace();
    if (this.source[this.pos] === close) {
      this.pos++;
      return items;
    }

    for (;;) {
      const item = this.parseValue();
      if (item === undefined) {
        return undefined;
      }
      items.push(item);
      this.skipWhitespace();
      const char = this.source[this.pos];
      this.pos++;
      if (char === close) {
        return items;
      }
      if (char !== ',') {
        return undefined;
      }
    }
  }

  private parseNumber(): ProtocolScalar | undefined {
    const match = /^([+-]?)(?:0[xX]([0-9a-fA-F]+)|(\d+\.?\d*(?:[eE][+-]?\d+)?|\.\d+(?:[eE][+-]?\d+)?))/.exec(
      this.source.slice(this.pos)
    );
    if (!match) {
      return undefined;
    }
    this.pos += match[0].length;
    const sign = match[1] === '-' ? -1 : 1;
    if (match[2] !== undefined) {
      return sign * parseInt(match[2], 16);
    }
    return sign * Number(match[3]);
  }

  private skipWhitespace(): void {
    while (this.pos < this.source.length && /\s/.test(this.source[this.pos])) {
      this.pos++;
    }
  }
}

/**
 * Number of slices declared by a decoded protocol (`sSliceArray.lSize`)
 */
export function getSliceCount(protocol: ProtocolBlock): number | undefined {
  const sliceArray = protocol['sSliceArray'];
  if (!isBlock(sliceArray)) {
    return undefined;
  }
  const size = sliceArray['lSize'];
  return typeof size === 'number' ? size : undefined;
}
