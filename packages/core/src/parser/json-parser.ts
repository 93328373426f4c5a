/**
 * Text to tree.
 *
 * Parsing goes through the `yaml` package with the YAML 1.2 core schema, of
 * which JSON is a subset. `//` and `/* *\/` comments are blanked out first;
 * any other syntax outside strict JSON, such as a block mapping or a `#`
 * comment, is reported. The parser never throws: syntax problems are returned as issues next to a
 * best-effort tree.
 */

import {
  type Document,
  isAlias,
  isMap,
  isScalar,
  isSeq,
  LineCounter,
  parseDocument,
} from 'yaml';

import { JsonNode } from '../node/json-node.js';
import { ParseError } from '../types/errors.js';

export interface ParseOptions {
  /** Name reported in issues and used as the source of each error */
  sourceName?: string;
}

export interface ParseResult {
  node: JsonNode;
  isValidSyntax: boolean;
  issues: ParseError[];
}

/** A problem at a character offset of the decoded text */
interface Finding {
  offset: number;
  message: string;
}

const BOM = '\uFEFF';
const FLAG_SEPARATOR = '#';

/** Literals and numbers as JSON writes them */
const JSON_PLAIN = /^(?:-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?|true|false|null)$/;

function decode(input: string | Uint8Array): string {
  const text = typeof input === 'string' ? input : new TextDecoder('utf-8').decode(input);
  return text.startsWith(BOM) ? text.slice(BOM.length) : text;
}

/** `"name#flag1#flag2"` → name plus flags */
function splitKey(raw: string): { name: string; flags: string[] } {
  const [name = '', ...flags] = raw.split(FLAG_SEPARATOR);
  return { name, flags: flags.filter((flag) => flag !== '') };
}

/**
 * Blanks out `//` and `/* *\/` comments outside strings. Offsets and newlines
 * are kept so that positions reported later still point into `text`.
 */
function stripComments(text: string): { text: string; findings: Finding[] } {
  const out: string[] = [];
  const findings: Finding[] = [];
  let inString = false;
  let lastComma: number | undefined;
  let i = 0;

  while (i < text.length) {
    const char = text.charAt(i);
    const next = text.charAt(i + 1);

    if (inString) {
      if (char === '\\' && i + 1 < text.length) {
        out.push(char, next);
        i += 2;
        continue;
      }
      if (char === '"') inString = false;
      out.push(char);
      i += 1;
      continue;
    }

    if (char === '/' && next === '/') {
      const newline = text.indexOf('\n', i);
      const stop = newline === -1 ? text.length : newline;
      out.push(' '.repeat(stop - i));
      i = stop;
      continue;
    }
    if (char === '/' && next === '*') {
      const close = text.indexOf('*/', i + 2);
      if (close === -1) findings.push({ offset: i, message: 'unterminated /* comment' });
      const stop = close === -1 ? text.length : close + 2;
      out.push(text.slice(i, stop).replace(/[^\n]/g, ' '));
      i = stop;
      continue;
    }

    if (char === '#') {
      findings.push({ offset: i, message: "'#' comments are not JSON" });
    } else if ((char === ']' || char === '}') && lastComma !== undefined) {
      findings.push({ offset: lastComma, message: 'trailing comma is not JSON' });
    }
    if (char === ',') lastComma = i;
    else if (!/\s/.test(char)) lastComma = undefined;
    if (char === '"') inString = true;

    out.push(char);
    i += 1;
  }
  return { text: out.join(''), findings };
}

function offsetOf(range: readonly number[] | null | undefined): number {
  return range?.[0] ?? 0;
}

/** First construct under `value` that JSON cannot express */
function findNonJson(value: unknown, text: string): Finding | undefined {
  if (value === null || value === undefined) return undefined;

  if (isAlias(value)) {
    return { offset: offsetOf(value.range), message: 'aliases are not JSON' };
  }

  if (isScalar(value)) {
    const offset = offsetOf(value.range);
    if (value.anchor !== undefined) return { offset, message: 'anchors are not JSON' };
    if (value.type === 'QUOTE_DOUBLE') return undefined;
    const end = value.range?.[1] ?? offset;
    if (value.type === 'PLAIN' && JSON_PLAIN.test(text.slice(offset, end).trim())) {
      return undefined;
    }
    return { offset, message: 'strings must be double-quoted' };
  }

  if (isSeq(value) || isMap(value)) {
    const offset = offsetOf(value.range);
    if (value.anchor !== undefined) return { offset, message: 'anchors are not JSON' };
    if (value.flow !== true) {
      const kind = isMap(value) ? 'mapping' : 'sequence';
      return { offset, message: `block ${kind} is not JSON` };
    }
  }

  if (isSeq(value)) {
    for (const item of value.items) {
      const finding = findNonJson(item, text);
      if (finding !== undefined) return finding;
    }
  } else if (isMap(value)) {
    for (const pair of value.items) {
      if (!isScalar(pair.key) || pair.key.type !== 'QUOTE_DOUBLE') {
        const range = isScalar(pair.key) ? pair.key.range : value.range;
        return { offset: offsetOf(range), message: 'keys must be double-quoted strings' };
      }
      const finding = findNonJson(pair.value, text);
      if (finding !== undefined) return finding;
    }
  }
  return undefined;
}

function keyText(key: unknown): string {
  if (isScalar(key)) return String(key.value);
  if (key === null || key === undefined) return '';
  return String(key);
}

function convert(value: unknown, doc: Document.Parsed, findings: Finding[]): JsonNode {
  const node = new JsonNode();

  if (isAlias(value)) {
    return convert(value.resolve(doc), doc, findings);
  }

  if (isScalar(value)) {
    const scalar = value.value;
    if (typeof scalar === 'bigint') {
      const integer = Number(scalar);
      if (Number.isSafeInteger(integer)) {
        node.setInteger(integer);
      } else {
        findings.push({
          offset: offsetOf(value.range),
          message: `integer ${String(scalar)} is outside ±(2^53 - 1)`,
        });
      }
    } else if (typeof scalar === 'number') node.setFloat(scalar);
    else if (typeof scalar === 'boolean') node.setBool(scalar);
    else if (typeof scalar === 'string') node.setString(scalar);
    return node;
  }

  if (isSeq(value)) {
    const items = node.vector();
    for (const item of value.items) items.push(convert(item, doc, findings));
    return node;
  }

  if (isMap(value)) {
    const map = node.struct();
    for (const pair of value.items) {
      const { name, flags } = splitKey(keyText(pair.key));
      const child = convert(pair.value, doc, findings);
      for (const flag of flags) child.addFlag(flag);
      map.set(name, child);
    }
  }
  return node;
}

/**
 * Parses JSON text (or UTF-8 bytes) into a tree. Integers become Integer
 * nodes and numbers written with a fraction or exponent become Float nodes.
 * An integer outside ±(2^53 - 1) is an issue and is left Null in the tree.
 */
export function parseJsonNode(
  input: string | Uint8Array,
  options: ParseOptions = {}
): ParseResult {
  const source = options.sourceName ?? '<input>';
  const stripped = stripComments(decode(input));
  const text = stripped.text;
  const lineCounter = new LineCounter();

  const doc = parseDocument(text, {
    schema: 'core',
    intAsBigInt: true,
    uniqueKeys: true,
    lineCounter,
  });

  const issues = doc.errors.map((error) => {
    const line = error.linePos?.[0]?.line;
    const col = error.linePos?.[0]?.col;
    const where = line !== undefined ? `${source}:${line}:${col ?? 1}` : source;
    const [summary = error.message] = error.message.split('\n');
    return new ParseError({
      message: `${where}: ${summary}`,
      context: { source, line, col },
    });
  });

  const findings = [...stripped.findings];
  if (doc.errors.length === 0) {
    const finding = findNonJson(doc.contents, text);
    if (finding !== undefined) findings.push(finding);
  }
  const node = convert(doc.contents, doc, findings);

  for (const { offset, message } of findings) {
    const { line, col } = lineCounter.linePos(offset);
    issues.push(
      new ParseError({
        message: `${source}:${line}:${col}: ${message}`,
        context: { source, line, col },
      })
    );
  }

  return {
    node,
    isValidSyntax: issues.length === 0,
    issues,
  };
}
