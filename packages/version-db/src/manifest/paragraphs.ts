/**
 * Paragraph File Tokenizer
 *
 * Splits a legacy `CONTROL` file into paragraphs of `Field: value` pairs.
 *
 * Grammar:
 * - paragraphs are separated by one or more blank lines
 * - a field line is `Name: value`; names are letters, digits and hyphens
 * - a line starting with a space or tab continues the previous field's value
 * - lines starting with `#` are comments
 *
 * @module manifest/paragraphs
 */

import { parseFailed, parseOk, type ParseResult } from './types.js';

export interface ParagraphField {
  readonly value: string;
  /** 1-based line of the field name */
  readonly line: number;
  readonly column: number;
}

export type Paragraph = ReadonlyMap<string, ParagraphField>;

const FIELD_NAME = /^[A-Za-z0-9-]+/;

/**
 * Parse every paragraph in `text`. Any grammar error fails the whole file.
 */
export function parseParagraphs(text: string, origin: string): ParseResult<Paragraph[]> {
  const lines = text.split(/\r?\n/);
  const paragraphs: Paragraph[] = [];
  let current = new Map<string, ParagraphField>();
  let lastField: string | undefined;

  const flush = (): void => {
    if (current.size > 0) paragraphs.push(current);
    current = new Map();
    lastField = undefined;
  };

  for (let index = 0; index < lines.length; index++) {
    const raw = lines[index];
    const line = index + 1;

    if (raw.startsWith('#')) continue;

    if (raw.trim() === '') {
      flush();
      continue;
    }

    if (raw.startsWith(' ') || raw.startsWith('\t')) {
      const previous = lastField === undefined ? undefined : current.get(lastField);
      if (lastField === undefined || previous === undefined) {
        return parseFailed(origin, [
          { field: '(paragraph)', message: 'continuation line without a field', line, column: 1 },
        ]);
      }
      current.set(lastField, { ...previous, value: `${previous.value}\n${raw.trim()}` });
      continue;
    }

    const nameMatch = FIELD_NAME.exec(raw);
    if (!nameMatch) {
      return parseFailed(origin, [
        { field: '(paragraph)', message: 'expected a field name', line, column: 1 },
      ]);
    }

    const name = nameMatch[0];
    if (raw.charAt(name.length) !== ':') {
      return parseFailed(origin, [
        { field: name, message: "expected ':' after field name", line, column: name.length + 1 },
      ]);
    }

    if (current.has(name)) {
      return parseFailed(origin, [
        { field: name, message: 'duplicate field', line, column: 1 },
      ]);
    }

    current.set(name, { value: raw.slice(name.length + 1).trim(), line, column: 1 });
    lastField = name;
  }

  flush();
  return parseOk(paragraphs);
}

/**
 * Split a comma-separated list, ignoring commas inside `[...]` and `(...)`
 */
export function splitTopLevelCommas(value: string): string[] {
  const items: string[] = [];
  let depth = 0;
  let start = 0;

  for (let i = 0; i < value.length; i++) {
    const ch = value[i];
    if (ch === '[' || ch === '(') depth++;
    else if (ch === ']' || ch === ')') depth = Math.max(0, depth - 1);
    else if (ch === ',' && depth === 0) {
      items.push(value.slice(start, i));
      start = i + 1;
    }
  }
  items.push(value.slice(start));

  return items.map((item) => item.trim()).filter((item) => item.length > 0);
}
