/**
 * Attribute mini-parser and the immutable, lazily parsed attribute map
 *
 * Two dialects share one routine: GFF3 column 9 (`key=value;key=value`,
 * values kept as written) and BED track lines (`key=value key="a b"`,
 * whitespace separated, quotes stripped).
 *
 * @module formats/attributes
 */

import type { FieldDefect } from "../diagnostics";

export interface AttributeSyntax {
  readonly pairSeparator: string;
  readonly keyValueSeparator: string;
  /** Strip surrounding quotes from values and never split inside them */
  readonly unquote: boolean;
}

export const GFF_ATTRIBUTE_SYNTAX: AttributeSyntax = Object.freeze({
  pairSeparator: ";",
  keyValueSeparator: "=",
  unquote: false,
});

export const TRACK_ATTRIBUTE_SYNTAX: AttributeSyntax = Object.freeze({
  pairSeparator: " ",
  keyValueSeparator: "=",
  unquote: true,
});

export interface ParsedAttributes {
  readonly entries: Map<string, string>;
  readonly defects: readonly FieldDefect[];
}

const QUOTE_CHARS = new Set(['"', "'"]);

function isSeparator(char: string, separator: string): boolean {
  return separator === " " ? /\s/.test(char) : char === separator;
}

/**
 * Split on the pair separator, ignoring separators inside quotes
 */
function splitQuoted(text: string, separator: string): string[] {
  const segments: string[] = [];
  let current = "";
  let quote: string | undefined;

  for (const char of text) {
    if (quote !== undefined) {
      current += char;
      if (char === quote) quote = undefined;
    } else if (QUOTE_CHARS.has(char)) {
      quote = char;
      current += char;
    } else if (isSeparator(char, separator)) {
      segments.push(current);
      current = "";
    } else {
      current += char;
    }
  }
  segments.push(current);
  return segments;
}

function stripQuotes(value: string): string {
  if (value.length >= 2) {
    const first = value.charAt(0);
    if (QUOTE_CHARS.has(first) && value.endsWith(first)) {
      return value.slice(1, -1);
    }
  }
  return value;
}

/**
 * Parse an attribute string into an ordered map
 *
 * A segment without the key/value separator becomes a key with an empty
 * value and a MalformedAttribute defect. Duplicate keys overwrite the
 * earlier value but keep its position.
 *
 * @example
 * ```typescript
 * parseAttributes("ID=gene1;Name=BRCA1").entries;
 * // Map { "ID" => "gene1", "Name" => "BRCA1" }
 * parseAttributes("lonelykey").entries;
 * // Map { "lonelykey" => "" }
 * ```
 */
export function parseAttributes(
  text: string,
  syntax: AttributeSyntax = GFF_ATTRIBUTE_SYNTAX
): ParsedAttributes {
  const entries = new Map<string, string>();
  const defects: FieldDefect[] = [];
  const trimmed = text.trim();

  if (trimmed === "" || trimmed === ".") {
    return { entries, defects };
  }

  const segments = syntax.unquote
    ? splitQuoted(trimmed, syntax.pairSeparator)
    : trimmed.split(syntax.pairSeparator);

  for (const rawSegment of segments) {
    const segment = rawSegment.trim();
    if (segment === "") continue;

    const separatorIndex = segment.indexOf(syntax.keyValueSeparator);
    if (separatorIndex === -1) {
      defects.push({
        kind: "MalformedAttribute",
        message: `attribute '${segment}' has no '${syntax.keyValueSeparator}'; using an empty value`,
        field: segment,
      });
      entries.set(segment, "");
      continue;
    }

    const key = segment.slice(0, separatorIndex).trim();
    if (key === "") {
      defects.push({
        kind: "MalformedAttribute",
        message: `attribute '${segment}' has an empty key; skipped`,
      });
      continue;
    }

    const value = segment.slice(separatorIndex + 1).trim();
    entries.set(key, syntax.unquote ? stripQuotes(value) : value);
  }

  return { entries, defects };
}

const GFF_RESERVED = /[;=&\t\n\r]/g;

/**
 * Percent-encode the characters GFF3 reserves inside attribute values
 */
export function encodeAttributeValue(value: string): string {
  return value.replace(
    GFF_RESERVED,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase().padStart(2, "0")}`
  );
}

/**
 * Immutable ordered key/value view over an attribute string
 *
 * A map built with `parse` keeps its source text and does no work until a
 * key is looked up; `format` then returns the source verbatim. A map built
 * with `from`, `with` or `without` is written from its entries.
 */
export class AttributeMap implements Iterable<[string, string]> {
  private parsed: ParsedAttributes | undefined;

  private constructor(
    private readonly source: string | undefined,
    readonly syntax: AttributeSyntax,
    entries?: Map<string, string>
  ) {
    if (entries !== undefined) {
      this.parsed = { entries, defects: [] };
    }
  }

  static parse(text: string, syntax: AttributeSyntax = GFF_ATTRIBUTE_SYNTAX): AttributeMap {
    return new AttributeMap(text, syntax);
  }

  static from(
    entries: Iterable<readonly [string, string]> | Readonly<Record<string, string>>,
    syntax: AttributeSyntax = GFF_ATTRIBUTE_SYNTAX
  ): AttributeMap {
    const pairs = isIterable(entries) ? entries : Object.entries(entries);
    const map = new Map<string, string>();
    for (const [key, value] of pairs) {
      map.set(key, value);
    }
    return new AttributeMap(undefined, syntax, map);
  }

  static empty(syntax: AttributeSyntax = GFF_ATTRIBUTE_SYNTAX): AttributeMap {
    return new AttributeMap(undefined, syntax, new Map());
  }

  private resolve(): ParsedAttributes {
    if (this.parsed === undefined) {
      this.parsed = parseAttributes(this.source ?? "", this.syntax);
    }
    return this.parsed;
  }

  /** Whether the source text has been parsed yet */
  get isParsed(): boolean {
    return this.parsed !== undefined;
  }

  get defects(): readonly FieldDefect[] {
    return this.resolve().defects;
  }

  get size(): number {
    return this.resolve().entries.size;
  }

  get(key: string): string | undefined {
    return this.resolve().entries.get(key);
  }

  has(key: string): boolean {
    return this.resolve().entries.has(key);
  }

  keys(): IterableIterator<string> {
    return this.resolve().entries.keys();
  }

  entries(): IterableIterator<[string, string]> {
    return this.resolve().entries.entries();
  }

  [Symbol.iterator](): Iterator<[string, string]> {
    return this.entries();
  }

  /**
   * Copy with one key set; an existing key keeps its position
   */
  with(key: string, value: string): AttributeMap {
    const next = new Map(this.resolve().entries);
    next.set(key, value);
    return new AttributeMap(undefined, this.syntax, next);
  }

  without(key: string): AttributeMap {
    const next = new Map(this.resolve().entries);
    next.delete(key);
    return new AttributeMap(undefined, this.syntax, next);
  }

  toObject(): Record<string, string> {
    return Object.fromEntries(this.resolve().entries);
  }

  /**
   * Serialise for output. Returns "" for an empty synthesised map.
   */
  format(): string {
    if (this.source !== undefined) {
      return this.source;
    }

    const { pairSeparator, keyValueSeparator, unquote } = this.syntax;
    const parts: string[] = [];
    for (const [key, value] of this.resolve().entries) {
      if (value === "") {
        parts.push(key);
      } else if (unquote) {
        parts.push(`${key}${keyValueSeparator}${/\s/.test(value) ? `"${value}"` : value}`);
      } else {
        parts.push(`${key}${keyValueSeparator}${encodeAttributeValue(value)}`);
      }
    }
    return parts.join(pairSeparator);
  }

  toString(): string {
    return this.format();
  }
}

function isIterable<T>(value: Iterable<T> | object): value is Iterable<T> {
  return Symbol.iterator in value;
}
