/**
 * Header metadata carried beside a record stream
 *
 * Comment, `track` and `browser` lines never become records. They are kept
 * here in file order with their line numbers so writers can re-emit them.
 *
 * @module formats/headers
 */

import { AttributeMap, TRACK_ATTRIBUTE_SYNTAX } from "./attributes";

export type HeaderKind = "comment" | "track" | "browser";

export interface HeaderLine {
  readonly kind: HeaderKind;
  /** The line as written, without its terminator */
  readonly text: string;
  readonly lineNumber?: number;
}

const GFF_VERSION_PRAGMA = /^##gff-version(\s|$)/;

export function isGffVersionPragma(text: string): boolean {
  return GFF_VERSION_PRAGMA.test(text);
}

export class HeaderMetadata implements Iterable<HeaderLine> {
  private readonly lines: HeaderLine[] = [];
  private readonly trackAttributes = new Map<HeaderLine, AttributeMap>();

  static from(lines: Iterable<HeaderLine>): HeaderMetadata {
    const headers = new HeaderMetadata();
    for (const line of lines) {
      headers.lines.push(Object.freeze({ ...line }));
    }
    return headers;
  }

  add(kind: HeaderKind, text: string, lineNumber?: number): HeaderLine {
    const line: HeaderLine = Object.freeze(
      lineNumber !== undefined ? { kind, text, lineNumber } : { kind, text }
    );
    this.lines.push(line);
    return line;
  }

  get length(): number {
    return this.lines.length;
  }

  at(index: number): HeaderLine | undefined {
    return this.lines.at(index);
  }

  tracks(): readonly HeaderLine[] {
    return this.lines.filter((line) => line.kind === "track");
  }

  /**
   * Attribute view of the index-th track line, parsed on first access
   *
   * @example
   * ```typescript
   * headers.track(0)?.get("name"); // "My Track" for: track name="My Track"
   * ```
   */
  track(index: number): AttributeMap | undefined {
    const line = this.tracks()[index];
    return line === undefined ? undefined : this.attributesOf(line);
  }

  /**
   * Attributes of a track line; other header kinds have none
   */
  attributesOf(line: HeaderLine): AttributeMap {
    if (line.kind !== "track") {
      return AttributeMap.empty(TRACK_ATTRIBUTE_SYNTAX);
    }
    let attributes = this.trackAttributes.get(line);
    if (attributes === undefined) {
      attributes = AttributeMap.parse(line.text.slice("track".length), TRACK_ATTRIBUTE_SYNTAX);
      this.trackAttributes.set(line, attributes);
    }
    return attributes;
  }

  [Symbol.iterator](): Iterator<HeaderLine> {
    return this.lines.slice()[Symbol.iterator]();
  }
}
