/**
 * Field coercion and the declarative column-schema table
 *
 * One generic routine (`readColumn`) turns raw column text into a typed
 * value using a column spec: name, index, semantic kind and the coercer to
 * apply. Coercion never clamps; range rules belong to the record builders.
 *
 * @module formats/fields
 */

import type { DefectKind, FieldDefect } from "../diagnostics";
import type { Rgb } from "../types";

// =============================================================================
// FIELD KINDS
// =============================================================================

export type FieldKind =
  | { readonly type: "integer" }
  | { readonly type: "float" }
  | { readonly type: "string" }
  | { readonly type: "rgb" }
  | { readonly type: "integerList" }
  | EnumKind<string>;

export interface EnumKind<T extends string> {
  readonly type: "enum";
  readonly values: readonly T[];
  /** Value substituted for unrecognized text; without one, unrecognized text fails */
  readonly fallback?: T;
}

/**
 * Result of coercing one field. A successful result may still carry a
 * warning when the value was substituted rather than parsed.
 */
export type CoercionResult<T> =
  | { readonly ok: true; readonly value: T; readonly warning?: FieldDefect }
  | { readonly ok: false; readonly defect: FieldDefect };

export const NEUTRAL_RGB: Rgb = Object.freeze({ r: 0, g: 0, b: 0 });

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const RGB_TRIPLET_PATTERN = /^(-?\d+),(-?\d+),(-?\d+)$/;
const RGB_HEX_PATTERN = /^#([0-9a-fA-F]{2})([0-9a-fA-F]{2})([0-9a-fA-F]{2})$/;

function fail(kind: DefectKind, message: string): { readonly ok: false; readonly defect: FieldDefect } {
  return { ok: false, defect: { kind, message } };
}

// =============================================================================
// COERCERS
// =============================================================================

export function coerceInteger(raw: string): CoercionResult<number> {
  const text = raw.trim();
  if (!INTEGER_PATTERN.test(text)) {
    return fail("NotNumeric", `'${raw}' is not an integer`);
  }
  const value = Number(text);
  if (!Number.isSafeInteger(value)) {
    return fail("NotNumeric", `'${raw}' is outside the safe integer range`);
  }
  return { ok: true, value };
}

export function coerceFloat(raw: string): CoercionResult<number> {
  const text = raw.trim();
  if (!FLOAT_PATTERN.test(text)) {
    return fail("NotNumeric", `'${raw}' is not a number`);
  }
  const value = Number(text);
  if (!Number.isFinite(value)) {
    return fail("NotNumeric", `'${raw}' is not a finite number`);
  }
  return { ok: true, value };
}

export function coerceString(raw: string): CoercionResult<string> {
  return { ok: true, value: raw };
}

/**
 * Match text against an enumeration. Unrecognized text maps to the
 * fallback with an UnrecognizedEnum warning, or fails when there is none.
 */
export function coerceEnum<T extends string>(raw: string, kind: EnumKind<T>): CoercionResult<T> {
  const match = kind.values.find((value) => value === raw);
  if (match !== undefined) {
    return { ok: true, value: match };
  }

  const message = `'${raw}' is not one of ${kind.values.map((v) => `'${v}'`).join(", ")}`;
  if (kind.fallback !== undefined) {
    return {
      ok: true,
      value: kind.fallback,
      warning: { kind: "UnrecognizedEnum", message: `${message}; using '${kind.fallback}'` },
    };
  }
  return fail("UnrecognizedEnum", message);
}

/**
 * Parse `r,g,b` or `#rrggbb`. The single value `0` is the BED convention
 * for "no colour". Anything else yields the neutral colour with a warning.
 * Channels are returned unclamped.
 */
export function coerceRgb(raw: string): CoercionResult<Rgb> {
  const text = raw.trim();

  if (text === "0") {
    return { ok: true, value: NEUTRAL_RGB };
  }

  const triplet = RGB_TRIPLET_PATTERN.exec(text.replace(/\s+/g, ""));
  if (triplet) {
    return {
      ok: true,
      value: { r: Number(triplet[1]), g: Number(triplet[2]), b: Number(triplet[3]) },
    };
  }

  const hex = RGB_HEX_PATTERN.exec(text);
  if (hex) {
    return {
      ok: true,
      value: {
        r: parseInt(hex[1] ?? "0", 16),
        g: parseInt(hex[2] ?? "0", 16),
        b: parseInt(hex[3] ?? "0", 16),
      },
    };
  }

  return {
    ok: true,
    value: NEUTRAL_RGB,
    warning: {
      kind: "NotNumeric",
      message: `'${raw}' is not an RGB colour; using 0,0,0`,
    },
  };
}

/**
 * Parse a comma-separated integer list; one trailing comma is tolerated
 */
export function coerceIntegerList(raw: string): CoercionResult<number[]> {
  const text = raw.trim();
  if (text === "") {
    return { ok: true, value: [] };
  }

  const parts = text.endsWith(",") ? text.slice(0, -1).split(",") : text.split(",");
  const values: number[] = [];
  for (const part of parts) {
    const result = coerceInteger(part);
    if (!result.ok) {
      return fail("NotNumeric", `'${raw}' is not a comma-separated integer list`);
    }
    values.push(result.value);
  }
  return { ok: true, value: values };
}

export type FieldValue = number | string | Rgb | number[];

/**
 * Coerce raw text according to a declared field kind
 */
export function coerce(raw: string, kind: { readonly type: "integer" | "float" }): CoercionResult<number>;
export function coerce(raw: string, kind: { readonly type: "string" }): CoercionResult<string>;
export function coerce(raw: string, kind: { readonly type: "rgb" }): CoercionResult<Rgb>;
export function coerce(raw: string, kind: { readonly type: "integerList" }): CoercionResult<number[]>;
export function coerce<T extends string>(raw: string, kind: EnumKind<T>): CoercionResult<T>;
export function coerce(raw: string, kind: FieldKind): CoercionResult<FieldValue>;
export function coerce(raw: string, kind: FieldKind): CoercionResult<FieldValue> {
  switch (kind.type) {
    case "integer":
      return coerceInteger(raw);
    case "float":
      return coerceFloat(raw);
    case "string":
      return coerceString(raw);
    case "rgb":
      return coerceRgb(raw);
    case "integerList":
      return coerceIntegerList(raw);
    case "enum":
      return coerceEnum(raw, kind);
  }
}

// =============================================================================
// COLUMN SCHEMA
// =============================================================================

/**
 * One row of a format's column-schema table
 */
export interface ColumnSpec<T> {
  readonly name: string;
  readonly index: number;
  readonly kind: FieldKind;
  /** Text that means "no value" for this column (e.g. `.`) */
  readonly absentTokens: readonly string[];
  readonly coerce: (raw: string) => CoercionResult<T>;
}

export type ColumnRead<T> =
  | { readonly status: "absent" }
  | { readonly status: "present"; readonly value: T; readonly warning?: FieldDefect }
  | { readonly status: "invalid"; readonly raw: string; readonly defect: FieldDefect };

/**
 * Read one column from a split line using its schema entry
 */
export function readColumn<T>(fields: readonly string[], spec: ColumnSpec<T>): ColumnRead<T> {
  const raw = fields[spec.index];
  if (raw === undefined || spec.absentTokens.includes(raw)) {
    return { status: "absent" };
  }

  const result = spec.coerce(raw);
  if (!result.ok) {
    return {
      status: "invalid",
      raw,
      defect: { ...result.defect, field: spec.name },
    };
  }
  return result.warning
    ? { status: "present", value: result.value, warning: { ...result.warning, field: spec.name } }
    : { status: "present", value: result.value };
}

// Column constructors keep the schema tables declarative

export function integerColumn(name: string, index: number, absentTokens: readonly string[] = []): ColumnSpec<number> {
  return { name, index, kind: { type: "integer" }, absentTokens, coerce: coerceInteger };
}

export function floatColumn(name: string, index: number, absentTokens: readonly string[] = []): ColumnSpec<number> {
  return { name, index, kind: { type: "float" }, absentTokens, coerce: coerceFloat };
}

export function stringColumn(name: string, index: number, absentTokens: readonly string[] = []): ColumnSpec<string> {
  return { name, index, kind: { type: "string" }, absentTokens, coerce: coerceString };
}

export function rgbColumn(name: string, index: number, absentTokens: readonly string[] = []): ColumnSpec<Rgb> {
  return { name, index, kind: { type: "rgb" }, absentTokens, coerce: coerceRgb };
}

export function integerListColumn(name: string, index: number, absentTokens: readonly string[] = []): ColumnSpec<number[]> {
  return { name, index, kind: { type: "integerList" }, absentTokens, coerce: coerceIntegerList };
}

export function enumColumn<T extends string>(
  name: string,
  index: number,
  kind: EnumKind<T>,
  absentTokens: readonly string[] = []
): ColumnSpec<T> {
  return { name, index, kind, absentTokens, coerce: (raw) => coerceEnum(raw, kind) };
}

// =============================================================================
// RANGE HELPERS
// =============================================================================

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function clampRgb(rgb: Rgb): Rgb {
  return { r: clamp(rgb.r, 0, 255), g: clamp(rgb.g, 0, 255), b: clamp(rgb.b, 0, 255) };
}

export function formatRgb(rgb: Rgb): string {
  return `${rgb.r},${rgb.g},${rgb.b}`;
}
