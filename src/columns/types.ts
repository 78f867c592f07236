/** Parsed `settings_str` of a column; shape depends on the column type. */
export type ColumnSettings = Record<string, unknown>;

export interface ColumnDefinition {
  id: string;
  title: string;
  type: string;
  settings: ColumnSettings;
  description?: string | null;
  archived?: boolean;
  width?: number | null;
}

/** A cell as read from the API: `value` is the raw JSON string monday stores. */
export interface ColumnCell {
  id: string;
  type?: string | null;
  text: string | null;
  value: string | null;
  display_value?: string | null;
}

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

/** What gets serialized into `column_values` for a mutation. */
export type WireValue = JsonValue;

/** Simplified value for tool and resource output; `null` marks an unset column. */
export type DisplayValue = JsonValue;

export interface ValidationFailure {
  field: string;
  title?: string;
  value: unknown;
  reason: string;
  suggestions?: string[];
}

export type ValidationResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ValidationFailure };

export type Validator<T> = (column: ColumnDefinition, raw: unknown) => ValidationResult<T>;

export type ValidationRules = Record<string, JsonValue>;

export interface ColumnHandler {
  /** Handler identity, e.g. `status` */
  readonly name: string;
  readonly family: 'basic' | 'advanced' | 'generic';
  readonly writable: boolean;
  toWire(column: ColumnDefinition, raw: unknown): ValidationResult<WireValue>;
  fromWire(column: ColumnDefinition, cell: ColumnCell): DisplayValue;
  rules(column: ColumnDefinition): ValidationRules;
}

export function ok<T>(value: T): ValidationResult<T> {
  return { ok: true, value };
}

export function fail<T = never>(
  column: ColumnDefinition,
  value: unknown,
  reason: string,
  suggestions?: string[]
): ValidationResult<T> {
  const error: ValidationFailure = { field: column.id, title: column.title, value, reason };
  if (suggestions && suggestions.length > 0) {
    error.suggestions = suggestions;
  }
  return { ok: false, error };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse the raw JSON `value` of a cell. Returns undefined for empty cells or
 * unparseable payloads.
 */
export function parseCellValue(cell: ColumnCell): unknown {
  if (cell.value === null || cell.value === '') return undefined;
  try {
    const parsed: unknown = JSON.parse(cell.value);
    return parsed ?? undefined;
  } catch {
    return undefined;
  }
}
