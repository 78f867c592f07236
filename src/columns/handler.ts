import {
  ColumnCell,
  ColumnDefinition,
  ColumnHandler,
  DisplayValue,
  ValidationRules,
  Validator,
  WireValue,
  fail,
  ok,
  parseCellValue,
} from './types.js';

export interface HandlerSpec<T> {
  name: string;
  family: ColumnHandler['family'];
  validate: Validator<T>;
  encode(value: T, column: ColumnDefinition): WireValue;
  /** `parsed` is the cell's JSON value, undefined when the cell is empty */
  decode(parsed: unknown, cell: ColumnCell, column: ColumnDefinition): DisplayValue;
  rules?(column: ColumnDefinition): ValidationRules;
}

/** Composes validate → encode for writes and decode for reads into a handler. */
export function defineHandler<T>(spec: HandlerSpec<T>): ColumnHandler {
  return {
    name: spec.name,
    family: spec.family,
    writable: true,
    toWire(column, raw) {
      const result = spec.validate(column, raw);
      if (!result.ok) return result;
      return ok(spec.encode(result.value, column));
    },
    fromWire(column, cell) {
      return spec.decode(parseCellValue(cell), cell, column);
    },
    rules(column) {
      return { type: spec.name, writable: true, ...(spec.rules?.(column) ?? {}) };
    },
  };
}

/** Cell text, or null for an empty cell. */
export function cellText(cell: ColumnCell): string | null {
  return cell.text !== null && cell.text !== '' ? cell.text : null;
}

/**
 * Columns whose value monday computes or manages itself. Writes are rejected
 * before any request is made; reads show the rendered text.
 */
export function readOnlyHandler(name: string, reason: string): ColumnHandler {
  return {
    name,
    family: 'advanced',
    writable: false,
    toWire(column: ColumnDefinition, raw: unknown) {
      return fail(column, raw, `Column "${column.title}" is read-only: ${reason}`);
    },
    fromWire(_column, cell) {
      const display = cell.display_value;
      return display !== undefined && display !== null && display !== '' ? display : cellText(cell);
    },
    rules() {
      return { type: name, writable: false, reason };
    },
  };
}
