import { ColumnHandler, ValidationResult, WireValue } from './types.js';
import { cellText } from './handler.js';
import { validateGeneric } from './validators.js';
import { BASIC_HANDLERS } from './handlers-basic.js';
import { ADVANCED_HANDLERS } from './handlers-advanced.js';

/** Type ids monday reports for legacy or renamed column types. */
export const COLUMN_TYPE_ALIASES: Readonly<Record<string, string>> = {
  numeric: 'numbers',
  color: 'status',
  boolean: 'checkbox',
  'long-text': 'long_text',
  timerange: 'timeline',
  duration: 'time_tracking',
  tag: 'tags',
  timezone: 'world_clock',
  lookup: 'mirror',
  votes: 'vote',
  autonumber: 'auto_number',
  'pulse-id': 'item_id',
  'pulse-log': 'creation_log',
  'pulse-updated': 'last_updated',
  'multiple-person': 'people',
  connect_boards: 'board_relation',
  'board-relation': 'board_relation',
};

export const COLUMN_TYPE_HANDLERS: Readonly<Record<string, ColumnHandler>> = {
  ...BASIC_HANDLERS,
  ...ADVANCED_HANDLERS,
};

/**
 * Fallback for column types with no dedicated handler: any non-empty scalar is
 * sent as a string and the cell text is shown on reads.
 */
export const PASSTHROUGH_HANDLER: ColumnHandler = {
  name: 'passthrough',
  family: 'generic',
  writable: true,
  toWire(column, raw): ValidationResult<WireValue> {
    return validateGeneric(column, raw);
  },
  fromWire(_column, cell) {
    return cellText(cell);
  },
  rules(column) {
    return { type: column.type, writable: true, strict: false };
  },
};

export function normalizeColumnType(type: string): string {
  return COLUMN_TYPE_ALIASES[type] ?? type;
}

export interface ResolvedHandler {
  handler: ColumnHandler;
  /** false when the type fell back to the passthrough handler */
  strict: boolean;
}

export function getColumnHandler(type: string): ResolvedHandler {
  const canonical = normalizeColumnType(type);
  return Object.hasOwn(COLUMN_TYPE_HANDLERS, canonical)
    ? { handler: COLUMN_TYPE_HANDLERS[canonical], strict: true }
    : { handler: PASSTHROUGH_HANDLER, strict: false };
}

export interface ColumnTypeInfo {
  type: string;
  handler: string;
  family: ColumnHandler['family'];
  writable: boolean;
}

/** Every type tag the registry understands, aliases included. */
export function listColumnTypes(): ColumnTypeInfo[] {
  const tags = [...Object.keys(COLUMN_TYPE_HANDLERS), ...Object.keys(COLUMN_TYPE_ALIASES)];
  return tags
    .map((type) => {
      const { handler } = getColumnHandler(type);
      return { type, handler: handler.name, family: handler.family, writable: handler.writable };
    })
    .sort((a, b) => a.type.localeCompare(b.type));
}
