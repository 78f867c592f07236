import type { z } from 'zod';
import { BoardCache } from './cache.js';
import { MondayError, MondayErrorType, MondayGateway } from './monday-client.js';
import { logger } from './logging/index.js';
import { BoardError, NotFoundError, UpstreamError, ValidationError, describePayloadShape } from './errors.js';
import { getColumnHandler, normalizeColumnType } from './columns/registry.js';
import { suggestOptions } from './columns/suggest.js';
import { validateCheckbox, validateDate } from './columns/validators.js';
import type { ColumnCell, ColumnDefinition, DisplayValue, ValidationFailure, WireValue } from './columns/types.js';
import {
  BOARD_ITEMS_FALLBACK_QUERY,
  BOARD_ITEMS_QUERY,
  BOARD_METADATA_FALLBACK_QUERY,
  BOARD_METADATA_QUERY,
  BOARD_SCHEMA_FALLBACK_QUERY,
  BOARD_SCHEMA_QUERY,
  CREATE_ITEM_MUTATION,
  DELETE_ITEM_MUTATION,
  GraphQLOperation,
  ITEM_FALLBACK_QUERY,
  ITEM_QUERY,
  NEXT_ITEMS_QUERY,
  UPDATE_ITEM_MUTATION,
} from './queries.js';
import {
  BoardItem,
  BoardItemsResponseSchema,
  BoardMetadata,
  BoardSchema,
  BoardsResponseSchema,
  CreateItemResponseSchema,
  DeleteItemResponseSchema,
  ItemRecord,
  ItemsResponseSchema,
  NextItemsResponseSchema,
  UpdateItemResponseSchema,
  parseUpstream,
  pickBoard,
  toBoardItem,
  toBoardMetadata,
  toBoardSchema,
} from './monday-types.js';

// ============================================
// READ STRATEGIES
// ============================================

export interface ReadStrategy<T> {
  name: string;
  /** Variables of the primary request, reported as a shape when the read fails */
  variables?: Record<string, unknown>;
  primary(signal?: AbortSignal): Promise<T>;
  fallback?(signal?: AbortSignal): Promise<T>;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Failures where a smaller query cannot help. */
function isTerminal(error: unknown): boolean {
  if (error instanceof NotFoundError) return true;
  return error instanceof MondayError && [
    MondayErrorType.ABORTED,
    MondayErrorType.AUTH_ERROR,
    MondayErrorType.PERMISSION_ERROR,
  ].includes(error.type);
}

export function toUpstreamError(
  operation: string,
  error: unknown,
  variables: Record<string, unknown> = {}
): BoardError {
  if (error instanceof BoardError) return error;
  const shape = describePayloadShape(variables);
  if (error instanceof MondayError) {
    return new UpstreamError(operation, error.type, error.message, shape, {
      cause: error,
      hint: error.hint,
      status: error.status,
    });
  }
  return new UpstreamError(operation, 'UNKNOWN', errorMessage(error), shape, { cause: error });
}

/**
 * Run the primary read; on failure run the fallback once. When both fail the
 * UpstreamError carries both messages.
 */
export async function runWithFallback<T>(strategy: ReadStrategy<T>, signal?: AbortSignal): Promise<T> {
  try {
    return await strategy.primary(signal);
  } catch (primaryError) {
    if (!strategy.fallback || isTerminal(primaryError)) {
      throw toUpstreamError(strategy.name, primaryError, strategy.variables);
    }

    logger.warning('Primary query failed, using fallback', {
      operation: strategy.name,
      error: errorMessage(primaryError),
    }, 'board-operations');

    try {
      return await strategy.fallback(signal);
    } catch (fallbackError) {
      if (fallbackError instanceof NotFoundError) throw fallbackError;
      const type = fallbackError instanceof MondayError ? fallbackError.type : 'UNKNOWN';
      throw new UpstreamError(
        strategy.name,
        type,
        `primary: ${errorMessage(primaryError)}; fallback: ${errorMessage(fallbackError)}`,
        describePayloadShape(strategy.variables ?? {}),
        { cause: fallbackError, hint: fallbackError instanceof MondayError ? fallbackError.hint : undefined }
      );
    }
  }
}

// ============================================
// RESULT SHAPES
// ============================================

export interface DisplayItem {
  id: string;
  name: string;
  group: { id: string; title: string | null } | null;
  created_at: string | null;
  updated_at: string | null;
  /** Keyed by column id; null marks an unset column */
  values: Record<string, DisplayValue>;
}

export interface PreparedValues {
  wire: Record<string, WireValue>;
  /** Columns sent through the passthrough handler */
  unvalidated: string[];
}

export interface FieldCheck {
  field: string;
  title?: string;
  type?: string;
  ok: boolean;
  strict?: boolean;
  wire_value?: WireValue;
  reason?: string;
  suggestions?: string[];
}

export interface CreateResult {
  id: string;
  name: string;
  group_id: string | null;
  column_values: Record<string, WireValue>;
  unvalidated_fields: string[];
}

export interface UpdateResult {
  id: string;
  updated_columns: string[];
  column_values: Record<string, WireValue>;
  unvalidated_fields: string[];
}

export interface DeleteReport {
  matched: number;
  deleted: { id: string; name: string }[];
  failed: { id: string; name: string; error: string }[];
}

export interface BoardOperationsOptions {
  /** Upper bound on items read from the board */
  maxItems?: number;
  pageSize?: number;
}

const ITEM_NAME_FIELD = 'name';
const ITEM_ID_PATTERN = /^\d+$/;

export function toDisplayItem(columns: ColumnDefinition[], item: BoardItem): DisplayItem {
  const values: Record<string, DisplayValue> = {};
  for (const column of columns) {
    if (normalizeColumnType(column.type) === 'name') continue;
    const cell = item.columnValues[column.id];
    values[column.id] = cell ? getColumnHandler(column.type).handler.fromWire(column, cell) : null;
  }

  return {
    id: item.id,
    name: item.name,
    group: item.groupId ? { id: item.groupId, title: item.groupTitle } : null,
    created_at: item.createdAt,
    updated_at: item.updatedAt,
    values,
  };
}

/** By id, then exact title, then case-insensitive title. */
export function resolveColumn(columns: ColumnDefinition[], ref: string): ColumnDefinition | undefined {
  const lowered = ref.toLowerCase();
  return columns.find((c) => c.id === ref)
    ?? columns.find((c) => c.title === ref)
    ?? columns.find((c) => c.title.toLowerCase() === lowered);
}

function knownColumns(columns: ColumnDefinition[]): string[] {
  return columns.map((c) => `${c.id} (${c.title})`);
}

/** Searchable fields: every column plus the item name, listed once. */
function knownFields(columns: ColumnDefinition[]): string[] {
  const listed = knownColumns(columns);
  return columns.some((c) => c.id === ITEM_NAME_FIELD) ? listed : [ITEM_NAME_FIELD, ...listed];
}

function searchText(value: unknown): string {
  return typeof value === 'string' ? value.trim() : String(value);
}

/** Type-aware comparison of a searched value with one cell. */
export function cellMatches(column: ColumnDefinition, cell: ColumnCell | undefined, value: unknown): boolean {
  const needle = searchText(value);
  if (!cell || needle === '') return false;
  if (cell.text !== null && cell.text === needle) return true;

  const display = getColumnHandler(column.type).handler.fromWire(column, cell);

  switch (normalizeColumnType(column.type)) {
    case 'status':
      return display === needle;
    case 'dropdown':
      return Array.isArray(display) && display.includes(needle);
    case 'numbers': {
      const target = typeof value === 'number' ? value : Number(needle);
      return needle !== '' && typeof display === 'number' && display === target;
    }
    case 'checkbox': {
      const parsed = validateCheckbox(column, value);
      return parsed.ok && display === parsed.value;
    }
    case 'date': {
      const parsed = validateDate(column, value);
      return parsed.ok && typeof display === 'string' && display.slice(0, 10) === parsed.value.date;
    }
    default:
      return typeof display === 'string' && display === needle;
  }
}

// ============================================
// BOARD OPERATIONS
// ============================================

export class BoardOperations {
  private maxItems: number;
  private pageSize: number;

  constructor(
    private gateway: MondayGateway,
    private cache: BoardCache,
    readonly boardId: string,
    options: BoardOperationsOptions = {}
  ) {
    this.maxItems = options.maxItems ?? 500;
    this.pageSize = Math.min(options.pageSize ?? 100, this.maxItems);
  }

  /**
   * Send a mutation and parse its payload. Item caches are dropped whatever
   * the outcome, since a failed response may still have been applied.
   */
  private async mutate<T>(
    operation: GraphQLOperation,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    variables: Record<string, unknown>,
    signal?: AbortSignal
  ): Promise<T> {
    try {
      const data = await this.gateway.execute(operation, variables, signal);
      return parseUpstream(schema, data, operation.name);
    } catch (error) {
      throw toUpstreamError(operation.name, error, variables);
    } finally {
      this.cache.invalidateItems();
    }
  }

  private boardVariables(): Record<string, unknown> {
    return { boardIds: [this.boardId] };
  }

  // ============================================
  // READS
  // ============================================

  schemaStrategy(): ReadStrategy<BoardSchema> {
    const load = async (operation: GraphQLOperation, signal?: AbortSignal) => {
      const data = await this.gateway.execute(operation, this.boardVariables(), signal);
      const { boards } = parseUpstream(BoardsResponseSchema, data, operation.name);
      return toBoardSchema(pickBoard(boards, this.boardId));
    };
    return {
      name: 'get_board_schema',
      variables: this.boardVariables(),
      primary: (signal) => load(BOARD_SCHEMA_QUERY, signal),
      fallback: (signal) => load(BOARD_SCHEMA_FALLBACK_QUERY, signal),
    };
  }

  async getSchema(signal?: AbortSignal): Promise<BoardSchema> {
    return this.cache.schema.getOrFetch(this.boardId, () => runWithFallback(this.schemaStrategy(), signal));
  }

  async getColumns(signal?: AbortSignal): Promise<ColumnDefinition[]> {
    return (await this.getSchema(signal)).columns;
  }

  async getColumn(columnId: string, signal?: AbortSignal): Promise<ColumnDefinition> {
    const { columns } = await this.getSchema(signal);
    const column = resolveColumn(columns, columnId);
    if (!column) {
      throw new NotFoundError('column', columnId, columns.map((c) => c.id));
    }
    return column;
  }

  metadataStrategy(): ReadStrategy<BoardMetadata> {
    const load = async (operation: GraphQLOperation, signal?: AbortSignal) => {
      const data = await this.gateway.execute(operation, this.boardVariables(), signal);
      const { boards } = parseUpstream(BoardsResponseSchema, data, operation.name);
      return toBoardMetadata(pickBoard(boards, this.boardId));
    };
    return {
      name: 'get_board_metadata',
      variables: this.boardVariables(),
      primary: (signal) => load(BOARD_METADATA_QUERY, signal),
      fallback: (signal) => load(BOARD_METADATA_FALLBACK_QUERY, signal),
    };
  }

  async getMetadata(signal?: AbortSignal): Promise<BoardMetadata> {
    return this.cache.metadata.getOrFetch(this.boardId, () => runWithFallback(this.metadataStrategy(), signal));
  }

  itemsStrategy(): ReadStrategy<BoardItem[]> {
    return {
      name: 'get_board_items',
      variables: { ...this.boardVariables(), limit: this.pageSize },
      primary: async (signal) => {
        const first = await this.gateway.execute(
          BOARD_ITEMS_QUERY,
          { ...this.boardVariables(), limit: this.pageSize },
          signal
        );
        const { boards } = parseUpstream(BoardItemsResponseSchema, first, BOARD_ITEMS_QUERY.name);
        const [board] = boards ?? [];
        if (!board) {
          throw new NotFoundError('board', this.boardId);
        }

        const records: ItemRecord[] = [...board.items_page.items];
        let cursor = board.items_page.cursor;

        while (cursor && records.length < this.maxItems) {
          const next = await this.gateway.execute(NEXT_ITEMS_QUERY, { cursor, limit: this.pageSize }, signal);
          const page = parseUpstream(NextItemsResponseSchema, next, NEXT_ITEMS_QUERY.name).next_items_page;
          records.push(...page.items);
          cursor = page.cursor;
        }

        return records.slice(0, this.maxItems).map(toBoardItem);
      },
      fallback: async (signal) => {
        const data = await this.gateway.execute(
          BOARD_ITEMS_FALLBACK_QUERY,
          { ...this.boardVariables(), limit: this.maxItems },
          signal
        );
        const { boards } = parseUpstream(BoardItemsResponseSchema, data, BOARD_ITEMS_FALLBACK_QUERY.name);
        const [board] = boards ?? [];
        if (!board) {
          throw new NotFoundError('board', this.boardId);
        }
        return board.items_page.items.slice(0, this.maxItems).map(toBoardItem);
      },
    };
  }

  async getItems(signal?: AbortSignal): Promise<BoardItem[]> {
    return this.cache.items.getOrFetch(this.boardId, () => runWithFallback(this.itemsStrategy(), signal));
  }

  async getDisplayItems(signal?: AbortSignal): Promise<DisplayItem[]> {
    const [schema, items] = await Promise.all([this.getSchema(signal), this.getItems(signal)]);
    return items.map((item) => toDisplayItem(schema.columns, item));
  }

  itemStrategy(itemId: string): ReadStrategy<BoardItem> {
    const load = async (operation: GraphQLOperation, signal?: AbortSignal) => {
      const data = await this.gateway.execute(operation, { itemIds: [itemId] }, signal);
      const { items } = parseUpstream(ItemsResponseSchema, data, operation.name);
      const record = items?.find((item) => item.id === itemId);
      // items(ids:) is account-wide; only items of this board are visible
      if (!record || (record.board && record.board.id !== this.boardId)) {
        throw new NotFoundError('item', itemId);
      }
      return toBoardItem(record);
    };
    return {
      name: 'get_item',
      variables: { itemIds: [itemId] },
      primary: (signal) => load(ITEM_QUERY, signal),
      fallback: (signal) => load(ITEM_FALLBACK_QUERY, signal),
    };
  }

  async getItem(itemId: string, signal?: AbortSignal): Promise<BoardItem> {
    if (!ITEM_ID_PATTERN.test(itemId)) {
      throw new NotFoundError('item', itemId);
    }
    return this.cache.item.getOrFetch(itemId, () => runWithFallback(this.itemStrategy(itemId), signal));
  }

  async getBoardData(signal?: AbortSignal): Promise<{ schema: BoardSchema; items: DisplayItem[] }> {
    const [schema, items] = await Promise.all([this.getSchema(signal), this.getItems(signal)]);
    return { schema, items: items.map((item) => toDisplayItem(schema.columns, item)) };
  }

  // ============================================
  // SEARCH
  // ============================================

  async searchItems(field: string, value: unknown, signal?: AbortSignal): Promise<BoardItem[]> {
    const schema = await this.getSchema(signal);
    const column = resolveColumn(schema.columns, field);
    if (!column && field.toLowerCase() !== ITEM_NAME_FIELD) {
      throw new NotFoundError('field', field, knownFields(schema.columns));
    }

    // a blank value matches nothing
    const needle = searchText(value);
    if (needle === '') return [];

    const items = await this.getItems(signal);
    if (!column || normalizeColumnType(column.type) === 'name') {
      return items.filter((item) => item.name === needle);
    }
    return items.filter((item) => cellMatches(column, item.columnValues[column.id], value));
  }

  // ============================================
  // VALIDATION
  // ============================================

  /** Resolve and normalize every value; throws on the first invalid one. */
  prepareColumnValues(columns: ColumnDefinition[], values: Record<string, unknown>): PreparedValues {
    const wire: Record<string, WireValue> = {};
    const unvalidated: string[] = [];

    for (const [ref, raw] of Object.entries(values)) {
      const column = resolveColumn(columns, ref);
      if (!column) {
        throw new NotFoundError('column', ref, knownColumns(columns));
      }

      const { handler, strict } = getColumnHandler(column.type);
      const result = handler.toWire(column, raw);
      if (!result.ok) {
        throw new ValidationError([result.error]);
      }

      wire[column.id] = result.value;
      if (!strict) unvalidated.push(column.id);
    }

    return { wire, unvalidated };
  }

  /** Dry run over every value; nothing is sent. */
  async validateColumnValues(
    values: Record<string, unknown>,
    signal?: AbortSignal
  ): Promise<{ valid: boolean; results: FieldCheck[] }> {
    const { columns } = await this.getSchema(signal);
    const titles = columns.map((c) => c.title);

    const results = Object.entries(values).map(([ref, raw]): FieldCheck => {
      const column = resolveColumn(columns, ref);
      if (!column) {
        return { field: ref, ok: false, reason: `Unknown column: ${ref}`, suggestions: suggestOptions(ref, titles) };
      }

      const { handler, strict } = getColumnHandler(column.type);
      const result = handler.toWire(column, raw);
      const base = { field: column.id, title: column.title, type: column.type, strict };
      if (result.ok) {
        return { ...base, ok: true, wire_value: result.value };
      }
      return result.error.suggestions
        ? { ...base, ok: false, reason: result.error.reason, suggestions: result.error.suggestions }
        : { ...base, ok: false, reason: result.error.reason };
    });

    return { valid: results.every((r) => r.ok), results };
  }

  // ============================================
  // WRITES
  // ============================================

  async createItem(
    name: string,
    columnValues: Record<string, unknown> = {},
    groupId?: string,
    signal?: AbortSignal
  ): Promise<CreateResult> {
    const itemName = name.trim();
    if (!itemName) {
      const failure: ValidationFailure = { field: ITEM_NAME_FIELD, value: name, reason: 'Item name cannot be empty' };
      throw new ValidationError([failure]);
    }

    const schema = await this.getSchema(signal);
    const prepared = this.prepareColumnValues(schema.columns, columnValues);

    let targetGroup: string | null = null;
    if (groupId !== undefined) {
      const group = schema.groups.find((g) => g.id === groupId) ?? schema.groups.find((g) => g.title === groupId);
      if (!group) {
        throw new NotFoundError('group', groupId, schema.groups.map((g) => g.id));
      }
      targetGroup = group.id;
    } else {
      targetGroup = schema.groups[0]?.id ?? null;
    }

    const variables: Record<string, unknown> = {
      boardId: this.boardId,
      itemName,
      columnValues: JSON.stringify(prepared.wire),
    };
    if (targetGroup) variables.groupId = targetGroup;

    const { create_item: created } = await this.mutate(CREATE_ITEM_MUTATION, CreateItemResponseSchema, variables, signal);

    logger.info('Item created', { item_id: created.id, group_id: targetGroup }, 'board-operations');

    return {
      id: created.id,
      name: created.name ?? itemName,
      group_id: targetGroup,
      column_values: prepared.wire,
      unvalidated_fields: prepared.unvalidated,
    };
  }

  async updateItem(
    itemId: string,
    columnValues: Record<string, unknown>,
    signal?: AbortSignal
  ): Promise<UpdateResult> {
    if (!ITEM_ID_PATTERN.test(itemId)) {
      throw new NotFoundError('item', itemId);
    }
    if (Object.keys(columnValues).length === 0) {
      throw new ValidationError([{ field: 'column_values', value: columnValues, reason: 'Provide at least one column value' }]);
    }

    const schema = await this.getSchema(signal);
    const prepared = this.prepareColumnValues(schema.columns, columnValues);

    const variables: Record<string, unknown> = {
      boardId: this.boardId,
      itemId,
      columnValues: JSON.stringify(prepared.wire),
    };

    let updated: { id: string } | null;
    try {
      ({ change_multiple_column_values: updated } = await this.mutate(
        UPDATE_ITEM_MUTATION,
        UpdateItemResponseSchema,
        variables,
        signal
      ));
    } catch (error) {
      if (error instanceof UpstreamError && error.upstreamType === MondayErrorType.NOT_FOUND) {
        throw new NotFoundError('item', itemId);
      }
      throw error;
    }
    if (!updated) {
      throw new NotFoundError('item', itemId);
    }

    logger.info('Item updated', { item_id: itemId, columns: Object.keys(prepared.wire) }, 'board-operations');

    return {
      id: itemId,
      updated_columns: Object.keys(prepared.wire),
      column_values: prepared.wire,
      unvalidated_fields: prepared.unvalidated,
    };
  }

  /** Delete every item matching the search. Individual failures are reported, never thrown. */
  async deleteItems(field: string, value: unknown, signal?: AbortSignal): Promise<DeleteReport> {
    const matches = await this.searchItems(field, value, signal);

    const outcomes = await Promise.allSettled(
      matches.map(async (item) => {
        const data = await this.gateway.execute(DELETE_ITEM_MUTATION, { itemId: item.id }, signal);
        const deleted = parseUpstream(DeleteItemResponseSchema, data, DELETE_ITEM_MUTATION.name).delete_item;
        if (!deleted) {
          throw new NotFoundError('item', item.id);
        }
        return item;
      })
    );

    const report: DeleteReport = { matched: matches.length, deleted: [], failed: [] };
    outcomes.forEach((outcome, index) => {
      const item = matches[index];
      if (outcome.status === 'fulfilled') {
        report.deleted.push({ id: item.id, name: item.name });
      } else {
        report.failed.push({ id: item.id, name: item.name, error: errorMessage(outcome.reason) });
      }
    });

    if (matches.length > 0) {
      this.cache.invalidateItems();
    }

    logger.info('Items deleted', {
      field,
      matched: report.matched,
      deleted: report.deleted.length,
      failed: report.failed.length,
    }, 'board-operations');

    return report;
  }
}
