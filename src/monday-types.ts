import { z } from 'zod';
import type { ColumnCell, ColumnDefinition, ColumnSettings } from './columns/types.js';
import { isRecord } from './columns/types.js';
import { NotFoundError, UpstreamError } from './errors.js';

// ============================================
// UPSTREAM RECORDS (GraphQL `data`)
// ============================================

const IdSchema = z.union([z.string(), z.number()]).transform(String);

const UserRecordSchema = z.object({
  id: IdSchema,
  name: z.string(),
  email: z.string().nullish(),
});

const TagRecordSchema = z.object({
  id: IdSchema,
  name: z.string(),
  color: z.string().nullish(),
});

const GroupRecordSchema = z.object({
  id: z.string(),
  title: z.string(),
  color: z.string().nullish(),
  position: z.string().nullish(),
  archived: z.boolean().nullish(),
});

const ColumnRecordSchema = z.object({
  id: z.string(),
  title: z.string(),
  type: z.string(),
  settings_str: z.string().nullish(),
  description: z.string().nullish(),
  archived: z.boolean().nullish(),
  width: z.number().nullish(),
});

const CellRecordSchema = z.object({
  id: z.string(),
  type: z.string().nullish(),
  text: z.string().nullish(),
  value: z.string().nullish(),
  display_value: z.string().nullish(),
});

const ItemRecordSchema = z.object({
  id: IdSchema,
  name: z.string(),
  board: z.object({ id: IdSchema }).nullish(),
  group: z.object({ id: z.string(), title: z.string() }).nullish(),
  created_at: z.string().nullish(),
  updated_at: z.string().nullish(),
  column_values: z.array(CellRecordSchema).default([]),
});

const BoardRecordSchema = z.object({
  id: IdSchema,
  name: z.string(),
  description: z.string().nullish(),
  state: z.string().nullish(),
  board_kind: z.string().nullish(),
  permissions: z.string().nullish(),
  workspace_id: IdSchema.nullish(),
  workspace: z.object({ id: IdSchema.nullish(), name: z.string() }).nullish(),
  items_count: z.number().nullish(),
  updated_at: z.string().nullish(),
  owners: z.array(UserRecordSchema.nullable()).nullish(),
  subscribers: z.array(UserRecordSchema.nullable()).nullish(),
  views: z.array(z.object({ id: IdSchema, name: z.string(), type: z.string().nullish() })).nullish(),
  tags: z.array(TagRecordSchema).nullish(),
  groups: z.array(GroupRecordSchema).nullish(),
  columns: z.array(ColumnRecordSchema).nullish(),
});

const ItemsPageRecordSchema = z.object({
  cursor: z.string().nullish(),
  items: z.array(ItemRecordSchema),
});

export const BoardsResponseSchema = z.object({ boards: z.array(BoardRecordSchema).nullable() });

export const BoardItemsResponseSchema = z.object({
  boards: z.array(z.object({ items_page: ItemsPageRecordSchema })).nullable(),
});

export const NextItemsResponseSchema = z.object({ next_items_page: ItemsPageRecordSchema });

export const ItemsResponseSchema = z.object({ items: z.array(ItemRecordSchema).nullable() });

export const CreateItemResponseSchema = z.object({
  create_item: z.object({ id: IdSchema, name: z.string().nullish() }),
});

export const UpdateItemResponseSchema = z.object({
  change_multiple_column_values: z.object({ id: IdSchema }).nullable(),
});

export const DeleteItemResponseSchema = z.object({
  delete_item: z.object({ id: IdSchema }).nullable(),
});

export type BoardRecord = z.infer<typeof BoardRecordSchema>;
export type ItemRecord = z.infer<typeof ItemRecordSchema>;
export type ItemsPageRecord = z.infer<typeof ItemsPageRecordSchema>;

// ============================================
// DOMAIN RECORDS
// ============================================

export interface BoardUser {
  id: string;
  name: string;
  email?: string;
}

export interface BoardTag {
  id: string;
  name: string;
  color: string | null;
}

export interface BoardGroup {
  id: string;
  title: string;
  color: string | null;
  position: string | null;
}

export interface BoardInfo {
  id: string;
  name: string;
  description: string | null;
  kind: string | null;
  state: string | null;
  permissions: string | null;
  workspaceId: string | null;
}

export interface BoardSchema {
  board: BoardInfo;
  columns: ColumnDefinition[];
  groups: BoardGroup[];
  tags: BoardTag[];
  owner: BoardUser | null;
}

export interface BoardItem {
  id: string;
  name: string;
  groupId: string | null;
  groupTitle: string | null;
  createdAt: string | null;
  updatedAt: string | null;
  /** Keyed by column id */
  columnValues: Record<string, ColumnCell>;
}

export interface BoardMetadata {
  id: string;
  name: string;
  description: string | null;
  workspace: { id: string | null; name: string } | null;
  itemsCount: number | null;
  updatedAt: string | null;
  owner: BoardUser | null;
  subscribers: BoardUser[];
  views: { id: string; name: string; type: string | null }[];
  groups: BoardGroup[];
  tags: BoardTag[];
}

// ============================================
// PARSERS
// ============================================

/**
 * Parse GraphQL `data` at the boundary. A shape mismatch is an upstream
 * failure, not a programming error.
 */
export function parseUpstream<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, operation: string): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = result.error.errors
      .slice(0, 3)
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new UpstreamError(operation, 'UNEXPECTED_RESPONSE', `unexpected response shape (${issues})`);
  }
  return result.data;
}

export function parseSettings(settingsStr: string | null | undefined): ColumnSettings {
  if (!settingsStr) return {};
  try {
    const parsed: unknown = JSON.parse(settingsStr);
    return isRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
}

function toUser(record: z.infer<typeof UserRecordSchema> | null | undefined): BoardUser | null {
  if (!record) return null;
  return record.email ? { id: record.id, name: record.name, email: record.email } : { id: record.id, name: record.name };
}

function toGroups(records: z.infer<typeof GroupRecordSchema>[] | null | undefined): BoardGroup[] {
  return (records ?? [])
    .filter((group) => !group.archived)
    .map((group) => ({
      id: group.id,
      title: group.title,
      color: group.color ?? null,
      position: group.position ?? null,
    }));
}

function toTags(records: z.infer<typeof TagRecordSchema>[] | null | undefined): BoardTag[] {
  return (records ?? []).map((tag) => ({ id: tag.id, name: tag.name, color: tag.color ?? null }));
}

export function toColumn(record: z.infer<typeof ColumnRecordSchema>): ColumnDefinition {
  return {
    id: record.id,
    title: record.title,
    type: record.type,
    settings: parseSettings(record.settings_str),
    description: record.description ?? null,
    archived: record.archived ?? false,
    width: record.width ?? null,
  };
}

/** The requested board, or NotFoundError when the token cannot see it. */
export function pickBoard(boards: BoardRecord[] | null, boardId: string): BoardRecord {
  const board = boards?.find((b) => b.id === boardId);
  if (!board) {
    throw new NotFoundError('board', boardId);
  }
  return board;
}

export function toBoardSchema(board: BoardRecord): BoardSchema {
  return {
    board: {
      id: board.id,
      name: board.name,
      description: board.description ?? null,
      kind: board.board_kind ?? null,
      state: board.state ?? null,
      permissions: board.permissions ?? null,
      workspaceId: board.workspace_id ?? null,
    },
    columns: (board.columns ?? []).map(toColumn).filter((column) => !column.archived),
    groups: toGroups(board.groups),
    tags: toTags(board.tags),
    owner: toUser(board.owners?.[0]),
  };
}

export function toBoardMetadata(board: BoardRecord): BoardMetadata {
  const workspace = board.workspace
    ? { id: board.workspace.id ?? null, name: board.workspace.name }
    : null;

  return {
    id: board.id,
    name: board.name,
    description: board.description ?? null,
    workspace,
    itemsCount: board.items_count ?? null,
    updatedAt: board.updated_at ?? null,
    owner: toUser(board.owners?.[0]),
    subscribers: (board.subscribers ?? []).flatMap((user) => {
      const parsed = toUser(user);
      return parsed ? [parsed] : [];
    }),
    views: (board.views ?? []).map((view) => ({ id: view.id, name: view.name, type: view.type ?? null })),
    groups: toGroups(board.groups),
    tags: toTags(board.tags),
  };
}

export function toBoardItem(record: ItemRecord): BoardItem {
  const columnValues: Record<string, ColumnCell> = {};
  for (const cell of record.column_values) {
    columnValues[cell.id] = {
      id: cell.id,
      type: cell.type ?? null,
      text: cell.text ?? null,
      value: cell.value ?? null,
      display_value: cell.display_value ?? null,
    };
  }

  return {
    id: record.id,
    name: record.name,
    groupId: record.group?.id ?? null,
    groupTitle: record.group?.title ?? null,
    createdAt: record.created_at ?? null,
    updatedAt: record.updated_at ?? null,
    columnValues,
  };
}
