import type { Resource, ResourceTemplate } from '@modelcontextprotocol/sdk/types.js';
import { BoardOperations, toDisplayItem } from './board-operations.js';
import { NotFoundError } from './errors.js';
import { getColumnHandler, listColumnTypes } from './columns/registry.js';
import type { ColumnDefinition, ValidationRules } from './columns/types.js';
import type { BoardSchema } from './monday-types.js';

export const RESOURCE_SCHEME = 'monday://board/';

// ============================================
// STATIC RESOURCES AND TEMPLATES
// ============================================

export const resources: Resource[] = [
  {
    uri: `${RESOURCE_SCHEME}schema`,
    name: 'Board Schema',
    description: 'Board details, columns with their validation rules, groups, tags and owner.',
    mimeType: 'application/json',
  },
  {
    uri: `${RESOURCE_SCHEME}columns`,
    name: 'Board Columns',
    description: 'Every column with its type, settings and validation rules.',
    mimeType: 'application/json',
  },
  {
    uri: `${RESOURCE_SCHEME}items`,
    name: 'Board Items',
    description: 'All items with simplified column values. Expensive on large boards.',
    mimeType: 'application/json',
  },
  {
    uri: `${RESOURCE_SCHEME}metadata`,
    name: 'Board Metadata',
    description: 'Workspace, subscribers, views, groups, tags and owner.',
    mimeType: 'application/json',
  },
  {
    uri: `${RESOURCE_SCHEME}column_types`,
    name: 'Supported Column Types',
    description: 'Column types this server validates, with their handler family and writability.',
    mimeType: 'application/json',
  },
];

export const resourceTemplates: ResourceTemplate[] = [
  {
    uriTemplate: `${RESOURCE_SCHEME}columns/{column_id}`,
    name: 'Board Column',
    description: 'One column by id or title, with its validation rules.',
    mimeType: 'application/json',
  },
  {
    uriTemplate: `${RESOURCE_SCHEME}item/{item_id}`,
    name: 'Board Item',
    description: 'One item with simplified column values.',
    mimeType: 'application/json',
  },
];

// ============================================
// SHAPES
// ============================================

export interface ColumnDescription {
  id: string;
  title: string;
  type: string;
  description: string | null;
  writable: boolean;
  strict: boolean;
  settings: Record<string, unknown>;
  validation_rules: ValidationRules;
}

export function describeColumn(column: ColumnDefinition): ColumnDescription {
  const { handler, strict } = getColumnHandler(column.type);
  return {
    id: column.id,
    title: column.title,
    type: column.type,
    description: column.description ?? null,
    writable: handler.writable,
    strict,
    settings: column.settings,
    validation_rules: handler.rules(column),
  };
}

export function describeSchema(schema: BoardSchema) {
  return {
    board: schema.board,
    columns: schema.columns.map(describeColumn),
    groups: schema.groups,
    tags: schema.tags,
    owner: schema.owner,
  };
}

// ============================================
// RESOLUTION
// ============================================

export interface ResourceContent {
  uri: string;
  mimeType: 'application/json';
  text: string;
}

function content(uri: string, data: unknown): ResourceContent {
  return { uri, mimeType: 'application/json', text: JSON.stringify(data, null, 2) };
}

/** Map a `monday://board/...` URI onto one board read, filtered by its path parameter. */
export async function resolveResource(
  uri: string,
  ops: BoardOperations,
  signal?: AbortSignal
): Promise<ResourceContent> {
  const known = [...resources.map((r) => r.uri), ...resourceTemplates.map((t) => t.uriTemplate)];
  if (!uri.startsWith(RESOURCE_SCHEME)) {
    throw new NotFoundError('resource', uri, known);
  }

  const [kind, param, ...rest] = uri.slice(RESOURCE_SCHEME.length).split('/');
  if (rest.length > 0) {
    throw new NotFoundError('resource', uri, known);
  }
  const id = param === undefined ? undefined : decodeURIComponent(param);

  switch (kind) {
    case 'schema':
      if (id !== undefined) break;
      return content(uri, describeSchema(await ops.getSchema(signal)));

    case 'columns': {
      if (id === undefined) {
        const columns = await ops.getColumns(signal);
        return content(uri, columns.map(describeColumn));
      }
      return content(uri, describeColumn(await ops.getColumn(id, signal)));
    }

    case 'items':
      if (id !== undefined) break;
      return content(uri, await ops.getDisplayItems(signal));

    case 'item': {
      if (!id) break;
      const [schema, item] = await Promise.all([ops.getSchema(signal), ops.getItem(id, signal)]);
      return content(uri, toDisplayItem(schema.columns, item));
    }

    case 'metadata':
      if (id !== undefined) break;
      return content(uri, await ops.getMetadata(signal));

    case 'column_types':
      if (id !== undefined) break;
      return content(uri, listColumnTypes());
  }

  throw new NotFoundError('resource', uri, known);
}
