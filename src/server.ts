import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  CallToolResult,
  ListToolsRequestSchema,
  ListResourcesRequestSchema,
  ReadResourceRequestSchema,
  ListResourceTemplatesRequestSchema,
  ListPromptsRequestSchema,
  GetPromptRequestSchema,
  Tool,
  Prompt,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { BoardCache } from './cache.js';
import { BoardOperations, toDisplayItem } from './board-operations.js';
import { BoardError, ValidationError } from './errors.js';
import { MondayError } from './monday-client.js';
import { logger, LogLevel, LoggerConfig } from './logging/index.js';
import { describeSchema, resolveResource, resources, resourceTemplates } from './resources.js';
import {
  GetBoardSchemaSchema,
  GetBoardItemsSchema,
  GetBoardDataSchema,
  SearchBoardItemsSchema,
  CreateBoardItemSchema,
  UpdateBoardItemSchema,
  DeleteBoardItemsSchema,
  ValidateColumnValuesSchema,
  InvalidateCacheSchema,
  SetLogLevelSchema,
} from './schemas.js';
import { applyResponseFormat, truncateResponse } from './utils.js';

export const SERVER_NAME = 'monday-board-mcp';
export const SERVER_VERSION = '1.0.0';

// ============================================
// SERVER PROMPT
// ============================================

export const boardGuidePrompt: Prompt = {
  name: 'monday-board-guide',
  description: 'Instructions for working with the configured monday.com board',
  arguments: [],
};

const boardGuideInstructions = `monday.com board MCP server - read and change one board's items.

Start here:
• Read monday://board/schema (or call get_board_schema) to learn column ids, titles, types and groups
• Each column lists validation_rules: follow them exactly when writing values

Writing values:
• column_values are keyed by column id or column title
• Dates: ISO 8601 only (YYYY-MM-DD, optional time). 03/09/2025 is rejected as ambiguous
• Status and dropdown: exact, case-sensitive labels. On a miss the error lists suggestions
• Formula, mirror, auto number and other computed columns are read-only
• Use validate_column_values for a dry run before create_board_item or update_board_item

Reading:
• search_board_items(field, value) matches by column type: status label, dropdown option, number, checkbox, date
• get_board_data returns schema and every item; it is the most expensive call
• Reads are cached for 5 minutes; writes refresh item data. invalidate_cache forces a refresh

Deleting:
• delete_board_items(field, value) deletes every matching item and reports each success and failure`;

// ============================================
// TOOLS DEFINITIONS
// ============================================

const formatProperty = {
  type: 'string',
  enum: ['json', 'markdown'],
  description: "Response format: 'json' (default) or 'markdown'",
};

const columnValuesProperty = {
  type: 'object',
  description: 'Column values keyed by column id or title, e.g. {"status": "Done", "date4": "2025-03-09"}. A JSON-encoded string is also accepted.',
  additionalProperties: true,
};

const searchValueProperty = {
  type: ['string', 'number', 'boolean'],
  description: 'Value to match. Compared by column type: status label, dropdown option, number, checkbox state, ISO date, or exact text.',
};

export const tools: Tool[] = [
  {
    name: 'get_board_schema',
    description: `Get the board's structure: board details, columns with their validation rules, groups and tags.

PURPOSE: Learn column ids, titles and types before searching or writing. Cached for 5 minutes.

PARAMETERS:
- format (optional): 'json' (default) or 'markdown'

RETURNS: board, columns[{id, title, type, writable, strict, validation_rules}], groups, tags, owner.

RELATED TOOLS: validate_column_values, create_board_item`,
    inputSchema: {
      type: 'object',
      properties: { format: formatProperty },
    },
  },
  {
    name: 'get_board_items',
    description: `Get every item on the board with simplified column values.

PURPOSE: Read the board's contents. Values are simplified per column type (labels for status, arrays for dropdown, numbers for numbers, booleans for checkbox). Unset columns are null.

PARAMETERS:
- format (optional): 'json' (default) or 'markdown'

RETURNS: {count, items[{id, name, group, values}]}.

⚠️ Large boards produce large responses. Prefer search_board_items when looking for specific items.`,
    inputSchema: {
      type: 'object',
      properties: { format: formatProperty },
    },
  },
  {
    name: 'get_board_data',
    description: `Get the board schema and all items in one response.

PURPOSE: Full snapshot of the board. This is the most expensive read; use get_board_schema or search_board_items when they are enough.

PARAMETERS:
- format (optional): 'json' (default) or 'markdown'

RETURNS: board, columns, groups, items_count, items.`,
    inputSchema: {
      type: 'object',
      properties: { format: formatProperty },
    },
  },
  {
    name: 'search_board_items',
    description: `Find items whose column matches a value.

PARAMETERS:
- field (required): column id, column title (case-insensitive), or "name" for the item name
- value (required): value to match, compared according to the column type
- format (optional): 'json' (default) or 'markdown'

RETURNS: {field, value, count, items}.

ERRORS:
- NOT_FOUND: unknown field; the hint lists every valid field

EXAMPLES:
✅ search_board_items({field: "status", value: "Done"})
✅ search_board_items({field: "Due date", value: "2025-03-09"})`,
    inputSchema: {
      type: 'object',
      properties: {
        field: { type: 'string', description: 'Column id, column title, or "name"' },
        value: searchValueProperty,
        format: formatProperty,
      },
      required: ['field', 'value'],
    },
  },
  {
    name: 'create_board_item',
    description: `Create an item on the board.

PURPOSE: Every column value is validated against its column type before anything is sent. The first invalid value aborts the call.

PARAMETERS:
- name (required): item name
- column_values (optional): values keyed by column id or title
- group_id (optional): target group id or title. Default: the board's first group

RETURNS: {success: true, item: {id, name, group_id, column_values, unvalidated_fields}}.
unvalidated_fields lists columns of types this server passes through without validation.

ERRORS:
- VALIDATION_ERROR (not an error result): {success: false, error: {field, failures[{reason, suggestions}]}}. Fix the value and retry
- NOT_FOUND: unknown column or group`,
    inputSchema: {
      type: 'object',
      properties: {
        name: { type: 'string', description: 'Name of the new item' },
        column_values: columnValuesProperty,
        group_id: { type: 'string', description: 'Group id or title (default: first group)' },
      },
      required: ['name'],
    },
  },
  {
    name: 'update_board_item',
    description: `Change column values of an existing item.

PARAMETERS:
- item_id (required): numeric item id
- column_values (required): values to change, keyed by column id or title. Other columns are left untouched

RETURNS: {success: true, item: {id, updated_columns, column_values, unvalidated_fields}}.

ERRORS:
- VALIDATION_ERROR (not an error result): same shape as create_board_item
- NOT_FOUND: unknown item or column`,
    inputSchema: {
      type: 'object',
      properties: {
        item_id: { type: ['string', 'number'], description: 'Numeric item id' },
        column_values: columnValuesProperty,
      },
      required: ['item_id', 'column_values'],
    },
  },
  {
    name: 'delete_board_items',
    description: `Delete every item whose column matches a value.

PURPOSE: Bulk delete by search. Matching works exactly as in search_board_items. Each item is deleted separately; one failure does not stop the others.

PARAMETERS:
- field (required): column id, column title, or "name"
- value (required): value to match

RETURNS: {success, matched, deleted_count, deleted[{id, name}], failed_count, failed[{id, name, error}]}.

⚠️ Deletion cannot be undone. Run search_board_items first to see what will match.`,
    inputSchema: {
      type: 'object',
      properties: {
        field: { type: 'string', description: 'Column id, column title, or "name"' },
        value: searchValueProperty,
      },
      required: ['field', 'value'],
    },
  },
  {
    name: 'validate_column_values',
    description: `Dry run: check column values without writing anything.

RETURNS: {valid, results[{field, title, type, ok, wire_value | reason, suggestions}]} with one result per supplied value.`,
    inputSchema: {
      type: 'object',
      properties: { column_values: columnValuesProperty },
      required: ['column_values'],
    },
  },
  {
    name: 'invalidate_cache',
    description: `Clear cached board data so the next read goes to monday.com.

PARAMETERS:
- scope (optional): 'all' (default), 'schema', 'items' or 'metadata'`,
    inputSchema: {
      type: 'object',
      properties: {
        scope: { type: 'string', enum: ['all', 'schema', 'items', 'metadata'] },
      },
    },
  },
  {
    name: 'get_server_status',
    description: 'Server version, board id, cache statistics, request queue, logging configuration and collected metrics.',
    inputSchema: { type: 'object', properties: {} },
  },
  {
    name: 'set_log_level',
    description: `Change logging at runtime.

PARAMETERS:
- level (required): debug, info, notice, warning, error, critical, alert, emergency, or off
- enable_mcp_logs, enable_file_logs, enable_request_logs, enable_metrics (optional booleans)`,
    inputSchema: {
      type: 'object',
      properties: {
        level: {
          type: 'string',
          enum: ['debug', 'info', 'notice', 'warning', 'error', 'critical', 'alert', 'emergency', 'off'],
        },
        enable_mcp_logs: { type: 'boolean' },
        enable_file_logs: { type: 'boolean' },
        enable_request_logs: { type: 'boolean' },
        enable_metrics: { type: 'boolean' },
      },
      required: ['level'],
    },
  },
];

// ============================================
// RESULT HELPERS
// ============================================

function textResult(data: unknown, isError = false): CallToolResult {
  const text = typeof data === 'string' ? data : JSON.stringify(data, null, 2);
  return {
    content: [{ type: 'text', text: truncateResponse(text) }],
    ...(isError ? { isError: true } : {}),
  };
}

export function errorResult(error: unknown): CallToolResult {
  // Bad column values are an answer the caller can act on, not a failure
  if (error instanceof ValidationError) {
    return textResult({ success: false, error: error.toJSON() });
  }

  if (error instanceof z.ZodError) {
    return textResult({
      success: false,
      error: {
        type: 'INVALID_ARGUMENTS',
        message: 'Invalid request parameters',
        details: error.errors.map((err) => ({
          path: err.path.join('.'),
          message: err.message,
          code: err.code,
        })),
      },
    }, true);
  }

  if (error instanceof BoardError || error instanceof MondayError) {
    return textResult({ success: false, error: error.toJSON() }, true);
  }

  return textResult({
    success: false,
    error: {
      type: 'UNKNOWN_ERROR',
      message: error instanceof Error ? error.message : String(error),
    },
  }, true);
}

// ============================================
// SERVER SETUP
// ============================================

export interface StatusSource {
  getQueueStats(): Record<string, number>;
}

export interface ServerDependencies {
  operations: BoardOperations;
  cache: BoardCache;
  /** Request queue of the SaaS client, reported by get_server_status */
  client?: StatusSource;
  settings?: Record<string, unknown>;
}

export function createServer(deps: ServerDependencies): Server {
  const { operations, cache } = deps;

  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
        resources: {},
        prompts: {},
        logging: {},
      },
    }
  );

  logger.getMCPLogger().setServer(server);

  // ============================================
  // TOOLS HANDLER
  // ============================================

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools };
  });

  // ============================================
  // RESOURCES HANDLERS
  // ============================================

  server.setRequestHandler(ListResourcesRequestSchema, async () => {
    return { resources };
  });

  server.setRequestHandler(ListResourceTemplatesRequestSchema, async () => {
    return { resourceTemplates };
  });

  server.setRequestHandler(ReadResourceRequestSchema, async (request, extra) => {
    const uri = request.params.uri;
    const started = Date.now();

    try {
      const contents = await resolveResource(uri, operations, extra.signal);
      logger.recordMetric({
        kind: 'resource',
        name: uri,
        latency_ms: Date.now() - started,
        success: true,
        timestamp: new Date().toISOString(),
      });
      return { contents: [contents] };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error('Resource read failed', { uri, error: message }, 'resources');
      logger.recordMetric({
        kind: 'resource',
        name: uri,
        latency_ms: Date.now() - started,
        success: false,
        timestamp: new Date().toISOString(),
        error: message,
      });
      throw new Error(`Failed to read resource ${uri}: ${message}`, { cause: error });
    }
  });

  // ============================================
  // PROMPTS HANDLERS
  // ============================================

  server.setRequestHandler(ListPromptsRequestSchema, async () => {
    return {
      prompts: [boardGuidePrompt],
    };
  });

  server.setRequestHandler(GetPromptRequestSchema, async (request) => {
    if (request.params.name === boardGuidePrompt.name) {
      return {
        messages: [
          {
            role: 'user' as const,
            content: {
              type: 'text' as const,
              text: boardGuideInstructions,
            },
          },
        ],
      };
    }
    throw new Error(`Prompt not found: ${request.params.name}`);
  });

  // ============================================
  // TOOL EXECUTION HANDLER (WITH ZOD VALIDATION)
  // ============================================

  async function executeTool(name: string, args: Record<string, unknown>, signal: AbortSignal): Promise<CallToolResult> {
    switch (name) {
      case 'get_board_schema': {
        const { format } = GetBoardSchemaSchema.parse(args);
        const schema = await operations.getSchema(signal);
        return textResult(applyResponseFormat(describeSchema(schema), format, `Board: ${schema.board.name}`));
      }

      case 'get_board_items': {
        const { format } = GetBoardItemsSchema.parse(args);
        const items = await operations.getDisplayItems(signal);
        return textResult(applyResponseFormat({ count: items.length, items }, format, 'Board items'));
      }

      case 'get_board_data': {
        const { format } = GetBoardDataSchema.parse(args);
        const { schema, items } = await operations.getBoardData(signal);
        const data = { ...describeSchema(schema), items_count: items.length, items };
        return textResult(applyResponseFormat(data, format, `Board: ${schema.board.name}`));
      }

      case 'search_board_items': {
        const { field, value, format } = SearchBoardItemsSchema.parse(args);
        const [schema, items] = await Promise.all([
          operations.getSchema(signal),
          operations.searchItems(field, value, signal),
        ]);
        const result = {
          field,
          value,
          count: items.length,
          items: items.map((item) => toDisplayItem(schema.columns, item)),
        };
        return textResult(applyResponseFormat(result, format, `Items where ${field} = ${String(value)}`));
      }

      case 'create_board_item': {
        const { name: itemName, column_values, group_id } = CreateBoardItemSchema.parse(args);
        const item = await operations.createItem(itemName, column_values ?? {}, group_id, signal);
        return textResult({ success: true, item });
      }

      case 'update_board_item': {
        const { item_id, column_values } = UpdateBoardItemSchema.parse(args);
        const item = await operations.updateItem(item_id, column_values, signal);
        return textResult({ success: true, item });
      }

      case 'delete_board_items': {
        const { field, value } = DeleteBoardItemsSchema.parse(args);
        const report = await operations.deleteItems(field, value, signal);
        return textResult({
          success: report.failed.length === 0,
          matched: report.matched,
          deleted_count: report.deleted.length,
          deleted: report.deleted,
          failed_count: report.failed.length,
          failed: report.failed,
        });
      }

      case 'validate_column_values': {
        const { column_values } = ValidateColumnValuesSchema.parse(args);
        return textResult(await operations.validateColumnValues(column_values, signal));
      }

      case 'invalidate_cache': {
        const { scope = 'all' } = InvalidateCacheSchema.parse(args);
        cache.invalidate(scope);
        return textResult({ message: `Cache invalidated successfully`, scope });
      }

      case 'get_server_status': {
        return textResult({
          version: SERVER_VERSION,
          board_id: operations.boardId,
          config: deps.settings ?? {},
          cache: cache.getStats(),
          queue: deps.client?.getQueueStats() ?? null,
          logging: logger.getConfig(),
          metrics: logger.getMetrics(),
        });
      }

      case 'set_log_level': {
        const { level, enable_mcp_logs, enable_file_logs, enable_request_logs, enable_metrics } =
          SetLogLevelSchema.parse(args);

        const newConfig: Partial<LoggerConfig> = level === 'off'
          ? { enabled: false }
          : { enabled: true, level: LEVELS[level] };

        if (enable_mcp_logs !== undefined) newConfig.mcpEnabled = enable_mcp_logs;
        if (enable_file_logs !== undefined) newConfig.fileEnabled = enable_file_logs;
        if (enable_request_logs !== undefined) newConfig.requestsEnabled = enable_request_logs;
        if (enable_metrics !== undefined) newConfig.metricsEnabled = enable_metrics;

        logger.updateConfig(newConfig);

        return textResult({
          message: 'Logging configuration updated successfully',
          config: logger.getConfig(),
        });
      }

      default:
        return textResult({
          success: false,
          error: { type: 'UNKNOWN_TOOL', message: `Unknown tool: ${name}` },
        }, true);
    }
  }

  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const { name, arguments: args = {} } = request.params;
    const started = Date.now();
    const before = cache.getStats();

    let result: CallToolResult;
    try {
      result = await executeTool(name, args, extra.signal);
    } catch (error) {
      if (!(error instanceof ValidationError)) {
        logger.error('Tool call failed', {
          tool: name,
          error: error instanceof Error ? error.message : String(error),
        }, 'tools');
      }
      result = errorResult(error);
    }

    const after = cache.getStats();
    logger.recordMetric({
      kind: 'tool',
      name,
      latency_ms: Date.now() - started,
      success: !result.isError,
      timestamp: new Date().toISOString(),
      cache_hit: after.hits > before.hits && after.misses === before.misses,
    });

    return result;
  });

  return server;
}

const LEVELS: Record<Exclude<z.infer<typeof SetLogLevelSchema>['level'], 'off'>, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  notice: LogLevel.NOTICE,
  warning: LogLevel.WARNING,
  error: LogLevel.ERROR,
  critical: LogLevel.CRITICAL,
  alert: LogLevel.ALERT,
  emergency: LogLevel.EMERGENCY,
};
