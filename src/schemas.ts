import { z } from 'zod';

// ============================================
// COMMON SCHEMAS
// ============================================

export const FormatSchema = z
  .enum(['json', 'markdown'])
  .optional()
  .describe("Response format: 'json' (default) or 'markdown'");

const ItemIdSchema = z
  .union([z.string().regex(/^\d+$/, 'item_id must be a numeric id'), z.number().int().positive()])
  .transform(String)
  .describe('monday.com item id');

const SearchValueSchema = z
  .union([z.string().trim().min(1), z.number(), z.boolean()])
  .describe('Value to match; compared by column type');

/**
 * Column values keyed by column id or title. Clients that can only send
 * strings may pass the object JSON-encoded.
 */
export const ColumnValuesSchema = z.preprocess((value) => {
  if (typeof value !== 'string') return value;
  try {
    return JSON.parse(value);
  } catch {
    return value;
  }
}, z.record(z.string(), z.unknown()));

// ============================================
// BOARD SCHEMAS
// ============================================

export const GetBoardSchemaSchema = z.object({
  format: FormatSchema,
});

export const GetBoardItemsSchema = z.object({
  format: FormatSchema,
});

export const GetBoardDataSchema = z.object({
  format: FormatSchema,
});

// ============================================
// ITEM SCHEMAS
// ============================================

export const SearchBoardItemsSchema = z.object({
  field: z.string().min(1).describe('Column id, column title, or "name" for the item name'),
  value: SearchValueSchema,
  format: FormatSchema,
});

export const CreateBoardItemSchema = z.object({
  name: z.string().min(1).max(255).describe('Name of the new item'),
  column_values: ColumnValuesSchema.optional().describe('Column values keyed by column id or title'),
  group_id: z.string().min(1).optional().describe('Target group id or title (default: first group)'),
});

export const UpdateBoardItemSchema = z.object({
  item_id: ItemIdSchema,
  column_values: ColumnValuesSchema.describe('Column values to change, keyed by column id or title'),
});

export const DeleteBoardItemsSchema = z.object({
  field: z.string().min(1).describe('Column id, column title, or "name"'),
  value: SearchValueSchema,
});

export const ValidateColumnValuesSchema = z.object({
  column_values: ColumnValuesSchema.describe('Column values to check, keyed by column id or title'),
});

// ============================================
// CACHE AND LOGGING SCHEMAS
// ============================================

export const InvalidateCacheSchema = z.object({
  scope: z.enum(['all', 'schema', 'items', 'metadata']).optional().describe("Which cache to clear (default: 'all')"),
});

export const SetLogLevelSchema = z.object({
  level: z.enum(['debug', 'info', 'notice', 'warning', 'error', 'critical', 'alert', 'emergency', 'off']).describe('New log level'),
  enable_mcp_logs: z.boolean().optional().describe('Enable/disable MCP client logs'),
  enable_file_logs: z.boolean().optional().describe('Enable/disable file logs'),
  enable_request_logs: z.boolean().optional().describe('Enable/disable detailed request logging'),
  enable_metrics: z.boolean().optional().describe('Enable/disable performance metrics collection'),
});
