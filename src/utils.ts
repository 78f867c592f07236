// ============================================
// CHARACTER TRUNCATION
// ============================================

const MAX_RESPONSE_LENGTH = 100000; // ~25k tokens (4 chars per token average)

export function truncateResponse(
  text: string,
  maxLength: number = MAX_RESPONSE_LENGTH
): string {
  if (text.length <= maxLength) {
    return text;
  }

  const truncated = text.slice(0, maxLength);
  const originalLength = text.length;
  const truncatedChars = originalLength - maxLength;

  return (
    truncated +
    '\n\n' +
    '─────────────────────────────────────────\n' +
    `⚠️  RESPONSE TRUNCATED\n` +
    `Original length: ${originalLength.toLocaleString('en-US')} characters\n` +
    `Truncated: ${truncatedChars.toLocaleString('en-US')} characters\n` +
    `Showing: ${maxLength.toLocaleString('en-US')} characters (~${Math.round(maxLength / 4).toLocaleString('en-US')} tokens)\n\n` +
    `💡 To reduce response size:\n` +
    `   • Use search_board_items instead of reading every item\n` +
    `   • Read a single item via monday://board/item/{item_id}\n` +
    `   • Lower MONDAY_ITEMS_LIMIT for very large boards\n` +
    '─────────────────────────────────────────'
  );
}

// ============================================
// RESPONSE FORMAT CONVERSION
// ============================================

export type ResponseFormat = 'json' | 'markdown';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function formatScalar(value: unknown): string {
  if (isPlainObject(value) || Array.isArray(value)) {
    return JSON.stringify(value);
  }
  return String(value);
}

interface TableRow {
  id: unknown;
  name: unknown;
  values: Record<string, unknown>;
}

// Board items ({id, name, values}) render as one table instead of one section each
function asTableRows(list: unknown[]): TableRow[] | null {
  if (list.length === 0) return null;
  const rows: TableRow[] = [];
  for (const entry of list) {
    if (!isPlainObject(entry) || !isPlainObject(entry.values)) return null;
    rows.push({ id: entry.id, name: entry.name, values: entry.values });
  }
  return rows;
}

function tableCell(value: unknown): string {
  if (value === null || value === undefined) return '';
  return formatScalar(value).replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

function formatTable(rows: TableRow[]): string {
  const columns = [...new Set(rows.flatMap((row) => Object.keys(row.values)))];
  const header = ['id', 'name', ...columns];
  const lines = [
    `| ${header.join(' | ')} |`,
    `| ${header.map(() => '---').join(' | ')} |`,
    ...rows.map((row) =>
      `| ${[row.id, row.name, ...columns.map((c) => row.values[c])].map(tableCell).join(' | ')} |`
    ),
  ];
  return lines.join('\n') + '\n';
}

// Convert JSON to formatted markdown
export function formatAsMarkdown(data: unknown, title?: string): string {
  if (typeof data === 'string') {
    return data; // Already markdown
  }

  let markdown = '';

  if (title) {
    markdown += `# ${title}\n\n`;
  }

  // Handle arrays
  if (Array.isArray(data)) {
    const rows = asTableRows(data);
    if (rows) return markdown + formatTable(rows);

    markdown += `Found ${data.length} items:\n\n`;
    data.forEach((item, index) => {
      markdown += `## Item ${index + 1}\n`;
      markdown += isPlainObject(item) ? formatObjectAsMarkdown(item) : `${formatScalar(item)}\n`;
      markdown += '\n';
    });
    return markdown;
  }

  if (!isPlainObject(data)) {
    return markdown + `${formatScalar(data)}\n`;
  }

  return markdown + formatObjectAsMarkdown(data);
}

function formatObjectAsMarkdown(obj: Record<string, unknown>): string {
  let markdown = '';

  for (const [key, value] of Object.entries(obj)) {
    if (value === null || value === undefined) continue;

    const label = key.replace(/_/g, ' ').replace(/\b\w/g, (l) => l.toUpperCase());

    if (isPlainObject(value)) {
      markdown += `\n**${label}:**\n`;
      markdown += formatObjectAsMarkdown(value);
    } else if (Array.isArray(value)) {
      const rows = asTableRows(value);
      markdown += rows
        ? `\n**${label}:**\n\n${formatTable(rows)}\n`
        : `**${label}:** ${value.map(formatScalar).join(', ')}\n`;
    } else {
      markdown += `**${label}:** ${formatScalar(value)}\n`;
    }
  }

  return markdown;
}

// Apply format conversion
export function applyResponseFormat(
  data: unknown,
  format: ResponseFormat = 'json',
  title?: string
): string {
  if (format === 'markdown') {
    return formatAsMarkdown(data, title);
  }

  // JSON format
  return JSON.stringify(data, null, 2);
}
