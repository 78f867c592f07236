import type { Tool } from '@modelcontextprotocol/sdk/types.js';

const PAIR_PATTERN = /([A-Za-z_][\w-]*)=("(?:[^"\\]|\\.)*"|'[^']*'|\S+)/gy;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function declaredTypes(schema: unknown): string[] {
  if (!isRecord(schema)) return [];
  const { type } = schema;
  if (typeof type === 'string') return [type];
  if (Array.isArray(type)) return type.filter((t): t is string => typeof t === 'string');
  return [];
}

function unquote(raw: string): string {
  if (raw.length >= 2 && raw.startsWith('"') && raw.endsWith('"')) {
    return raw.slice(1, -1).replace(/\\(.)/g, '$1');
  }
  if (raw.length >= 2 && raw.startsWith("'") && raw.endsWith("'")) {
    return raw.slice(1, -1);
  }
  return raw;
}

function coerce(key: string, raw: string, schema: unknown): unknown {
  const types = declaredTypes(schema);

  if (types.includes('object') || types.includes('array')) {
    try {
      return JSON.parse(raw);
    } catch (error) {
      // Column values may also be sent JSON-encoded as a string
      if (types.includes('string')) return raw;
      throw new Error(`Argument "${key}" must be JSON: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
  if ((types.includes('integer') || types.includes('number')) && /^-?\d+(\.\d+)?$/.test(raw)) {
    return Number(raw);
  }
  if (types.includes('boolean') && (raw === 'true' || raw === 'false')) {
    return raw === 'true';
  }
  return raw;
}

/**
 * Turn one line typed at the CLI prompt into tool arguments.
 *
 * Accepts either a JSON object or `key=value` pairs, where values may be
 * quoted and are coerced using the tool's input schema.
 */
export function parseCliArguments(tool: Tool, line: string): Record<string, unknown> {
  const trimmed = line.trim();
  if (trimmed === '') return {};

  if (trimmed.startsWith('{')) {
    const parsed: unknown = JSON.parse(trimmed);
    if (!isRecord(parsed)) {
      throw new Error('Arguments must be a JSON object');
    }
    return parsed;
  }

  const properties = tool.inputSchema.properties ?? {};
  const known = Object.keys(properties);
  const args: Record<string, unknown> = {};

  let offset = 0;
  while (offset < trimmed.length) {
    while (trimmed[offset] === ' ' || trimmed[offset] === '\t') offset++;
    if (offset >= trimmed.length) break;

    PAIR_PATTERN.lastIndex = offset;
    const match = PAIR_PATTERN.exec(trimmed);
    if (!match) {
      throw new Error(`Cannot parse "${trimmed.slice(offset)}"; use key=value pairs or a JSON object`);
    }

    const [, key, rawValue] = match;
    if (!known.includes(key)) {
      throw new Error(`Unknown argument "${key}" for ${tool.name}; expected one of: ${known.join(', ')}`);
    }
    args[key] = coerce(key, unquote(rawValue), properties[key]);
    offset = PAIR_PATTERN.lastIndex;
  }

  return args;
}
