import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { describe, expect, it } from 'vitest';
import { parseCliArguments } from '../src/cli-arguments.js';

const searchTool: Tool = {
  name: 'search_board_items',
  inputSchema: {
    type: 'object',
    properties: {
      field: { type: 'string' },
      value: { type: ['string', 'number', 'boolean'] },
      format: { type: 'string', enum: ['json', 'markdown'] },
    },
  },
};

const updateTool: Tool = {
  name: 'update_board_item',
  inputSchema: {
    type: 'object',
    properties: {
      item_id: { type: ['string', 'number'] },
      column_values: { type: 'object' },
    },
  },
};

describe('parseCliArguments', () => {
  it('returns no arguments for an empty line', () => {
    expect(parseCliArguments(searchTool, '   ')).toEqual({});
  });

  it('accepts a JSON object', () => {
    expect(parseCliArguments(searchTool, '{"field": "Status", "value": "Done"}')).toEqual({
      field: 'Status',
      value: 'Done',
    });
    expect(() => parseCliArguments(searchTool, '{}x')).toThrow(SyntaxError);
  });

  it('parses key=value pairs with quoted values', () => {
    expect(parseCliArguments(searchTool, `field=Status value="Working on it"`)).toEqual({
      field: 'Status',
      value: 'Working on it',
    });
    expect(parseCliArguments(searchTool, `field='Due date' value="say \\"hi\\""`)).toEqual({
      field: 'Due date',
      value: 'say "hi"',
    });
  });

  it('coerces values by the declared type', () => {
    expect(parseCliArguments(searchTool, 'field=Budget value=42')).toEqual({ field: 'Budget', value: 42 });
    expect(parseCliArguments(searchTool, 'field=Done value=true')).toEqual({ field: 'Done', value: true });
    expect(parseCliArguments(searchTool, 'field=42 value=x')).toEqual({ field: '42', value: 'x' });
  });

  it('parses JSON for object arguments', () => {
    expect(parseCliArguments(updateTool, `item_id=5000 column_values='{"status": "Done"}'`)).toEqual({
      item_id: 5000,
      column_values: { status: 'Done' },
    });
    expect(() => parseCliArguments(updateTool, 'column_values={bad')).toThrow('Argument "column_values" must be JSON');
  });

  it('rejects unknown keys and stray text', () => {
    expect(() => parseCliArguments(searchTool, 'priority=high')).toThrow(
      'Unknown argument "priority" for search_board_items; expected one of: field, value, format'
    );
    expect(() => parseCliArguments(searchTool, 'field=Status =oops')).toThrow(
      'Cannot parse "=oops"; use key=value pairs or a JSON object'
    );
  });
});
