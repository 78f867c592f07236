import { beforeEach, describe, expect, it } from 'vitest';
import { BoardOperations } from '../src/board-operations.js';
import { BoardCache } from '../src/cache.js';
import { NotFoundError } from '../src/errors.js';
import { describeColumn, resolveResource } from '../src/resources.js';
import { BOARD_ID, FakeMondayGateway, STATUS_LABELS } from './support/fake-monday.js';
import { rejectionOf } from './support/helpers.js';

let gateway: FakeMondayGateway;
let ops: BoardOperations;
let itemId: string;

beforeEach(() => {
  gateway = new FakeMondayGateway();
  ops = new BoardOperations(gateway, new BoardCache(), BOARD_ID);
  itemId = gateway.seedItem('Alpha', { status: { value: { index: 2 }, text: 'Stuck' } });
});

function parse(text: string): unknown {
  return JSON.parse(text);
}

describe('describeColumn', () => {
  it('includes writability and validation rules', () => {
    const column = { id: 'status', title: 'Status', type: 'status', settings: { labels: STATUS_LABELS } };

    expect(describeColumn(column)).toEqual({
      id: 'status',
      title: 'Status',
      type: 'status',
      description: null,
      writable: true,
      strict: true,
      settings: { labels: STATUS_LABELS },
      validation_rules: {
        type: 'status',
        writable: true,
        options: ['Working on it', 'Done', 'Stuck'],
        case_sensitive: true,
      },
    });
  });

  it('marks passthrough columns as not strict', () => {
    const described = describeColumn({ id: 'w', title: 'Widget', type: 'custom_widget', settings: {} });
    expect(described.strict).toBe(false);
    expect(described.writable).toBe(true);
  });
});

describe('resolveResource', () => {
  it('serves the schema with column rules', async () => {
    const content = await resolveResource('monday://board/schema', ops);

    expect(content.uri).toBe('monday://board/schema');
    expect(content.mimeType).toBe('application/json');
    expect(parse(content.text)).toMatchObject({
      board: { id: BOARD_ID, name: 'Product roadmap' },
      groups: [{ id: 'topics' }, { id: 'completed' }],
    });
  });

  it('serves one column by encoded title', async () => {
    const content = await resolveResource('monday://board/columns/Due%20date', ops);
    expect(parse(content.text)).toMatchObject({ id: 'date_col', type: 'date', writable: true });
  });

  it('serves one item with display values', async () => {
    const content = await resolveResource(`monday://board/item/${itemId}`, ops);
    expect(parse(content.text)).toMatchObject({ id: itemId, name: 'Alpha', values: { status: 'Stuck' } });
  });

  it('serves items, metadata and column types', async () => {
    const items = parse((await resolveResource('monday://board/items', ops)).text);
    expect(Array.isArray(items) && items.length).toBe(1);

    const metadata = parse((await resolveResource('monday://board/metadata', ops)).text);
    expect(metadata).toMatchObject({ id: BOARD_ID, itemsCount: 1 });

    const types = parse((await resolveResource('monday://board/column_types', ops)).text);
    expect(types).toEqual(expect.arrayContaining([
      { type: 'color', handler: 'status', family: 'advanced', writable: true },
    ]));
  });

  it('rejects unknown URIs with the known ones', async () => {
    for (const uri of ['monday://board/schema/extra', 'monday://board/item/', 'other://board/schema', 'monday://board/nope']) {
      const error = await rejectionOf(resolveResource(uri, ops));
      expect(error).toBeInstanceOf(NotFoundError);
      if (error instanceof NotFoundError) {
        expect(error.kind).toBe('resource');
        expect(error.known).toContain('monday://board/item/{item_id}');
      }
    }
  });
});
