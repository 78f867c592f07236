import { beforeEach, describe, expect, it, vi } from 'vitest';
import { BoardOperations, toDisplayItem } from '../src/board-operations.js';
import { BoardCache, FRESHNESS_WINDOW_MS } from '../src/cache.js';
import { NotFoundError, UpstreamError, ValidationError } from '../src/errors.js';
import { MondayError, MondayErrorType } from '../src/monday-client.js';
import { BOARD_ID, DEFAULT_COLUMNS, FakeMondayGateway } from './support/fake-monday.js';
import { fakeClock, rejectionOf } from './support/helpers.js';

let gateway: FakeMondayGateway;
let ops: BoardOperations;
let alpha: string;
let beta: string;
let gamma: string;

beforeEach(() => {
  gateway = new FakeMondayGateway();
  ops = new BoardOperations(gateway, new BoardCache(), BOARD_ID, { pageSize: 2 });

  alpha = gateway.seedItem('Alpha', {
    status: { value: { index: 1 }, text: 'Done' },
    budget: { value: '100', text: '100' },
    date_col: { value: { date: '2025-03-09' }, text: '2025-03-09' },
  });
  beta = gateway.seedItem('Beta', {
    status: { value: { index: 0 }, text: 'Working on it' },
  });
  // no rendered text: matched through the status handler
  gamma = gateway.seedItem('Gamma', {
    status: { value: { index: 1 } },
  }, 'completed');
});

describe('schema reads', () => {
  it('drops archived columns and groups', async () => {
    const schema = await ops.getSchema();

    expect(schema.columns.map((c) => c.id)).toEqual(DEFAULT_COLUMNS.map((c) => c.id));
    expect(schema.groups.map((g) => g.id)).toEqual(['topics', 'completed']);
    expect(schema.board).toEqual({
      id: BOARD_ID,
      name: 'Product roadmap',
      description: 'Quarterly plan',
      kind: 'public',
      state: 'active',
      permissions: 'everyone',
      workspaceId: '77',
    });
    expect(schema.owner).toEqual({ id: '1', name: 'Owner One', email: 'owner@example.com' });
  });

  it('serves the schema from cache', async () => {
    await ops.getSchema();
    await ops.getColumns();
    expect(gateway.callsOf('get_board_schema')).toHaveLength(1);
  });

  it('resolves a column by id or title', async () => {
    expect((await ops.getColumn('budget')).title).toBe('Budget');
    expect((await ops.getColumn('due date')).id).toBe('date_col');

    const error = await rejectionOf(ops.getColumn('priority'));
    expect(error).toBeInstanceOf(NotFoundError);
  });

  it('reads metadata without null subscribers', async () => {
    const metadata = await ops.getMetadata();
    expect(metadata.itemsCount).toBe(3);
    expect(metadata.workspace).toEqual({ id: '77', name: 'Main workspace' });
    expect(metadata.subscribers).toEqual([{ id: '1', name: 'Owner One', email: 'owner@example.com' }]);
    expect(metadata.views).toEqual([{ id: '9', name: 'Main table', type: 'table' }]);
  });

  it('reports a board the token cannot see as not found', async () => {
    const other = new BoardOperations(gateway, new BoardCache(), '999');
    const error = await rejectionOf(other.getSchema());

    expect(error).toBeInstanceOf(NotFoundError);
    if (error instanceof NotFoundError) expect(error.kind).toBe('board');
    expect(gateway.callsOf('get_board_schema_fallback')).toHaveLength(0);
  });
});

describe('fallback reads', () => {
  it('uses the fallback query when the primary one fails', async () => {
    gateway.failNext('get_board_schema', new MondayError(MondayErrorType.API_ERROR, 'Field not supported'));

    const schema = await ops.getSchema();

    expect(schema.board.name).toBe('Product roadmap');
    expect(gateway.callsOf('get_board_schema_fallback')).toHaveLength(1);
  });

  it('reports both failures when the fallback fails too', async () => {
    gateway.failNext('get_board_items', new MondayError(MondayErrorType.API_ERROR, 'Complexity too high'));
    gateway.failNext('get_board_items_fallback', new MondayError(MondayErrorType.TIMEOUT, 'Request timeout'));

    const error = await rejectionOf(ops.getItems());

    expect(error).toBeInstanceOf(UpstreamError);
    if (error instanceof UpstreamError) {
      expect(error.message).toBe('get_board_items failed: primary: Complexity too high; fallback: Request timeout');
      expect(error.upstreamType).toBe('TIMEOUT');
      expect(error.payloadShape).toEqual({ boardIds: 'array(1)', limit: 'number' });
    }
  });

  it('does not fall back on authentication failures', async () => {
    gateway.failNext('get_board_schema', new MondayError(MondayErrorType.AUTH_ERROR, 'Not authenticated'));

    const error = await rejectionOf(ops.getSchema());

    expect(error).toBeInstanceOf(UpstreamError);
    if (error instanceof UpstreamError) expect(error.upstreamType).toBe('AUTH_ERROR');
    expect(gateway.callsOf('get_board_schema_fallback')).toHaveLength(0);
  });

  it('caches nothing after a failed read', async () => {
    gateway.failNext('get_board_items', new MondayError(MondayErrorType.AUTH_ERROR, 'Not authenticated'));
    await rejectionOf(ops.getItems());

    expect(await ops.getItems()).toHaveLength(3);
  });
});

describe('item reads', () => {
  it('walks every page', async () => {
    const items = await ops.getItems();

    expect(items.map((i) => i.name)).toEqual(['Alpha', 'Beta', 'Gamma']);
    expect(gateway.callsOf('get_board_items')).toHaveLength(1);
    expect(gateway.callsOf('get_board_items_next_page')).toHaveLength(1);
  });

  it('stops at the item limit', async () => {
    const limited = new BoardOperations(gateway, new BoardCache(), BOARD_ID, { maxItems: 2, pageSize: 10 });
    const items = await limited.getItems();

    expect(items.map((i) => i.name)).toEqual(['Alpha', 'Beta']);
    expect(gateway.callsOf('get_board_items_next_page')).toHaveLength(0);
  });

  it('simplifies column values for display', async () => {
    const [first] = await ops.getDisplayItems();

    expect(first).toEqual({
      id: alpha,
      name: 'Alpha',
      group: { id: 'topics', title: 'Topics' },
      created_at: '2025-03-01T09:00:00Z',
      updated_at: '2025-03-02T09:00:00Z',
      values: {
        status: 'Done',
        date_col: '2025-03-09',
        budget: 100,
        notes: null,
        total: null,
        widget: null,
      },
    });
  });

  it('reads one item by id', async () => {
    const item = await ops.getItem(beta);
    expect(item.name).toBe('Beta');
    expect(item.groupId).toBe('topics');

    const missing = await rejectionOf(ops.getItem('424242'));
    expect(missing).toBeInstanceOf(NotFoundError);

    const malformed = await rejectionOf(ops.getItem('abc'));
    expect(malformed).toBeInstanceOf(NotFoundError);
    expect(gateway.callsOf('get_item').map((c) => c.variables.itemIds)).toEqual([[beta], ['424242']]);
  });

  it('refetches items once the freshness window has passed', async () => {
    const clock = fakeClock();
    const timed = new BoardOperations(gateway, new BoardCache({ now: clock.now }), BOARD_ID);

    await timed.getItems();
    clock.advance(FRESHNESS_WINDOW_MS - 1000);
    await timed.getItems();
    expect(gateway.callsOf('get_board_items')).toHaveLength(1);

    clock.advance(1000);
    await timed.getItems();
    expect(gateway.callsOf('get_board_items')).toHaveLength(2);
  });
});

describe('searchItems', () => {
  it('matches status labels by text and by index', async () => {
    const items = await ops.searchItems('Status', 'Done');
    expect(items.map((i) => i.id)).toEqual([alpha, gamma]);
  });

  it('is case-sensitive for labels', async () => {
    expect(await ops.searchItems('status', 'done')).toEqual([]);
  });

  it('searches item names, numbers and dates', async () => {
    expect((await ops.searchItems('name', 'Beta')).map((i) => i.id)).toEqual([beta]);
    expect((await ops.searchItems('Budget', 100)).map((i) => i.id)).toEqual([alpha]);
    expect((await ops.searchItems('date_col', '2025-03-09')).map((i) => i.id)).toEqual([alpha]);
  });

  it('matches nothing for a blank value', async () => {
    gateway.seedItem('Delta', { notes: { value: null, text: '' } });

    expect(await ops.searchItems('notes', '   ')).toEqual([]);
    expect(await ops.searchItems('name', '')).toEqual([]);
  });

  it('lists the valid fields for an unknown one', async () => {
    const error = await rejectionOf(ops.searchItems('Priority', 'High'));

    expect(error).toBeInstanceOf(NotFoundError);
    if (error instanceof NotFoundError) {
      expect(error.kind).toBe('field');
      expect(error.known).toEqual([
        'name (Name)',
        'status (Status)',
        'date_col (Due date)',
        'budget (Budget)',
        'notes (Notes)',
        'total (Total)',
        'widget (Widget)',
      ]);
    }
  });
});

describe('validateColumnValues', () => {
  it('checks every value without writing', async () => {
    const report = await ops.validateColumnValues({ Status: 'done', Budget: '12' });

    expect(report).toEqual({
      valid: false,
      results: [
        {
          field: 'status',
          title: 'Status',
          type: 'status',
          strict: true,
          ok: false,
          reason: '"done" is not one of the configured options (matching is case-sensitive)',
          suggestions: ['Done', 'Stuck', 'Working on it'],
        },
        { field: 'budget', title: 'Budget', type: 'numbers', strict: true, ok: true, wire_value: '12' },
      ],
    });
    expect(gateway.calls.map((c) => c.operation)).toEqual(['get_board_schema']);
  });

  it('suggests column titles for unknown references', async () => {
    const report = await ops.validateColumnValues({ Budgett: 5 });
    expect(report.valid).toBe(false);
    expect(report.results[0].reason).toBe('Unknown column: Budgett');
    expect(report.results[0].suggestions?.[0]).toBe('Budget');
  });
});

describe('createItem', () => {
  it('is visible to the next read even when an items read overlapped the write', async () => {
    const release = gateway.holdNext('get_board_items');
    const overlapping = ops.getItems();
    await vi.waitFor(() => expect(gateway.callsOf('get_board_items')).toHaveLength(1));

    await ops.createItem('Task A');
    release();
    await overlapping;

    const names = (await ops.getItems()).map((item) => item.name);
    expect(names).toEqual(['Alpha', 'Beta', 'Gamma', 'Task A']);
  });

  it('sends normalized values and shows up in the next read', async () => {
    await ops.getItems();

    const created = await ops.createItem('Delta', { Status: 'Done', 'Due date': '2025-03-09' });

    expect(created).toEqual({
      id: '5003',
      name: 'Delta',
      group_id: 'topics',
      column_values: { status: { index: 1 }, date_col: { date: '2025-03-09' } },
      unvalidated_fields: [],
    });
    expect(gateway.callsOf('create_item')[0].variables).toEqual({
      boardId: BOARD_ID,
      itemName: 'Delta',
      groupId: 'topics',
      columnValues: '{"status":{"index":1},"date_col":{"date":"2025-03-09"}}',
    });

    const delta = (await ops.getDisplayItems()).find((item) => item.id === '5003');
    expect(delta?.values.status).toBe('Done');
    expect(delta?.values.date_col).toBe('2025-03-09');
    expect(gateway.callsOf('get_board_items')).toHaveLength(2);
  });

  it('rejects an ambiguous date before anything is sent', async () => {
    const error = await rejectionOf(ops.createItem('Delta', { 'Due date': '03/09/2025' }));

    expect(error).toBeInstanceOf(ValidationError);
    if (error instanceof ValidationError) {
      expect(error.field).toBe('date_col');
      expect(error.failures[0].reason).toBe('Ambiguous date format "03/09/2025"; use ISO 8601 YYYY-MM-DD');
    }
    expect(gateway.callsOf('create_item')).toHaveLength(0);
  });

  it('rejects writes to read-only columns', async () => {
    const error = await rejectionOf(ops.createItem('Delta', { Total: 10 }));

    expect(error).toBeInstanceOf(ValidationError);
    if (error instanceof ValidationError) {
      expect(error.failures[0].reason).toBe('Column "Total" is read-only: computed field');
    }
  });

  it('rejects unknown columns and groups', async () => {
    const column = await rejectionOf(ops.createItem('Delta', { Priority: 'High' }));
    expect(column).toBeInstanceOf(NotFoundError);
    if (column instanceof NotFoundError) expect(column.kind).toBe('column');

    const group = await rejectionOf(ops.createItem('Delta', {}, 'backlog'));
    expect(group).toBeInstanceOf(NotFoundError);
    if (group instanceof NotFoundError) expect(group.known).toEqual(['topics', 'completed']);
  });

  it('requires a name', async () => {
    const error = await rejectionOf(ops.createItem('   '));
    expect(error).toBeInstanceOf(ValidationError);
    if (error instanceof ValidationError) expect(error.field).toBe('name');
  });

  it('resolves groups by title and flags passthrough columns', async () => {
    const created = await ops.createItem('Delta', { Widget: 'blue' }, 'Completed');

    expect(created.group_id).toBe('completed');
    expect(created.column_values).toEqual({ widget: 'blue' });
    expect(created.unvalidated_fields).toEqual(['widget']);
  });

  it('drops cached items even when the write fails', async () => {
    await ops.getItems();
    gateway.failNext('create_item', new MondayError(MondayErrorType.API_ERROR, 'Internal error'));

    const error = await rejectionOf(ops.createItem('Delta'));
    expect(error).toBeInstanceOf(UpstreamError);
    if (error instanceof UpstreamError) {
      expect(error.message).toBe('create_item failed: Internal error');
      expect(error.payloadShape).toEqual({
        boardId: 'string',
        itemName: 'string',
        columnValues: 'json{}',
        groupId: 'string',
      });
    }

    await ops.getItems();
    expect(gateway.callsOf('get_board_items')).toHaveLength(2);
  });
});

describe('updateItem', () => {
  it('changes values and shows them in the next read', async () => {
    await ops.getItems();

    const result = await ops.updateItem(beta, { Notes: '  Ship   it ', status: 'Stuck' });

    expect(result).toEqual({
      id: beta,
      updated_columns: ['notes', 'status'],
      column_values: { notes: 'Ship it', status: { index: 2 } },
      unvalidated_fields: [],
    });
    const updated = (await ops.getDisplayItems()).find((item) => item.id === beta);
    expect(updated?.values.notes).toBe('Ship it');
    expect(updated?.values.status).toBe('Stuck');
  });

  it('reports an unknown item as not found', async () => {
    const error = await rejectionOf(ops.updateItem('424242', { Notes: 'x' }));

    expect(error).toBeInstanceOf(NotFoundError);
    if (error instanceof NotFoundError) {
      expect(error.kind).toBe('item');
      expect(error.id).toBe('424242');
    }
  });

  it('rejects malformed ids and empty updates', async () => {
    expect(await rejectionOf(ops.updateItem('abc', { Notes: 'x' }))).toBeInstanceOf(NotFoundError);
    expect(await rejectionOf(ops.updateItem(beta, {}))).toBeInstanceOf(ValidationError);
    expect(gateway.callsOf('change_multiple_column_values')).toHaveLength(0);
  });
});

describe('deleteItems', () => {
  it('deletes every match and reports failures per item', async () => {
    gateway.failDeleteOf(gamma);

    const report = await ops.deleteItems('Status', 'Done');

    expect(report).toEqual({
      matched: 2,
      deleted: [{ id: alpha, name: 'Alpha' }],
      failed: [{ id: gamma, name: 'Gamma', error: 'Item is locked' }],
    });
    expect((await ops.getItems()).map((i) => i.id)).toEqual([beta, gamma]);
  });

  it('deletes nothing for a blank value', async () => {
    gateway.seedItem('Delta', { notes: { value: null, text: '' } });

    const report = await ops.deleteItems('notes', '   ');

    expect(report).toEqual({ matched: 0, deleted: [], failed: [] });
    expect(gateway.callsOf('delete_item')).toHaveLength(0);
  });

  it('deletes nothing when nothing matches', async () => {
    const report = await ops.deleteItems('name', 'Omega');

    expect(report).toEqual({ matched: 0, deleted: [], failed: [] });
    expect(gateway.callsOf('delete_item')).toHaveLength(0);
  });
});

describe('toDisplayItem', () => {
  it('shows null for columns without a cell', () => {
    const item = {
      id: '1',
      name: 'Bare',
      groupId: null,
      groupTitle: null,
      createdAt: null,
      updatedAt: null,
      columnValues: {},
    };
    const columns = [{ id: 'notes', title: 'Notes', type: 'text', settings: {} }];

    expect(toDisplayItem(columns, item)).toEqual({
      id: '1',
      name: 'Bare',
      group: null,
      created_at: null,
      updated_at: null,
      values: { notes: null },
    });
  });
});
