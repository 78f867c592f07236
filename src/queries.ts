/**
 * GraphQL documents sent to monday.com. Each read has a primary document with
 * the exact shape the server needs and a smaller fallback that older API
 * versions and restricted tokens still answer.
 */

export interface GraphQLOperation {
  /** Used in logs, metrics and UpstreamError messages */
  name: string;
  query: string;
}

const CELL_FIELDS = `
  id
  type
  text
  value
  ... on FormulaValue { display_value }
  ... on MirrorValue { display_value }
  ... on BoardRelationValue { display_value }
`;

const ITEM_FIELDS = `
  id
  name
  board { id }
  group { id title }
  created_at
  updated_at
  column_values { ${CELL_FIELDS} }
`;

export const BOARD_SCHEMA_QUERY: GraphQLOperation = {
  name: 'get_board_schema',
  query: `query BoardSchema($boardIds: [ID!]) {
  boards(ids: $boardIds) {
    id
    name
    description
    state
    board_kind
    permissions
    workspace_id
    owners { id name }
    tags { id name color }
    groups { id title color position archived }
    columns { id title type settings_str description archived width }
  }
}`,
};

export const BOARD_SCHEMA_FALLBACK_QUERY: GraphQLOperation = {
  name: 'get_board_schema_fallback',
  query: `query BoardSchemaBasic($boardIds: [ID!]) {
  boards(ids: $boardIds) {
    id
    name
    groups { id title }
    columns { id title type settings_str }
  }
}`,
};

export const BOARD_METADATA_QUERY: GraphQLOperation = {
  name: 'get_board_metadata',
  query: `query BoardMetadata($boardIds: [ID!]) {
  boards(ids: $boardIds) {
    id
    name
    description
    items_count
    updated_at
    workspace { id name }
    owners { id name email }
    subscribers { id name email }
    views { id name type }
    tags { id name color }
    groups { id title color position archived }
  }
}`,
};

export const BOARD_METADATA_FALLBACK_QUERY: GraphQLOperation = {
  name: 'get_board_metadata_fallback',
  query: `query BoardMetadataBasic($boardIds: [ID!]) {
  boards(ids: $boardIds) {
    id
    name
    description
    groups { id title }
  }
}`,
};

export const BOARD_ITEMS_QUERY: GraphQLOperation = {
  name: 'get_board_items',
  query: `query BoardItems($boardIds: [ID!], $limit: Int!) {
  boards(ids: $boardIds) {
    items_page(limit: $limit) {
      cursor
      items { ${ITEM_FIELDS} }
    }
  }
}`,
};

export const NEXT_ITEMS_QUERY: GraphQLOperation = {
  name: 'get_board_items_next_page',
  query: `query NextItems($cursor: String!, $limit: Int!) {
  next_items_page(cursor: $cursor, limit: $limit) {
    cursor
    items { ${ITEM_FIELDS} }
  }
}`,
};

/** Single page, no fragments */
export const BOARD_ITEMS_FALLBACK_QUERY: GraphQLOperation = {
  name: 'get_board_items_fallback',
  query: `query BoardItemsBasic($boardIds: [ID!], $limit: Int!) {
  boards(ids: $boardIds) {
    items_page(limit: $limit) {
      items {
        id
        name
        group { id title }
        column_values { id text value }
      }
    }
  }
}`,
};

export const ITEM_QUERY: GraphQLOperation = {
  name: 'get_item',
  query: `query Item($itemIds: [ID!]) {
  items(ids: $itemIds) { ${ITEM_FIELDS} }
}`,
};

export const ITEM_FALLBACK_QUERY: GraphQLOperation = {
  name: 'get_item_fallback',
  query: `query ItemBasic($itemIds: [ID!]) {
  items(ids: $itemIds) {
    id
    name
    board { id }
    column_values { id text value }
  }
}`,
};

export const CREATE_ITEM_MUTATION: GraphQLOperation = {
  name: 'create_item',
  query: `mutation CreateItem($boardId: ID!, $groupId: String, $itemName: String!, $columnValues: JSON) {
  create_item(board_id: $boardId, group_id: $groupId, item_name: $itemName, column_values: $columnValues) {
    id
    name
  }
}`,
};

export const UPDATE_ITEM_MUTATION: GraphQLOperation = {
  name: 'change_multiple_column_values',
  query: `mutation UpdateItem($boardId: ID!, $itemId: ID!, $columnValues: JSON!) {
  change_multiple_column_values(board_id: $boardId, item_id: $itemId, column_values: $columnValues) {
    id
  }
}`,
};

export const DELETE_ITEM_MUTATION: GraphQLOperation = {
  name: 'delete_item',
  query: `mutation DeleteItem($itemId: ID!) {
  delete_item(item_id: $itemId) {
    id
  }
}`,
};
