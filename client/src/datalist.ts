import {
  CartItem,
  DataListBlock,
  DeliveryDate,
  Favourite,
  Group,
  Item,
  Order,
  OrderPosition,
  SubGroup,
  Subscription,
  UserProfile,
} from './types';
import { OekoboxValidationError } from './errors';

/*
 * The shop answers catalog, cart and order calls with "DataLists": an array of
 * blocks `{ type, data }`, where every data row is a positional record. A row
 * starting with 0 marks the end of a list.
 */

type Row = unknown[];

function isBlock(value: unknown): value is DataListBlock {
  if (typeof value !== 'object' || value === null) return false;
  const block = value as Record<string, unknown>;
  return (
    typeof block.type === 'string' &&
    Array.isArray(block.data) &&
    block.data.every(row => Array.isArray(row))
  );
}

/** Validate a response as a DataList; anything else is rejected */
export function readBlocks(data: unknown, context: string): DataListBlock[] {
  if (!Array.isArray(data) || !data.every(isBlock)) {
    throw new OekoboxValidationError(
      `Unexpected ${context} response: expected a list of {type, data} blocks`,
    );
  }
  return data;
}

function isTerminator(row: Row): boolean {
  return row.length === 0 || row[0] === 0 || row[0] === -1;
}

/** All data rows of the given type, terminators dropped */
export function rowsOf(blocks: DataListBlock[], type: string): Row[] {
  return blocks
    .filter(block => block.type === type)
    .flatMap(block => block.data)
    .filter(row => !isTerminator(row));
}

// --- Cell readers ---

function invalid(type: string, row: Row, index: number, expected: string): never {
  throw new OekoboxValidationError(
    `Invalid ${type} row ${JSON.stringify(row)}: expected ${expected} at position ${index}`,
  );
}

function idAt(row: Row, index: number, type: string): string {
  const value = row[index];
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (typeof value === 'string' && value) return value;
  return invalid(type, row, index, 'an id');
}

function textAt(row: Row, index: number, type: string): string {
  const value = row[index];
  if (typeof value === 'string') return value;
  return invalid(type, row, index, 'a string');
}

function optionalTextAt(row: Row, index: number, type: string): string | null {
  const value = row[index];
  if (value === undefined || value === null || value === '') return null;
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return invalid(type, row, index, 'a string or nothing');
}

function toNumber(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value);
    if (Number.isFinite(n)) return n;
  }
  return null;
}

function numberAt(row: Row, index: number, type: string): number {
  return toNumber(row[index]) ?? invalid(type, row, index, 'a number');
}

function optionalNumberAt(row: Row, index: number, type: string): number | null {
  const value = row[index];
  if (value === undefined || value === null || value === '') return null;
  return toNumber(value) ?? invalid(type, row, index, 'a number or nothing');
}

function quantityAt(row: Row, index: number, type: string): number {
  const n = numberAt(row, index, type);
  return n >= 0 ? n : invalid(type, row, index, 'a quantity >= 0');
}

// --- Records ---

export function toGroup(row: Row): Group {
  return {
    id: idAt(row, 0, 'Group'),
    name: textAt(row, 1, 'Group'),
    info: optionalTextAt(row, 2, 'Group'),
    count: optionalNumberAt(row, 3, 'Group') ?? 0,
  };
}

export function toSubGroup(row: Row): SubGroup {
  return {
    id: idAt(row, 0, 'SubGroup'),
    name: textAt(row, 1, 'SubGroup'),
    parentId: idAt(row, 2, 'SubGroup'),
    count: optionalNumberAt(row, 3, 'SubGroup') ?? 0,
  };
}

/** Item rows carry 60-odd columns; only the ones the client exposes are read */
export function toItem(row: Row, subgroupId: string | null = null): Item {
  return {
    id: idAt(row, 0, 'Item'),
    name: textAt(row, 1, 'Item'),
    price: optionalNumberAt(row, 2, 'Item'),
    unit: optionalTextAt(row, 3, 'Item'),
    description: optionalTextAt(row, 4, 'Item'),
    groupId: optionalTextAt(row, 5, 'Item'),
    subgroupId,
    searchTerms: optionalTextAt(row, 24, 'Item'),
  };
}

export function toCartItem(row: Row): CartItem {
  return {
    itemId: idAt(row, 0, 'CartItem'),
    quantity: quantityAt(row, 1, 'CartItem'),
    unit: optionalTextAt(row, 2, 'CartItem'),
    note: optionalTextAt(row, 3, 'CartItem'),
  };
}

export function toPosition(row: Row): OrderPosition {
  return {
    itemId: idAt(row, 0, 'Position'),
    quantity: quantityAt(row, 1, 'Position'),
    unit: optionalTextAt(row, 2, 'Position'),
    price: optionalNumberAt(row, 3, 'Position'),
  };
}

/** ShopDate rows from the customer's date list: one per booked order */
export function toOrderSummary(row: Row): Order {
  return {
    id: idAt(row, 0, 'ShopDate'),
    status: optionalTextAt(row, 1, 'ShopDate'),
    deliveryDate: optionalTextAt(row, 2, 'ShopDate'),
    positions: [],
    totalAmount: optionalNumberAt(row, 9, 'ShopDate'),
  };
}

export function toOrder(row: Row, positions: OrderPosition[]): Order {
  return {
    id: idAt(row, 0, 'Order'),
    deliveryDate: optionalTextAt(row, 1, 'Order'),
    status: optionalTextAt(row, 2, 'Order'),
    positions,
    totalAmount: optionalNumberAt(row, 16, 'Order'),
  };
}

export function toDeliveryDate(row: Row): DeliveryDate {
  return {
    id: idAt(row, 0, 'DDate'),
    tourId: optionalTextAt(row, 1, 'DDate'),
    date: textAt(row, 2, 'DDate'),
  };
}

/** Favourite rows are `[entity, id]`; only item favourites are kept */
export function toFavourites(rows: Row[]): Favourite[] {
  return rows
    .filter(row => row[0] === 'Item')
    .map(row => ({ itemId: idAt(row, 1, 'Favourite') }));
}

export function toSubscription(row: Row): Subscription {
  return {
    id: idAt(row, 0, 'Subscription'),
    itemId: optionalTextAt(row, 1, 'Subscription'),
    amount: optionalNumberAt(row, 2, 'Subscription'),
    unit: optionalTextAt(row, 3, 'Subscription'),
    start: optionalTextAt(row, 4, 'Subscription'),
    end: optionalTextAt(row, 5, 'Subscription'),
    periodWeeks: optionalNumberAt(row, 6, 'Subscription'),
    lastDelivery: optionalTextAt(row, 7, 'Subscription'),
    tourId: optionalTextAt(row, 8, 'Subscription'),
    notes: optionalTextAt(row, 9, 'Subscription'),
  };
}

/** UserInfo rows are long; driver, payment and notification columns are not read */
export function toUserProfile(row: Row): UserProfile {
  return {
    authenticationState: optionalTextAt(row, 0, 'UserInfo'),
    userId: optionalTextAt(row, 1, 'UserInfo'),
    opener: optionalTextAt(row, 2, 'UserInfo'),
    firstName: optionalTextAt(row, 3, 'UserInfo'),
    lastName: optionalTextAt(row, 4, 'UserInfo'),
    email: optionalTextAt(row, 13, 'UserInfo'),
    phone: optionalTextAt(row, 14, 'UserInfo'),
    zip: optionalTextAt(row, 17, 'UserInfo'),
    city: optionalTextAt(row, 18, 'UserInfo'),
    street: optionalTextAt(row, 19, 'UserInfo'),
  };
}

// --- Whole responses ---

export type DataListRecord =
  | { type: 'Group'; record: Group }
  | { type: 'SubGroup'; record: SubGroup }
  | { type: 'Item'; record: Item }
  | { type: 'CartItem'; record: CartItem }
  | { type: 'Order'; record: Order }
  | { type: 'Position'; record: OrderPosition }
  | { type: 'ShopDate'; record: Order }
  | { type: 'DDate'; record: DeliveryDate }
  | { type: 'Favourite'; record: Favourite }
  | { type: 'Subscription'; record: Subscription }
  | { type: 'UserInfo'; record: UserProfile };

function decodeRow(type: string, row: Row): DataListRecord | null {
  switch (type) {
    case 'Group':
      return { type, record: toGroup(row) };
    case 'SubGroup':
      return { type, record: toSubGroup(row) };
    case 'Item':
      return { type, record: toItem(row) };
    case 'CartItem':
      return { type, record: toCartItem(row) };
    case 'Order':
      return { type, record: toOrder(row, []) };
    case 'Position':
      return { type, record: toPosition(row) };
    case 'ShopDate':
      return { type, record: toOrderSummary(row) };
    case 'DDate':
      return { type, record: toDeliveryDate(row) };
    case 'Favourite': {
      const [favourite] = toFavourites([row]);
      return favourite ? { type, record: favourite } : null;
    }
    case 'Subscription':
      return { type, record: toSubscription(row) };
    case 'UserInfo':
      return { type, record: toUserProfile(row) };
    default:
      return null;
  }
}

/**
 * Decode every row of a DataList response, in order, into tagged records.
 * Blocks of types the client does not model are skipped.
 */
export function decodeDataList(data: unknown): DataListRecord[] {
  const records: DataListRecord[] = [];
  for (const block of readBlocks(data, 'DataList')) {
    for (const row of rowsOf([block], block.type)) {
      const record = decodeRow(block.type, row);
      if (record) records.push(record);
    }
  }
  return records;
}

export function decodeCart(data: unknown): CartItem[] {
  return rowsOf(readBlocks(data, 'cart'), 'CartItem').map(toCartItem);
}

/**
 * Decode an Order response. When the shop sends no Position rows the
 * `fallbackPositions` are used instead.
 */
export function decodeOrder(data: unknown, fallbackPositions: OrderPosition[] = []): Order | null {
  const blocks = readBlocks(data, 'order');
  const [orderRow] = rowsOf(blocks, 'Order');
  if (!orderRow) return null;
  const positionRows = rowsOf(blocks, 'Position');
  const positions = positionRows.length > 0 ? positionRows.map(toPosition) : fallbackPositions;
  return toOrder(orderRow, positions);
}
