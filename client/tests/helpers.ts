export const SHOP_ID = 'test_shop';
export const SHOP_PATH = `/v3/shop/${SHOP_ID}`;
export const BASE_URL = `https://oekobox-online.de${SHOP_PATH}`;
export const API = `${BASE_URL}/api`;

export const USERNAME = 'tester@example.com';
export const PASSWORD = 'test-secret';
export const SESSION_ID = 'test-session-1';

export interface FakeReply {
  status?: number;
  /** Serialised as JSON */
  body?: unknown;
  /** Sent verbatim instead of `body` */
  text?: string;
  headers?: Record<string, string>;
}

export interface RecordedCall {
  method: string;
  url: URL;
}

export type RouteHandler = (url: URL, init?: RequestInit) => FakeReply;

const NOT_FOUND: FakeReply = { status: 404, body: { error: 'Not found' } };

export function toResponse(reply: FakeReply): Response {
  const text = reply.text ?? (reply.body === undefined ? '' : JSON.stringify(reply.body));
  return new Response(text, {
    status: reply.status ?? 200,
    headers: {
      'Content-Type': reply.text === undefined ? 'application/json' : 'text/plain',
      ...reply.headers,
    },
  });
}

/**
 * Build a mock fetch that maps `METHOD /path` keys (relative to the test
 * shop, `*` suffix for a prefix) to reply factories. Every call is recorded.
 */
export function mockFetch(
  routes: Record<string, RouteHandler>,
  calls: RecordedCall[] = [],
): typeof fetch {
  return async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = new URL(input.toString());
    const method = init?.method ?? 'GET';
    calls.push({ method, url });

    for (const [key, handler] of Object.entries(routes)) {
      const [routeMethod, routePath] = key.split(' ');
      if (routeMethod !== method) continue;
      const full = `${SHOP_PATH}${routePath}`;
      const matches = full.endsWith('*')
        ? url.pathname.startsWith(full.slice(0, -1))
        : url.pathname === full;
      if (matches) return toResponse(handler(url, init));
    }
    return toResponse(NOT_FOUND);
  };
}

// --- Catalog fixtures ---

/** Item rows put search terms at position 24 */
function itemRow(
  id: number,
  name: string,
  price: number | string,
  unit: string,
  description: string | null,
  groupId: number,
  searchTerms: string | null = null,
): unknown[] {
  const row: unknown[] = [id, name, price, unit, description, groupId];
  while (row.length < 24) row.push(null);
  row.push(searchTerms);
  return row;
}

export const GROUPS_RESPONSE = [
  { type: 'Group', version: 2, cnt: 2, data: [[1, 'Gemüse', 'Frisch vom Feld', 3], [2, 'Brot', '', 1], [0]] },
  { type: 'SubGroup', data: [[11, 'Wurzelgemüse', 1, 2], [21, 'Sauerteig', 2, 1], [0]] },
];

export const ITEM_ROWS = [
  itemRow(1042, 'Karotten', 2.49, 'kg', 'Bunde aus der Region', 1, 'möhren rüebli'),
  itemRow(1043, 'Pastinaken', 3.1, 'kg', null, 1),
  itemRow(1044, 'Rote Bete', '1.99', 'kg', 'Vorgekocht', 1),
  itemRow(2001, 'Roggenbrot', 4.2, 'Stk', 'Sauerteigbrot 750g', 2, 'sourdough'),
];

const SUBGROUP_MEMBERS: Record<string, number[]> = {
  '11': [1042, 1044],
  '21': [2001],
};

/** UserInfo row: email at 13, phone at 14, zip/city/street at 17-19 */
export const USER_ROW: unknown[] = [
  'AUTH', 40021, 'Frau', 'Erika', 'Muster', 0, null, null, null, 0, null, null, null,
  USERNAME, '030 1234567', null, 'DE', '10115', 'Berlin', 'Feldweg 3',
];

export const SUBSCRIPTION_ROWS: unknown[][] = [
  [501, 1042, '2', 'kg', '2026-09-01', '', 2, '2026-10-16', 3, 'ohne Kraut'],
  [502, -7, '', null, '2026-10-01', '2026-12-31', 1, null, 3, null],
];

const DELIVERY_DATE = '2026-10-23';
const DELIVERY_COST = 2.5;

interface CartLine {
  amount: number;
  unit: string | null;
  note: string | null;
}

interface StoredOrder {
  id: number;
  state: string;
  ddate: string;
  positions: unknown[][];
  total: number;
}

export interface FakeShopOptions {
  /** Answer logout with HTTP 500 */
  failLogout?: boolean;
  /** Answer cart/add with the `no_ddate` result code */
  requireDeliveryDate?: boolean;
  /** Answer cart/submit without Position rows */
  omitPositions?: boolean;
  /** Answer api/dates1 with HTTP 404, leaving only the shop-root dates1 */
  noApiDates?: boolean;
  /** Answer api/client/subscriptions with HTTP 404 */
  noSubscriptionRoute?: boolean;
}

/**
 * In-process stand-in for one shop: logon with a session cookie, a catalog,
 * a cart that accumulates amounts per item, and order submission.
 */
export class FakeShop {
  readonly calls: RecordedCall[] = [];
  readonly cart = new Map<string, CartLine>();
  readonly orders: StoredOrder[] = [];
  readonly favourites = new Set<string>(['1042']);
  readonly fetch: typeof fetch;
  private loggedIn = false;
  private nextOrderId = 101;

  constructor(private options: FakeShopOptions = {}) {
    this.fetch = mockFetch(
      {
        'GET /api/logon': url => this.logon(url),
        'GET /api/logout': () => this.logout(),
        'GET /api/groups2': () => ({ body: GROUPS_RESPONSE }),
        'GET /api/items1/*': url => ({ body: this.items(url) }),
        'GET /api/cart/show': url => this.withSession(url, () => ({ body: this.cartBlocks() })),
        'POST /api/cart/add': url => this.withSession(url, () => this.addToCart(url)),
        'POST /api/cart/remove': url => this.withSession(url, () => this.removeFromCart(url)),
        'GET /api/client/resetcart': url => this.withSession(url, () => {
          this.cart.clear();
          return { text: '' };
        }),
        'POST /api/cart/submit': url => this.withSession(url, () => this.submit()),
        'GET /dates1': url => this.withSession(url, () => ({ body: this.shopDates() })),
        'GET /api/order2/*': url => this.withSession(url, () => this.order(url)),
        'GET /api/dates1': url => this.withSession(url, () => (this.options.noApiDates
          ? NOT_FOUND
          : { body: [{ type: 'DDate', data: [[7, 3, DELIVERY_DATE], [8, null, '2026-10-30'], [0]] }] })),
        'GET /api/user': url => this.withSession(url, () => ({
          body: [{ type: 'UserInfo', data: [USER_ROW] }],
        })),
        'GET /api/client/subscriptions': url => this.withSession(url, () => (this.options.noSubscriptionRoute
          ? NOT_FOUND
          : { body: [{ type: 'Subscription', data: [...SUBSCRIPTION_ROWS, [0]] }] })),
        'GET /api/client/favourites': url => this.withSession(url, () => ({
          body: [{
            type: 'Favourite',
            data: [...[...this.favourites].map(id => ['Item', Number(id)]), ['Group', 1], [0]],
          }],
        })),
        'GET /api/client/addfavourites': url => this.withSession(url, () => {
          this.favourites.add(url.searchParams.get('id') ?? '');
          return { body: { result: 'ok' } };
        }),
        'GET /api/client/dropfavourites': url => this.withSession(url, () => {
          this.favourites.delete(url.searchParams.get('id') ?? '');
          return { body: { result: 'ok' } };
        }),
      },
      this.calls,
    );
  }

  /** Paths (relative to the shop) of every call so far */
  paths(): string[] {
    return this.calls.map(call => call.url.pathname.slice(SHOP_PATH.length));
  }

  private logon(url: URL): FakeReply {
    const cid = url.searchParams.get('cid');
    const pass = url.searchParams.get('pass');
    if (cid !== USERNAME) {
      return { body: { action: 'Logon', result: 'no_such_user' } };
    }
    if (pass !== PASSWORD) {
      return { body: { action: 'Logon', result: 'wrong_password' } };
    }
    this.loggedIn = true;
    return {
      body: { action: 'Logon', result: 'ok', pcgifversion: 7, shopversion: '3.2.1' },
      headers: { 'Set-Cookie': `JSESSIONID=${SESSION_ID}; Path=/; HttpOnly` },
    };
  }

  private logout(): FakeReply {
    if (this.options.failLogout) {
      return { status: 500, body: { error: 'logout unavailable' } };
    }
    this.loggedIn = false;
    return { text: 'ok' };
  }

  private withSession(url: URL, handler: () => FakeReply): FakeReply {
    if (!this.loggedIn || url.searchParams.get('x-oekobox-sid') !== SESSION_ID) {
      return { status: 401, text: 'Unauthorized' };
    }
    return handler();
  }

  private items(url: URL): unknown[] {
    const group = Number(url.pathname.split('/').pop());
    const subgroup = url.searchParams.get('subgroup');
    const rows = ITEM_ROWS.filter(row => {
      if (group !== -1 && row[5] !== group) return false;
      if (subgroup !== null && !(SUBGROUP_MEMBERS[subgroup] ?? []).includes(Number(row[0]))) return false;
      return true;
    });
    return [{ type: 'Item', cnt: rows.length, data: [...rows, [0]] }];
  }

  private findItem(id: string): unknown[] | undefined {
    return ITEM_ROWS.find(row => String(row[0]) === id);
  }

  private cartBlocks(): unknown[] {
    const rows = [...this.cart.entries()].map(([id, line]) => [Number(id), line.amount, line.unit, line.note]);
    return [{ type: 'CartItem', data: [...rows, [0]] }];
  }

  private addToCart(url: URL): FakeReply {
    if (this.options.requireDeliveryDate) {
      return { body: { result: 'no_ddate' } };
    }
    const id = url.searchParams.get('id') ?? '';
    const item = this.findItem(id);
    if (!item) {
      return { body: { result: 'no_such_item' } };
    }
    const amount = Number(url.searchParams.get('amount'));
    const existing = this.cart.get(id);
    this.cart.set(id, {
      amount: (existing?.amount ?? 0) + amount,
      unit: url.searchParams.get('unit') ?? existing?.unit ?? String(item[3]),
      note: url.searchParams.get('note') ?? existing?.note ?? null,
    });
    return { body: this.cartBlocks() };
  }

  private removeFromCart(url: URL): FakeReply {
    const id = url.searchParams.get('id');
    const pos = url.searchParams.get('pos');
    if (id !== null) {
      this.cart.delete(id);
    } else if (pos !== null) {
      const key = [...this.cart.keys()][Number(pos)];
      if (key !== undefined) this.cart.delete(key);
    }
    return { body: this.cartBlocks() };
  }

  private submit(): FakeReply {
    if (this.cart.size === 0) {
      return { body: { result: 'empty' } };
    }
    let sum = 0;
    const positions = [...this.cart.entries()].map(([id, line]) => {
      const price = Number(this.findItem(id)?.[2] ?? 0);
      sum += price * line.amount;
      return [Number(id), line.amount, line.unit, price];
    });
    const order: StoredOrder = {
      id: this.nextOrderId++,
      state: 'open',
      ddate: DELIVERY_DATE,
      positions,
      total: Math.round((sum + DELIVERY_COST) * 100) / 100,
    };
    this.orders.push(order);
    this.cart.clear();
    return { body: this.orderBlocks(order, !this.options.omitPositions) };
  }

  private orderBlocks(order: StoredOrder, withPositions: boolean): unknown[] {
    const row: unknown[] = [order.id, order.ddate, order.state];
    while (row.length < 16) row.push(null);
    row.push(order.total);
    const blocks: unknown[] = [{ type: 'Order', data: [row, [0]] }];
    if (withPositions) {
      blocks.push({ type: 'Position', data: [...order.positions, [0]] });
    }
    return blocks;
  }

  private shopDates(): unknown[] {
    const rows = this.orders.map(o => [o.id, o.state, o.ddate, 0, 0, 0, 0, 0, 0, o.total]);
    return [
      { type: 'ShopDate', data: [[-1, 'free', '2026-10-30', 0, 0, 0, 0, 0, 0, null], ...rows, [0]] },
      { type: 'DDate', data: [[9, 4, '2026-11-06'], [0]] },
      { type: 'Subscription', data: [SUBSCRIPTION_ROWS[0], [0]] },
    ];
  }

  private order(url: URL): FakeReply {
    const id = Number(url.pathname.split('/').pop());
    const order = this.orders.find(o => o.id === id);
    if (!order) {
      return { status: 404, body: { error: 'no such order' } };
    }
    return { body: this.orderBlocks(order, true) };
  }
}
