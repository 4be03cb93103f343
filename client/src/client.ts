import {
  AddToCartOptions,
  CartItem,
  CartLineRef,
  CustomerInfo,
  DeliveryDate,
  Favourite,
  Group,
  Item,
  OekoboxClientConfig,
  Order,
  OrderPosition,
  Shop,
  ShopListOptions,
  SubGroup,
  Subscription,
  UserInfo,
  UserProfile,
} from './types';
import { Transport } from './transport';
import { getAvailableShops, resolveShopUrl } from './discover';
import { logon, endSession } from './session';
import {
  decodeCart,
  decodeOrder,
  readBlocks,
  rowsOf,
  toDeliveryDate,
  toFavourites,
  toGroup,
  toItem,
  toOrderSummary,
  toSubGroup,
  toSubscription,
  toUserProfile,
} from './datalist';
import { OekoboxApiError, OekoboxAuthenticationError, OekoboxValidationError } from './errors';

const DEFAULT_USER_AGENT = 'oekobox-online-client/0.1.0';
const ALL_GROUPS = '-1';

function isNotFound(err: unknown): err is OekoboxApiError {
  return err instanceof OekoboxApiError && err.statusCode === 404;
}

/**
 * Async client for one Ökobox Online shop.
 *
 * Usage:
 *   const client = new OekoboxClient({ shopId: 'demo', username: 'me@example.com', password: '…' });
 *   const order = await client.withSession(async c => {
 *     await c.addToCart('1042', 2);
 *     return c.createOrder();
 *   });
 */
export class OekoboxClient {
  readonly shopId: string;
  readonly username: string;
  private password: string;
  private transport: Transport;
  private currentUser: UserInfo | null = null;

  constructor(config: OekoboxClientConfig) {
    const timeout = config.timeout ?? 30;
    if (!Number.isFinite(timeout) || timeout <= 0) {
      throw new OekoboxValidationError(`timeout must be a positive number of seconds, got ${timeout}`);
    }

    this.shopId = config.shopId;
    this.username = config.username;
    this.password = config.password;

    const baseUrl = resolveShopUrl(config.shopId, config.baseUrl);
    if (baseUrl.startsWith('http://') && !config.allowInsecure) {
      console.warn(
        `[OekoboxClient] Connecting over insecure HTTP to ${baseUrl}. ` +
        'Set { allowInsecure: true } to suppress this warning.',
      );
    }

    this.transport = new Transport({
      baseUrl,
      timeout,
      fetchImpl: config.fetch ?? fetch,
      userAgent: config.userAgent ?? DEFAULT_USER_AGENT,
      signal: config.signal,
    });
  }

  /** List every shop on the platform (no client or session needed) */
  static async getAvailableShops(options?: ShopListOptions): Promise<Shop[]> {
    return getAvailableShops(options);
  }

  get baseUrl(): string {
    return this.transport.baseUrl;
  }

  get apiBaseUrl(): string {
    return this.transport.apiBaseUrl;
  }

  /** Request timeout in seconds */
  get timeout(): number {
    return this.transport.timeout;
  }

  get sessionId(): string | null {
    return this.transport.session;
  }

  get isAuthenticated(): boolean {
    return this.currentUser !== null;
  }

  get user(): UserInfo | null {
    return this.currentUser;
  }

  // --- Session ---

  /** Log on with the configured credentials */
  async login(): Promise<UserInfo> {
    this.currentUser = null;
    let user: UserInfo;
    try {
      user = await logon(this.transport, this.username, this.password);
    } catch (err) {
      this.transport.clearSession();
      throw err;
    }
    this.currentUser = user;
    return user;
  }

  /** End the session. The local session is cleared even if the request fails. */
  async logout(): Promise<void> {
    this.currentUser = null;
    if (!this.transport.session) return;
    try {
      await endSession(this.transport);
    } finally {
      this.transport.clearSession();
    }
  }

  /**
   * Log in, run `fn`, and log out again on every exit path.
   * If `fn` fails and logout fails too, the logout failure is logged and
   * `fn`'s error is rethrown.
   */
  async withSession<T>(fn: (client: this) => Promise<T>): Promise<T> {
    let result: T;
    try {
      await this.login();
      result = await fn(this);
    } catch (err) {
      await this.logout().catch((logoutErr: unknown) => {
        console.warn('[OekoboxClient] Logout after a failed operation also failed:', logoutErr);
      });
      throw err;
    }
    await this.logout();
    return result;
  }

  // --- Profile (requires session) ---

  async getUserInfo(): Promise<UserProfile> {
    this.requireSession();
    const data = await this.transport.get('user');
    const [row] = rowsOf(readBlocks(data, 'user'), 'UserInfo');
    if (!row) {
      throw new OekoboxValidationError('User response holds no UserInfo row');
    }
    return toUserProfile(row);
  }

  /** Customer summary built from the profile, falling back to the logon name */
  async getCustomerInfo(): Promise<CustomerInfo> {
    const profile = await this.getUserInfo();
    const name = [profile.firstName, profile.lastName].filter(part => part !== null).join(' ');
    return {
      id: profile.userId ?? this.username,
      name: name || null,
      email: profile.email ?? (this.username.includes('@') ? this.username : null),
    };
  }

  // --- Catalog ---

  async getGroups(): Promise<Group[]> {
    const data = await this.transport.get('groups2');
    return rowsOf(readBlocks(data, 'groups'), 'Group').map(toGroup);
  }

  /** Subgroups, optionally only those below `groupId` */
  async getSubgroups(groupId?: string): Promise<SubGroup[]> {
    const data = await this.transport.get('groups2');
    const subgroups = rowsOf(readBlocks(data, 'groups'), 'SubGroup').map(toSubGroup);
    return groupId === undefined ? subgroups : subgroups.filter(s => s.parentId === groupId);
  }

  /** Items of one group (all groups when omitted), optionally narrowed to a subgroup */
  async getItems(groupId?: string, subgroupId?: string): Promise<Item[]> {
    const data = await this.transport.get(`items1/${encodeURIComponent(groupId || ALL_GROUPS)}`, {
      query: { subgroup: subgroupId || undefined },
    });
    return rowsOf(readBlocks(data, 'items'), 'Item').map(row => toItem(row, subgroupId || null));
  }

  async getItem(itemId: string): Promise<Item> {
    const item = (await this.getItems()).find(i => i.id === itemId);
    if (!item) {
      throw new OekoboxValidationError(`Item not found: ${itemId}`);
    }
    return item;
  }

  /** Case-insensitive match on item name, description and search terms */
  async searchItems(query: string): Promise<Item[]> {
    const needle = query.trim().toLowerCase();
    if (!needle) {
      throw new OekoboxValidationError('Search query must not be empty');
    }
    const items = await this.getItems();
    return items.filter(item =>
      [item.name, item.description, item.searchTerms].some(
        field => field !== null && field.toLowerCase().includes(needle),
      ),
    );
  }

  // --- Cart (requires session) ---

  async getCart(): Promise<CartItem[]> {
    this.requireSession();
    return decodeCart(await this.transport.get('cart/show'));
  }

  /**
   * Add `quantity` of an item to the cart and return the updated cart.
   * Whether an existing line is increased or replaced is up to the shop.
   */
  async addToCart(itemId: string, quantity: number, options: AddToCartOptions = {}): Promise<CartItem[]> {
    if (!itemId) {
      throw new OekoboxValidationError('itemId must not be empty');
    }
    if (!Number.isFinite(quantity) || quantity < 0) {
      throw new OekoboxValidationError(`Quantity must be a number >= 0, got ${quantity}`);
    }
    this.requireSession();
    const data = await this.transport.post('cart/add', {
      query: { id: itemId, amount: quantity, unit: options.unit, note: options.note },
    });
    return decodeCart(data);
  }

  /** Remove a cart line by item id or by its position, returning the updated cart */
  async removeFromCart(line: CartLineRef): Promise<CartItem[]> {
    if ('position' in line && (!Number.isInteger(line.position) || line.position < 0)) {
      throw new OekoboxValidationError(`Cart position must be an integer >= 0, got ${line.position}`);
    }
    this.requireSession();
    const query = 'itemId' in line ? { id: line.itemId } : { pos: line.position };
    return decodeCart(await this.transport.post('cart/remove', { query }));
  }

  async clearCart(): Promise<void> {
    this.requireSession();
    await this.transport.get('client/resetcart', { expectJson: false });
  }

  // --- Orders (requires session) ---

  /** Booked orders, as summaries without positions */
  async getOrders(): Promise<Order[]> {
    this.requireSession();
    const data = await this.transport.get('dates1', { root: true });
    return rowsOf(readBlocks(data, 'dates'), 'ShopDate').map(toOrderSummary);
  }

  async getOrder(orderId: string): Promise<Order> {
    this.requireSession();
    let data: unknown;
    try {
      data = await this.transport.get(`order2/${encodeURIComponent(orderId)}`);
    } catch (err) {
      if (isNotFound(err)) {
        throw new OekoboxValidationError(`Order not found: ${orderId}`, 404, err.internalError);
      }
      throw err;
    }
    const order = decodeOrder(data);
    if (!order) {
      throw new OekoboxValidationError(`Order not found in response: ${orderId}`);
    }
    return order;
  }

  /**
   * Turn the current cart into an order. The order's positions mirror the
   * cart at call time; totals and availability are decided by the shop.
   */
  async createOrder(): Promise<Order> {
    this.requireSession();
    const snapshot = await this.getCart();
    if (snapshot.length === 0) {
      throw new OekoboxValidationError('Cannot create an order from an empty cart');
    }

    const positions: OrderPosition[] = snapshot.map(line => ({
      itemId: line.itemId,
      quantity: line.quantity,
      unit: line.unit,
      price: null,
    }));

    const order = decodeOrder(await this.transport.post('cart/submit'), positions);
    if (!order) {
      throw new OekoboxValidationError('Order submission returned no order');
    }
    return order;
  }

  /** Reads `api/dates1`, or the shop-root `dates1` where the shop has no API route for it */
  async getDeliveryDates(): Promise<DeliveryDate[]> {
    this.requireSession();
    const data = await this.getWithRootFallback('dates1');
    return rowsOf(readBlocks(data, 'delivery dates'), 'DDate').map(toDeliveryDate);
  }

  /**
   * Subscriptions from `api/client/subscriptions`. Shops without that route
   * list them as Subscription rows in the shop-root `dates1`.
   */
  async getSubscriptions(): Promise<Subscription[]> {
    this.requireSession();
    let data: unknown;
    try {
      data = await this.transport.get('client/subscriptions');
    } catch (err) {
      if (!isNotFound(err)) throw err;
      data = await this.transport.get('dates1', { root: true });
    }
    return rowsOf(readBlocks(data, 'subscriptions'), 'Subscription').map(toSubscription);
  }

  // --- Favourites (requires session) ---

  async getFavourites(): Promise<Favourite[]> {
    this.requireSession();
    const data = await this.transport.get('client/favourites');
    return toFavourites(rowsOf(readBlocks(data, 'favourites'), 'Favourite'));
  }

  async addFavourite(itemId: string): Promise<void> {
    this.requireSession();
    await this.transport.get('client/addfavourites', { query: { id: itemId } });
  }

  async removeFavourite(itemId: string): Promise<void> {
    this.requireSession();
    await this.transport.get('client/dropfavourites', { query: { id: itemId } });
  }

  // --- Private helpers ---

  private async getWithRootFallback(path: string): Promise<unknown> {
    try {
      return await this.transport.get(path);
    } catch (err) {
      if (!isNotFound(err)) throw err;
      return this.transport.get(path, { root: true });
    }
  }

  private requireSession(): void {
    if (!this.currentUser) {
      throw new OekoboxAuthenticationError(
        'This operation requires a session. Call login() first.',
      );
    }
  }
}
