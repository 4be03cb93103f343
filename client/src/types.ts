// Shop list entries (as returned by shop discovery)

export interface GeoPoint {
  latitude: number;
  longitude: number;
}

export interface Shop {
  readonly id: string;
  readonly name: string;
  readonly location: GeoPoint;
  /** Centre of the delivery area, when the shop publishes one */
  readonly deliveryLocation: GeoPoint | null;
}

// Session returned after logon

export interface UserInfo {
  readonly username: string;
  readonly email: string | null;
  readonly pcgifVersion: string | null;
  readonly shopVersion: string | null;
}

/** Profile row from `api/user` */
export interface UserProfile {
  /** NONE, INVALID, VALID, AUTH, SUPER or ADMIN */
  readonly authenticationState: string | null;
  readonly userId: string | null;
  readonly opener: string | null;
  readonly firstName: string | null;
  readonly lastName: string | null;
  readonly email: string | null;
  readonly phone: string | null;
  readonly zip: string | null;
  readonly city: string | null;
  readonly street: string | null;
}

export interface CustomerInfo {
  readonly id: string;
  readonly name: string | null;
  readonly email: string | null;
}

// Catalog

export interface Group {
  readonly id: string;
  readonly name: string;
  readonly info: string | null;
  readonly count: number;
}

export interface SubGroup {
  readonly id: string;
  readonly name: string;
  readonly parentId: string;
  readonly count: number;
}

export interface Item {
  readonly id: string;
  readonly name: string;
  readonly price: number | null;
  readonly unit: string | null;
  readonly description: string | null;
  readonly groupId: string | null;
  readonly subgroupId: string | null;
  /** Extra search terms the shop maintains for this item */
  readonly searchTerms: string | null;
}

// Cart types

export interface CartItem {
  readonly itemId: string;
  readonly quantity: number;
  readonly unit: string | null;
  readonly note: string | null;
}

export interface AddToCartOptions {
  unit?: string;
  note?: string;
}

/** Identifies a cart line either by item or by its position in the cart */
export type CartLineRef = { itemId: string } | { position: number };

// Orders

export interface OrderPosition {
  readonly itemId: string;
  readonly quantity: number;
  readonly unit: string | null;
  readonly price: number | null;
}

export interface Order {
  readonly id: string;
  readonly deliveryDate: string | null;
  readonly status: string | null;
  readonly positions: readonly OrderPosition[];
  /** Server-computed; never derived from the positions */
  readonly totalAmount: number | null;
}

export interface DeliveryDate {
  readonly id: string;
  readonly date: string;
  readonly tourId: string | null;
}

export interface Favourite {
  readonly itemId: string;
}

export interface Subscription {
  readonly id: string;
  /** Negative ids reference an assortment rather than an item */
  readonly itemId: string | null;
  readonly amount: number | null;
  readonly unit: string | null;
  readonly start: string | null;
  readonly end: string | null;
  /** Delivery cycle in weeks (1..4) */
  readonly periodWeeks: number | null;
  readonly lastDelivery: string | null;
  readonly tourId: string | null;
  readonly notes: string | null;
}

// DataList wire format

export interface DataListBlock {
  type: string;
  version?: number;
  cnt?: number;
  data: unknown[][];
}

/** Plain-object response carrying a `result` code, e.g. from logon */
export interface ResultResponse {
  result: string;
  action?: string;
  [key: string]: unknown;
}

// Client config

export interface OekoboxClientConfig {
  /** Shop identifier from the shop list */
  shopId: string;
  /** Customer id or e-mail address */
  username: string;
  password: string;
  /** Overrides the shop URL derived from `shopId` */
  baseUrl?: string;
  /** Request timeout in seconds. Default: 30 */
  timeout?: number;
  /** Fetch implementation (defaults to global fetch) */
  fetch?: typeof fetch;
  /** User-Agent string sent with every request */
  userAgent?: string;
  /** Suppress the warning for plain-HTTP shop URLs */
  allowInsecure?: boolean;
  /** Aborting it cancels every pending and later request of this client */
  signal?: AbortSignal;
}

export interface ShopListOptions {
  /** Fetch implementation (defaults to global fetch) */
  fetch?: typeof fetch;
  /** Shop list location. Default: the public Ökobox Online list */
  url?: string;
  /** Request timeout in seconds. Default: 30 */
  timeout?: number;
}
