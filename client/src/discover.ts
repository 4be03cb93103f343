import { Shop, ShopListOptions } from './types';
import { request } from './http';
import { OekoboxValidationError } from './errors';

export const SHOP_LIST_URL = 'https://oekobox-online.eu/v3/shoplist.js.jsp';
export const SHOP_HOST_URL = 'https://oekobox-online.de/v3/shop';

// [lat, lng, "name", deliveryLat, deliveryLng, "shopId"]
const SHOP_ENTRY = /^\[(-?\d+(?:\.\d+)?),(-?\d+(?:\.\d+)?),"([^"]+)",(-?\d+(?:\.\d+)?),(-?\d+(?:\.\d+)?),"([^"]+)"\],?$/;

/** Resolve the URL a shop is served from, honouring an explicit override */
export function resolveShopUrl(shopId: string, override?: string): string {
  if (override) return override.replace(/\/+$/, '');
  if (!shopId) {
    throw new OekoboxValidationError('shopId is required to derive the shop URL');
  }
  return `${SHOP_HOST_URL}/${encodeURIComponent(shopId)}`;
}

/**
 * Parse the shop list script. Each shop is one array literal per line;
 * lines that are not shop entries are skipped. A shop without coordinates
 * (-1) is placed at its delivery area instead.
 */
export function parseShopList(text: string): Shop[] {
  const shops: Shop[] = [];

  for (const rawLine of text.split('\n')) {
    const match = SHOP_ENTRY.exec(rawLine.trim());
    if (!match) continue;

    const [, lat, lng, name, deliveryLat, deliveryLng, id] = match;
    const hasDelivery = deliveryLat !== '-1' && deliveryLng !== '-1';
    const hasLocation = lat !== '-1' && lng !== '-1';

    const deliveryLocation = hasDelivery
      ? { latitude: Number(deliveryLat), longitude: Number(deliveryLng) }
      : null;

    shops.push({
      id,
      name,
      location: hasLocation
        ? { latitude: Number(lat), longitude: Number(lng) }
        : { latitude: Number(deliveryLat), longitude: Number(deliveryLng) },
      deliveryLocation,
    });
  }

  return shops;
}

/** Fetch every shop registered with Ökobox Online. Needs no session. */
export async function getAvailableShops(options: ShopListOptions = {}): Promise<Shop[]> {
  const res = await request(options.url ?? SHOP_LIST_URL, {
    fetchImpl: options.fetch ?? fetch,
    timeoutMs: (options.timeout ?? 30) * 1000,
    expectJson: false,
  });
  return parseShopList(typeof res.data === 'string' ? res.data : '');
}
