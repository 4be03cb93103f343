export { OekoboxClient } from './client';
export { getAvailableShops, parseShopList, resolveShopUrl, SHOP_LIST_URL } from './discover';
export { decodeDataList } from './datalist';
export type { DataListRecord } from './datalist';
export {
  OekoboxError,
  OekoboxAuthenticationError,
  OekoboxConnectionError,
  OekoboxApiError,
  OekoboxValidationError,
} from './errors';
export type {
  AddToCartOptions,
  CartItem,
  CartLineRef,
  CustomerInfo,
  DataListBlock,
  DeliveryDate,
  Favourite,
  GeoPoint,
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
