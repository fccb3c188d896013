import { appendHeaderValue } from '../../core/headers.js';
import { type Opt, optHeader, optQuery } from '../../core/opt.js';

/** Header carrying the end user's context (location, affiliate ids) as comma-joined `key=value` pairs. */
export const EndUserContextHeader = 'X-EBAY-C-ENDUSERCTX';

/** Header selecting the eBay marketplace, e.g. `EBAY_US`. */
export const MarketplaceHeader = 'X-EBAY-C-MARKETPLACE-ID';

/**
 * Sets the buyer's location so shipping and availability are estimated for it.
 * Appends to {@link EndUserContextHeader}, keeping any value already there.
 *
 * eBay API docs: https://developer.ebay.com/api-docs/buy/static/api-browse.html#Headers
 */
export function browseContextualLocation(country: string, zip: string): Opt {
  const location = encodeURIComponent(`country=${country},zip=${zip}`);
  return ({ headers }) => appendHeaderValue(headers, EndUserContextHeader, `contextualLocation=${location}`);
}

/** Selects the marketplace the call runs against. */
export function browseMarketplace(marketplaceId: string): Opt {
  return optHeader(MarketplaceHeader, marketplaceId);
}

/** Keywords to search for. */
export function browseSearch(q: string): Opt {
  return optQuery('q', q);
}

/** Number of items returned per page (eBay's maximum is 200). */
export function browseSearchLimit(limit: number): Opt {
  return optQuery('limit', limit);
}

/** Number of items skipped before the first returned one. */
export function browseSearchOffset(offset: number): Opt {
  return optQuery('offset', offset);
}

/** Restricts the search to the given category ids. */
export function browseSearchCategory(...categoryIds: string[]): Opt {
  return optQuery('category_ids', categoryIds.join(','));
}

/**
 * Field filters such as `price:[10..50]` or `buyingOptions:{AUCTION}`.
 *
 * eBay API docs: https://developer.ebay.com/api-docs/buy/static/ref-buy-browse-filters.html
 */
export function browseSearchFilter(...filters: string[]): Opt {
  return optQuery('filter', filters.join(','));
}

/** Sort order, e.g. `price` or `-price`. */
export function browseSearchSort(sort: string): Opt {
  return optQuery('sort', sort);
}

/** Searches by Global Trade Item Number. */
export function browseSearchGTIN(gtin: string): Opt {
  return optQuery('gtin', gtin);
}

/** Searches by eBay product id. */
export function browseSearchEPID(epid: string): Opt {
  return optQuery('epid', epid);
}

/** Field groups to return, e.g. `MATCHING_ITEMS`, `ASPECT_REFINEMENTS`. */
export function browseSearchFieldgroups(...fieldgroups: string[]): Opt {
  return optQuery('fieldgroups', fieldgroups.join(','));
}

/** Aspect filter, e.g. `categoryId:15724,Color:{Red}`. */
export function browseSearchAspectFilter(aspectFilter: string): Opt {
  return optQuery('aspect_filter', aspectFilter);
}
