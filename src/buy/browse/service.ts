import type { StandardSchemaV1 } from '@standard-schema/spec';
import type { Client } from '../../core/client.js';
import { type Opt, optQuery } from '../../core/opt.js';
import type { EndpointOptions } from '../../types/request.js';
import type { SafeWrapAsync } from '../../utils/wrap.js';
import {
  type CompactItem,
  compactItemSchema,
  type Item,
  type ItemsByGroup,
  itemSchema,
  itemsByGroupSchema,
  type SearchResult,
  searchResultSchema,
} from './types.js';

/**
 * eBay Buy › Browse API: item lookup and keyword search.
 *
 * eBay API docs: https://developer.ebay.com/api-docs/buy/browse/resources/methods
 */
export class BrowseService {
  #client: Client;

  constructor(client: Client) {
    this.#client = client;
  }

  /** Retrieves an item by the id shown on its eBay listing page. */
  getItemByLegacyId(legacyItemId: string, opts: EndpointOptions = {}): SafeWrapAsync<Error, Item> {
    return this.#get(
      'getItemByLegacyId',
      'buy/browse/v1/item/get_item_by_legacy_id',
      itemSchema,
      opts,
      optQuery('legacy_item_id', legacyItemId),
    );
  }

  /** Retrieves the COMPACT field group of an item: price, availability and revision only. */
  getCompactItem(itemId: string, opts: EndpointOptions = {}): SafeWrapAsync<Error, CompactItem> {
    return this.#get('getCompactItem', itemPath(itemId), compactItemSchema, opts, optQuery('fieldgroups', 'COMPACT'));
  }

  /** Retrieves the PRODUCT field group of an item: the item plus its product details. */
  getItem(itemId: string, opts: EndpointOptions = {}): SafeWrapAsync<Error, Item> {
    return this.#get('getItem', itemPath(itemId), itemSchema, opts, optQuery('fieldgroups', 'PRODUCT'));
  }

  /** Retrieves every item of a multi-variation listing. */
  getItemsByGroupId(itemGroupId: string, opts: EndpointOptions = {}): SafeWrapAsync<Error, ItemsByGroup> {
    return this.#get(
      'getItemsByGroupId',
      'buy/browse/v1/item/get_items_by_item_group',
      itemsByGroupSchema,
      opts,
      optQuery('item_group_id', itemGroupId),
    );
  }

  /**
   * Searches items; the criteria come from the `browseSearch*` options.
   *
   * @example
   * const [err, result] = await client.buy.browse.search({ opts: [browseSearch('drone'), browseSearchLimit(3)] });
   */
  search(opts: EndpointOptions = {}): SafeWrapAsync<Error, SearchResult> {
    return this.#get('search', 'buy/browse/v1/item_summary/search', searchResultSchema, opts);
  }

  async #get<T extends StandardSchemaV1>(
    operation: string,
    path: string,
    schema: T,
    { opts = [], ...call }: EndpointOptions,
    ...fixed: Opt[]
  ): SafeWrapAsync<Error, StandardSchemaV1.InferOutput<T>> {
    const [errRequest, request] = this.#client.newRequest('GET', path, undefined, ...fixed, ...opts);
    if (errRequest) {
      return [new Error(`error creating request in ${operation}`, { cause: errRequest }), null];
    }

    const [err, result] = await this.#client.do(request, schema, call);
    if (err) {
      return [new Error(`error doing request in ${operation}`, { cause: err }), null];
    }

    return [null, result];
  }
}

function itemPath(itemId: string): string {
  return `buy/browse/v1/item/${encodeURIComponent(itemId)}`;
}
