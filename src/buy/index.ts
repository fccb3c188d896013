import type { Client } from '../core/client.js';
import { BrowseService } from './browse/service.js';

/**
 * The eBay Buy APIs.
 *
 * eBay API docs: https://developer.ebay.com/api-docs/buy/static/buy-landing.html
 */
export class BuyAPI {
  readonly browse: BrowseService;

  constructor(client: Client) {
    this.browse = new BrowseService(client);
  }
}

export * from './browse/index.js';
