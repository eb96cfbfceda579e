/**
 * Shop-level queries
 */

import { SHOP_QUERY, shopSchema } from './graphql.js';
import type { ShopifyClientContext } from './types.js';

/** Cheapest authenticated round trip: proves domain, token and API version */
export async function fetchShopName(ctx: ShopifyClientContext): Promise<string> {
    const { shop } = await ctx.executeGraphQL(SHOP_QUERY, {}, shopSchema);
    return shop.name;
}
