import type { Address, DealOffer } from '@shared/schema';
import { Logger } from '../logger';
import { formatAddress } from '../address';
import type { SessionContext } from '../session-context';
import type { DealSiteConfig } from '../site-config';
import type { Transport } from '../transports/types';
import { AddressResolver, encodeAddress, type NoMatch, type ResolverOptions } from './address-resolver';
import { findDealLinks, parseDealPage } from './deal-parser';

export type DealResult = DealOffer | NoMatch;

export function dealSearchUrl(baseUrl: string, address: Address): string {
  return `${baseUrl.replace(/\/+$/, '')}/search?q=${encodeAddress(address)}`;
}

/** Offer per property address: search the deal site, read the first result. */
export class DealResolver extends AddressResolver<DealOffer> {
  constructor(transport: Transport, session: SessionContext, config: DealSiteConfig, options: ResolverOptions = {}) {
    super(transport, session, config, options, 'deals');
  }

  protected async find(address: Address): Promise<DealOffer | null> {
    const search = await this.get(dealSearchUrl(this.config.baseUrl, address));
    if (!search) return null;

    const links = findDealLinks(search.body, this.config.baseUrl);
    if (links.length === 0) return null;

    await Logger.debug(`Following deal ${links[0]} for ${formatAddress(address)}`, 'deals');
    const page = await this.get(links[0], search.url);
    if (!page) return null;

    const deal = parseDealPage(page.body);
    return deal ? { ...deal, listingUrl: page.url, resolvedAt: this.now().toISOString() } : null;
  }
}
