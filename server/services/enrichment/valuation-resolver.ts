import type { Address, EnrichmentEstimate } from '@shared/schema';
import { Logger } from '../logger';
import { formatAddress } from '../address';
import type { SessionContext } from '../session-context';
import type { ValuationSiteConfig } from '../site-config';
import type { Transport } from '../transports/types';
import { AddressResolver, encodeAddress, type NoMatch, type ResolverOptions } from './address-resolver';
import { findPropertyId, parseListingPage, type ListingData } from './valuation-parser';

export type EnrichmentResult = EnrichmentEstimate | NoMatch;

export function searchUrl(baseUrl: string, address: Address): string {
  return `${baseUrl.replace(/\/+$/, '')}/homes/${encodeAddress(address)}_rb/`;
}

export function detailsUrl(baseUrl: string, propertyId: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/homedetails/${propertyId}_zpid/`;
}

/** Valuation per property address, read from the listing site. */
export class EnrichmentResolver extends AddressResolver<EnrichmentEstimate> {
  constructor(transport: Transport, session: SessionContext, config: ValuationSiteConfig, options: ResolverOptions = {}) {
    super(transport, session, config, options, 'resolver');
  }

  protected async find(address: Address): Promise<EnrichmentEstimate | null> {
    const search = await this.get(searchUrl(this.config.baseUrl, address));
    if (!search) return null;

    const direct = parseListingPage(search.body);
    if (direct && (direct.estimateValue !== null || direct.listPrice !== null)) {
      return this.toEstimate(direct, search.url);
    }

    const propertyId = findPropertyId(search.body);
    if (!propertyId) return null;

    await Logger.debug(`Following property ${propertyId} for ${formatAddress(address)}`, 'resolver');
    const details = await this.get(detailsUrl(this.config.baseUrl, propertyId), search.url);
    if (!details) return null;

    const listing = parseListingPage(details.body);
    return listing ? this.toEstimate(listing, details.url) : null;
  }

  private toEstimate(listing: ListingData, listingUrl: string): EnrichmentEstimate {
    const estimate: EnrichmentEstimate = {
      estimateValue: listing.estimateValue,
      listPrice: listing.listPrice,
      bedrooms: listing.bedrooms,
      bathrooms: listing.bathrooms,
      sqft: listing.sqft,
      yearBuilt: listing.yearBuilt,
      listingUrl,
      resolvedAt: this.now().toISOString(),
    };
    if (listing.propertyType) {
      estimate.propertyType = listing.propertyType;
    }
    if (listing.status) {
      estimate.status = listing.status;
    }
    return estimate;
  }
}
