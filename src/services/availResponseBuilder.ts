import type { AvailRules } from "../infra/config.js";
import { calculateSellingPrice } from "./pricing.js";
import type { PricedOffer, ValidatedAvailRequest } from "./availTypes.js";

/**
 * Build one priced offer per destination, in destination order.
 * Ids are sequential (A#1, A#2, ...). Net price, markup and supplier code come
 * from the pricing stub in the rule set; the selling currency is the request's.
 */
export function buildAvailResponse(req: ValidatedAvailRequest, rules: AvailRules): PricedOffer[] {
  const { netPrice, netCurrency, markupPercentage, exchangeRate, hotelCodeSupplier } = rules.pricing;
  const sellingPrice = calculateSellingPrice(netPrice, markupPercentage);

  return req.destinations.map((_destination, index) => ({
    id: `A#${index + 1}`,
    hotelCodeSupplier,
    market: req.market,
    price: {
      minimumSellingPrice: null,
      currency: netCurrency,
      net: netPrice,
      selling_price: sellingPrice,
      selling_currency: req.currency,
      markup: markupPercentage,
      exchange_rate: exchangeRate,
    },
  }));
}

export function renderAvailResponse(offers: PricedOffer[]): string {
  return JSON.stringify(offers, null, 2);
}
