/**
 * Selling price from a net price and a markup percentage.
 * No rounding; callers format for display.
 */
export function calculateSellingPrice(netPrice: number, markupPercentage: number): number {
  return netPrice * (1 + markupPercentage / 100);
}
