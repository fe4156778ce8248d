/**
 * PRICE CHANGE TRACKER
 *
 * Compares the stored price of a re-sighted listing with the freshly extracted
 * one. The history itself lives in listing_snapshots; this only classifies
 * and logs the change.
 */

export interface PriceComparisonResult {
  hasChanged: boolean;
  oldPrice: number;
  newPrice: number;
  priceChange: number; // negative = price dropped, positive = increased
  changePercentage: number;
  isSignificantDrop: boolean; // > 5% drop
  isMajorDrop: boolean; // > 10% drop
}

/**
 * Null when either side has no price: an ad that stops stating its price is
 * not a change.
 */
export function detectPriceChange(
  oldPrice: number | null,
  newPrice: number | null
): PriceComparisonResult | null {
  if (oldPrice === null || newPrice === null || oldPrice <= 0) {
    return null;
  }

  const priceChange = newPrice - oldPrice;
  const changePercentage = (priceChange / oldPrice) * 100;

  return {
    hasChanged: oldPrice !== newPrice,
    oldPrice,
    newPrice,
    priceChange,
    changePercentage,
    isSignificantDrop: changePercentage <= -5,
    isMajorDrop: changePercentage <= -10,
  };
}

export function logPriceChange(listingId: string, comparison: PriceComparisonResult): void {
  if (!comparison.hasChanged) return;

  const from = `$${comparison.oldPrice.toLocaleString('en-SG')}`;
  const to = `$${comparison.newPrice.toLocaleString('en-SG')}`;

  if (comparison.priceChange < 0) {
    const marker = comparison.isMajorDrop ? '💰💰' : '💰';
    console.log(
      `[PRICE-TRACKER] ${marker} Price drop detected! Listing ${listingId}: ${from} → ${to} (${comparison.changePercentage.toFixed(1)}%)`
    );
  } else {
    console.log(
      `[PRICE-TRACKER] ⬆️ Price increase detected! Listing ${listingId}: ${from} → ${to} (+${comparison.changePercentage.toFixed(1)}%)`
    );
  }
}
