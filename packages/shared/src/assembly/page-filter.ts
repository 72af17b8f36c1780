/**
 * Pricing Page Filter
 *
 * A page is a pricing page when at least one of its lines carries a dollar
 * amount. Pricing pages are dropped from the merged output, not redacted.
 */

/** "$1,250.00", "$ 40", "$1250" */
export const PRICING_LINE_PATTERN = /\$\s?[0-9][0-9,]*(\.[0-9]{2})?/;

export function isPricingPage(text: string): boolean {
  return text.split(/\r?\n/).some((line) => PRICING_LINE_PATTERN.test(line));
}

export interface PageSelection {
  /** 0-based indices of pages to keep, ascending */
  kept: number[];
  /** 0-based indices of pricing pages dropped */
  removed: number[];
}

/**
 * Decide which pages of a document survive. Pages with no extracted text
 * are kept.
 */
export function selectPages(
  pageCount: number,
  pageTexts: readonly string[] | null,
  filterPricing: boolean
): PageSelection {
  const kept: number[] = [];
  const removed: number[] = [];

  for (let i = 0; i < pageCount; i++) {
    const text = pageTexts && i < pageTexts.length ? pageTexts[i] : '';
    if (filterPricing && isPricingPage(text)) {
      removed.push(i);
    } else {
      kept.push(i);
    }
  }

  return { kept, removed };
}
