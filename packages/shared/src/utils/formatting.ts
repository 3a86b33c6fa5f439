/**
 * Shared formatting utilities for PropQuery
 * Used by the search service, the CLI and any UI for consistent display
 */

/** One crore = 10,000,000 rupees */
export const CRORE = 10_000_000;

/** One lakh = 100,000 rupees */
export const LAKH = 100_000;

const integerFormatter = new Intl.NumberFormat('en-US', {
  maximumFractionDigits: 0,
});

/**
 * Fixed-point text for `value`, rounding exact ties to the even digit
 * (85.25 -> "85.2", 85.75 -> "85.8"). `toFixed` rounds ties up.
 */
export function toFixedHalfEven(value: number, digits: number): string {
  if (value < 0) {
    const text = toFixedHalfEven(-value, digits);
    return Number(text) === 0 ? text : `-${text}`;
  }

  const scale = 10 ** digits;
  const scaled = value * scale;
  const lower = Math.floor(scaled);
  if (scaled - lower !== 0.5) {
    return value.toFixed(digits);
  }

  // A tie only when the double is exactly (2k + 1) / (2 * 10^digits)
  const odd = 2 * lower + 1;
  const fives = 5 ** digits;
  const isTie = odd % fives === 0 && odd / fives / 2 ** (digits + 1) === value;
  if (!isTie) {
    return value.toFixed(digits);
  }

  const rounded = lower % 2 === 0 ? lower : lower + 1;
  return (rounded / scale).toFixed(digits);
}

/**
 * Format a price in Indian units
 * @param price - Price in rupees
 * @returns "₹1.25 Cr", "₹95.00 Lakh", "₹75,000" or "Price on request"
 */
export function formatPrice(price: number | null | undefined): string {
  if (price == null || Number.isNaN(price)) {
    return 'Price on request';
  }

  if (price >= CRORE) {
    return `₹${toFixedHalfEven(price / CRORE, 2)} Cr`;
  }
  if (price >= LAKH) {
    return `₹${toFixedHalfEven(price / LAKH, 2)} Lakh`;
  }
  return `₹${integerFormatter.format(price)}`;
}

/**
 * Format a budget ceiling with a single decimal (e.g. "₹1.2 Cr", "₹80.0 Lakh")
 */
export function formatBudget(budget: number): string {
  if (budget >= CRORE) {
    return `₹${toFixedHalfEven(budget / CRORE, 1)} Cr`;
  }
  return `₹${toFixedHalfEven(budget / LAKH, 1)} Lakh`;
}

/**
 * Format a price range, each bound in its own natural unit
 * @param min - Lowest price in the range
 * @param max - Highest price in the range
 * @returns Formatted range string (e.g., "₹85.0 Lakh - ₹1.10 Cr")
 */
export function formatPriceRange(min: number, max: number): string {
  if (max >= CRORE) {
    if (min >= CRORE) {
      return `₹${toFixedHalfEven(min / CRORE, 2)} Cr - ₹${toFixedHalfEven(max / CRORE, 2)} Cr`;
    }
    return `₹${toFixedHalfEven(min / LAKH, 1)} Lakh - ₹${toFixedHalfEven(max / CRORE, 2)} Cr`;
  }
  return `₹${toFixedHalfEven(min / LAKH, 2)} Lakh - ₹${toFixedHalfEven(max / LAKH, 2)} Lakh`;
}

/**
 * Format carpet area in square feet
 * @returns Formatted string (e.g., "1050 sq.ft") or "N/A"
 */
export function formatArea(sqft: number | null | undefined): string {
  if (sqft == null || Number.isNaN(sqft)) {
    return 'N/A';
  }
  return `${sqft} sq.ft`;
}

/**
 * Upper-case the first letter of every word and lower-case the rest
 * ("navi mumbai" -> "Navi Mumbai")
 */
export function titleCase(text: string): string {
  return text.replace(
    /[A-Za-z]+/g,
    (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase()
  );
}

/**
 * Truncate text with ellipsis
 * @param text - Text to truncate
 * @param maxLength - Maximum length
 * @returns Truncated text
 */
export function truncateText(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return `${text.slice(0, maxLength - 3)}...`;
}
