/**
 * Amount parsing for model output.
 *
 * Invoices arrive in both "1,234.56" and "1.234,56" notation, often with a
 * currency symbol or code attached. Numbers pass through unchanged.
 */

export function parseAmount(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value !== "string") return null;

  let cleaned = value.trim().replace(/[^0-9.,\-]/g, "");
  const negative = cleaned.startsWith("-") || /^\(.*\)$/.test(value.trim());
  cleaned = cleaned.replace(/-/g, "");
  if (!cleaned || !/[0-9]/.test(cleaned)) return null;

  const lastComma = cleaned.lastIndexOf(",");
  const lastDot = cleaned.lastIndexOf(".");

  let normalized: string;
  if (lastComma !== -1 && lastDot !== -1) {
    // Both present: whichever comes last is the decimal separator.
    normalized =
      lastComma > lastDot
        ? cleaned.replace(/\./g, "").replace(",", ".")
        : cleaned.replace(/,/g, "");
  } else if (lastComma !== -1) {
    const decimals = cleaned.length - lastComma - 1;
    const commas = cleaned.split(",").length - 1;
    const isDecimal = commas === 1 && decimals > 0 && (decimals <= 2 || /^0?,/.test(cleaned));
    normalized = isDecimal ? cleaned.replace(",", ".") : cleaned.replace(/,/g, "");
  } else if (lastDot !== -1) {
    const decimals = cleaned.length - lastDot - 1;
    const dots = cleaned.split(".").length - 1;
    // "1.234.567" and "1.234" are thousands groupings; "12.5" and "0.125" are decimals.
    const isGrouping = dots > 1 || (decimals === 3 && !/^0?\./.test(cleaned));
    normalized = isGrouping ? cleaned.replace(/\./g, "") : cleaned;
  } else {
    normalized = cleaned;
  }

  const parsed = Number(normalized);
  if (!Number.isFinite(parsed)) return null;
  return negative ? -parsed : parsed;
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * total / net - 1, e.g. 121 / 100 - 1 = 0.21.
 */
export function deriveTaxRate(netAmount: number | null, totalAmount: number | null): number | null {
  if (netAmount === null || totalAmount === null || netAmount === 0) return null;
  return roundTo(totalAmount / netAmount - 1, 4);
}
