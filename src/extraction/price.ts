const CURRENCY_SYMBOLS = /[$€£¥₹]/g;
const DECIMAL = /^-?\d+(\.\d+)?$/;

/**
 * "$1,234.50" -> 1234.5. Text that is not a plain decimal amount once the
 * currency symbol and thousands separators are gone comes back trimmed but
 * otherwise as it was ("Contact for price", "1e3").
 */
export function parsePrice(text: string): number | string {
    const raw = text.trim();
    const cleaned = raw.replace(CURRENCY_SYMBOLS, '').replace(/,/g, '').replace(/\s+/g, '');
    if (!DECIMAL.test(cleaned)) return raw;
    const amount = Number(cleaned);
    return Number.isFinite(amount) ? amount : raw;
}
