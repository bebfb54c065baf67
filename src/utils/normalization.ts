const PLACEHOLDERS = new Set(['', 'nan', 'none', 'null', 'nat']);

/**
 * True for absent cells and for the placeholder strings spreadsheets and
 * dataframe exports leave behind ("nan", "None", "NaT", "null", blank).
 */
export function isNull(value: string | null | undefined): boolean {
    if (value === null || value === undefined) return true;
    return PLACEHOLDERS.has(value.trim().toLowerCase());
}

/**
 * Expands scientific-notation artifacts such as `1.2E+11` into a plain integer string.
 * Anything that does not parse is returned unchanged.
 */
export function normalizeNumber(value: string): string {
    const trimmed = value.trim();
    if (!/e\+/i.test(trimmed)) return trimmed;

    const parsed = Number(trimmed);
    if (!Number.isFinite(parsed)) return trimmed;

    try {
        return BigInt(Math.trunc(parsed)).toString();
    } catch (e) {
        return trimmed;
    }
}

/**
 * Title-cases a phrase: "self employed" -> "Self Employed", "JOHN SMITH" -> "John Smith".
 */
export function toTitleCase(value: string): string {
    return value
        .toLowerCase()
        .replace(/(^|[^a-z])([a-z])/g, (_match, boundary: string, letter: string) => boundary + letter.toUpperCase());
}
