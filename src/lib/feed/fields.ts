/**
 * @file    fields.ts
 * @purpose Field normalizer for spreadsheet rows. Resolves the logical product
 *          fields across the header spellings the sheet has used over time and
 *          turns raw cell values into clean display strings.
 * @created 2026-10-12
 * @updated 2026-10-19
 */

import type { ProductField, ProductRecord } from "../../types/products";

// ──────────────────────────────────────────────────
// ALIAS TABLE
// Lookups are case-insensitive, so each spelling is listed once, lowercase.
// Order is priority: the first alias holding a present value wins.
// ──────────────────────────────────────────────────

export const FIELD_ALIASES: Record<ProductField, readonly string[]> = {
    id: ["id", "sku"],
    name: ["nombre", "name"],
    brand: ["marca", "brand"],
    price: ["precio", "price"],
    discount: ["descuento", "discount"],
    discountedPrice: ["precio_descuento", "precio descuento", "discounted_price"],
    description: ["descripcion", "descripción", "description"],
    category: ["categoria", "categoría", "category"],
    objective: ["objetivo", "objective"],
    image: ["imagen", "image"],
};

/**
 * Turns a raw cell into a display string, or undefined when the cell is empty.
 * Integral numbers lose their decimal point (5.0 reads "5"); text is only
 * trimmed, so "5.00" and "1.000" keep the form the sheet gave them.
 */
export function normalizeValue(raw: unknown): string | undefined {
    if (raw === null || raw === undefined) return undefined;

    if (typeof raw === "number") {
        if (!Number.isFinite(raw)) return undefined;
        return String(raw);
    }

    const text = String(raw).trim();
    return text || undefined;
}

function normalizeHeader(header: string): string {
    return header.trim().toLowerCase();
}

/**
 * Reads one logical field from a row. Returns undefined if no alias column
 * holds a usable value.
 */
export function readField(record: ProductRecord, field: ProductField): string | undefined {
    const columns = Object.keys(record);

    for (const alias of FIELD_ALIASES[field]) {
        for (const column of columns) {
            if (normalizeHeader(column) !== alias) continue;
            const value = normalizeValue(record[column]);
            if (value !== undefined) return value;
        }
    }

    return undefined;
}

/**
 * Equality for category/objective values. Both sides go through the
 * normalizer, so a numeric 5 and the menu text "5" match.
 */
export function sameTaxonomyValue(a: unknown, b: unknown): boolean {
    const left = normalizeValue(a);
    return left !== undefined && left === normalizeValue(b);
}
