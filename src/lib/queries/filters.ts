/**
 * @file    filters.ts
 * @purpose Predicates behind the user-facing product queries: discount bracket,
 *          free-text search, category and objective.
 */

import type { ProductRecord } from "../../types/products";
import { normalizeValue, readField, sameTaxonomyValue } from "../feed/fields";

export type ProductPredicate = (record: ProductRecord) => boolean;

export interface DiscountBracket {
    id: string;
    label: string;
    min: number;
    max: number | null;   // null = open upper bound
}

export const DISCOUNT_BRACKETS: readonly DiscountBracket[] = [
    { id: "0-10", label: "0-10%", min: 0, max: 10 },
    { id: "10-20", label: "10-20%", min: 10, max: 20 },
    { id: "20-30", label: "20-30%", min: 20, max: 30 },
    { id: "30-50", label: "30-50%", min: 30, max: 50 },
    { id: "50+", label: "Más del 50%", min: 50, max: null },
];

export function findBracket(id: string): DiscountBracket | undefined {
    return DISCOUNT_BRACKETS.find((bracket) => bracket.id === id);
}

const DECIMAL = /^-?\d+(\.\d+)?$/;

/**
 * "35", "35%", "12,5 %" → number. Anything else → null.
 */
export function parseDiscount(raw: unknown): number | null {
    const text = normalizeValue(raw);
    if (text === undefined) return null;

    const cleaned = text.replace(/%$/, "").trim().replace(",", ".");
    // Plain decimals only: Number() would also take "0x10" or "1e1"
    if (!DECIMAL.test(cleaned)) return null;

    return Number(cleaned);
}

export function discountBracketPredicate(bracket: DiscountBracket): ProductPredicate {
    return (record) => {
        const value = parseDiscount(readField(record, "discount"));
        if (value === null) return false;
        return value >= bracket.min && (bracket.max === null || value < bracket.max);
    };
}

const SEARCH_FIELDS = ["name", "brand", "description", "category", "objective"] as const;

/**
 * Case-insensitive substring match over the product's descriptive fields.
 * The caller rejects empty terms before building the predicate.
 */
export function searchPredicate(term: string): ProductPredicate {
    const needle = term.trim().toLowerCase();
    return (record) => {
        const haystack = SEARCH_FIELDS
            .map((field) => readField(record, field))
            .filter((value): value is string => value !== undefined)
            .join(" ")
            .toLowerCase();
        return haystack.includes(needle);
    };
}

export function categoryPredicate(selected: string): ProductPredicate {
    return (record) => sameTaxonomyValue(readField(record, "category"), selected);
}

export function objectivePredicate(selected: string): ProductPredicate {
    return (record) => sameTaxonomyValue(readField(record, "objective"), selected);
}

export function filterProducts(snapshot: readonly ProductRecord[], predicate: ProductPredicate): ProductRecord[] {
    return snapshot.filter(predicate);
}
