/**
 * @file    menus.ts
 * @purpose Inline keyboards for the query commands and the callback data they
 *          carry back.
 * @deps    telegraf
 */

import { Markup } from "telegraf";
import { DISCOUNT_BRACKETS } from "../queries/filters";
import { taxonomyKey, type TaxonomyKind } from "../state/taxonomy";

export const CALLBACK_PREFIX: Record<"discount" | TaxonomyKind, string> = {
    discount: "discount_",
    category: "cat_",
    objective: "obj_",
};

export function chunk<T>(items: readonly T[], size: number): T[][] {
    const rows: T[][] = [];
    for (let i = 0; i < items.length; i += size) {
        rows.push(items.slice(i, i + size));
    }
    return rows;
}

// 2 / 2 / 1 with the default five brackets
export function buildDiscountMenu() {
    const buttons = DISCOUNT_BRACKETS.map((bracket) =>
        Markup.button.callback(bracket.label, `${CALLBACK_PREFIX.discount}${bracket.id}`),
    );
    return Markup.inlineKeyboard(chunk(buttons, 2));
}

export function buildTaxonomyMenu(kind: TaxonomyKind, values: readonly string[]) {
    const buttons = values.map((value) =>
        Markup.button.callback(value, `${CALLBACK_PREFIX[kind]}${taxonomyKey(value)}`),
    );
    return Markup.inlineKeyboard(chunk(buttons, 2));
}
