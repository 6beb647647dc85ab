/**
 * @file    renderer.ts
 * @purpose Builds the Telegram HTML body for one product.
 *          Only <b>, <s> and <a> are emitted, so the text survives both
 *          sendMessage and photo captions.
 * @created 2026-10-12
 * @updated 2026-10-17
 */

import type { ChangeKind, ProductRecord } from "../../types/products";
import { readField } from "./fields";

const BANNERS: Record<ChangeKind, string | null> = {
    none: null,
    new: "🆕 <b>Nuevo Producto:</b>",
    discount: "🔥 <b>¡Nuevo descuento!</b>",
    search: "🔍 <b>Resultado de búsqueda:</b>",
};

// Zero-width joiner inside a link: Telegram shows the logo as link preview
const ZERO_WIDTH_JOINER = "&#8205;";

export function escapeHtml(text: string): string {
    return text
        .replace(/&/g, "&amp;")
        .replace(/</g, "&lt;")
        .replace(/>/g, "&gt;")
        .replace(/"/g, "&quot;");
}

// Data sometimes carries the unit already; the renderer appends its own.
function withoutSuffix(value: string | undefined, suffix: string): string | undefined {
    if (value === undefined || !value.endsWith(suffix)) return value;
    return value.slice(0, -suffix.length).trim() || undefined;
}

function line(label: string, value: string | undefined, format: (v: string) => string = (v) => v): string | null {
    if (value === undefined) return null;
    const separator = label.endsWith("\n") ? "" : " ";
    return `${label}${separator}${format(escapeHtml(value))}`;
}

/**
 * Render a product as rich text. Groups are separated by a single blank line
 * and groups with no present field are left out entirely.
 */
export function renderProduct(record: ProductRecord, kind: ChangeKind = "none", brandingImage?: string): string {
    const logo = brandingImage?.trim();
    const anchor = logo ? `<a href="${escapeHtml(logo)}">${ZERO_WIDTH_JOINER}</a>` : "";
    const banner = BANNERS[kind] ?? "";

    const price = readField(record, "price");
    const discount = readField(record, "discount");
    const discountedPrice = readField(record, "discountedPrice");
    // Blank lines inside the description would read as group breaks
    const description = readField(record, "description")?.replace(/\n\s*\n+/g, "\n");

    const groups: Array<Array<string | null>> = [
        [anchor || banner ? `${anchor}${banner}` : null],
        [
            line("🔹 <b>Nombre:</b>", readField(record, "name")),
            line("🔸 <b>Marca:</b>", readField(record, "brand")),
        ],
        [
            line("💲 <b>Precio original:</b>", withoutSuffix(price, "€"), (v) => `<s>${v}€</s>`),
            line("🎯 <b>Descuento:</b>", withoutSuffix(discount, "%"), (v) => `${v}%`),
            line("✅ <b>Precio con descuento:</b>", withoutSuffix(discountedPrice, "€"), (v) => `<b>${v}€</b>`),
        ],
        [line("📝 <b>Descripción:</b>\n", description)],
        [
            line("📦 <b>Categoria:</b>", readField(record, "category")),
            line("🎯 <b>Objetivo:</b>", readField(record, "objective")),
        ],
    ];

    return groups
        .map((group) => group.filter((entry): entry is string => entry !== null).join("\n"))
        .filter((block) => block.length > 0)
        .join("\n\n");
}

/**
 * Plain-text version of rendered HTML for channels that reject the markup.
 */
export function toPlainText(html: string): string {
    return html
        .replace(/<[^>]+>/g, "")
        .replace(/&#8205;/g, "")
        .replace(/&lt;/g, "<")
        .replace(/&gt;/g, ">")
        .replace(/&quot;/g, "\"")
        .replace(/&amp;/g, "&")
        .trim();
}
