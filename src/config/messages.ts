/**
 * @file    messages.ts
 * @purpose Every user-facing string the bot sends. Edit this single file to
 *          change how the bot talks to people.
 * @created 2026-10-13
 * @updated 2026-10-19
 */

import type { QueryOutcome, RefreshReport } from "../types/products";

// ──────────────────────────────────────────────────
// WELCOME & HELP
// ──────────────────────────────────────────────────

export const WELCOME_MESSAGE =
    "¡Bienvenido al bot de ofertas! 🎉\n\n" +
    "Este bot te permite buscar productos y sus descuentos.\n\n" +
    "Comandos disponibles:\n" +
    "/ofertas - Ver productos por rango de descuento\n" +
    "/buscar [término] - Buscar productos por palabra clave\n" +
    "/categoria - Ver productos por categoría\n" +
    "/objetivo - Ver productos por objetivo\n" +
    "/help - Ayuda detallada";

export function helpMessage(promoChannel?: string): string {
    const lines = [
        "🆘 <b>Ayuda - Comandos disponibles:</b>",
        "",
        "🔹 <b>/start</b> - Muestra el mensaje de bienvenida",
        "🔹 <b>/help</b> - Muestra esta ayuda",
        "🔹 <b>/ofertas</b> - Muestra productos por rango de descuento",
        "🔹 <b>/buscar [término]</b> - Busca productos por palabra clave",
        "🔹 <b>/categoria</b> - Muestra productos por categoría",
        "🔹 <b>/objetivo</b> - Muestra productos por objetivo",
        "",
        "📌 <b>Ejemplos:</b>",
        "<code>/buscar proteína</code> - Busca productos con \"proteína\"",
        "<code>/ofertas</code> - Muestra productos con descuento",
    ];
    if (promoChannel) {
        lines.push("", `👉 Únete a nuestro canal: ${promoChannel}`);
    }
    return lines.join("\n");
}

// ──────────────────────────────────────────────────
// QUERIES
// ──────────────────────────────────────────────────

export const QUERY_MESSAGES = {
    feedUnconfigured: "Error: URL de la hoja de cálculo no configurada.",
    feedUnreachable: "No se pudo acceder a los datos. Intenta más tarde.",
    selectionExpired: "Esa opción ya no está disponible. Vuelve a abrir el menú.",
    searchUsage:
        "Por favor, especifica un término de búsqueda después de /buscar.\n" +
        "Ejemplo: /buscar proteína",

    pickBracket: "Selecciona el rango de descuento que quieres ver:",
    pickCategory: "Selecciona una categoría para ver sus productos:",
    pickObjective: "Selecciona un objetivo para ver sus productos:",
    noCategories: "No se encontraron categorías.",
    noObjectives: "No se encontraron objetivos.",
    taxonomyUnavailable: "No se pudieron cargar las categorías y objetivos. Intenta más tarde.",

    sending: (found: string) => `Encontrados ${found}.\nEnviando productos...`,
    empty: (scope: string) => `No se encontraron productos ${scope}.`,
    done: (delivered: number, matched: number, scope: string, promoChannel?: string) => {
        const head = delivered === matched
            ? `✅ Se han enviado todos los ${matched} productos ${scope}.`
            : `✅ Se han enviado ${delivered} de ${matched} productos ${scope}.`;
        return promoChannel ? `${head} Si quieres estar al día únete al canal ${promoChannel}.` : head;
    },
};

export function bracketScope(min: number, max: number | null): string {
    return max === null
        ? `con descuentos de ${min}% o más`
        : `con descuentos entre ${min}% y ${max}%`;
}

export const searchScope = (term: string) => `que coinciden con '${term}'`;
export const categoryScope = (value: string) => `de la categoría '${value}'`;
export const objectiveScope = (value: string) => `con el objetivo '${value}'`;

export function foundLabel(count: number, scope: string): string {
    return `${count} productos ${scope}`;
}

/** The closing line of a query, one distinct text per outcome. */
export function queryResultMessage(outcome: QueryOutcome, scope: string, promoChannel?: string): string {
    switch (outcome.status) {
        case "unconfigured":
            return QUERY_MESSAGES.feedUnconfigured;
        case "unreachable":
            return QUERY_MESSAGES.feedUnreachable;
        case "empty":
            return QUERY_MESSAGES.empty(scope);
        case "delivered":
            return QUERY_MESSAGES.done(outcome.delivered, outcome.matched, scope, promoChannel);
    }
}

// ──────────────────────────────────────────────────
// ADMIN
// ──────────────────────────────────────────────────

export const ADMIN_MESSAGES = {
    permissionDenied: "No tienes permiso para usar este comando.",
    forcing: "Forzando actualización...",
    completed: (summary: string) => `Actualización completada.\n${summary}`,
    feedUnconfigured: "Error: URL de la hoja de cálculo no configurada.",
    feedUnreachable: "No se pudo acceder al Google Sheet. Reintentando en el próximo intervalo.",
    stateUnreadable: (reason: string) => `No se pudo leer el estado guardado: ${reason}`,
    refreshFailed: (reason: string) => `La actualización falló: ${reason}`,
};

export function refreshSummary(report: RefreshReport): string {
    switch (report.status) {
        case "unconfigured":
            return "⚠️ URL de la hoja de cálculo no configurada.";
        case "unreachable":
            return "⚠️ No se pudo acceder al Google Sheet.";
        case "failed":
            return `❌ ${report.reason}`;
        case "indexed":
            return `📇 Canal no configurado: estado actualizado con ${report.rows} productos.`;
        case "broadcast":
            return `🆕 Nuevos: ${report.newItems} · 🔥 Descuentos: ${report.changedItems} · 📤 Enviados: ${report.delivered}`;
    }
}
