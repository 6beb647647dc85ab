/**
 * @file    bot.ts
 * @purpose Telegram command surface: welcome/help, the four product queries
 *          with their inline menus, and the admin-only forced refresh.
 * @created 2026-10-15
 * @updated 2026-10-19
 * @deps    telegraf
 *
 * DECISION(2026-10-15): Status lines for a menu selection edit the menu message
 * in place; the closing "sent N" line is a new message so it lands after the
 * products. /buscar has no menu, so its status lines are plain replies.
 */

import type { Telegraf } from "telegraf";
import type { BotConfig } from "../../config/env";
import {
    ADMIN_MESSAGES,
    QUERY_MESSAGES,
    WELCOME_MESSAGE,
    bracketScope,
    categoryScope,
    foundLabel,
    helpMessage,
    objectiveScope,
    queryResultMessage,
    refreshSummary,
    searchScope,
} from "../../config/messages";
import type { ChangeKind, ChatId, RefreshReport, Taxonomy } from "../../types/products";
import type { FeedFetcher } from "../feed/fetcher";
import {
    categoryPredicate,
    discountBracketPredicate,
    findBracket,
    objectivePredicate,
    searchPredicate,
    type ProductPredicate,
} from "../queries/filters";
import { runProductQuery } from "../queries/run-query";
import { StateFileError } from "../state/json-document";
import type { TaxonomyCache, TaxonomyKind } from "../state/taxonomy";
import { errorMessage } from "../utils";
import type { DeliveryService } from "./delivery";
import { buildDiscountMenu, buildTaxonomyMenu } from "./menus";

export interface BotServices {
    fetchFeed: FeedFetcher;
    delivery: DeliveryService;
    taxonomy: TaxonomyCache;
    monitor: { refresh(): Promise<RefreshReport> };
}

type BotSettings = Pick<BotConfig, "feedUrl" | "promoChannel">;

/** "/buscar@my_bot  whey isolate " → "whey isolate" */
export function extractSearchTerm(text: string): string {
    return text.replace(/^\/buscar(@\S+)?\s*/i, "").trim();
}

type Reply = (text: string) => Promise<unknown>;

interface QueryTarget {
    destination: ChatId;
    status: Reply;
    reply: Reply;
}

export function registerCommands(bot: Telegraf, config: BotSettings, services: BotServices): void {
    const { fetchFeed, delivery, taxonomy, monitor } = services;

    async function answerQuery(target: QueryTarget, predicate: ProductPredicate, scope: string, kind: ChangeKind) {
        const outcome = await runProductQuery({
            feedUrl: config.feedUrl,
            fetchFeed,
            predicate,
            destination: target.destination,
            kind,
            delivery,
            onMatches: async (count) => {
                await target.status(QUERY_MESSAGES.sending(foundLabel(count, scope)));
            },
        });

        const closing = queryResultMessage(outcome, scope, config.promoChannel);
        if (outcome.status === "delivered") {
            await target.reply(closing);
        } else {
            await target.status(closing);
        }
    }

    // A corrupt taxonomy file still gets the user an answer; anything else goes to bot.catch
    async function reportTaxonomyError(err: unknown, reply: Reply): Promise<void> {
        if (!(err instanceof StateFileError)) throw err;

        const reason = errorMessage(err);
        console.error("❌ [bot] Taxonomy unreadable:", reason);
        await delivery.notifyAdmin(ADMIN_MESSAGES.stateUnreadable(reason));
        await reply(QUERY_MESSAGES.taxonomyUnavailable);
    }

    async function showTaxonomyMenu(kind: TaxonomyKind, reply: (text: string, extra?: ReturnType<typeof buildTaxonomyMenu>) => Promise<unknown>) {
        const feedUrl = config.feedUrl;
        if (!feedUrl) {
            await reply(QUERY_MESSAGES.feedUnconfigured);
            return;
        }

        let stored: Taxonomy | null;
        try {
            stored = await taxonomy.ensure(() => fetchFeed(feedUrl));
        } catch (err) {
            await reportTaxonomyError(err, reply);
            return;
        }
        if (stored === null) {
            await reply(QUERY_MESSAGES.feedUnreachable);
            return;
        }

        const values = kind === "category" ? stored.categories : stored.objectives;
        if (values.length === 0) {
            await reply(kind === "category" ? QUERY_MESSAGES.noCategories : QUERY_MESSAGES.noObjectives);
            return;
        }

        await reply(
            kind === "category" ? QUERY_MESSAGES.pickCategory : QUERY_MESSAGES.pickObjective,
            buildTaxonomyMenu(kind, values),
        );
    }

    // ──────────────────────────────────────────────────
    // COMMANDS
    // ──────────────────────────────────────────────────

    bot.start((ctx) => ctx.reply(WELCOME_MESSAGE));

    bot.help((ctx) => ctx.reply(helpMessage(config.promoChannel), { parse_mode: "HTML" }));

    bot.command("ofertas", (ctx) => ctx.reply(QUERY_MESSAGES.pickBracket, buildDiscountMenu()));

    bot.command("buscar", async (ctx) => {
        const term = extractSearchTerm(ctx.message.text);
        if (!term) {
            await ctx.reply(QUERY_MESSAGES.searchUsage);
            return;
        }

        console.log(`🔍 [bot] Search "${term}" from ${ctx.from.id}`);
        await answerQuery(
            { destination: ctx.chat.id, status: (text) => ctx.reply(text), reply: (text) => ctx.reply(text) },
            searchPredicate(term),
            searchScope(term),
            "search",
        );
    });

    bot.command("categoria", (ctx) => showTaxonomyMenu("category", (text, extra) => ctx.reply(text, extra)));

    bot.command("objetivo", (ctx) => showTaxonomyMenu("objective", (text, extra) => ctx.reply(text, extra)));

    bot.command("force_update", async (ctx) => {
        if (!delivery.isAdmin(ctx.from.id)) {
            await ctx.reply(ADMIN_MESSAGES.permissionDenied);
            return;
        }

        console.log(`🔄 [bot] Forced refresh by ${ctx.from.id}`);
        await ctx.reply(ADMIN_MESSAGES.forcing);
        const report = await monitor.refresh();
        await ctx.reply(ADMIN_MESSAGES.completed(refreshSummary(report)));
    });

    // ──────────────────────────────────────────────────
    // MENU SELECTIONS
    // ──────────────────────────────────────────────────

    bot.action(/^discount_(.+)$/, async (ctx) => {
        await ctx.answerCbQuery();
        const destination = ctx.chat?.id;
        if (destination === undefined) return;

        const bracket = findBracket(ctx.match[1]);
        if (!bracket) {
            await ctx.editMessageText(QUERY_MESSAGES.selectionExpired);
            return;
        }

        await answerQuery(
            { destination, status: (text) => ctx.editMessageText(text), reply: (text) => ctx.reply(text) },
            discountBracketPredicate(bracket),
            bracketScope(bracket.min, bracket.max),
            "none",
        );
    });

    const TAXONOMY_ACTIONS: Array<[RegExp, TaxonomyKind]> = [
        [/^cat_(.+)$/, "category"],
        [/^obj_(.+)$/, "objective"],
    ];

    for (const [pattern, kind] of TAXONOMY_ACTIONS) {
        bot.action(pattern, async (ctx) => {
            await ctx.answerCbQuery();
            const destination = ctx.chat?.id;
            if (destination === undefined) return;

            let value: string | undefined;
            try {
                value = taxonomy.resolve(kind, ctx.match[1]);
            } catch (err) {
                await reportTaxonomyError(err, (text) => ctx.editMessageText(text));
                return;
            }
            if (value === undefined) {
                await ctx.editMessageText(QUERY_MESSAGES.selectionExpired);
                return;
            }

            await answerQuery(
                { destination, status: (text) => ctx.editMessageText(text), reply: (text) => ctx.reply(text) },
                kind === "category" ? categoryPredicate(value) : objectivePredicate(value),
                kind === "category" ? categoryScope(value) : objectiveScope(value),
                "none",
            );
        });
    }

    bot.catch(async (err, ctx) => {
        const reason = errorMessage(err);
        console.error(`❌ [bot] Handler failed for update ${ctx.update.update_id}:`, reason);
        await delivery.notifyAdmin(`Error procesando una actualización: ${reason}`);
    });
}
