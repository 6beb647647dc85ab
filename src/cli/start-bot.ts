/**
 * @file    start-bot.ts
 * @purpose Long-running launcher: wires config, feed, state, delivery and the
 *          Telegram command surface, then starts polling and the feed monitor.
 * @created 2026-10-15
 * @updated 2026-10-18
 * @deps    dotenv, telegraf
 * @env     see src/config/env.ts
 */

import * as dotenv from "dotenv";
dotenv.config({ path: ".env.local" });
dotenv.config();

import { Telegraf } from "telegraf";
import { ConfigError, loadConfig, type BotConfig } from "../config/env";
import { createFeedFetcher, httpTextLoader } from "../lib/feed/fetcher";
import { FeedMonitor } from "../lib/monitor/feed-monitor";
import { ChangeDetector, StateStore } from "../lib/state/change-detector";
import { TaxonomyCache } from "../lib/state/taxonomy";
import { registerCommands } from "../lib/telegram/bot";
import { DeliveryService, telegramSender } from "../lib/telegram/delivery";
import { errorMessage } from "../lib/utils";

// ──────────────────────────────────────────────────
// CONFIG
// ──────────────────────────────────────────────────

let config: BotConfig;
try {
    config = loadConfig();
} catch (err) {
    if (err instanceof ConfigError) {
        console.error(`❌ ${err.message}`);
        process.exit(1);
    }
    throw err;
}

// ──────────────────────────────────────────────────
// WIRING
// ──────────────────────────────────────────────────

const bot = new Telegraf(config.telegramToken);

const delivery = new DeliveryService(telegramSender(bot.telegram), {
    adminIds: config.adminIds,
    adminChatId: config.adminChatId,
    brandingImage: config.logoUrl,
    pacingMs: config.deliveryPacingMs,
});
const fetchFeed = createFeedFetcher(httpTextLoader(config.feedTimeoutMs));
const detector = new ChangeDetector(new StateStore(config.stateFile));
const taxonomy = new TaxonomyCache(config.taxonomyFile);
const monitor = new FeedMonitor({ config, fetchFeed, detector, taxonomy, delivery });

registerCommands(bot, config, { fetchFeed, delivery, taxonomy, monitor });

console.log("🚀 DEAL RELAY BOT BOOTING...");
console.log(`📄 Feed: ${config.feedUrl ? "✅ Configured" : "❌ Not configured"}`);
console.log(`📣 Channel: ${config.channelId ? `✅ ${config.channelId}` : "❌ Not configured (index only)"}`);
console.log(`🛡️ Admins: ${config.adminIds.length > 0 || config.adminChatId ? "✅ Loaded" : "❌ Not configured"}`);

// ──────────────────────────────────────────────────
// LAUNCH
// ──────────────────────────────────────────────────

async function main(): Promise<void> {
    // Polling conflicts with a webhook left behind by an earlier deployment
    await bot.telegram.deleteWebhook({ drop_pending_updates: true });

    // launch() only resolves when polling stops, so it is not awaited here
    bot.launch({ dropPendingUpdates: true }).catch((err: unknown) => {
        console.error("❌ Telegram polling stopped:", errorMessage(err));
        monitor.stop();
        process.exit(1);
    });
    console.log("🤖 Telegram polling started");

    monitor.start();
}

function shutdown(signal: string): void {
    console.log(`👋 ${signal} received, shutting down`);
    monitor.stop();
    bot.stop(signal);
}

process.once("SIGINT", () => shutdown("SIGINT"));
process.once("SIGTERM", () => shutdown("SIGTERM"));

main().catch((err: unknown) => {
    console.error("❌ Startup failed:", errorMessage(err));
    process.exit(1);
});
