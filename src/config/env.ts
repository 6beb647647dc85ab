/**
 * @file    env.ts
 * @purpose Reads and validates the bot's environment into one immutable config
 *          object, built once at startup and handed to every component.
 * @created 2026-10-12
 * @updated 2026-10-17
 * @deps    zod, node-cron
 * @env     TELEGRAM_BOT_TOKEN, FEED_CSV_URL, TELEGRAM_CHANNEL_ID, ADMIN_CHAT_ID,
 *          ADMIN_USER_IDS, LOGO_URL, PROMO_CHANNEL, POLL_INTERVAL_MINUTES,
 *          POLL_INITIAL_DELAY_SECONDS, POLL_CRON, DELIVERY_PACING_MS,
 *          FEED_TIMEOUT_MS, STATE_FILE, TAXONOMY_FILE
 */

import cron from "node-cron";
import { z } from "zod";

export interface BotConfig {
    telegramToken: string;
    feedUrl?: string;
    channelId?: string;
    adminChatId?: string;
    adminIds: readonly string[];
    logoUrl?: string;
    promoChannel?: string;
    pollIntervalMinutes: number;
    pollInitialDelaySeconds: number;
    pollCron?: string;
    deliveryPacingMs: number;
    feedTimeoutMs: number;
    stateFile: string;
    taxonomyFile: string;
}

export class ConfigError extends Error {
    constructor(issues: string[]) {
        super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`);
        this.name = "ConfigError";
    }
}

// Blank values count as unset
const optionalText = z
    .string()
    .optional()
    .transform((value) => value?.trim() || undefined);

function numberOr(fallback: number, schema: z.ZodNumber) {
    return z.preprocess(
        (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
        schema.default(fallback),
    );
}

const EnvSchema = z.object({
    TELEGRAM_BOT_TOKEN: z
        .string({ required_error: "required" })
        .trim()
        .min(1, "required"),
    FEED_CSV_URL: optionalText.pipe(z.string().url().optional()),
    TELEGRAM_CHANNEL_ID: optionalText,
    ADMIN_CHAT_ID: optionalText,
    ADMIN_USER_IDS: optionalText.transform((value) =>
        (value ?? "").split(",").map((id) => id.trim()).filter(Boolean),
    ),
    LOGO_URL: optionalText.pipe(z.string().url().optional()),
    PROMO_CHANNEL: optionalText,
    POLL_INTERVAL_MINUTES: numberOr(25, z.coerce.number().positive()),
    POLL_INITIAL_DELAY_SECONDS: numberOr(10, z.coerce.number().min(0)),
    POLL_CRON: optionalText.refine((value) => value === undefined || cron.validate(value), {
        message: "not a valid cron expression",
    }),
    DELIVERY_PACING_MS: numberOr(1000, z.coerce.number().int().min(0)),
    FEED_TIMEOUT_MS: numberOr(30_000, z.coerce.number().int().positive()),
    STATE_FILE: optionalText.transform((value) => value ?? "data/processed_ids.json"),
    TAXONOMY_FILE: optionalText.transform((value) => value ?? "data/taxonomy.json"),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): BotConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`));
    }

    const e = parsed.data;
    return Object.freeze({
        telegramToken: e.TELEGRAM_BOT_TOKEN,
        feedUrl: e.FEED_CSV_URL,
        channelId: e.TELEGRAM_CHANNEL_ID,
        adminChatId: e.ADMIN_CHAT_ID,
        adminIds: Object.freeze([...e.ADMIN_USER_IDS]),
        logoUrl: e.LOGO_URL,
        promoChannel: e.PROMO_CHANNEL,
        pollIntervalMinutes: e.POLL_INTERVAL_MINUTES,
        pollInitialDelaySeconds: e.POLL_INITIAL_DELAY_SECONDS,
        pollCron: e.POLL_CRON,
        deliveryPacingMs: e.DELIVERY_PACING_MS,
        feedTimeoutMs: e.FEED_TIMEOUT_MS,
        stateFile: e.STATE_FILE,
        taxonomyFile: e.TAXONOMY_FILE,
    });
}
