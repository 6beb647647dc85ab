/**
 * @file    delivery.ts
 * @purpose Sends rendered products to a chat with image → text → plain-text
 *          fallback, and relays operator-facing error notices.
 * @created 2026-10-13
 * @updated 2026-10-17
 * @deps    telegraf
 *
 * DECISION(2026-10-14): A failed image never reaches the user. The same body is
 * resent as text; only a failure of every attempt counts as a delivery error.
 * Errors while messaging an administrator are logged and dropped, otherwise a
 * broken admin chat would keep reporting its own failures.
 */

import type { Telegram } from "telegraf";
import type { ChatId, DeliveryEntry, DeliveryOutcome } from "../../types/products";
import { readField } from "../feed/fields";
import { renderProduct, toPlainText } from "../feed/renderer";
import { errorMessage, sleep } from "../utils";

// ──────────────────────────────────────────────────
// SENDER PORT
// ──────────────────────────────────────────────────

export interface ChatSender {
    sendText(chatId: ChatId, text: string, html: boolean): Promise<void>;
    sendPhoto(chatId: ChatId, photoUrl: string, htmlCaption: string): Promise<void>;
}

export function telegramSender(telegram: Telegram): ChatSender {
    return {
        async sendText(chatId, text, html) {
            await telegram.sendMessage(chatId, text, html ? { parse_mode: "HTML" } : {});
        },
        async sendPhoto(chatId, photoUrl, htmlCaption) {
            await telegram.sendPhoto(chatId, photoUrl, { caption: htmlCaption, parse_mode: "HTML" });
        },
    };
}

// ──────────────────────────────────────────────────
// IMAGE REFERENCES
// ──────────────────────────────────────────────────

const TELEGRAM_CAPTION_LIMIT = 1024;

const DRIVE_PATTERNS = [
    /drive\.google\.com\/file\/d\/([^/?#]+)/,
    /drive\.google\.com\/open\?(?:.*&)?id=([^&#]+)/,
];

/**
 * Maps a sheet image reference to a URL Telegram can fetch. Drive share links
 * become direct-content links; anything that is not absolute http(s) is dropped.
 */
export function resolveImageUrl(imageRef: string | undefined): string | null {
    const raw = imageRef?.trim();
    if (!raw) return null;

    let candidate = raw;
    for (const pattern of DRIVE_PATTERNS) {
        const match = pattern.exec(raw);
        if (match) {
            candidate = `https://drive.google.com/uc?export=view&id=${match[1]}`;
            break;
        }
    }

    if (!/^https?:\/\//i.test(candidate)) return null;
    try {
        new URL(candidate);
        return candidate;
    } catch {
        return null;
    }
}

function isMarkupRejection(err: unknown): boolean {
    return /can't parse entities/i.test(errorMessage(err));
}

// ──────────────────────────────────────────────────
// DELIVERY
// ──────────────────────────────────────────────────

export interface DeliveryOptions {
    adminIds: readonly string[];
    adminChatId?: string;
    brandingImage?: string;
    pacingMs: number;
}

export class DeliveryService {
    private sender: ChatSender;
    private options: DeliveryOptions;

    constructor(sender: ChatSender, options: DeliveryOptions) {
        this.sender = sender;
        this.options = options;
    }

    isAdmin(id: ChatId | undefined): boolean {
        if (id === undefined) return false;
        const key = String(id);
        return this.options.adminChatId === key || this.options.adminIds.includes(key);
    }

    /**
     * Deliver one rich-text body, with the image as a photo when possible.
     * Resolves with how the message went out; never rejects.
     */
    async deliver(destination: ChatId, html: string, imageRef?: string): Promise<DeliveryOutcome> {
        const photoUrl = resolveImageUrl(imageRef);

        if (photoUrl && toPlainText(html).length <= TELEGRAM_CAPTION_LIMIT) {
            try {
                await this.sender.sendPhoto(destination, photoUrl, html);
                return "photo";
            } catch (err) {
                console.warn(`⚠️ [delivery] Photo rejected for ${destination}, sending text only:`, errorMessage(err));
            }
        }

        let failure: unknown;
        try {
            await this.sender.sendText(destination, html, true);
            return "text";
        } catch (err) {
            failure = err;
        }

        if (isMarkupRejection(failure)) {
            try {
                await this.sender.sendText(destination, toPlainText(html), false);
                return "plain";
            } catch (err) {
                failure = err;
            }
        }

        const reason = errorMessage(failure);
        console.error(`❌ [delivery] Could not message ${destination}:`, reason);
        if (!this.isAdmin(destination)) {
            await this.notifyAdmin(`Error enviando mensaje: ${reason}`);
        }
        return "failed";
    }

    /**
     * Best-effort notice to the operator. This is the end of the line for
     * errors: a failure here is only logged.
     */
    async notifyAdmin(message: string): Promise<void> {
        const target = this.options.adminChatId ?? this.options.adminIds[0];
        if (!target) {
            console.warn("⚠️ [delivery] No admin chat configured, notice dropped:", message);
            return;
        }
        try {
            await this.sender.sendText(target, `⚠️ Bot error:\n${message}`, false);
        } catch (err) {
            console.error("❌ [delivery] Could not notify the admin:", errorMessage(err));
        }
    }

    /**
     * Render and deliver entries in order, pausing between consecutive sends
     * to stay under Telegram's per-chat rate limits. Returns how many went out.
     */
    async deliverBatch(destination: ChatId, entries: readonly DeliveryEntry[]): Promise<number> {
        let delivered = 0;
        for (const [index, { record, kind }] of entries.entries()) {
            const html = renderProduct(record, kind, this.options.brandingImage);
            const outcome = await this.deliver(destination, html, readField(record, "image"));
            if (outcome !== "failed") delivered++;

            if (index < entries.length - 1) await sleep(this.options.pacingMs);
        }
        return delivered;
    }
}
