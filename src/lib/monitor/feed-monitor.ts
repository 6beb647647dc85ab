/**
 * @file    feed-monitor.ts
 * @purpose Scheduled refresh of the product feed: fetch the sheet, grow the
 *          taxonomy cache, detect new products and price drops, broadcast them
 *          to the channel, then persist the seen-ids / price state.
 * @created 2026-10-14
 * @updated 2026-10-18
 * @deps    node-cron
 */

import cron, { type ScheduledTask } from "node-cron";
import type { BotConfig } from "../../config/env";
import { ADMIN_MESSAGES, refreshSummary } from "../../config/messages";
import type { DeliveryEntry, RefreshReport } from "../../types/products";
import type { FeedFetcher } from "../feed/fetcher";
import type { ChangeDetector } from "../state/change-detector";
import { StateFileError } from "../state/json-document";
import type { TaxonomyCache } from "../state/taxonomy";
import type { DeliveryService } from "../telegram/delivery";
import { errorMessage } from "../utils";

export type MonitorConfig = Pick<
    BotConfig,
    "feedUrl" | "channelId" | "pollIntervalMinutes" | "pollInitialDelaySeconds" | "pollCron"
>;

export interface FeedMonitorDeps {
    config: MonitorConfig;
    fetchFeed: FeedFetcher;
    detector: ChangeDetector;
    taxonomy: TaxonomyCache;
    delivery: DeliveryService;
}

export class FeedMonitor {
    private config: MonitorConfig;
    private fetchFeed: FeedFetcher;
    private detector: ChangeDetector;
    private taxonomy: TaxonomyCache;
    private delivery: DeliveryService;

    private inFlight: Promise<RefreshReport> | null = null;
    private initialTimer: NodeJS.Timeout | null = null;
    private intervalTimer: NodeJS.Timeout | null = null;
    private cronTask: ScheduledTask | null = null;

    constructor(deps: FeedMonitorDeps) {
        this.config = deps.config;
        this.fetchFeed = deps.fetchFeed;
        this.detector = deps.detector;
        this.taxonomy = deps.taxonomy;
        this.delivery = deps.delivery;
    }

    // ──────────────────────────────────────────────────
    // LIFECYCLE
    // ──────────────────────────────────────────────────

    /**
     * First refresh after the initial delay, then every poll interval
     * (or on POLL_CRON when configured).
     */
    start(): void {
        const { pollCron, pollIntervalMinutes, pollInitialDelaySeconds } = this.config;

        this.initialTimer = setTimeout(() => {
            this.initialTimer = null;
            void this.runScheduled();

            if (!pollCron) {
                this.intervalTimer = setInterval(() => void this.runScheduled(), pollIntervalMinutes * 60_000);
            }
        }, pollInitialDelaySeconds * 1000);

        if (pollCron) {
            this.cronTask = cron.schedule(pollCron, () => void this.runScheduled());
            console.log(`📅 [monitor] Feed refresh on cron "${pollCron}" (first run in ${pollInitialDelaySeconds}s)`);
        } else {
            console.log(`📅 [monitor] Feed refresh every ${pollIntervalMinutes} min (first run in ${pollInitialDelaySeconds}s)`);
        }
    }

    stop(): void {
        if (this.initialTimer) clearTimeout(this.initialTimer);
        if (this.intervalTimer) clearInterval(this.intervalTimer);
        this.cronTask?.stop();
        this.initialTimer = null;
        this.intervalTimer = null;
        this.cronTask = null;
    }

    private async runScheduled(): Promise<void> {
        try {
            const report = await this.refresh();
            console.log(`🔄 [monitor] Refresh finished: ${refreshSummary(report)}`);
        } catch (err) {
            console.error("❌ [monitor] Refresh crashed:", errorMessage(err));
        }
    }

    // ──────────────────────────────────────────────────
    // REFRESH
    // ──────────────────────────────────────────────────

    /**
     * Runs one refresh. A call made while another refresh is still delivering
     * joins that run instead of broadcasting the same changes twice.
     */
    refresh(): Promise<RefreshReport> {
        if (!this.inFlight) {
            this.inFlight = this.runRefresh().finally(() => {
                this.inFlight = null;
            });
        }
        return this.inFlight;
    }

    private async runRefresh(): Promise<RefreshReport> {
        const { feedUrl, channelId } = this.config;

        if (!feedUrl) {
            await this.delivery.notifyAdmin(ADMIN_MESSAGES.feedUnconfigured);
            return { status: "unconfigured" };
        }

        const snapshot = await this.fetchFeed(feedUrl);
        if (snapshot === null) {
            await this.delivery.notifyAdmin(ADMIN_MESSAGES.feedUnreachable);
            return { status: "unreachable" };
        }

        try {
            this.taxonomy.refresh(snapshot);
            const { newItems, changedItems, next } = this.detector.detect(snapshot);

            // No channel: keep the index current without announcing anything
            if (!channelId) {
                this.detector.commit(next);
                console.log(`📇 [monitor] No channel configured, indexed ${snapshot.length} rows`);
                return { status: "indexed", rows: snapshot.length };
            }

            const entries: DeliveryEntry[] = [
                ...newItems.map((record): DeliveryEntry => ({ record, kind: "new" })),
                ...changedItems.map((record): DeliveryEntry => ({ record, kind: "discount" })),
            ];
            if (entries.length > 0) {
                console.log(`📣 [monitor] Broadcasting ${newItems.length} new / ${changedItems.length} discounted`);
            }
            const delivered = await this.delivery.deliverBatch(channelId, entries);

            this.detector.commit(next);
            return {
                status: "broadcast",
                rows: snapshot.length,
                newItems: newItems.length,
                changedItems: changedItems.length,
                delivered,
            };
        } catch (err) {
            const reason = errorMessage(err);
            console.error("❌ [monitor] Refresh aborted:", reason);
            await this.delivery.notifyAdmin(
                err instanceof StateFileError ? ADMIN_MESSAGES.stateUnreadable(reason) : ADMIN_MESSAGES.refreshFailed(reason),
            );
            return { status: "failed", reason };
        }
    }
}
