/**
 * @file    change-detector.ts
 * @purpose Compares a feed snapshot with the persisted seen-ids / price map and
 *          splits it into new products and products whose discounted price moved.
 * @created 2026-10-13
 * @updated 2026-10-16
 * @deps    zod
 */

import { z } from "zod";
import type { ChangeSet, FeedState, ProductRecord } from "../../types/products";
import { readField } from "../feed/fields";
import { JsonDocument } from "./json-document";

// ──────────────────────────────────────────────────
// STATE STORE
// On-disk layout: { "IDs": [...], "last_prices": { id: price } }
// ──────────────────────────────────────────────────

const StateFileSchema = z.object({
    IDs: z.array(z.coerce.string()).default([]),
    last_prices: z.record(z.string(), z.coerce.string()).default({}),
});

type StateFile = z.infer<typeof StateFileSchema>;

export class StateStore {
    private document: JsonDocument<StateFile>;

    constructor(filePath: string) {
        this.document = new JsonDocument(filePath, StateFileSchema, () => ({ IDs: [], last_prices: {} }));
    }

    load(): FeedState {
        const file = this.document.load();
        const seenIds = new Set(file.IDs);
        const lastPrices = new Map(Object.entries(file.last_prices));

        // Every priced id is a seen id, even if an older file says otherwise
        for (const id of lastPrices.keys()) seenIds.add(id);

        return { seenIds, lastPrices };
    }

    /** Replaces the whole document; there is no partial update. */
    save(state: FeedState): void {
        this.document.save({
            IDs: [...state.seenIds],
            last_prices: Object.fromEntries(state.lastPrices),
        });
    }
}

// ──────────────────────────────────────────────────
// DETECTOR
// ──────────────────────────────────────────────────

export interface Detection extends ChangeSet {
    next: FeedState;
}

export class ChangeDetector {
    private store: StateStore;

    constructor(store: StateStore) {
        this.store = store;
    }

    /**
     * Classifies the snapshot against the stored state without writing it.
     * Rows without an id are ignored. Both partitions keep feed order.
     */
    detect(snapshot: readonly ProductRecord[]): Detection {
        const current = this.store.load();
        const seenIds = new Set(current.seenIds);
        const lastPrices = new Map(current.lastPrices);
        const newItems: ProductRecord[] = [];
        const changedItems: ProductRecord[] = [];

        for (const record of snapshot) {
            const id = readField(record, "id");
            if (!id) continue;

            const price = readField(record, "discountedPrice") ?? "";

            if (!seenIds.has(id)) {
                newItems.push(record);
                seenIds.add(id);
                lastPrices.set(id, price);
            } else if (price && lastPrices.get(id) !== price) {
                changedItems.push(record);
                lastPrices.set(id, price);
            }
        }

        return { newItems, changedItems, next: { seenIds, lastPrices } };
    }

    commit(next: FeedState): void {
        this.store.save(next);
    }

    detectAndCommit(snapshot: readonly ProductRecord[]): ChangeSet {
        const { newItems, changedItems, next } = this.detect(snapshot);
        this.commit(next);
        return { newItems, changedItems };
    }
}
