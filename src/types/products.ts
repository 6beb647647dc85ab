/**
 * @file    products.ts
 * @purpose Shared shapes for feed rows, persisted state and query results.
 */

// One spreadsheet row, keyed by its raw header. No column is guaranteed.
export type ProductRecord = Record<string, unknown>;

export type ProductField =
    | "id"
    | "name"
    | "brand"
    | "price"
    | "discount"
    | "discountedPrice"
    | "description"
    | "category"
    | "objective"
    | "image";

export type ChangeKind = "none" | "new" | "discount" | "search";

export type ChatId = string | number;

export interface DeliveryEntry {
    record: ProductRecord;
    kind: ChangeKind;
}

export type DeliveryOutcome =
    | "photo"     // image + caption accepted
    | "text"      // HTML text (image missing or rejected)
    | "plain"     // markup rejected, sent without parse mode
    | "failed";

export interface FeedState {
    seenIds: Set<string>;
    lastPrices: Map<string, string>;
}

export interface ChangeSet {
    newItems: ProductRecord[];
    changedItems: ProductRecord[];
}

export interface Taxonomy {
    categories: string[];
    objectives: string[];
}

export type QueryOutcome =
    | { status: "unconfigured" }
    | { status: "unreachable" }
    | { status: "empty" }
    | { status: "delivered"; matched: number; delivered: number };

export type RefreshReport =
    | { status: "unconfigured" }
    | { status: "unreachable" }
    | { status: "failed"; reason: string }
    | { status: "indexed"; rows: number }
    | { status: "broadcast"; rows: number; newItems: number; changedItems: number; delivered: number };
