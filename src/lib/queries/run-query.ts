/**
 * @file    run-query.ts
 * @purpose One fetch → filter → paced delivery routine shared by every
 *          interactive query (/ofertas, /buscar, /categoria, /objetivo).
 */

import type { ChangeKind, ChatId, QueryOutcome } from "../../types/products";
import type { FeedFetcher } from "../feed/fetcher";
import type { DeliveryService } from "../telegram/delivery";
import { filterProducts, type ProductPredicate } from "./filters";

export interface ProductQuery {
    feedUrl: string | undefined;
    fetchFeed: FeedFetcher;
    predicate: ProductPredicate;
    destination: ChatId;
    kind: ChangeKind;
    delivery: DeliveryService;
    // Called once the match count is known, before the first product is sent
    onMatches?: (count: number) => Promise<void>;
}

export async function runProductQuery(query: ProductQuery): Promise<QueryOutcome> {
    if (!query.feedUrl) return { status: "unconfigured" };

    const snapshot = await query.fetchFeed(query.feedUrl);
    if (snapshot === null) return { status: "unreachable" };

    const matches = filterProducts(snapshot, query.predicate);
    if (matches.length === 0) return { status: "empty" };

    if (query.onMatches) await query.onMatches(matches.length);

    const delivered = await query.delivery.deliverBatch(
        query.destination,
        matches.map((record) => ({ record, kind: query.kind })),
    );

    return { status: "delivered", matched: matches.length, delivered };
}
