/**
 * @file    check-feed.ts
 * @purpose One-off check of the configured sheet: row count, the categories and
 *          objectives it carries, and how the first product would render.
 *          Reads nothing from and writes nothing to the state files.
 * @usage   npm run check-feed [-- <csv-url>]
 * @deps    dotenv
 */

import * as dotenv from "dotenv";
dotenv.config({ path: ".env.local" });
dotenv.config();

import { readField } from "../lib/feed/fields";
import { createFeedFetcher, httpTextLoader } from "../lib/feed/fetcher";
import { renderProduct, toPlainText } from "../lib/feed/renderer";
import type { ProductRecord } from "../types/products";

function distinct(snapshot: readonly ProductRecord[], field: "category" | "objective"): string[] {
    const values = new Set<string>();
    for (const record of snapshot) {
        const value = readField(record, field);
        if (value) values.add(value);
    }
    return [...values].sort((a, b) => a.localeCompare(b, "es"));
}

async function main(): Promise<number> {
    const url = process.argv[2] ?? process.env.FEED_CSV_URL;
    if (!url) {
        console.error("❌ No feed URL. Pass one as an argument or set FEED_CSV_URL.");
        return 1;
    }

    const fetchFeed = createFeedFetcher(httpTextLoader(Number(process.env.FEED_TIMEOUT_MS) || undefined));
    const snapshot = await fetchFeed(url);
    if (snapshot === null) return 1;

    const withId = snapshot.filter((record) => readField(record, "id") !== undefined).length;
    console.log(`\n📊 Rows: ${snapshot.length} (${withId} with an id)`);
    console.log(`📦 Categories: ${distinct(snapshot, "category").join(", ") || "(none)"}`);
    console.log(`🎯 Objectives: ${distinct(snapshot, "objective").join(", ") || "(none)"}`);

    const first = snapshot[0];
    if (first) {
        console.log("\n── First product ──────────────────────────────");
        console.log(toPlainText(renderProduct(first, "new", process.env.LOGO_URL)));
    }
    return 0;
}

main()
    .then((code) => process.exit(code))
    .catch((err: unknown) => {
        console.error("❌ Feed check failed:", err);
        process.exit(1);
    });
