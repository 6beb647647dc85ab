/**
 * @file    taxonomy.ts
 * @purpose Persisted, grow-only set of the categories and objectives seen in the
 *          feed. Backs the /categoria and /objetivo menus so they do not need a
 *          fresh scan of the sheet.
 * @created 2026-10-14
 * @updated 2026-10-16
 * @deps    zod
 */

import { createHash } from "crypto";
import { z } from "zod";
import type { ProductRecord, Taxonomy } from "../../types/products";
import { readField } from "../feed/fields";
import { JsonDocument } from "./json-document";

const TaxonomyFileSchema = z.object({
    categories: z.array(z.coerce.string()).default([]),
    objectives: z.array(z.coerce.string()).default([]),
});

export type TaxonomyKind = "category" | "objective";

function sorted(values: Iterable<string>): string[] {
    return [...new Set(values)].sort((a, b) => a.localeCompare(b, "es"));
}

/**
 * Compact, stable callback key for a menu value. Telegram caps callback data
 * at 64 bytes, which long category names would overflow.
 */
export function taxonomyKey(value: string): string {
    return createHash("sha1").update(value).digest("hex").slice(0, 10);
}

export class TaxonomyCache {
    private document: JsonDocument<Taxonomy>;

    constructor(filePath: string) {
        this.document = new JsonDocument(filePath, TaxonomyFileSchema, () => ({ categories: [], objectives: [] }));
    }

    current(): Taxonomy {
        const stored = this.document.load();
        return { categories: sorted(stored.categories), objectives: sorted(stored.objectives) };
    }

    /**
     * Merges the snapshot's values into the stored sets and persists them.
     * Entries are never removed, even when they disappear from the feed.
     */
    refresh(snapshot: readonly ProductRecord[]): Taxonomy {
        const stored = this.current();
        const categories = new Set(stored.categories);
        const objectives = new Set(stored.objectives);

        for (const record of snapshot) {
            const category = readField(record, "category");
            if (category) categories.add(category);
            const objective = readField(record, "objective");
            if (objective) objectives.add(objective);
        }

        const merged: Taxonomy = { categories: sorted(categories), objectives: sorted(objectives) };
        this.document.save(merged);
        return merged;
    }

    /**
     * Returns the stored taxonomy, filling it from a fresh snapshot first when
     * nothing has been recorded yet. Null when the feed cannot be loaded.
     */
    async ensure(loadSnapshot: () => Promise<ProductRecord[] | null>): Promise<Taxonomy | null> {
        const stored = this.current();
        if (stored.categories.length > 0 || stored.objectives.length > 0) return stored;

        const snapshot = await loadSnapshot();
        return snapshot === null ? null : this.refresh(snapshot);
    }

    /** Finds the stored value behind a menu callback key. */
    resolve(kind: TaxonomyKind, key: string): string | undefined {
        const { categories, objectives } = this.current();
        const values = kind === "category" ? categories : objectives;
        return values.find((value) => taxonomyKey(value) === key);
    }
}
