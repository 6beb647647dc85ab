/**
 * Unit tests for the feed fetcher
 *
 * The HTTP layer is replaced by an in-memory text loader
 */

import { describe, it, expect, vi } from "vitest";
import { readField } from "../../src/lib/feed/fields";
import { createFeedFetcher, parseFeedCsv, type TextLoader } from "../../src/lib/feed/fetcher";

const CSV = [
    "ID,Nombre,Precio,Categoria",
    '1,"Whey, 1kg",29.99,Proteínas',
    "2,Creatina,,Fuerza",
].join("\n");

describe("parseFeedCsv", () => {
    it("should return one record per data row keyed by the header", () => {
        const rows = parseFeedCsv(CSV);

        expect(rows).toHaveLength(2);
        expect(readField(rows[0], "id")).toBe("1");
        expect(readField(rows[0], "name")).toBe("Whey, 1kg");
        expect(readField(rows[0], "price")).toBe("29.99");
        expect(readField(rows[1], "category")).toBe("Fuerza");
    });

    it("should leave empty cells absent", () => {
        const rows = parseFeedCsv(CSV);

        expect(readField(rows[1], "price")).toBeUndefined();
    });

    it("should ignore a byte order mark", () => {
        const rows = parseFeedCsv("\uFEFFid,nombre\n7,Barrita\n");

        expect(readField(rows[0], "id")).toBe("7");
    });

    it("should return no rows for an empty body", () => {
        expect(parseFeedCsv("")).toEqual([]);
        expect(parseFeedCsv("  \n")).toEqual([]);
    });
});

describe("createFeedFetcher", () => {
    it("should load the url and parse the body", async () => {
        const load = vi.fn<TextLoader>().mockResolvedValue(CSV);
        const fetchFeed = createFeedFetcher(load);

        const rows = await fetchFeed("https://sheets.example.com/feed.csv");

        expect(load).toHaveBeenCalledWith("https://sheets.example.com/feed.csv");
        expect(rows).toHaveLength(2);
    });

    it("should return null when the source cannot be read", async () => {
        const fetchFeed = createFeedFetcher(vi.fn<TextLoader>().mockRejectedValue(new Error("timeout of 30000ms exceeded")));

        await expect(fetchFeed("https://sheets.example.com/feed.csv")).resolves.toBeNull();
    });

    it("should tell an empty sheet apart from an unreachable one", async () => {
        const fetchFeed = createFeedFetcher(vi.fn<TextLoader>().mockResolvedValue(""));

        await expect(fetchFeed("https://sheets.example.com/feed.csv")).resolves.toEqual([]);
    });
});
