/**
 * @file    fetcher.ts
 * @purpose Downloads the published spreadsheet as CSV and turns it into rows.
 *          Never throws: an unreachable or unreadable feed comes back as null so
 *          callers can tell "source down" apart from "sheet has no rows".
 * @created 2026-10-12
 * @updated 2026-10-16
 * @deps    axios, xlsx
 */

import axios from "axios";
import * as XLSX from "xlsx";
import type { ProductRecord } from "../../types/products";
import { errorMessage } from "../utils";

export type TextLoader = (url: string) => Promise<string>;
export type FeedFetcher = (url: string) => Promise<ProductRecord[] | null>;

const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * GET the feed body as raw text. axios would otherwise try to JSON-parse it.
 */
export function httpTextLoader(timeoutMs: number = DEFAULT_TIMEOUT_MS): TextLoader {
    return async (url: string) => {
        const response = await axios.get<string>(url, {
            responseType: "text",
            timeout: timeoutMs,
            transformResponse: [(data: unknown) => data],
        });
        if (typeof response.data !== "string") {
            throw new Error(`Unexpected feed payload (${typeof response.data})`);
        }
        return response.data;
    };
}

/**
 * Parse CSV text into one object per data row, keyed by the header row.
 * Empty cells come back as null.
 */
export function parseFeedCsv(csv: string): ProductRecord[] {
    const text = csv.replace(/^\uFEFF/, "");
    if (!text.trim()) return [];

    const workbook = XLSX.read(text, { type: "string", raw: true });
    const sheetName = workbook.SheetNames[0];
    if (!sheetName) return [];

    return XLSX.utils.sheet_to_json<ProductRecord>(workbook.Sheets[sheetName], {
        defval: null,
        raw: true,
    });
}

export function createFeedFetcher(load: TextLoader = httpTextLoader()): FeedFetcher {
    return async (url: string) => {
        try {
            const rows = parseFeedCsv(await load(url));
            console.log(`📄 [feed] Read ${rows.length} products from the sheet.`);
            return rows;
        } catch (err) {
            console.error("❌ [feed] Failed to read the sheet:", errorMessage(err));
            return null;
        }
    };
}
