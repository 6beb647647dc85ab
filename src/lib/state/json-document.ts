/**
 * @file    json-document.ts
 * @purpose A small JSON file on disk, validated on load and replaced atomically
 *          on save (temp file in the same directory, then rename).
 * @deps    zod
 */

import * as fs from "fs";
import * as path from "path";
import type { z } from "zod";
import { errorMessage } from "../utils";

export class StateFileError extends Error {
    readonly filePath: string;

    constructor(filePath: string, reason: string) {
        super(`State file ${filePath} is unreadable: ${reason}`);
        this.name = "StateFileError";
        this.filePath = filePath;
    }
}

export class JsonDocument<T> {
    readonly filePath: string;
    private schema: z.ZodType<T, z.ZodTypeDef, unknown>;
    private empty: () => T;

    constructor(filePath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, empty: () => T) {
        this.filePath = filePath;
        this.schema = schema;
        this.empty = empty;
    }

    /**
     * Returns the stored value, or the empty value when the file does not exist
     * yet. A file that exists but cannot be parsed throws StateFileError.
     */
    load(): T {
        if (!fs.existsSync(this.filePath)) return this.empty();

        let raw: unknown;
        try {
            raw = JSON.parse(fs.readFileSync(this.filePath, "utf8"));
        } catch (err) {
            throw new StateFileError(this.filePath, errorMessage(err));
        }

        const parsed = this.schema.safeParse(raw);
        if (!parsed.success) {
            throw new StateFileError(this.filePath, parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; "));
        }
        return parsed.data;
    }

    save(value: T): void {
        const dir = path.dirname(this.filePath);
        fs.mkdirSync(dir, { recursive: true });

        const tempPath = path.join(dir, `.${path.basename(this.filePath)}.${process.pid}.tmp`);
        fs.writeFileSync(tempPath, JSON.stringify(value, null, 2) + "\n", "utf8");
        fs.renameSync(tempPath, this.filePath);
    }
}
