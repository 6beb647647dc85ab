import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { vi } from "vitest";
import type { ChatSender } from "../../src/lib/telegram/delivery";

/**
 * Chat sender that records every call and succeeds unless told otherwise.
 */
export function fakeSender() {
    return {
        sendText: vi.fn<ChatSender["sendText"]>().mockResolvedValue(undefined),
        sendPhoto: vi.fn<ChatSender["sendPhoto"]>().mockResolvedValue(undefined),
    };
}

export function makeTempDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), "deal-relay-"));
}

export function removeDir(dir: string): void {
    fs.rmSync(dir, { recursive: true, force: true });
}
