/**
 * @file    utils.ts
 * @purpose Small helpers shared by the feed, delivery and bot layers.
 */

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}
