/**
 * Unit tests for the delivery adapter
 *
 * Telegram is replaced by a recording fake sender
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { renderProduct, toPlainText } from "../../src/lib/feed/renderer";
import { DeliveryService, resolveImageUrl, type DeliveryOptions } from "../../src/lib/telegram/delivery";
import { fakeSender } from "../helpers/fakes";

const HTML = "🔹 <b>Nombre:</b> Whey";
const IMAGE = "https://cdn.example.com/whey.png";

function createService(sender: ReturnType<typeof fakeSender>, options: Partial<DeliveryOptions> = {}) {
    return new DeliveryService(sender, { adminIds: ["99"], pacingMs: 0, ...options });
}

afterEach(() => {
    vi.restoreAllMocks();
});

describe("resolveImageUrl", () => {
    it("should turn Drive share links into direct links", () => {
        expect(resolveImageUrl("https://drive.google.com/file/d/abc123/view?usp=sharing"))
            .toBe("https://drive.google.com/uc?export=view&id=abc123");
        expect(resolveImageUrl("https://drive.google.com/open?id=xyz789"))
            .toBe("https://drive.google.com/uc?export=view&id=xyz789");
    });

    it("should keep other absolute links", () => {
        expect(resolveImageUrl(IMAGE)).toBe(IMAGE);
    });

    it("should reject references Telegram cannot fetch", () => {
        expect(resolveImageUrl(undefined)).toBeNull();
        expect(resolveImageUrl("whey.png")).toBeNull();
        expect(resolveImageUrl("ftp://files.example.com/whey.png")).toBeNull();
    });
});

describe("DeliveryService.deliver", () => {
    it("should send a photo with the body as caption", async () => {
        const sender = fakeSender();

        const outcome = await createService(sender).deliver(123, HTML, IMAGE);

        expect(outcome).toBe("photo");
        expect(sender.sendPhoto).toHaveBeenCalledWith(123, IMAGE, HTML);
        expect(sender.sendText).not.toHaveBeenCalled();
    });

    it("should fall back to text when the photo is rejected", async () => {
        vi.spyOn(console, "warn").mockImplementation(() => undefined);
        const sender = fakeSender();
        sender.sendPhoto.mockRejectedValue(new Error("Bad Request: wrong file identifier"));

        const outcome = await createService(sender).deliver(123, HTML, IMAGE);

        expect(outcome).toBe("text");
        expect(sender.sendText).toHaveBeenCalledWith(123, HTML, true);
    });

    it("should skip the photo when the caption is too long", async () => {
        const sender = fakeSender();
        const longHtml = `<b>Descripción:</b> ${"x".repeat(1100)}`;

        const outcome = await createService(sender).deliver(123, longHtml, IMAGE);

        expect(outcome).toBe("text");
        expect(sender.sendPhoto).not.toHaveBeenCalled();
    });

    it("should resend as plain text when the markup is rejected", async () => {
        const sender = fakeSender();
        sender.sendText.mockRejectedValueOnce(new Error("Bad Request: can't parse entities: unsupported start tag"));

        const outcome = await createService(sender).deliver(123, HTML);

        expect(outcome).toBe("plain");
        expect(sender.sendText).toHaveBeenLastCalledWith(123, toPlainText(HTML), false);
    });

    it("should notify the admin when every attempt fails", async () => {
        vi.spyOn(console, "error").mockImplementation(() => undefined);
        const sender = fakeSender();
        sender.sendText.mockImplementation(async (chatId) => {
            if (chatId !== "99") throw new Error("Forbidden: bot was blocked by the user");
        });

        const outcome = await createService(sender).deliver(123, HTML);

        expect(outcome).toBe("failed");
        expect(sender.sendText).toHaveBeenLastCalledWith(
            "99",
            "⚠️ Bot error:\nError enviando mensaje: Forbidden: bot was blocked by the user",
            false,
        );
    });

    it("should not notify the admin about their own chat", async () => {
        vi.spyOn(console, "error").mockImplementation(() => undefined);
        const sender = fakeSender();
        sender.sendText.mockRejectedValue(new Error("Forbidden: bot was blocked by the user"));

        const outcome = await createService(sender).deliver(99, HTML);

        expect(outcome).toBe("failed");
        expect(sender.sendText).toHaveBeenCalledTimes(1);
    });
});

describe("DeliveryService.notifyAdmin", () => {
    it("should prefer the admin chat over the first admin id", async () => {
        const sender = fakeSender();

        await createService(sender, { adminChatId: "-100500" }).notifyAdmin("feed down");

        expect(sender.sendText).toHaveBeenCalledWith("-100500", "⚠️ Bot error:\nfeed down", false);
    });

    it("should drop the notice when no admin is configured", async () => {
        vi.spyOn(console, "warn").mockImplementation(() => undefined);
        const sender = fakeSender();

        await createService(sender, { adminIds: [] }).notifyAdmin("feed down");

        expect(sender.sendText).not.toHaveBeenCalled();
    });

    it("should swallow a failure to reach the admin", async () => {
        vi.spyOn(console, "error").mockImplementation(() => undefined);
        const sender = fakeSender();
        sender.sendText.mockRejectedValue(new Error("chat not found"));

        await expect(createService(sender).notifyAdmin("feed down")).resolves.toBeUndefined();
    });
});

describe("DeliveryService.deliverBatch", () => {
    it("should render each entry with its banner and count what went out", async () => {
        const sender = fakeSender();
        const first = { ID: "1", Nombre: "Whey" };
        const second = { ID: "2", Nombre: "Creatina" };

        const delivered = await createService(sender).deliverBatch("@canal", [
            { record: first, kind: "new" },
            { record: second, kind: "discount" },
        ]);

        expect(delivered).toBe(2);
        expect(sender.sendText.mock.calls).toEqual([
            ["@canal", renderProduct(first, "new"), true],
            ["@canal", renderProduct(second, "discount"), true],
        ]);
    });

    it("should brand every message when a logo is configured", async () => {
        const sender = fakeSender();
        const record = { Nombre: "Whey" };

        await createService(sender, { brandingImage: "https://cdn.example.com/logo.png" })
            .deliverBatch("@canal", [{ record, kind: "none" }]);

        expect(sender.sendText).toHaveBeenCalledWith(
            "@canal",
            '<a href="https://cdn.example.com/logo.png">&#8205;</a>\n\n🔹 <b>Nombre:</b> Whey',
            true,
        );
    });

    it("should use the row's image column", async () => {
        const sender = fakeSender();

        await createService(sender).deliverBatch(5, [{ record: { Nombre: "Whey", Imagen: IMAGE }, kind: "none" }]);

        expect(sender.sendPhoto).toHaveBeenCalledWith(5, IMAGE, "🔹 <b>Nombre:</b> Whey");
    });

    it("should not count failed sends", async () => {
        vi.spyOn(console, "error").mockImplementation(() => undefined);
        const sender = fakeSender();
        sender.sendText.mockRejectedValueOnce(new Error("Too Many Requests: retry after 3"));

        const delivered = await createService(sender, { adminIds: [] }).deliverBatch("@canal", [
            { record: { Nombre: "Whey" }, kind: "new" },
            { record: { Nombre: "Creatina" }, kind: "new" },
        ]);

        expect(delivered).toBe(1);
    });
});
