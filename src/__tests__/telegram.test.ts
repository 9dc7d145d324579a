/**
 * Unit tests for Telegram delivery
 */

import { TelegramChannel } from "../telegram";
import { httpError, response, StubAdapter } from "./http";

describe("TelegramChannel", () => {
  it("should post the message to sendMessage", async () => {
    const stub = new StubAdapter((config) => response(config, { ok: true, result: { message_id: 1 } }));
    const channel = new TelegramChannel("test-token", { adapter: stub.adapter });

    const result = await channel.send("test-chat", "<b>hello</b>", "HTML");

    expect(result).toEqual({ ok: true });
    expect(stub.requests).toHaveLength(1);

    const [request] = stub.requests;
    expect(request.method).toBe("post");
    expect(request.baseURL).toBe("https://api.telegram.org/bottest-token");
    expect(request.url).toBe("/sendMessage");
    expect(JSON.parse(request.data)).toEqual({
      chat_id: "test-chat",
      text: "<b>hello</b>",
      parse_mode: "HTML",
      disable_web_page_preview: true,
    });
  });

  it("should report an HTTP error with Telegram's description", async () => {
    const stub = new StubAdapter((config) => {
      throw httpError(config, 400, { ok: false, error_code: 400, description: "Bad Request: chat not found" });
    });
    const channel = new TelegramChannel("test-token", { adapter: stub.adapter });

    await expect(channel.send("test-chat", "hi", "HTML")).resolves.toEqual({
      ok: false,
      error: "400 Bad Request: chat not found",
    });
  });

  it("should fall back to the axios message when there is no description", async () => {
    const stub = new StubAdapter((config) => {
      throw httpError(config, 502, "<html>Bad Gateway</html>");
    });
    const channel = new TelegramChannel("test-token", { adapter: stub.adapter });

    await expect(channel.send("test-chat", "hi", "HTML")).resolves.toEqual({
      ok: false,
      error: "Request failed with status code 502",
    });
  });

  it("should treat ok: false in a 200 body as a failure", async () => {
    const stub = new StubAdapter((config) => response(config, { ok: false, description: "Forbidden: bot was blocked" }));
    const channel = new TelegramChannel("test-token", { adapter: stub.adapter });

    await expect(channel.send("test-chat", "hi", "HTML")).resolves.toEqual({
      ok: false,
      error: "Forbidden: bot was blocked",
    });
  });

  it("should never throw on transport errors", async () => {
    const stub = new StubAdapter(() => {
      throw new Error("socket hang up");
    });
    const channel = new TelegramChannel("test-token", { adapter: stub.adapter });

    await expect(channel.send("test-chat", "hi", "HTML")).resolves.toEqual({ ok: false, error: "socket hang up" });
  });
});
