import type { IdentityNamespace } from "@meridian/core";
import { ValidationError } from "@meridian/errors";
import { beforeEach, describe, expect, it } from "vitest";
import { type IdentityResolver, Translator } from "../../translator.js";

/** Resolver over a fixed table: ou_alice <-> @alice:hub.test. */
class TableResolver implements IdentityResolver {
  readonly lookups: Array<[IdentityNamespace, string]> = [];
  private readonly imToChannel = new Map([["ou_alice", "@alice:hub.test"]]);
  private readonly channelToIm = new Map([["@alice:hub.test", "ou_alice"]]);

  async resolveCounterpart(namespace: IdentityNamespace, id: string): Promise<string | null> {
    this.lookups.push([namespace, id]);
    const table = namespace === "im" ? this.imToChannel : this.channelToIm;
    return table.get(id) ?? null;
  }
}

describe("Translator", () => {
  let resolver: TableResolver;
  let translator: Translator;

  beforeEach(() => {
    resolver = new TableResolver();
    translator = new Translator(resolver);
  });

  describe("toChannelFormat", () => {
    it("should map text messages to m.text", async () => {
      const result = await translator.toChannelFormat({
        kind: "text",
        text: "hello",
        extensions: { thread: "t-1" },
      });

      expect(result).toEqual({
        value: { msgtype: "m.text", body: "hello", extensions: { thread: "t-1" } },
        warnings: [],
      });
    });

    it("should rewrite resolvable mentions and keep the rest verbatim", async () => {
      const result = await translator.toChannelFormat({
        kind: "text",
        text: 'ping <at user_id="ou_alice">Alice</at> and <at user_id="ou_bob">Bob</at>',
        extensions: {},
      });

      expect(result.value.body).toBe(
        'ping @alice:hub.test and <at user_id="ou_bob">Bob</at>',
      );
      expect(result.warnings).toEqual([]);
    });

    it("should resolve a repeated mention once", async () => {
      await translator.toChannelFormat({
        kind: "text",
        text: '<at user_id="ou_alice"></at> <at user_id="ou_alice"></at>',
        extensions: {},
      });

      expect(resolver.lookups).toEqual([["im", "ou_alice"]]);
    });

    it("should flatten posts and drop images and emoji with warnings", async () => {
      const result = await translator.toChannelFormat({
        kind: "post",
        title: "Weekly report",
        paragraphs: [
          [
            { tag: "text", text: "Owner: " },
            { tag: "at", userId: "ou_alice" },
          ],
          [
            { tag: "a", text: "dashboard", href: "https://example.test/d" },
            { tag: "img", imageKey: "img_1" },
            { tag: "emotion", emojiType: "SMILE" },
          ],
        ],
        extensions: {},
      });

      expect(result.value).toEqual({
        msgtype: "m.text",
        body: "Weekly report\nOwner: @alice:hub.test\ndashboard (https://example.test/d)",
        extensions: {},
      });
      expect(result.warnings).toEqual([
        { field: "paragraphs[1][1]", reason: '"img" elements have no channel equivalent' },
        { field: "paragraphs[1][2]", reason: '"emotion" elements have no channel equivalent' },
      ]);
    });

    it("should keep an unresolvable post mention as the raw id", async () => {
      const result = await translator.toChannelFormat({
        kind: "post",
        title: null,
        paragraphs: [[{ tag: "at", userId: "ou_bob" }]],
        extensions: {},
      });

      expect(result.value.body).toBe("ou_bob");
    });

    it("should render cards as m.notice and drop interactive elements", async () => {
      const result = await translator.toChannelFormat({
        kind: "interactive",
        header: "Deploy?",
        elements: [
          { tag: "markdown", content: "**prod** by <at user_id=\"ou_alice\"></at>" },
          { tag: "hr" },
          { tag: "div", text: "Window: 10 minutes" },
          { tag: "action", actions: [{ text: "Go", value: "go" }] },
        ],
        extensions: {},
      });

      expect(result.value).toEqual({
        msgtype: "m.notice",
        body: "Deploy?\n**prod** by @alice:hub.test\nWindow: 10 minutes",
        extensions: {},
      });
      expect(result.warnings).toEqual([
        { field: "elements[1]", reason: '"hr" card elements have no channel equivalent' },
        { field: "elements[3]", reason: '"action" card elements have no channel equivalent' },
      ]);
    });
  });

  describe("toNativeFormat", () => {
    it("should map a channel event to a native text message", async () => {
      const result = await translator.toNativeFormat({
        eventId: "$e1",
        roomId: "!r:hub.test",
        sender: "@alice:hub.test",
        content: { msgtype: "m.text", body: "hi @alice:hub.test and @carol:hub.test" },
      });

      expect(result).toEqual({
        value: {
          kind: "text",
          text: 'hi <at user_id="ou_alice"></at> and @carol:hub.test',
          extensions: {},
        },
        warnings: [],
      });
    });

    it("should warn about formatted bodies and unsupported msgtypes", async () => {
      const result = await translator.toNativeFormat({
        eventId: "$e2",
        roomId: "!r:hub.test",
        sender: "@bob:hub.test",
        content: {
          msgtype: "m.emote",
          body: "waves",
          format: "org.matrix.custom.html",
          formatted_body: "<em>waves</em>",
          "io.meridian.audit": { message_id: "d-1" },
        },
      });

      expect(result.value).toEqual({
        kind: "text",
        text: "waves",
        extensions: { "io.meridian.audit": { message_id: "d-1" } },
      });
      expect(result.warnings).toEqual([
        { field: "msgtype", reason: '"m.emote" is delivered as plain text' },
        {
          field: "formatted_body",
          reason: "org.matrix.custom.html markup is not carried over; the plain body is used",
        },
      ]);
    });
  });

  describe("translate", () => {
    it("should pass channel content through with unknown keys as extensions", async () => {
      const result = await translator.translate({ body: "hi", "x.custom": 1 });

      expect(result).toEqual({
        value: { msgtype: "m.text", body: "hi", extensions: { "x.custom": 1 } },
        warnings: [],
      });
    });

    it("should fall back to m.text for unsupported channel msgtypes", async () => {
      const result = await translator.translate({ msgtype: "m.image", body: "cat.png" });

      expect(result).toEqual({
        value: { msgtype: "m.text", body: "cat.png", extensions: {} },
        warnings: [{ field: "msgtype", reason: '"m.image" is not supported; sent as m.text' }],
      });
    });

    it("should drop formatted bodies from channel content", async () => {
      const result = await translator.translate({
        body: "plain",
        format: "org.matrix.custom.html",
        formatted_body: "<b>plain</b>",
      });

      expect(result.value).toEqual({ msgtype: "m.text", body: "plain", extensions: {} });
      expect(result.warnings).toEqual([
        { field: "formatted_body", reason: "formatted bodies are not forwarded" },
      ]);
    });

    it("should translate anything with a kind as a native message", async () => {
      const result = await translator.translate({ kind: "text", text: "native" });

      expect(result.value).toEqual({ msgtype: "m.text", body: "native", extensions: {} });
    });

    it("should reject a malformed native message", async () => {
      const error = await translator.translate({ kind: "post" }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({
        message: "Message content is neither a native message nor channel content",
      });
    });

    it("should reject content that is not an object", async () => {
      await expect(translator.translate("hello")).rejects.toBeInstanceOf(ValidationError);
    });
  });

  it("should leave mentions verbatim without a resolver", async () => {
    const bare = new Translator();

    const result = await bare.toChannelFormat({
      kind: "text",
      text: '<at user_id="ou_alice">Alice</at>',
      extensions: {},
    });

    expect(result.value.body).toBe('<at user_id="ou_alice">Alice</at>');
  });
});
