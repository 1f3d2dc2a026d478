import {
  type CardElement,
  type ChannelContent,
  ChannelContentSchema,
  type ChannelEvent,
  type ChannelMsgtype,
  ChannelMsgtypeSchema,
  type ChannelPayload,
  type IdentityNamespace,
  type JsonObject,
  type NativeMessage,
  NativeMessageSchema,
  type PostElement,
  type Translation,
  type TranslationWarning,
} from "@meridian/core";
import { ValidationError } from "@meridian/errors";

/** Looks up the counterpart of an identifier in the other namespace. */
export interface IdentityResolver {
  resolveCounterpart(namespace: IdentityNamespace, id: string): Promise<string | null>;
}

/** IM mention markup: `<at user_id="ou_1">Name</at>`. */
const IM_MENTION = /<at\s+(?:user_id|id)="([^"]+)">[^<]*<\/at>/g;

/** Matrix user ids: `@localpart:server.name[:port]`. */
const CHANNEL_USER_ID = /@[a-z0-9._=/+-]+:[A-Za-z0-9.-]+(?::\d+)?/g;

/** Content keys the channel schema defines; anything else is an extension. */
const CHANNEL_KNOWN_KEYS = new Set(["msgtype", "body", "format", "formatted_body"]);

const noResolver: IdentityResolver = {
  resolveCounterpart: async () => null,
};

/**
 * Converts between native IM messages and channel `m.room.message` content.
 *
 * Elements with no counterpart on the other side are dropped and reported as
 * warnings; they never fail a translation. Principal references are rewritten
 * to the other namespace where a link exists and kept verbatim otherwise.
 */
export class Translator {
  constructor(private readonly identities: IdentityResolver = noResolver) {}

  /**
   * Normalize send-API content: a native message (anything with a `kind`) is
   * translated, channel-shaped content is taken as is.
   * @throws ValidationError when the content matches neither shape
   */
  async translate(content: unknown): Promise<Translation<ChannelPayload>> {
    if (typeof content === "object" && content !== null && "kind" in content) {
      const native = NativeMessageSchema.safeParse(content);
      if (!native.success) {
        throw invalidContent(native.error.issues);
      }
      return this.toChannelFormat(native.data);
    }
    const channel = ChannelContentSchema.safeParse(content);
    if (!channel.success) {
      throw invalidContent(channel.error.issues);
    }
    return this.fromChannelContent(channel.data);
  }

  async toChannelFormat(message: NativeMessage): Promise<Translation<ChannelPayload>> {
    const warnings: TranslationWarning[] = [];
    switch (message.kind) {
      case "text":
        return {
          value: {
            msgtype: "m.text",
            body: await this.rewriteImMentions(message.text),
            extensions: message.extensions,
          },
          warnings,
        };
      case "post": {
        const lines = message.title === null ? [] : [message.title];
        for (const [p, paragraph] of message.paragraphs.entries()) {
          const parts: string[] = [];
          for (const [e, element] of paragraph.entries()) {
            const text = await this.renderPostElement(element);
            if (text === null) {
              warnings.push({
                field: `paragraphs[${p}][${e}]`,
                reason: `"${element.tag}" elements have no channel equivalent`,
              });
            } else {
              parts.push(text);
            }
          }
          lines.push(parts.join(""));
        }
        return {
          value: { msgtype: "m.text", body: lines.join("\n"), extensions: message.extensions },
          warnings,
        };
      }
      case "interactive": {
        const lines = message.header === null ? [] : [message.header];
        for (const [index, element] of message.elements.entries()) {
          const text = await this.renderCardElement(element);
          if (text === null) {
            warnings.push({
              field: `elements[${index}]`,
              reason: `"${element.tag}" card elements have no channel equivalent`,
            });
          } else {
            lines.push(text);
          }
        }
        return {
          value: { msgtype: "m.notice", body: lines.join("\n"), extensions: message.extensions },
          warnings,
        };
      }
    }
  }

  async toNativeFormat(event: ChannelEvent): Promise<Translation<NativeMessage>> {
    const warnings: TranslationWarning[] = [];
    const { msgtype, body, format, formatted_body, ...rest } = event.content;

    if (!ChannelMsgtypeSchema.safeParse(msgtype).success) {
      warnings.push({ field: "msgtype", reason: `"${msgtype}" is delivered as plain text` });
    }
    if (formatted_body !== undefined) {
      warnings.push({
        field: "formatted_body",
        reason: `${format ?? "formatted"} markup is not carried over; the plain body is used`,
      });
    }

    return {
      value: {
        kind: "text",
        text: await this.rewriteChannelMentions(body),
        extensions: rest,
      },
      warnings,
    };
  }

  fromChannelContent(content: ChannelContent): Translation<ChannelPayload> {
    const warnings: TranslationWarning[] = [];
    const msgtype = ChannelMsgtypeSchema.safeParse(content.msgtype ?? "m.text");
    if (!msgtype.success) {
      warnings.push({
        field: "msgtype",
        reason: `"${String(content.msgtype)}" is not supported; sent as m.text`,
      });
    }

    const extensions: JsonObject = {};
    for (const [key, value] of Object.entries(content)) {
      if (CHANNEL_KNOWN_KEYS.has(key) || value === undefined) {
        continue;
      }
      extensions[key] = value;
    }
    if (content.formatted_body !== undefined) {
      warnings.push({ field: "formatted_body", reason: "formatted bodies are not forwarded" });
    }

    const resolved: ChannelMsgtype = msgtype.success ? msgtype.data : "m.text";
    return { value: { msgtype: resolved, body: content.body ?? "", extensions }, warnings };
  }

  private async renderPostElement(element: PostElement): Promise<string | null> {
    switch (element.tag) {
      case "text":
        return this.rewriteImMentions(element.text);
      case "a":
        return `${element.text} (${element.href})`;
      case "at":
        return (await this.identities.resolveCounterpart("im", element.userId)) ?? element.userId;
      case "img":
      case "emotion":
        return null;
    }
  }

  private async renderCardElement(element: CardElement): Promise<string | null> {
    switch (element.tag) {
      case "markdown":
        return this.rewriteImMentions(element.content);
      case "div":
        return this.rewriteImMentions(element.text);
      case "action":
      case "hr":
      case "img":
        return null;
    }
  }

  private async rewriteImMentions(text: string): Promise<string> {
    return replaceAsync(text, IM_MENTION, async (match, id) => {
      return (await this.identities.resolveCounterpart("im", id)) ?? match;
    });
  }

  private async rewriteChannelMentions(text: string): Promise<string> {
    return replaceAsync(text, CHANNEL_USER_ID, async (match) => {
      const imId = await this.identities.resolveCounterpart("channel", match);
      return imId === null ? match : `<at user_id="${imId}"></at>`;
    });
  }
}

/** `String.replace` with an async replacer; each distinct match is resolved once. */
async function replaceAsync(
  text: string,
  pattern: RegExp,
  replacer: (match: string, group: string) => Promise<string>,
): Promise<string> {
  const matches = [...text.matchAll(pattern)];
  if (matches.length === 0) {
    return text;
  }
  const replacements = new Map<string, string>();
  for (const match of matches) {
    const whole = match[0];
    if (!replacements.has(whole)) {
      replacements.set(whole, await replacer(whole, match[1] ?? whole));
    }
  }
  return text.replace(pattern, (whole) => replacements.get(whole) ?? whole);
}

function invalidContent(issues: readonly { path: (string | number)[]; message: string; code: string }[]): ValidationError {
  return new ValidationError({
    code: "VALIDATION_FAILED",
    message: "Message content is neither a native message nor channel content",
    issues: issues.map((issue) => ({
      field: ["content", ...issue.path].join("."),
      message: issue.message,
      code: issue.code,
    })),
  });
}
