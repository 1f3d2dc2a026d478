import { z } from "zod";
import { type JsonObject, JsonObjectSchema, JsonValueSchema } from "./json.js";

// ---------------------------------------------------------------------------
// Native (IM platform) messages: a tagged variant plus an opaque extension map
// ---------------------------------------------------------------------------

export const PostElementSchema = z.discriminatedUnion("tag", [
  z.object({ tag: z.literal("text"), text: z.string() }),
  z.object({ tag: z.literal("a"), text: z.string(), href: z.string() }),
  z.object({ tag: z.literal("at"), userId: z.string() }),
  z.object({ tag: z.literal("img"), imageKey: z.string() }),
  z.object({ tag: z.literal("emotion"), emojiType: z.string() }),
]);
export type PostElement = z.infer<typeof PostElementSchema>;

export const CardActionSchema = z.object({
  text: z.string(),
  value: z.string(),
});
export type CardAction = z.infer<typeof CardActionSchema>;

export const CardElementSchema = z.discriminatedUnion("tag", [
  z.object({ tag: z.literal("markdown"), content: z.string() }),
  z.object({ tag: z.literal("div"), text: z.string() }),
  z.object({ tag: z.literal("action"), actions: z.array(CardActionSchema) }),
  z.object({ tag: z.literal("hr") }),
  z.object({ tag: z.literal("img"), imageKey: z.string() }),
]);
export type CardElement = z.infer<typeof CardElementSchema>;

const Extensions = JsonObjectSchema.default({});

export const NativeMessageSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("text"),
    text: z.string(),
    extensions: Extensions,
  }),
  z.object({
    kind: z.literal("post"),
    title: z.string().nullable().default(null),
    paragraphs: z.array(z.array(PostElementSchema)),
    extensions: Extensions,
  }),
  z.object({
    kind: z.literal("interactive"),
    header: z.string().nullable().default(null),
    elements: z.array(CardElementSchema),
    extensions: Extensions,
  }),
]);
export type NativeMessage = z.infer<typeof NativeMessageSchema>;
export type NativeMessageInput = z.input<typeof NativeMessageSchema>;

// ---------------------------------------------------------------------------
// Channel (federated chat protocol) payloads
// ---------------------------------------------------------------------------

export const ChannelMsgtypeSchema = z.enum(["m.text", "m.notice"]);
export type ChannelMsgtype = z.infer<typeof ChannelMsgtypeSchema>;

/** Body of an `m.room.message` event. */
export interface ChannelPayload {
  readonly msgtype: ChannelMsgtype;
  readonly body: string;
  /** Fields with no counterpart in the channel schema, carried unchanged. */
  readonly extensions: JsonObject;
}

/** Audit fields stamped into every message the hub sends. */
export interface AuditFields {
  readonly messageId: string;
  readonly sender: string;
  readonly receiver: string;
  readonly timestamp: string;
}

/** Inbound event from the channel side. */
export const ChannelEventSchema = z.object({
  eventId: z.string(),
  roomId: z.string(),
  sender: z.string(),
  content: z
    .object({
      msgtype: z.string().default("m.text"),
      body: z.string().default(""),
      format: z.string().optional(),
      formatted_body: z.string().optional(),
    })
    .catchall(JsonValueSchema),
});
export type ChannelEvent = z.infer<typeof ChannelEventSchema>;

/**
 * Loose content accepted by the send API when the caller already speaks the
 * channel schema (`{ body, msgtype? }`).
 */
export const ChannelContentSchema = z
  .object({
    msgtype: z.string().optional(),
    body: z.string().optional(),
  })
  .catchall(JsonValueSchema);
export type ChannelContent = z.infer<typeof ChannelContentSchema>;

// ---------------------------------------------------------------------------
// Translation results
// ---------------------------------------------------------------------------

/** A field dropped because the target schema has no equivalent. */
export interface TranslationWarning {
  readonly field: string;
  readonly reason: string;
}

export interface Translation<T> {
  readonly value: T;
  readonly warnings: readonly TranslationWarning[];
}
