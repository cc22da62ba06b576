import { z } from "zod";

/**
 * Response shapes of the chat service's web API, reduced to the fields
 * this package reads. Unknown fields pass through untouched.
 */

export const UserInfoSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    deleted: z.boolean().optional(),
    is_bot: z.boolean().optional(),
    profile: z
      .object({
        display_name: z.string().optional(),
        real_name: z.string().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export const BotInfoSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    deleted: z.boolean().optional(),
    user_id: z.string().optional(),
  })
  .passthrough();

export const ConversationInfoSchema = z
  .object({
    id: z.string(),
    name: z.string().optional(),
    is_channel: z.boolean().optional(),
    is_im: z.boolean().optional(),
  })
  .passthrough();

export const RtmConnectSchema = z.object({
  url: z.string(),
  team: z.object({ id: z.string(), name: z.string().optional() }).passthrough(),
  self: z.object({ id: z.string(), name: z.string().optional() }).passthrough(),
});

export const UsersInfoSchema = z.object({ users: z.array(UserInfoSchema) });
export const BotsInfoSchema = z.object({ bots: z.array(BotInfoSchema) });
export const UsersConversationsSchema = z.object({
  channels: z.array(ConversationInfoSchema),
  response_metadata: z.object({ next_cursor: z.string().optional() }).optional(),
});

/** Every response carries `ok`; failures add an `error` code. */
export const ApiEnvelopeSchema = z.object({
  ok: z.boolean(),
  error: z.string().optional(),
});

export type UserInfo = z.infer<typeof UserInfoSchema>;
export type BotInfo = z.infer<typeof BotInfoSchema>;
export type ConversationInfo = z.infer<typeof ConversationInfoSchema>;
export type RtmConnect = z.infer<typeof RtmConnectSchema>;
export type UsersInfo = z.infer<typeof UsersInfoSchema>;
export type BotsInfo = z.infer<typeof BotsInfoSchema>;
export type UsersConversations = z.infer<typeof UsersConversationsSchema>;

export type ConversationType = "public_channel" | "private_channel" | "mpim" | "im";
