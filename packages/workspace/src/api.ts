/**
 * Chat service web API client
 *
 * Every call is an `httpRequest` through the scheduler, so callers suspend
 * on the host's process hook like any other async primitive.
 */

import type { z } from "zod";
import { ApiError } from "@hookloop/shared";
import { Logger, type Scheduler } from "@hookloop/kernel";
import { httpRequest, type HttpRequestOptions } from "@hookloop/http";
import {
  ApiEnvelopeSchema,
  BotsInfoSchema,
  RtmConnectSchema,
  UsersConversationsSchema,
  UsersInfoSchema,
  type BotInfo,
  type ConversationInfo,
  type ConversationType,
  type RtmConnect,
  type UserInfo,
} from "./types.js";

const log = Logger.for("ChatApi");

export const DEFAULT_API_BASE_URL = "https://slack.com/api";

export interface ChatApiOptions {
  scheduler: Scheduler;
  token: string;
  timeoutMs: number;
  baseUrl?: string;
  http?: HttpRequestOptions;
}

export class ChatApi {
  private readonly scheduler: Scheduler;
  private readonly token: string;
  private readonly timeoutMs: number;
  private readonly baseUrl: string;
  private readonly http: HttpRequestOptions;

  constructor(options: ChatApiOptions) {
    this.scheduler = options.scheduler;
    this.token = options.token;
    this.timeoutMs = options.timeoutMs;
    this.baseUrl = (options.baseUrl ?? DEFAULT_API_BASE_URL).replace(/\/$/, "");
    this.http = options.http ?? {};
  }

  async fetchRtmConnect(): Promise<RtmConnect> {
    return this.call("rtm.connect", {}, RtmConnectSchema);
  }

  async fetchUsersInfo(userIds: Iterable<string>): Promise<UserInfo[]> {
    const response = await this.call("users.info", { users: [...userIds].join(",") }, UsersInfoSchema);
    return response.users;
  }

  async fetchBotsInfo(botIds: Iterable<string>): Promise<BotInfo[]> {
    const response = await this.call("bots.info", { bots: [...botIds].join(",") }, BotsInfoSchema);
    return response.bots;
  }

  /** All conversations of the given types the user is a member of, across pages. */
  async fetchUsersConversations(types: ConversationType[]): Promise<ConversationInfo[]> {
    const channels: ConversationInfo[] = [];
    let cursor: string | undefined;

    do {
      const params: Record<string, string> = {
        types: types.join(","),
        exclude_archived: "true",
        limit: "1000",
      };
      if (cursor) params.cursor = cursor;

      const page = await this.call("users.conversations", params, UsersConversationsSchema);
      channels.push(...page.channels);
      cursor = page.response_metadata?.next_cursor || undefined;
    } while (cursor);

    return channels;
  }

  private async call<T>(
    method: string,
    params: Record<string, string>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T> {
    const query = new URLSearchParams(params).toString();
    const url = `${this.baseUrl}/${method}${query ? `?${query}` : ""}`;

    const body = await httpRequest(
      this.scheduler,
      url,
      { httpheader: `Authorization: Bearer ${this.token}` },
      this.timeoutMs,
      this.http,
    );

    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch {
      throw new ApiError(method, "invalid_json");
    }

    const envelope = ApiEnvelopeSchema.safeParse(json);
    if (!envelope.success) {
      throw new ApiError(method, "invalid_response");
    }
    if (!envelope.data.ok) {
      throw new ApiError(method, envelope.data.error ?? "unknown_error");
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      log.warn({ method, issues: parsed.error.issues.length }, "unexpected response shape");
      throw new ApiError(method, "invalid_response");
    }
    return parsed.data;
  }
}
