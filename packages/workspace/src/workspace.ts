/**
 * Workspace
 *
 * One signed-in account on the chat service: its API client, the user and
 * bot caches, the conversation list and the realtime session.
 */

import { ApiError, SocketError } from "@hookloop/shared";
import { AsyncCache, Logger, type HookloopConfig, type Scheduler } from "@hookloop/kernel";
import {
  openWebSocketSession,
  type ConnectOptions,
  type SessionHandlers,
  type SocketSession,
} from "@hookloop/socket";
import { ChatApi } from "./api.js";
import type { BotInfo, ConversationInfo, ConversationType, UserInfo } from "./types.js";

const log = Logger.for("Workspace");

export class User {
  constructor(
    readonly id: string,
    readonly info: UserInfo,
  ) {}

  get displayName(): string {
    return this.info.profile?.display_name || this.info.profile?.real_name || this.info.name;
  }
}

export class Bot {
  constructor(
    readonly id: string,
    readonly info: BotInfo,
  ) {}

  get displayName(): string {
    return this.info.name;
  }
}

export type OpenSessionFn = (
  scheduler: Scheduler,
  url: string,
  options: ConnectOptions,
  handlers: SessionHandlers,
) => Promise<SocketSession>;

export interface WorkspaceOptions {
  name: string;
  token: string;
  scheduler: Scheduler;
  config: HookloopConfig;
  baseUrl?: string;
  /** Conversation types listed on connect. Default: public channels. */
  conversationTypes?: ConversationType[];
  /** Receives every realtime message. */
  onMessage?: (message: unknown) => void;
  /** Defaults to {@link openWebSocketSession}. */
  openSession?: OpenSessionFn;
}

export class Workspace {
  readonly name: string;
  readonly api: ChatApi;
  readonly users: AsyncCache<string, User, UserInfo>;
  readonly bots: AsyncCache<string, Bot, BotInfo>;
  readonly conversations = new Map<string, ConversationInfo>();

  private readonly scheduler: Scheduler;
  private readonly config: HookloopConfig;
  private readonly conversationTypes: ConversationType[];
  private readonly onMessage: (message: unknown) => void;
  private readonly openSession: OpenSessionFn;

  private _id: string | null = null;
  private _myUser: User | null = null;
  private _session: SocketSession | null = null;
  private _isConnected = false;

  constructor(options: WorkspaceOptions) {
    this.name = options.name;
    this.scheduler = options.scheduler;
    this.config = options.config;
    this.conversationTypes = options.conversationTypes ?? ["public_channel"];
    this.onMessage = options.onMessage ?? ((message) => log.debug({ message }, "received"));
    this.openSession = options.openSession ?? openWebSocketSession;

    this.api = new ChatApi({
      scheduler: options.scheduler,
      token: options.token,
      timeoutMs: options.config.network.timeoutMs,
      baseUrl: options.baseUrl,
      http: { maxRetries: options.config.http.maxRetries, retryPolicy: options.config.http.retry },
    });

    this.users = new AsyncCache<string, User, UserInfo>(options.scheduler, {
      name: `${this.name}:users`,
      create: async (id, info) =>
        new User(id, info ?? (await this.fetchOne("users.info", id, (ids) => this.api.fetchUsersInfo(ids)))),
      fetchMany: async (ids) =>
        new Map((await this.api.fetchUsersInfo(ids)).map((info) => [info.id, info])),
    });

    this.bots = new AsyncCache<string, Bot, BotInfo>(options.scheduler, {
      name: `${this.name}:bots`,
      create: async (id, info) =>
        new Bot(id, info ?? (await this.fetchOne("bots.info", id, (ids) => this.api.fetchBotsInfo(ids)))),
      fetchMany: async (ids) =>
        new Map((await this.api.fetchBotsInfo(ids)).map((info) => [info.id, info])),
    });
  }

  get id(): string | null {
    return this._id;
  }

  get myUser(): User | null {
    return this._myUser;
  }

  get session(): SocketSession | null {
    return this._session;
  }

  get isConnected(): boolean {
    return this._isConnected;
  }

  /**
   * rtm.connect → own user → realtime session → conversation list.
   */
  async connect(): Promise<void> {
    const rtm = await this.api.fetchRtmConnect();
    this._id = rtm.team.id;
    this._myUser = await this.users.get(rtm.self.id);

    const session = await this.openSession(
      this.scheduler,
      rtm.url,
      {
        timeoutMs: this.config.network.timeoutMs,
        proxy: this.config.proxy,
        caFile: this.config.tls.caFile,
      },
      {
        onMessage: this.onMessage,
        onDisconnect: (error) => {
          log.warn({ workspace: this.name, err: error }, "disconnected");
          this._isConnected = false;
          this._session = null;
        },
      },
    );
    this._session = session;

    let channels: ConversationInfo[];
    try {
      channels = await this.api.fetchUsersConversations(this.conversationTypes);
    } catch (error) {
      this.disconnect();
      throw error;
    }
    for (const channel of channels) {
      this.conversations.set(channel.id, channel);
    }

    // onDisconnect clears the session if the socket dropped meanwhile.
    if (this._session !== session) {
      throw new SocketError(`${this.name}: connection lost while connecting`);
    }
    this._isConnected = true;
    log.info(
      { workspace: this.name, team: this._id, conversations: this.conversations.size },
      "connected",
    );
  }

  disconnect(): void {
    this._session?.close();
    this._session = null;
    this._isConnected = false;
  }

  private async fetchOne<I extends { id: string }>(
    method: string,
    id: string,
    fetch: (ids: string[]) => Promise<I[]>,
  ): Promise<I> {
    const info = (await fetch([id])).find((item) => item.id === id);
    if (!info) throw new ApiError(method, "not_found");
    return info;
  }
}
