/**
 * @hookloop/workspace - One account on the chat service
 *
 * API client, per-entity caches and the connect flow, all running as
 * scheduler tasks on top of the host hooks.
 */

export { ChatApi, DEFAULT_API_BASE_URL } from "./api.js";
export type { ChatApiOptions } from "./api.js";
export { Workspace, User, Bot } from "./workspace.js";
export type { WorkspaceOptions, OpenSessionFn } from "./workspace.js";
export * from "./types.js";
