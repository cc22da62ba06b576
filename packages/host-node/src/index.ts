/**
 * @hookloop/host-node - Host hooks on the Node.js event loop
 */

export { NodeHost, createNodeHost, runShellCommand } from "./node-host.js";
export type { NodeHostOptions } from "./node-host.js";
export { buildUrlRequest, formatResponse, runUrlRequest, URL_COMMAND_PREFIX } from "./url-request.js";
export type { FetchFn, UrlRequest } from "./url-request.js";
