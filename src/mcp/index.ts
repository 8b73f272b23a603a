export { McpChannel, toChannelResult, toResultPart } from "./client.js";
export type { McpServerConfig } from "./client.js";
