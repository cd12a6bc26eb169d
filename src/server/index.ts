export { createScoutServer, startStdioServer } from "./mcpServer";
export type { ScoutServerDeps } from "./mcpServer";
