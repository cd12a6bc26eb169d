export { findMcpServer } from "./findServer";
export type { FindServerDeps } from "./findServer";
export { promoteDocumented } from "./promotion";
export type { PromotedResult } from "./promotion";
export { createReadmeFetcher, parseGithubUrl, readmeCandidates } from "./readmeFetcher";
export type { ReadmeFetcher, GithubLocation } from "./readmeFetcher";
