export { ServerDatabase } from "./serverDatabase";
export { CatalogAssembler, CatalogUnavailableError } from "./catalogAssembler";
export type { ServerDatabaseDeps, PublishedState, AssembleOptions } from "./catalogAssembler";
