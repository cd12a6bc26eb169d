export { buildBundle, downloadPreviousBundle, embedIncremental } from "./buildBundle";
export type { BuildBundleOptions, BuildBundleResult, PreviousBundle } from "./buildBundle";
