export * from "./types/brands";
export * from "./errors";
export * from "./lattice/semilattice";
export * from "./lattice/primitives";
export * from "./lattice/product";
export * from "./lattice/redactable";
export * from "./lattice/vote";
export * from "./model/schema";
export * from "./model/session";
export * from "./model/detailed";
export { renderReport } from "./model/report";
export {
  encodeSlice,
  decodeSlice,
  encodeRoot,
  decodeRoot,
  encodeDetailed,
  decodeDetailed,
} from "./codec/schema";
export { blobId, computeRootDigest, type Hex } from "./core/hash";
export type { ReplicationSubstrate } from "./infra/substrate";
export { MemorySubstrate } from "./infra/memorySubstrate";
export { FsSubstrate } from "./infra/fsSubstrate";
export { ThreadStore } from "./infra/store";
export { openWorkspace, type Workspace } from "./infra/workspace";
export { loadConfig, type Config } from "./config";
export { makeLogger, type ILogger } from "./logging";
