export type { L1BlockSource } from "./source.js";
export { ViemL1BlockSource, createViemL1BlockSource } from "./viem-source.js";
export type { ViemL1BlockSourceConfig, BlockReader } from "./viem-source.js";
