export { LocalChain } from "./localChain";
export type { ExecuteOptions, LocalChainOptions, WatchEventParameters } from "./localChain";
export { JournaledMap, JournaledValue } from "./journal";
