export { ExecutorClient } from "./executorClient";
export type {
  ExecutionTransaction,
  ExecutorClientOptions,
  SimulationResult,
} from "./executorClient";
export { chainById } from "./chains";
