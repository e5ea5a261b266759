export {
  SGD, Adam, createOptimizerRegistry,
  type Optimizer, type OptimizerState, type OptimizerConfig, type SGDConfig, type AdamConfig,
} from "./optimizers.js";
export { DataLoader, type DataBatch, type DataLoaderOptions } from "./data.js";
export { FileModelStore, encodeModel, decodeModel } from "./model-store.js";
export { train, type TrainerDeps, type EpochMetrics } from "./trainer.js";
