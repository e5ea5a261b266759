export { parseKV, requireArg, strArg, positiveIntArg, envOverrides, loadConfig } from "./parse.js";
export { resolveOptimizer, listImplementations } from "./resolve.js";
export { resolveArgs, runCommand, serviceLayer, toConfigError, type ResolvedArgs } from "./runtime.js";
export { runDemo, demoCmd } from "./commands/demo.js";
export { inspectCmd } from "./commands/inspect.js";
export { syntheticRegression, trainCmd } from "./commands/train.js";
