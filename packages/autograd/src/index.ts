export { GradContext, type GradContextOptions } from "./context.js";
export { backward, accumulateGrad, zeroGrad, releaseGraph } from "./graph.js";
export {
  add, sub, mul, div, neg,
  matmul,
  sum, mean,
  relu, sigmoid, tanh,
  reshape, permute, transpose, expand,
} from "./ops.js";
