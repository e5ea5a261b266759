/**
 * @tensorgrad/tensor -- shapes, storage, tensors and raw kernels.
 */
export { Shape } from "./shape.js";
export { Storage } from "./storage.js";
export { Allocator, allocator, type AllocationErrorHandler, type AllocatorOptions } from "./allocator.js";
export { Tensor, type NestedNumbers } from "./tensor.js";
export { NO_OP, type OpTag, type OpRecord, type GradState } from "./op.js";
export { parallelFor } from "./parallel.js";
export { formatTensor, printTensor } from "./print.js";
export * as kernels from "./kernels.js";
export type { BinaryKind } from "./kernels.js";
