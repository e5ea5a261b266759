/**
 * @tensorgrad/nn -- layers, containers and losses.
 */
export { BaseModule, type Module } from "./module.js";
export { Linear, ReLU, Sigmoid, Tanh, type LinearOptions } from "./layers.js";
export { Sequential } from "./sequential.js";
export { mseLoss } from "./loss.js";
export { moduleToRecord, moduleFromRecord } from "./record.js";
