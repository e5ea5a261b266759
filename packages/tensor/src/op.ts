/**
 * Operation records stamped on tensors produced by differentiable ops.
 * The backward pass dispatches on `tag`.
 */

export type OpTag =
  | "none"
  | "add"
  | "sub"
  | "mul"
  | "div"
  | "matmul"
  | "neg"
  | "sum"
  | "mean"
  | "relu"
  | "sigmoid"
  | "tanh"
  | "reshape"
  | "permute"
  | "expand";

export type OpRecord =
  | { readonly tag: "none" }
  | { readonly tag: "add" }
  | { readonly tag: "sub" }
  | { readonly tag: "mul" }
  | { readonly tag: "div" }
  | { readonly tag: "matmul" }
  | { readonly tag: "neg" }
  | { readonly tag: "sum"; readonly axis: number | null; readonly keepdims: boolean }
  | { readonly tag: "mean"; readonly axis: number | null; readonly keepdims: boolean }
  | { readonly tag: "relu" }
  | { readonly tag: "sigmoid" }
  | { readonly tag: "tanh" }
  | { readonly tag: "reshape"; readonly dims: readonly number[] }
  | { readonly tag: "permute"; readonly axes: readonly number[] }
  | { readonly tag: "expand"; readonly dims: readonly number[] };

export const NO_OP: OpRecord = { tag: "none" };

/** Autograd lifecycle of a tensor. */
export type GradState = "leaf" | "computed" | "differentiated" | "consumed";
