/**
 * Reverse-mode backward pass over the graph recorded by the ops.
 *
 * Nodes are visited in reverse topological order, so each node's gradient is
 * complete before it is pushed to its parents. Local gradients are computed
 * with the raw kernels and never recorded.
 */
import { GradShapeMismatch, formatDims, gradDtype, type Dims } from "@tensorgrad/core";
import { Tensor, kernels } from "@tensorgrad/tensor";
import type { GradContext } from "./context.js";

/** Add `g` (any layout, equal element count) into `t.grad`, allocating it on first use. */
export function accumulateGrad(t: Tensor, g: Tensor): void {
  if (!t.requiresGrad) return;
  if (g.numel !== t.numel) {
    throw new GradShapeMismatch({
      message: `gradient ${g.shape} does not match tensor ${t.shape}`,
    });
  }
  if (!t.grad) t.grad = Tensor.create(t.dims, gradDtype(t.dtype));
  const dst = t.grad.data;
  const src = g.toArray();
  for (let i = 0; i < src.length; i++) dst[i] += src[i];
}

/** Reset `t.grad` to zeros (allocating it if absent). */
export function zeroGrad(t: Tensor): void {
  if (!t.requiresGrad) return;
  if (t.grad) {
    t.grad.zero();
  } else {
    t.grad = Tensor.create(t.dims, gradDtype(t.dtype));
  }
}

/** Post-order over the grad-requiring subgraph, iterative so chain depth is unbounded. */
function topoSort(root: Tensor): Tensor[] {
  const order: Tensor[] = [];
  const visited = new Set<Tensor>([root]);
  const stack: [Tensor, number][] = [[root, 0]];
  while (stack.length > 0) {
    const frame = stack[stack.length - 1];
    const [t, next] = frame;
    if (next < t.parents.length) {
      frame[1] = next + 1;
      const p = t.parents[next];
      if (p.requiresGrad && !visited.has(p)) {
        visited.add(p);
        stack.push([p, 0]);
      }
    } else {
      stack.pop();
      order.push(t);
    }
  }
  return order;
}

/**
 * Release every recorded (non-leaf) tensor reachable from `root`, root
 * included. Leaves such as parameters and inputs are left alone. Views the
 * ops created along the way drop their hold on the leaves' storage.
 */
export function releaseGraph(root: Tensor): void {
  for (const node of topoSort(root)) {
    if (!node.isLeaf) node.release();
  }
}

/** View `g` (a reduced gradient) back to `dims` and materialize it. */
function unreduce(g: Tensor, dims: Dims, axis: number | null, keepdims: boolean): Tensor {
  const kept = axis === null ? dims.map(() => 1) : dims.map((d, i) => (i === axis ? 1 : d));
  const shaped = keepdims ? g : g.reshape(kept);
  const wide = shaped.expand(dims);
  const out = wide.contiguous();
  wide.release();
  if (shaped !== g) shaped.release();
  return out;
}

/** Gradients for each parent of `node`, null where a parent needs none. */
function localGrads(node: Tensor, g: Tensor): (Tensor | null)[] {
  const [a, b] = node.parents;
  const want = node.parents.map((p) => p.requiresGrad);
  const op = node.op;
  switch (op.tag) {
    case "none":
      return [];
    case "add":
      return [
        want[0] ? kernels.reduceToShape(g, a.dims) : null,
        want[1] ? kernels.reduceToShape(g, b.dims) : null,
      ];
    case "sub": {
      let gb: Tensor | null = null;
      if (want[1]) {
        const negG = kernels.neg(g);
        gb = kernels.reduceToShape(negG, b.dims);
        negG.release();
      }
      return [want[0] ? kernels.reduceToShape(g, a.dims) : null, gb];
    }
    case "mul":
      return [
        want[0] ? reduced(kernels.mul(g, b), a.dims) : null,
        want[1] ? reduced(kernels.mul(g, a), b.dims) : null,
      ];
    case "div": {
      let gb: Tensor | null = null;
      if (want[1]) {
        // -g * a / b^2
        const ga = kernels.mul(g, a);
        const bb = kernels.mul(b, b);
        const q = kernels.div(ga, bb);
        gb = reduced(kernels.neg(q), b.dims);
        ga.release();
        bb.release();
        q.release();
      }
      return [want[0] ? reduced(kernels.div(g, b), a.dims) : null, gb];
    }
    case "matmul": {
      let ga: Tensor | null = null;
      let gb: Tensor | null = null;
      if (want[0]) {
        const bt = b.transpose(0, 1);
        ga = kernels.matmul(g, bt);
        bt.release();
      }
      if (want[1]) {
        const at = a.transpose(0, 1);
        gb = kernels.matmul(at, g);
        at.release();
      }
      return [ga, gb];
    }
    case "neg":
      return [kernels.neg(g)];
    case "sum":
      return [unreduce(g, a.dims, op.axis, op.keepdims)];
    case "mean": {
      const n = op.axis === null ? a.numel : a.dims[op.axis];
      const wide = unreduce(g, a.dims, op.axis, op.keepdims);
      const out = kernels.scale(wide, 1 / n);
      wide.release();
      return [out];
    }
    case "relu":
      return [masked(g, kernels.map(a, (x) => (x > 0 ? 1 : 0)))];
    case "sigmoid":
      return [masked(g, kernels.map(node, (y) => y * (1 - y)))];
    case "tanh":
      return [masked(g, kernels.map(node, (y) => 1 - y * y))];
    case "reshape":
      return [g.reshape(a.dims)];
    case "permute": {
      const inverse = new Array<number>(op.axes.length);
      op.axes.forEach((axis, i) => {
        inverse[axis] = i;
      });
      return [g.permute(inverse)];
    }
    case "expand":
      return [kernels.reduceToShape(g, a.dims)];
    default: {
      const unreachable: never = op;
      return unreachable;
    }
  }
}

function reduced(full: Tensor, dims: Dims): Tensor {
  if (full.shape.equals(dims)) return full;
  const out = kernels.reduceToShape(full, dims);
  full.release();
  return out;
}

function masked(g: Tensor, local: Tensor): Tensor {
  const out = kernels.mul(g, local);
  local.release();
  return out;
}

/**
 * Backpropagate from `t`.
 *
 * Seeding: an explicit `grad` (same shape as `t`) is accumulated into
 * `t.grad`; otherwise an existing `t.grad` is used; otherwise `t` must hold
 * exactly one element and is seeded with ones.
 */
export function backward(ctx: GradContext, t: Tensor, grad?: Tensor): void {
  if (!t.requiresGrad) return;

  if (grad) {
    if (!grad.shape.equals(t.shape)) {
      throw new GradShapeMismatch({
        message: `seed gradient ${grad.shape} does not match output ${t.shape}`,
      });
    }
    accumulateGrad(t, grad);
  } else if (!t.grad) {
    if (t.numel !== 1) {
      throw new GradShapeMismatch({
        message: `gradient can be implicitly created only for single-element outputs, got ${formatDims(t.dims)}`,
      });
    }
    t.grad = Tensor.ones(t.dims, gradDtype(t.dtype));
  }

  const order = topoSort(t);
  for (let i = order.length - 1; i >= 0; i--) {
    const node = order[i];
    if (node.isLeaf) continue;
    const g = node.grad;
    if (!g) continue;

    const grads = localGrads(node, g);
    node.parents.forEach((parent, j) => {
      const pg = grads[j];
      if (!pg) return;
      accumulateGrad(parent, pg);
      pg.release();
    });
    node.gradState = "differentiated";

    if (!ctx.retainGraph) {
      g.release();
      node.grad = null;
      node.gradState = "consumed";
    }
  }
}
