/**
 * Broadcast helpers shared by the tensor kernels and autograd.
 *
 * These implement NumPy-style broadcasting: shapes are right-aligned, dimensions
 * of size 1 are stretched to match the other operand.
 */
import { ShapeMismatch } from "./errors.js";
import { formatDims, type Dims } from "./types.js";

/** Broadcast two dims lists and return the result dims. */
export function broadcastShapes(sa: Dims, sb: Dims): number[] {
  const ndim = Math.max(sa.length, sb.length);
  const result: number[] = new Array(ndim);
  const padA = ndim - sa.length;
  const padB = ndim - sb.length;

  for (let i = 0; i < ndim; i++) {
    const da = i < padA ? 1 : sa[i - padA];
    const db = i < padB ? 1 : sb[i - padB];
    if (da !== db && da !== 1 && db !== 1) {
      throw new ShapeMismatch({
        message: `Cannot broadcast shapes ${formatDims(sa)} and ${formatDims(sb)}`,
      });
    }
    result[i] = da === 1 ? db : da;
  }
  return result;
}

/** True when `src` can be expanded to `target` under the right-aligned rule. */
export function canBroadcastTo(src: Dims, target: Dims): boolean {
  if (src.length > target.length) return false;
  const pad = target.length - src.length;
  for (let i = 0; i < src.length; i++) {
    if (src[i] !== target[i + pad] && src[i] !== 1) return false;
  }
  return true;
}
