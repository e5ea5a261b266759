/**
 * Human-readable tensor dump.
 *
 * One format is chosen for the whole tensor from a pre-scan of its values:
 * integers print in `%g` style (plain below a million, `1e+06` above) and
 * switch to fixed-width scientific past ten digits; floats print fixed-point unless
 * their magnitudes span more than four decades.
 */
import { Tensor } from "./tensor.js";

type PrintFormat =
  | { readonly kind: "int"; readonly width: number }
  | { readonly kind: "fixed"; readonly width: number; readonly precision: number }
  | { readonly kind: "scientific"; readonly width: number; readonly precision: number };

const SCIENTIFIC: PrintFormat = { kind: "scientific", width: 11, precision: 4 };

function chooseFormat(values: readonly number[]): PrintFormat {
  const intMode = values.every((v) => !Number.isFinite(v) || v === Math.floor(v));

  let lo = Infinity;
  let hi = 0;
  for (const v of values) {
    const z = Math.abs(v);
    if (Number.isFinite(z) && z > 0) {
      if (z < lo) lo = z;
      if (z > hi) hi = z;
    }
  }
  let expMin = 0;
  let expMax = 0;
  if (hi > 0) {
    expMin = Math.floor(Math.log10(lo));
    expMax = Math.floor(Math.log10(hi));
  }

  if (intMode) {
    return expMax > 9 ? SCIENTIFIC : { kind: "int", width: expMax + 2 };
  }
  if (expMax - expMin > 4) return SCIENTIFIC;
  const precision = 4;
  return { kind: "fixed", width: Math.max(expMax, 0) + precision + 2, precision };
}

function nonFinite(v: number): string {
  if (Number.isNaN(v)) return "nan";
  return v > 0 ? "inf" : "-inf";
}

/** `1.0000e+00` style: at least two exponent digits. */
function exponential(v: number, precision: number): string {
  return v.toExponential(precision).replace(/e([+-])(\d)$/, "e$10$2");
}

/** Six significant digits; exponent form from 1e+06 up, trailing zeros dropped. */
function general(v: number): string {
  if (Object.is(v, -0)) return "-0";
  if (v === 0 || Math.abs(v) < 1e6) return String(v);
  const [mantissa, exp] = exponential(v, 5).split("e");
  const trimmed = mantissa.includes(".") ? mantissa.replace(/\.?0+$/, "") : mantissa;
  return `${trimmed}e${exp}`;
}

function formatFinite(v: number, fmt: PrintFormat): string {
  switch (fmt.kind) {
    case "int": return general(v);
    case "fixed": return v.toFixed(fmt.precision);
    case "scientific": return exponential(v, fmt.precision);
  }
}

function formatValue(v: number, fmt: PrintFormat): string {
  const s = Number.isFinite(v) ? formatFinite(v, fmt) : nonFinite(v);
  return s.padStart(fmt.width);
}

function render(values: readonly number[], dims: readonly number[], depth: number, start: number, fmt: PrintFormat): string {
  const n = dims[depth];
  if (depth === dims.length - 1) {
    const row: string[] = [];
    for (let i = 0; i < n; i++) row.push(formatValue(values[start + i], fmt));
    return `[${row.join(", ")}]`;
  }
  let block = 1;
  for (let d = depth + 1; d < dims.length; d++) block *= dims[d];
  const parts: string[] = [];
  for (let i = 0; i < n; i++) parts.push(render(values, dims, depth + 1, start + i * block, fmt));
  return `[${parts.join(",\n" + " ".repeat(depth + 1))}]`;
}

/** Values followed by a `[Tensor of shape: Shape[...]]` footer line. */
export function formatTensor(t: Tensor): string {
  const footer = `[Tensor of shape: ${t.shape}]`;
  if (t.numel === 0) return `[]\n${footer}`;
  if (t.ndim === 0) return `${t.item().toFixed(4)}\n${footer}`;
  const values = t.toArray();
  return `${render(values, t.dims, 0, 0, chooseFormat(values))}\n${footer}`;
}

export function printTensor(t: Tensor): void {
  console.log(formatTensor(t));
}
