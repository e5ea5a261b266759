/**
 * Typed error classes for every subsystem.
 *
 * Synchronous tensor code throws these directly; I/O paths surface them as
 * the error channel of an Effect.
 */
import { Data } from "effect";

// ── Shape / layout ─────────────────────────────────────────────────────────

export class ShapeMismatch extends Data.TaggedError("ShapeMismatch")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class InvalidAxes extends Data.TaggedError("InvalidAxes")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class IncompatibleShape extends Data.TaggedError("IncompatibleShape")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class NotContiguous extends Data.TaggedError("NotContiguous")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class IndexOutOfBounds extends Data.TaggedError("IndexOutOfBounds")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

// ── Arithmetic ─────────────────────────────────────────────────────────────

export class DivisionByZero extends Data.TaggedError("DivisionByZero")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

// ── Memory ─────────────────────────────────────────────────────────────────

export class AllocationFailure extends Data.TaggedError("AllocationFailure")<{
  readonly message: string;
  /** Call site that requested the buffer. */
  readonly site: string;
  readonly cause?: unknown;
}> {}

export class UseAfterRelease extends Data.TaggedError("UseAfterRelease")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

// ── Autograd / training ────────────────────────────────────────────────────

export class GradShapeMismatch extends Data.TaggedError("GradShapeMismatch")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class AutogradError extends Data.TaggedError("AutogradError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class OptimizerError extends Data.TaggedError("OptimizerError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class TrainingError extends Data.TaggedError("TrainingError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class CheckpointError extends Data.TaggedError("CheckpointError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}
