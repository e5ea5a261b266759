/**
 * Grad mode for one logical thread of computation. Passed explicitly as the
 * first argument of every recorded op; there is no global grad state.
 */
import { AutogradError } from "@tensorgrad/core";

export interface GradContextOptions {
  gradEnabled?: boolean;
  retainGraph?: boolean;
}

export class GradContext {
  /** Keep non-leaf gradients after they have been propagated. */
  retainGraph: boolean;
  private _enabled: boolean;
  private _noGradDepth = 0;
  private _savedMode = true;

  constructor(options: GradContextOptions = {}) {
    this._enabled = options.gradEnabled ?? true;
    this.retainGraph = options.retainGraph ?? false;
  }

  get gradEnabled(): boolean {
    return this._enabled;
  }

  get noGradDepth(): number {
    return this._noGradDepth;
  }

  setGradEnabled(mode: boolean): void {
    this._enabled = mode;
  }

  /** Disable recording. Nests: only the outermost exit restores the mode. */
  enterNoGrad(): void {
    if (this._noGradDepth === 0) this._savedMode = this._enabled;
    this._noGradDepth++;
    this._enabled = false;
  }

  exitNoGrad(): void {
    if (this._noGradDepth === 0) {
      throw new AutogradError({ message: "exitNoGrad() called without a matching enterNoGrad()" });
    }
    this._noGradDepth--;
    if (this._noGradDepth === 0) this._enabled = this._savedMode;
  }

  /** Run `fn` with recording disabled. */
  noGrad<T>(fn: () => T): T {
    this.enterNoGrad();
    try {
      return fn();
    } finally {
      this.exitNoGrad();
    }
  }
}
