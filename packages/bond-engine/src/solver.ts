// =============================================================================
// Root finders shared by the yield, spread and breakeven solves
// Newton-Raphson with an admissibility guard, and a sign-checked bisection
// =============================================================================

export type StopReason =
  | 'residual'
  | 'step'
  | 'max-iterations'
  | 'flat-derivative'
  | 'domain'
  | 'no-bracket';

export interface RootResult {
  root: number;
  iterations: number;
  converged: boolean;
  error: number;       // |f(root)| at the last evaluation
  reason: StopReason;
}

export interface NewtonOptions {
  residualTolerance: number;
  stepTolerance: number;
  maxIterations: number;
  derivativeFloor: number;
  /** Iterates failing this are never evaluated. */
  isAdmissible?: (x: number) => boolean;
}

export interface BisectionOptions {
  residualTolerance: number;
  stepTolerance: number;
  maxIterations: number;
}

/**
 * Newton-Raphson: x_{n+1} = x_n - f(x_n) / f'(x_n).
 * Stops on a small residual or step; otherwise reports why it gave up.
 */
export function newtonRaphson(
  f: (x: number) => number,
  df: (x: number) => number,
  x0: number,
  options: NewtonOptions,
): RootResult {
  const { residualTolerance, stepTolerance, maxIterations, derivativeFloor } = options;
  const isAdmissible = options.isAdmissible ?? Number.isFinite;

  if (!isAdmissible(x0)) {
    return { root: x0, iterations: 0, converged: false, error: Number.NaN, reason: 'domain' };
  }

  let x = x0;
  let fx = Number.NaN;

  for (let iter = 0; iter < maxIterations; iter++) {
    fx = f(x);
    if (Math.abs(fx) < residualTolerance) {
      return { root: x, iterations: iter + 1, converged: true, error: Math.abs(fx), reason: 'residual' };
    }

    const dfx = df(x);
    if (!(Math.abs(dfx) >= derivativeFloor)) {
      return { root: x, iterations: iter + 1, converged: false, error: Math.abs(fx), reason: 'flat-derivative' };
    }

    const next = x - fx / dfx;
    if (!Number.isFinite(next) || !isAdmissible(next)) {
      return { root: x, iterations: iter + 1, converged: false, error: Math.abs(fx), reason: 'domain' };
    }

    if (Math.abs(next - x) < stepTolerance) {
      return { root: next, iterations: iter + 1, converged: true, error: Math.abs(fx), reason: 'step' };
    }
    x = next;
  }

  return { root: x, iterations: maxIterations, converged: false, error: Math.abs(fx), reason: 'max-iterations' };
}

/**
 * Bisection on [lo, hi]. The bracket is used only when f changes sign across
 * it; otherwise the result is unconverged with reason 'no-bracket'.
 */
export function bisect(
  f: (x: number) => number,
  lo: number,
  hi: number,
  options: BisectionOptions,
): RootResult {
  const { residualTolerance, stepTolerance, maxIterations } = options;

  let a = lo;
  let b = hi;
  let fa = f(a);
  const fb = f(b);

  if (Number.isNaN(fa) || Number.isNaN(fb) || Math.sign(fa) === Math.sign(fb)) {
    const nearer = Math.abs(fa) < Math.abs(fb) ? a : b;
    return {
      root: nearer,
      iterations: 0,
      converged: false,
      error: Math.min(Math.abs(fa), Math.abs(fb)),
      reason: 'no-bracket',
    };
  }
  if (fa === 0) return { root: a, iterations: 0, converged: true, error: 0, reason: 'residual' };
  if (fb === 0) return { root: b, iterations: 0, converged: true, error: 0, reason: 'residual' };

  let mid = a;
  let fm = fa;
  for (let iter = 0; iter < maxIterations; iter++) {
    mid = (a + b) / 2;
    fm = f(mid);
    if (Math.abs(fm) < residualTolerance) {
      return { root: mid, iterations: iter + 1, converged: true, error: Math.abs(fm), reason: 'residual' };
    }
    if ((b - a) / 2 < stepTolerance) {
      return { root: mid, iterations: iter + 1, converged: true, error: Math.abs(fm), reason: 'step' };
    }
    if (Math.sign(fm) === Math.sign(fa)) {
      a = mid;
      fa = fm;
    } else {
      b = mid;
    }
  }

  return { root: mid, iterations: maxIterations, converged: false, error: Math.abs(fm), reason: 'max-iterations' };
}
