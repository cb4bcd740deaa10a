/**
 * Tuning for the implied volatility search
 */
export interface SolverOptions {
  /** Price resolution as a fraction of spot (default: 1e-9) */
  priceTolerance?: number;
  /** Volatility step (Newton) or half-bracket (bisection) accepted as converged (default: 1e-8) */
  volatilityTolerance?: number;
  /**
   * Widest band of volatilities repricing within `priceTolerance` that still
   * counts as one answer (default: 1e-4)
   */
  volatilityResolution?: number;
  /** Newton-Raphson step cap before falling back to bisection (default: 50) */
  maxNewtonIterations?: number;
  /** Bisection step cap (default: 200) */
  maxBisectionIterations?: number;
  /** Lower end of the search range, as decimal (default: 0.0001) */
  minVolatility?: number;
  /** Upper end of the search range, as decimal (default: 5.0 = 500%) */
  maxVolatility?: number;
  /** Starting point for Newton; derived from the price when omitted */
  initialGuess?: number;
}

export const DEFAULT_SOLVER_OPTIONS: Required<Omit<SolverOptions, 'initialGuess'>> = {
  priceTolerance: 1e-9,
  volatilityTolerance: 1e-8,
  volatilityResolution: 1e-4,
  maxNewtonIterations: 50,
  maxBisectionIterations: 200,
  minVolatility: 0.0001,
  maxVolatility: 5.0,
};
