import {
  ImpliedVolatilityQuery,
  ImpliedVolatilityResult,
  PricingConfig,
  UnresolvedReason,
  DEFAULT_PRICING_CONFIG,
} from '../types';
import { blackScholes, calculateModelVega } from '../blackscholes';
import { SolverOptions, DEFAULT_SOLVER_OPTIONS } from './types';

export type { SolverOptions } from './types';
export { DEFAULT_SOLVER_OPTIONS } from './types';

/**
 * Recover the Black-Scholes volatility that reproduces an observed price.
 *
 * Runs a bounded Newton-Raphson on the model price using analytic vega.
 * Every Newton evaluation tightens a [low, high] bracket (the price is
 * increasing in volatility); when a step stalls, leaves the bracket or the
 * Newton budget runs out, bisection finishes inside that bracket.
 *
 * A root is accepted once the volatility itself has converged (Newton step
 * or half-bracket within `volatilityTolerance`), never on price distance
 * alone. When prices within `priceTolerance` of the observation span more
 * than `volatilityResolution` of volatility, the answer is not unique and
 * comes back as `insensitive-price`.
 *
 * Never throws. Prices outside the no-arbitrage range, expired instruments
 * and searches that do not converge come back as `{ resolved: false }`.
 *
 * @param query - Observed price with spot, strike, time to expiry and type
 * @param config - Risk-free rate and day count
 * @param options - Solver tolerances, iteration caps and search range
 *
 * @example
 * ```typescript
 * const result = solveImpliedVolatility({
 *   price: 2450,
 *   spot: 60000,
 *   strike: 65000,
 *   timeToExpiry: 0.1,
 *   optionType: 'call',
 * });
 * if (result.resolved) {
 *   console.log(`IV: ${(result.volatility * 100).toFixed(2)}%`);
 * }
 * ```
 */
export function solveImpliedVolatility(
  query: ImpliedVolatilityQuery,
  config: PricingConfig = DEFAULT_PRICING_CONFIG,
  options: SolverOptions = {}
): ImpliedVolatilityResult {
  const opts = { ...DEFAULT_SOLVER_OPTIONS, ...options };
  const { price, spot, strike, timeToExpiry, optionType } = query;

  // Sanity checks
  if (!(timeToExpiry > 0) || !Number.isFinite(timeToExpiry)) {
    return unresolved('expired');
  }
  if (!(price > 0) || !Number.isFinite(price)) {
    return unresolved('invalid-price');
  }
  if (!(spot > 0) || !(strike > 0) || !Number.isFinite(spot) || !Number.isFinite(strike)) {
    return unresolved('invalid-input');
  }

  // No-arbitrage bounds: any positive volatility prices strictly inside them
  const discountedStrike = strike * Math.exp(-config.riskFreeRate * timeToExpiry);
  const lowerBound =
    optionType === 'call' ? Math.max(0, spot - discountedStrike) : Math.max(0, discountedStrike - spot);
  const upperBound = optionType === 'call' ? spot : discountedStrike;

  if (price <= lowerBound) {
    return unresolved('below-intrinsic');
  }
  if (price >= upperBound) {
    return unresolved('above-upper-bound');
  }

  const modelPrice = (volatility: number): number =>
    blackScholes({ spot, strike, timeToExpiry, volatility, optionType }, config);
  const modelVega = (volatility: number): number =>
    calculateModelVega({ spot, strike, timeToExpiry, volatility, optionType }, config);

  let low = opts.minVolatility;
  let high = opts.maxVolatility;

  // Prices closer than this cannot tell two volatilities apart
  const priceResolution = opts.priceTolerance * spot;

  if (modelPrice(low) - price > priceResolution || price - modelPrice(high) > priceResolution) {
    return unresolved('outside-search-range');
  }

  let iterations = 0;
  let sigma = startingPoint(options.initialGuess ?? seedVolatility(price - lowerBound, spot, timeToExpiry), low, high);

  // A converged volatility only counts when the price pins it down
  const accept = (volatility: number, method: 'newton' | 'bisection'): ImpliedVolatilityResult => {
    const uncertainty = priceResolution / modelVega(volatility);
    if (!(uncertainty <= opts.volatilityResolution)) {
      return unresolved('insensitive-price');
    }
    return { resolved: true, volatility, iterations, method };
  };

  // Newton-Raphson
  for (let i = 0; i < opts.maxNewtonIterations; i++) {
    iterations++;
    const diff = modelPrice(sigma) - price;

    if (diff > 0) {
      high = sigma;
    } else {
      low = sigma;
    }

    const vega = modelVega(sigma);
    const next = sigma - diff / vega;

    if (!(vega > 0) || !Number.isFinite(next)) {
      break;
    }
    if (Math.abs(next - sigma) <= opts.volatilityTolerance) {
      return accept(next, 'newton');
    }
    if (next <= low || next >= high) {
      break;
    }

    sigma = next;
  }

  // Bisection fallback
  for (let i = 0; i < opts.maxBisectionIterations; i++) {
    iterations++;
    const mid = 0.5 * (low + high);

    if ((high - low) / 2 <= opts.volatilityTolerance) {
      return accept(mid, 'bisection');
    }

    if (modelPrice(mid) - price > 0) {
      // Model price too high → volatility too high
      high = mid;
    } else {
      low = mid;
    }
  }

  return unresolved('no-convergence');
}

/**
 * Brenner-Subrahmanyam approximation applied to the time value
 * @internal
 */
function seedVolatility(timeValue: number, spot: number, timeToExpiry: number): number {
  return Math.sqrt((2 * Math.PI) / timeToExpiry) * (timeValue / spot);
}

/**
 * @internal
 */
function startingPoint(guess: number, low: number, high: number): number {
  if (Number.isFinite(guess) && guess > low && guess < high) {
    return guess;
  }
  return Math.min(Math.max(0.5, low), high);
}

/**
 * @internal
 */
function unresolved(reason: UnresolvedReason): ImpliedVolatilityResult {
  return { resolved: false, reason };
}
