/**
 * Statistical utility functions
 */

const INV_SQRT_2PI = 1 / Math.sqrt(2 * Math.PI);

/**
 * Cumulative distribution function for standard normal distribution
 * Using the Abramowitz and Stegun 26.2.17 rational approximation (|error| < 7.5e-8)
 *
 * @param x - Input value
 * @returns Cumulative probability
 */
export function cumulativeNormalDistribution(x: number): number {
  if (Number.isNaN(x)) return NaN;

  const t = 1 / (1 + 0.2316419 * Math.abs(x));
  const probability =
    normalPDF(x) *
    t *
    (0.31938153 +
      t * (-0.356563782 + t * (1.781477937 + t * (-1.821255978 + t * 1.330274429))));

  return x > 0 ? 1 - probability : probability;
}

/**
 * Probability density function for standard normal distribution
 *
 * @param x - Input value
 * @returns Probability density
 */
export function normalPDF(x: number): number {
  return INV_SQRT_2PI * Math.exp((-x * x) / 2);
}
