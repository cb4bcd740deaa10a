import {
  blackScholes,
  calculateGreeks,
  calculateModelVega,
  getTimeToExpirationInYears,
} from '../blackscholes';
import { BlackScholesParams, MILLISECONDS_PER_DAY } from '../types';

const atTheMoney: BlackScholesParams = {
  spot: 100,
  strike: 100,
  timeToExpiry: 1,
  volatility: 0.2,
  optionType: 'call',
};

describe('blackScholes', () => {
  it('should calculate call option price correctly', () => {
    expect(blackScholes(atTheMoney)).toBeCloseTo(10.4506, 3);
  });

  it('should calculate put option price correctly', () => {
    expect(blackScholes({ ...atTheMoney, optionType: 'put' })).toBeCloseTo(5.5735, 3);
  });

  it('should satisfy put-call parity', () => {
    const params: BlackScholesParams = {
      spot: 100,
      strike: 105,
      timeToExpiry: 0.25,
      volatility: 0.45,
      optionType: 'call',
    };
    const r = 0.05;

    const callPrice = blackScholes(params);
    const putPrice = blackScholes({ ...params, optionType: 'put' });

    expect(callPrice - putPrice).toBeCloseTo(100 - 105 * Math.exp(-r * 0.25), 10);
  });

  it('should return intrinsic value at expiry', () => {
    expect(blackScholes({ ...atTheMoney, spot: 110, timeToExpiry: 0 })).toBe(10);
    expect(blackScholes({ ...atTheMoney, spot: 110, timeToExpiry: 0, optionType: 'put' })).toBe(0);
  });

  it('should return discounted intrinsic value with zero volatility', () => {
    const price = blackScholes({ ...atTheMoney, spot: 110, volatility: 0 });
    expect(price).toBeCloseTo(110 - 100 * Math.exp(-0.05), 10);
  });

  it('should return NaN for non-positive spot', () => {
    expect(blackScholes({ ...atTheMoney, spot: 0 })).toBeNaN();
  });

  it('should use the configured risk-free rate', () => {
    const zeroRate = blackScholes(atTheMoney, { riskFreeRate: 0, daysPerYear: 365.25 });
    const defaultRate = blackScholes(atTheMoney);
    expect(zeroRate).toBeLessThan(defaultRate);
  });
});

describe('calculateGreeks', () => {
  it('should calculate call Greeks', () => {
    const greeks = calculateGreeks(atTheMoney);

    expect(greeks.delta).toBeCloseTo(0.636831, 5);
    expect(greeks.gamma).toBeCloseTo(0.018762, 5);
    expect(greeks.vega).toBeCloseTo(0.37524, 4);
    expect(greeks.theta).toBeCloseTo(-0.017561, 5);
  });

  it('should calculate put Greeks', () => {
    const greeks = calculateGreeks({ ...atTheMoney, optionType: 'put' });

    expect(greeks.delta).toBeCloseTo(-0.363169, 5);
    expect(greeks.gamma).toBeCloseTo(0.018762, 5);
    expect(greeks.vega).toBeCloseTo(0.37524, 4);
    expect(greeks.theta).toBeCloseTo(-0.004539, 5);
  });

  it('should give calls and puts the same gamma and vega', () => {
    const call = calculateGreeks({ ...atTheMoney, strike: 120, timeToExpiry: 0.3 });
    const put = calculateGreeks({ ...atTheMoney, strike: 120, timeToExpiry: 0.3, optionType: 'put' });

    expect(call.gamma).toBe(put.gamma);
    expect(call.vega).toBe(put.vega);
    expect(call.delta - put.delta).toBeCloseTo(1, 12);
  });

  it('should approach a call delta of 1 and a put delta of 0 in the money near expiry', () => {
    const nearExpiry: BlackScholesParams = { ...atTheMoney, spot: 110, timeToExpiry: 1e-6 };

    expect(calculateGreeks(nearExpiry).delta).toBeCloseTo(1, 6);
    expect(calculateGreeks({ ...nearExpiry, optionType: 'put' }).delta).toBeCloseTo(0, 6);
  });

  it('should give an at-the-money call a delta near one half', () => {
    const delta = calculateGreeks({ ...atTheMoney, timeToExpiry: 30 / 365.25, volatility: 0.5 }).delta;

    expect(delta).toBeCloseTo(0.5, 1);
    expect(delta).toBeCloseTo(0.54, 2);
  });

  it('should scale theta by the configured day count', () => {
    const calendar = calculateGreeks(atTheMoney, { riskFreeRate: 0.05, daysPerYear: 365.25 });
    const trading = calculateGreeks(atTheMoney, { riskFreeRate: 0.05, daysPerYear: 252 });

    expect(trading.theta).toBeCloseTo((calendar.theta * 365.25) / 252, 12);
  });

  it.each<[string, Partial<BlackScholesParams>]>([
    ['zero time to expiry', { timeToExpiry: 0 }],
    ['negative time to expiry', { timeToExpiry: -0.01 }],
    ['zero volatility', { volatility: 0 }],
    ['NaN volatility', { volatility: NaN }],
    ['zero spot', { spot: 0 }],
  ])('should return NaN Greeks for %s', (_label, override) => {
    const greeks = calculateGreeks({ ...atTheMoney, ...override });

    expect(greeks.delta).toBeNaN();
    expect(greeks.gamma).toBeNaN();
    expect(greeks.vega).toBeNaN();
    expect(greeks.theta).toBeNaN();
  });
});

describe('calculateModelVega', () => {
  it('should return vega per unit of volatility', () => {
    expect(calculateModelVega(atTheMoney)).toBeCloseTo(37.524, 2);
  });

  it('should return zero for degenerate inputs', () => {
    expect(calculateModelVega({ ...atTheMoney, timeToExpiry: 0 })).toBe(0);
  });
});

describe('getTimeToExpirationInYears', () => {
  const expiration = Date.UTC(2026, 2, 27, 8);

  it('should measure one year as 365.25 days', () => {
    expect(getTimeToExpirationInYears(expiration, expiration - 365.25 * MILLISECONDS_PER_DAY)).toBe(1);
  });

  it('should be exactly zero at settlement', () => {
    expect(getTimeToExpirationInYears(expiration, expiration)).toBe(0);
  });

  it('should be negative after settlement', () => {
    expect(getTimeToExpirationInYears(expiration, expiration + MILLISECONDS_PER_DAY)).toBeLessThan(0);
  });

  it('should honour a custom day count', () => {
    expect(getTimeToExpirationInYears(expiration, expiration - 365 * MILLISECONDS_PER_DAY, 365)).toBe(1);
  });
});
