/**
 * Exchange option name utilities
 *
 * Option names follow the format: UNDERLYING-DMMMYY-STRIKE-C/P
 * Example: BTC-6FEB26-60000-C = BTC 60,000 Call settling Feb 6, 2026 at 08:00 UTC
 */

import { InstrumentIdentifier, OptionType, SETTLEMENT_HOUR_UTC } from '../types';

const MONTH_CODES = ['JAN', 'FEB', 'MAR', 'APR', 'MAY', 'JUN', 'JUL', 'AUG', 'SEP', 'OCT', 'NOV', 'DEC'];

const UNDERLYING_PATTERN = /^[A-Z0-9_]+$/;
const EXPIRY_PATTERN = /^(\d{1,2})([A-Z]{3})(\d{2})$/;
// Linear options write fractional strikes with 'd' as decimal separator (0d625)
const STRIKE_PATTERN = /^\d+(?:[.d]\d+)?$/;

/**
 * Thrown when an option name cannot be decoded.
 * Callers skip the instrument; nothing downstream sees partial fields.
 */
export class MalformedIdentifierError extends Error {
  readonly instrumentName: string;
  readonly reason: string;

  constructor(instrumentName: string, reason: string) {
    super(`Malformed instrument name "${instrumentName}": ${reason}`);
    this.name = 'MalformedIdentifierError';
    this.instrumentName = instrumentName;
    this.reason = reason;
  }
}

/**
 * Parses an exchange option name into its components.
 *
 * @param instrumentName - The option name to parse
 * @returns Parsed identifier with the settlement instant at 08:00 UTC
 * @throws {MalformedIdentifierError} If any token is invalid
 *
 * @example
 * ```typescript
 * const parsed = parseInstrumentName('BTC-6FEB26-60000-C');
 * // { underlying: 'BTC', expiration: 2026-02-06T08:00:00.000Z, strike: 60000, optionType: 'call' }
 * ```
 */
export function parseInstrumentName(instrumentName: string): InstrumentIdentifier {
  const parts = instrumentName.split('-');
  if (parts.length !== 4) {
    throw new MalformedIdentifierError(instrumentName, `expected 4 tokens, got ${parts.length}`);
  }

  const [underlying, expiryCode, strikeCode, typeCode] = parts;

  if (!UNDERLYING_PATTERN.test(underlying)) {
    throw new MalformedIdentifierError(instrumentName, `invalid underlying "${underlying}"`);
  }

  const expiration = parseExpiryCode(expiryCode);
  if (!expiration) {
    throw new MalformedIdentifierError(instrumentName, `invalid expiry "${expiryCode}"`);
  }

  const strike = parseStrike(strikeCode);
  if (strike === null) {
    throw new MalformedIdentifierError(instrumentName, `invalid strike "${strikeCode}"`);
  }

  let optionType: OptionType;
  if (typeCode === 'C') {
    optionType = 'call';
  } else if (typeCode === 'P') {
    optionType = 'put';
  } else {
    throw new MalformedIdentifierError(instrumentName, `invalid option type "${typeCode}"`);
  }

  return {
    underlying,
    expiration,
    expirationTimestamp: expiration.getTime(),
    strike,
    optionType,
  };
}

/**
 * Returns whether a string decodes as an option name.
 */
export function isInstrumentName(instrumentName: string): boolean {
  try {
    parseInstrumentName(instrumentName);
    return true;
  } catch (error) {
    if (error instanceof MalformedIdentifierError) return false;
    throw error;
  }
}

/**
 * Builds an exchange option name from its components.
 *
 * @example
 * ```typescript
 * buildInstrumentName({
 *   underlying: 'ETH',
 *   expiration: new Date('2026-03-27T08:00:00Z'),
 *   strike: 3000,
 *   optionType: 'put',
 * });
 * // Returns: 'ETH-27MAR26-3000-P'
 * ```
 */
export function buildInstrumentName(
  params: Pick<InstrumentIdentifier, 'underlying' | 'expiration' | 'strike' | 'optionType'>
): string {
  const { underlying, expiration, strike, optionType } = params;

  const day = expiration.getUTCDate();
  const month = MONTH_CODES[expiration.getUTCMonth()];
  const year = expiration.getUTCFullYear().toString().slice(-2);

  const strikeCode = Number.isInteger(strike) ? strike.toString() : strike.toString().replace('.', 'd');
  const typeCode = optionType === 'call' ? 'C' : 'P';

  return `${underlying.toUpperCase()}-${day}${month}${year}-${strikeCode}-${typeCode}`;
}

/**
 * Decodes DMMMYY into the 08:00 UTC settlement instant, or null when it is
 * not a real calendar date.
 * @internal
 */
function parseExpiryCode(code: string): Date | null {
  const match = code.match(EXPIRY_PATTERN);
  if (!match) return null;

  const day = parseInt(match[1], 10);
  const month = MONTH_CODES.indexOf(match[2]);
  const year = 2000 + parseInt(match[3], 10);
  if (month < 0 || day < 1) return null;

  const expiration = new Date(Date.UTC(year, month, day, SETTLEMENT_HOUR_UTC, 0, 0));

  // Date.UTC rolls 31FEB over into March
  if (expiration.getUTCDate() !== day || expiration.getUTCMonth() !== month) {
    return null;
  }

  return expiration;
}

/**
 * @internal
 */
function parseStrike(code: string): number | null {
  if (!STRIKE_PATTERN.test(code)) return null;

  const strike = parseFloat(code.replace('d', '.'));
  return Number.isFinite(strike) && strike > 0 ? strike : null;
}
