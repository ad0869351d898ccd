/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * SIGNED 64.64 FIXED-POINT NUMBERS
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Values are held as a bigint raw word: value = raw / 2^64.
 * The raw word must fit a signed 128-bit integer; any result outside that
 * range throws ArithmeticOverflowError instead of wrapping.
 *
 * Rounding:
 *   mul  → floor (arithmetic shift)
 *   div  → truncation toward zero
 *   toInteger → truncation toward zero
 *
 * exp() reduces the argument by ln(2) and sums a Taylor series at 96
 * fractional bits, so results only depend on integer arithmetic.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import BigNumber from 'bignumber.js';
import { ArithmeticOverflowError, DivisionByZeroError } from '../errors';

const FRACTION_BITS = 64n;
const ONE_RAW = 1n << FRACTION_BITS;
const MAX_RAW = (1n << 127n) - 1n;
const MIN_RAW = -(1n << 127n);

// exp() works with 32 guard bits on top of the 64 fractional bits
const GUARD_BITS = 32n;
const SERIES_ONE = 1n << (FRACTION_BITS + GUARD_BITS);
const LN2_SERIES = 0xb17217f7d1cf79abc9e3b398n; // ln(2) * 2^96
const EXP_MAX_INPUT = 64n * ONE_RAW;
const EXP_MIN_INPUT = -64n * ONE_RAW;

const DecimalMath = BigNumber.clone({ DECIMAL_PLACES: 20, EXPONENTIAL_AT: 1e9 });
const TWO_POW_64 = new DecimalMath(2).pow(64);

function checked(raw: bigint, operation: string): bigint {
    if (raw > MAX_RAW || raw < MIN_RAW) {
        throw new ArithmeticOverflowError(operation, { raw: raw.toString() });
    }
    return raw;
}

export class FixedPoint {
    static readonly ZERO = new FixedPoint(0n);
    static readonly ONE = new FixedPoint(ONE_RAW);

    private constructor(public readonly raw: bigint) {}

    static fromRaw(raw: bigint): FixedPoint {
        return new FixedPoint(checked(raw, 'fromRaw'));
    }

    /**
     * Build from a signed or unsigned integer.
     */
    /**
     * numerator / denominator from integers, truncated toward zero. Neither
     * operand has to fit the 64.64 range, only the quotient.
     */
    static fromRatio(numerator: bigint, denominator: bigint): FixedPoint {
        if (denominator === 0n) {
            throw new DivisionByZeroError({ numerator: numerator.toString() });
        }
        return new FixedPoint(checked((numerator << FRACTION_BITS) / denominator, 'fromRatio'));
    }

    static fromInt(value: bigint | number): FixedPoint {
        if (typeof value === 'number' && !Number.isSafeInteger(value)) {
            throw new RangeError(`[FIXED_POINT] ${value} is not a safe integer`);
        }
        return new FixedPoint(checked(BigInt(value) << FRACTION_BITS, 'fromInt'));
    }

    /**
     * Parse a decimal such as "0.5" or 12.25. Digits beyond 2^-64 are dropped
     * (rounded toward zero).
     */
    static fromDecimal(value: BigNumber.Value): FixedPoint {
        const parsed = new DecimalMath(value);
        if (parsed.isNaN()) {
            throw new RangeError(`[FIXED_POINT] ${String(value)} is not a number`);
        }
        if (!parsed.isFinite()) {
            throw new ArithmeticOverflowError('fromDecimal', { value: String(value) });
        }
        const scaled = parsed.times(TWO_POW_64).integerValue(BigNumber.ROUND_DOWN);
        return new FixedPoint(checked(BigInt(scaled.toFixed()), 'fromDecimal'));
    }

    add(other: FixedPoint): FixedPoint {
        return new FixedPoint(checked(this.raw + other.raw, 'add'));
    }

    sub(other: FixedPoint): FixedPoint {
        return new FixedPoint(checked(this.raw - other.raw, 'sub'));
    }

    mul(other: FixedPoint): FixedPoint {
        return new FixedPoint(checked((this.raw * other.raw) >> FRACTION_BITS, 'mul'));
    }

    div(other: FixedPoint): FixedPoint {
        if (other.raw === 0n) {
            throw new DivisionByZeroError({ numerator: this.toString() });
        }
        return new FixedPoint(checked((this.raw << FRACTION_BITS) / other.raw, 'div'));
    }

    neg(): FixedPoint {
        return new FixedPoint(checked(-this.raw, 'neg'));
    }

    /**
     * Natural exponential. Inputs below -64 return zero (the true value is
     * far below 2^-64); results above the representable range throw.
     */
    exp(): FixedPoint {
        if (this.raw > EXP_MAX_INPUT) {
            throw new ArithmeticOverflowError('exp', { input: this.toString() });
        }
        if (this.raw < EXP_MIN_INPUT) {
            return FixedPoint.ZERO;
        }

        // x = k * ln2 + r, |r| <= ln2 / 2
        const x = this.raw << GUARD_BITS;
        const half = LN2_SERIES / 2n;
        const k = x >= 0n ? (x + half) / LN2_SERIES : -((-x + half) / LN2_SERIES);
        const r = x - k * LN2_SERIES;

        let sum = SERIES_ONE;
        let term = SERIES_ONE;
        for (let i = 1n; i <= 40n; i++) {
            term = (term * r) / (i * SERIES_ONE);
            if (term === 0n) break;
            sum += term;
        }

        const shift = k - GUARD_BITS;
        const raw = shift >= 0n ? sum << shift : sum >> -shift;
        return new FixedPoint(checked(raw, 'exp'));
    }

    /**
     * Integer part, truncated toward zero.
     */
    toInteger(): bigint {
        return this.raw >= 0n ? this.raw >> FRACTION_BITS : -((-this.raw) >> FRACTION_BITS);
    }

    compare(other: FixedPoint): -1 | 0 | 1 {
        if (this.raw === other.raw) return 0;
        return this.raw < other.raw ? -1 : 1;
    }

    eq(other: FixedPoint): boolean {
        return this.raw === other.raw;
    }

    lt(other: FixedPoint): boolean {
        return this.raw < other.raw;
    }

    lte(other: FixedPoint): boolean {
        return this.raw <= other.raw;
    }

    gt(other: FixedPoint): boolean {
        return this.raw > other.raw;
    }

    gte(other: FixedPoint): boolean {
        return this.raw >= other.raw;
    }

    isZero(): boolean {
        return this.raw === 0n;
    }

    isNegative(): boolean {
        return this.raw < 0n;
    }

    clamp(lower: FixedPoint, upper: FixedPoint): FixedPoint {
        if (this.raw < lower.raw) return lower;
        if (this.raw > upper.raw) return upper;
        return this;
    }

    /**
     * Decimal rendering, up to 20 fractional digits.
     */
    toString(): string {
        return new DecimalMath(this.raw.toString()).div(TWO_POW_64).toString();
    }
}
