/**
 * Scalar Coercion Table
 *
 * Conversions between the integer, unsigned and floating families.
 * Integers wrap to the destination width with two's-complement semantics;
 * there is no overflow checking.
 *
 * @example
 * ```typescript
 * coerceScalar(300, 'int', 'int8');        // -> 44
 * coerceScalar(-1, 'int32', 'int64');      // -> -1
 * coerceScalar(4294967295, 'uint32', 'int32'); // -> -1
 * coerceScalar(9.1, 'float64', 'float32'); // -> 9.100000381469727
 * coerceScalar('x', 'string', 'int');      // -> undefined (no rule)
 * ```
 */

import { MapperError } from './mapper-error';
import type { FloatKind, IntegerKind, ScalarKind, UnsignedKind } from './types';

const integerBits: Record<IntegerKind, number> = {
	int: 64,
	int8: 8,
	int16: 16,
	int32: 32,
	int64: 64
};

const unsignedBits: Record<UnsignedKind, number> = {
	uint: 64,
	uint8: 8,
	uint16: 16,
	uint32: 32,
	uint64: 64
};

export function isIntegerKind(kind: ScalarKind): kind is IntegerKind {
	return kind in integerBits;
}

export function isUnsignedKind(kind: ScalarKind): kind is UnsignedKind {
	return kind in unsignedBits;
}

export function isFloatKind(kind: ScalarKind): kind is FloatKind {
	return kind === 'float32' || kind === 'float64';
}

/**
 * Read an integer-family value as a bigint, dropping any fraction.
 *
 * @throws MapperError if the value is not a finite number or a bigint
 */
function toBigInt(value: unknown, kind: ScalarKind): bigint {
	if (typeof value === 'bigint') {
		return value;
	}
	if (typeof value === 'number' && Number.isFinite(value)) {
		return BigInt(Math.trunc(value));
	}
	throw new MapperError(`Expected a finite ${kind} value, got: ${String(value)}`);
}

/**
 * Wrap an integer to a signed width.
 */
export function toSigned(value: unknown, from: ScalarKind, to: IntegerKind): number {
	return Number(BigInt.asIntN(integerBits[to], toBigInt(value, from)));
}

/**
 * Wrap an integer to an unsigned width.
 */
export function toUnsigned(value: unknown, from: ScalarKind, to: UnsignedKind): number {
	return Number(BigInt.asUintN(unsignedBits[to], toBigInt(value, from)));
}

/**
 * Convert between floating widths. float32 rounds to single precision.
 *
 * @throws MapperError if the value is not a number
 */
export function toFloat(value: unknown, from: FloatKind, to: FloatKind): number {
	if (typeof value !== 'number') {
		throw new MapperError(`Expected a ${from} value, got: ${String(value)}`);
	}
	return to === 'float32' ? Math.fround(value) : value;
}

/**
 * Apply the first coercion rule that covers the pair, in this order:
 * integer to integer, unsigned to unsigned, unsigned to integer, float to float.
 *
 * @returns The converted value, or undefined when no rule applies
 */
export function coerceScalar(value: unknown, from: ScalarKind, to: ScalarKind): number | undefined {
	if (isIntegerKind(to) && isIntegerKind(from)) {
		return toSigned(value, from, to);
	}
	if (isUnsignedKind(to) && isUnsignedKind(from)) {
		return toUnsigned(value, from, to);
	}
	if (isIntegerKind(to) && isUnsignedKind(from)) {
		return toSigned(value, from, to);
	}
	if (isFloatKind(to) && isFloatKind(from)) {
		return toFloat(value, from, to);
	}
	return undefined;
}
