import { describe, test, expect } from 'vitest';
import { coerceScalar, isFloatKind, isIntegerKind, isUnsignedKind } from '../src/coercion';
import { MapperError } from '../src/mapper-error';

describe('coerceScalar', () => {
	describe('integer to integer', () => {
		test('should keep in-range values', () => {
			expect(coerceScalar(9, 'int32', 'int')).toBe(9);
			expect(coerceScalar(-1, 'int32', 'int64')).toBe(-1);
			expect(coerceScalar(-128, 'int64', 'int8')).toBe(-128);
		});

		test('should wrap with two\'s complement when narrowing', () => {
			expect(coerceScalar(300, 'int', 'int8')).toBe(44);
			expect(coerceScalar(-129, 'int16', 'int8')).toBe(127);
			expect(coerceScalar(40000, 'int64', 'int16')).toBe(-25536);
		});

		test('should wrap at 64 bits for int', () => {
			expect(coerceScalar(2 ** 63, 'int64', 'int')).toBe(-(2 ** 63));
		});

		test('should drop the fraction of non-integral input', () => {
			expect(coerceScalar(2.9, 'int64', 'int32')).toBe(2);
			expect(coerceScalar(-2.9, 'int64', 'int32')).toBe(-2);
		});

		test('should accept bigint input', () => {
			expect(coerceScalar(10n, 'int64', 'int32')).toBe(10);
		});
	});

	describe('unsigned to unsigned', () => {
		test('should wrap modulo the destination width', () => {
			expect(coerceScalar(256, 'uint16', 'uint8')).toBe(0);
			expect(coerceScalar(65535, 'uint32', 'uint8')).toBe(255);
		});

		test('should keep large values that fit', () => {
			expect(coerceScalar(2 ** 53, 'uint64', 'uint')).toBe(2 ** 53);
		});
	});

	describe('unsigned to integer', () => {
		test('should reinterpret as signed at the destination width', () => {
			expect(coerceScalar(9, 'uint', 'int32')).toBe(9);
			expect(coerceScalar(4294967295, 'uint32', 'int32')).toBe(-1);
			expect(coerceScalar(200, 'uint8', 'int8')).toBe(-56);
		});
	});

	describe('float to float', () => {
		test('should round to single precision for float32', () => {
			expect(coerceScalar(9.1, 'float64', 'float32')).toBe(Math.fround(9.1));
		});

		test('should keep the value for float64', () => {
			expect(coerceScalar(0.1, 'float32', 'float64')).toBe(0.1);
		});
	});

	describe('pairs without a rule', () => {
		test('should return undefined', () => {
			expect(coerceScalar(5, 'int32', 'uint32')).toBeUndefined();
			expect(coerceScalar(1, 'int', 'float64')).toBeUndefined();
			expect(coerceScalar(9.7, 'float64', 'int32')).toBeUndefined();
			expect(coerceScalar('x', 'string', 'int')).toBeUndefined();
			expect(coerceScalar(true, 'bool', 'uint8')).toBeUndefined();
		});
	});

	describe('invalid input', () => {
		test('should reject non-finite integers', () => {
			expect(() => coerceScalar(Number.NaN, 'int64', 'int32')).toThrow(
				new MapperError('Expected a finite int64 value, got: NaN')
			);
		});

		test('should reject non-numeric floats', () => {
			expect(() => coerceScalar('1.5', 'float64', 'float32')).toThrow('Expected a float64 value, got: 1.5');
		});
	});
});

describe('kind guards', () => {
	test('should classify scalar kinds', () => {
		expect(isIntegerKind('int16')).toBe(true);
		expect(isIntegerKind('uint16')).toBe(false);
		expect(isUnsignedKind('uint')).toBe(true);
		expect(isUnsignedKind('string')).toBe(false);
		expect(isFloatKind('float32')).toBe(true);
		expect(isFloatKind('int')).toBe(false);
	});
});
