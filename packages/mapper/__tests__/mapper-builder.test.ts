import { describe, test, expect, vi } from 'vitest';
import { Logger } from '@shapemap/logging';
import { Mapper } from '../src/mapper';
import { MapperUsageError } from '../src/mapper-error';

describe('MapperBuilder', () => {
	test('should build a mapper with the default policy', () => {
		const { config } = Mapper.builder().build();

		expect(config.failOnMissingSourceField).toBe(true);
		expect(config.failOnIncompatibleTypes).toBe(true);
		expect(config.fuzzyMatch).toBe(false);
		expect(config.ignoreCase).toBe(false);
		expect(config.fieldRenames).toEqual([]);
		expect([...config.ignoredDestinationFields]).toEqual([]);
	});

	test('should collect every option', () => {
		const customMapper = vi.fn((): boolean => false);
		const logger = new Logger('Custom');

		const { config } = Mapper.builder()
			.fuzzyMatch()
			.ignoreCase()
			.sourceTag('json')
			.destTag('db')
			.rename('user_id', 'AccountId')
			.ignore('Audit_Trail', 'Version')
			.use(customMapper)
			.failOnMissingSourceField(false)
			.failOnIncompatibleTypes(false)
			.logger(logger)
			.build();

		expect(config.fuzzyMatch).toBe(true);
		expect(config.ignoreCase).toBe(true);
		expect(config.sourceTagKey).toBe('json');
		expect(config.destTagKey).toBe('db');
		expect(config.fieldRenames).toEqual([['userid', 'accountid']]);
		expect([...config.ignoredDestinationFields]).toEqual(['audittrail', 'version']);
		expect(config.customMappers).toEqual([customMapper]);
		expect(config.failOnMissingSourceField).toBe(false);
		expect(config.failOnIncompatibleTypes).toBe(false);
		expect(config.logger).toBe(logger);
	});

	test('should reject a second rename of the same destination', () => {
		const builder = Mapper.builder().rename('a', 'target');

		expect(() => builder.rename('b', 'target')).toThrow(MapperUsageError);
		expect(() => builder.rename('b', 'target')).toThrow(
			"Destination field 'target' is already renamed. Each destination field can only be renamed once. " +
				'Attempted duplicate rename from: b'
		);
	});

	test('should reject a second rename of the same source', () => {
		const builder = Mapper.builder().rename('a', 'first');

		expect(() => builder.rename('a', 'second')).toThrow(
			"Source field 'a' is already renamed to 'first'. A rename table maps each source field once."
		);
	});

	test('should not share state between built mappers', () => {
		const builder = Mapper.builder().ignore('a');
		const first = builder.build();
		builder.ignore('b');

		expect([...first.config.ignoredDestinationFields]).toEqual(['a']);
		expect([...builder.build().config.ignoredDestinationFields]).toEqual(['a', 'b']);
	});
});
