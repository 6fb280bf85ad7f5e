import { describe, test, expect, beforeEach } from 'vitest';
import { Logger, type LogObject, type Transport } from '@shapemap/logging';
import { Mapper } from '../src/mapper';
import { field } from '../src/field';
import { typed } from '../src/typed';

describe('StructMapper logging', () => {
	const Source = Mapper.defineRecord('SourceFoo', { Foo: field.int() });
	const Dest = Mapper.defineRecord('DestFooBar', { Foo: field.int(), Bar: field.string() });

	let mockTransport: Transport & { logs: LogObject[] };

	beforeEach(() => {
		mockTransport = {
			logs: [],
			write(obj: LogObject) {
				this.logs.push(obj);
			},
			async flush() {},
			async close() {}
		};
	});

	test('should log recorded failures and a summary at debug level', () => {
		const logger = new Logger('MapperTest', { level: 'debug', transports: [mockTransport] });
		const mapper = Mapper.configure({ failOnMissingSourceField: false, logger });

		mapper.map(typed(Source, { Foo: 1 }), typed(Dest, Dest.zero()));

		expect(mockTransport.logs.map((log) => log.msg)).toEqual(['Recorded mapping failure', 'Mapped value']);
		expect(mockTransport.logs[0]).toMatchObject({
			name: 'MapperTest',
			error: 'MissingSourceFieldError',
			scope: '',
			reason: 'Missing fields from source record: Bar'
		});
		expect(mockTransport.logs[1]).toMatchObject({
			source: 'SourceFoo',
			dest: 'DestFooBar',
			errors: 1,
			missing: 1
		});
	});

	test('should log the scope of incompatible fields', () => {
		const logger = new Logger('MapperTest', { level: 'debug', transports: [mockTransport] });
		const Text = Mapper.defineRecord('Text', { Foo: field.string() });
		const mapper = Mapper.configure({ failOnIncompatibleTypes: false, logger });

		mapper.map(typed(Text, { Foo: 'x' }), typed(Source, Source.zero()));

		expect(mockTransport.logs[0]).toMatchObject({ error: 'IncompatibleTypesError', scope: 'Foo' });
	});

	test('should stay quiet above debug level', () => {
		const logger = new Logger('MapperTest', { level: 'info', transports: [mockTransport] });

		Mapper.configure({ logger }).map(typed(Source, { Foo: 1 }), typed(Source, Source.zero()));

		expect(mockTransport.logs).toEqual([]);
	});
});
