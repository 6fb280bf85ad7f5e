import { describe, test, expect, vi } from 'vitest';
import { Mapper } from '../src/mapper';
import { field } from '../src/field';
import { typed } from '../src/typed';
import type { MapResult } from '../src/map-result';
import type { StructMapper } from '../src/struct-mapper';
import type { CustomMapper } from '../src/mapper-types';

const isoDates: CustomMapper = (source, sourceShape, dest, destShape) => {
	if (sourceShape.kind !== 'timestamp' || destShape.kind !== 'scalar' || destShape.scalar !== 'string') {
		return false;
	}
	dest.set(source instanceof Date ? source.toISOString() : '');
	return true;
};

const Event = Mapper.defineRecord('Event', { name: field.string(), at: field.timestamp() });
const EventDto = Mapper.defineRecord('EventDto', { name: field.string(), at: field.string() });

describe('custom mappers', () => {
	test('should convert pairs the built-in rules reject', () => {
		const dest = EventDto.zero();

		const result = Mapper.configure({ customMappers: [isoDates] }).map(
			typed(Event, { name: 'launch', at: new Date('2024-03-01T10:00:00Z') }),
			typed(EventDto, dest)
		);

		expect(dest).toEqual({ name: 'launch', at: '2024-03-01T10:00:00.000Z' });
		expect(result.ok).toBe(true);
	});

	test('should be consulted at every node until one handles it', () => {
		const declining = vi.fn((): boolean => false);
		const dest = EventDto.zero();

		Mapper.configure({ customMappers: [declining, isoDates] }).map(
			typed(Event, { name: 'launch', at: new Date(0) }),
			typed(EventDto, dest)
		);

		// root record, name, at
		expect(declining).toHaveBeenCalledTimes(3);
		expect(dest.at).toBe('1970-01-01T00:00:00.000Z');
	});

	test('should run in registration order', () => {
		const shout: CustomMapper = (source, sourceShape, dest, destShape) => {
			if (sourceShape.kind !== 'scalar' || destShape.kind !== 'scalar' || sourceShape.scalar !== 'string') {
				return false;
			}
			dest.set(String(source).toUpperCase());
			return true;
		};
		const whisper: CustomMapper = (source, sourceShape, dest) => {
			if (sourceShape.kind !== 'scalar' || sourceShape.scalar !== 'string') {
				return false;
			}
			dest.set(String(source).toLowerCase());
			return true;
		};
		const dest = EventDto.zero();

		Mapper.configure({ customMappers: [shout, whisper, isoDates] }).map(
			typed(Event, { name: 'Launch', at: new Date(0) }),
			typed(EventDto, dest)
		);

		expect(dest.name).toBe('LAUNCH');
	});

	test('should take precedence over identical-type copies', () => {
		const doubler: CustomMapper = (source, sourceShape, dest, destShape) => {
			if (sourceShape.kind !== 'scalar' || destShape.kind !== 'scalar' || sourceShape.scalar !== 'int') {
				return false;
			}
			dest.set(typeof source === 'number' ? source * 2 : 0);
			return true;
		};
		const Counter = Mapper.defineRecord('Counter', { n: field.int() });
		const CounterDto = Mapper.defineRecord('CounterDto', { n: field.int() });
		const dest = CounterDto.zero();

		Mapper.configure({ customMappers: [doubler] }).map(typed(Counter, { n: 21 }), typed(CounterDto, dest));

		expect(dest.n).toBe(42);
	});

	test('should see an empty optional source as a zero record', () => {
		const Inner = Mapper.defineRecord('Inner', { value: field.int() });
		const Source = Mapper.defineRecord('Source', { inner: field.record(Inner).optional() });
		const Dest = Mapper.defineRecord('Dest', { inner: field.record(Inner) });
		const seen: unknown[] = [];
		const spy: CustomMapper = (source, sourceShape) => {
			if (sourceShape === Inner) {
				seen.push(source);
			}
			return false;
		};

		Mapper.configure({ customMappers: [spy] }).map(typed(Source, { inner: undefined }), typed(Dest, Dest.zero()));

		expect(seen).toEqual([{ value: 0 }]);
	});

	test('should let a shared mapper map re-entrantly', () => {
		const Inner = Mapper.defineRecord('Inner', { value: field.int() });
		const InnerDto = Mapper.defineRecord('InnerDto', { value: field.int(), note: field.string() });
		const Holder = Mapper.defineRecord('Holder', { inner: field.record(Inner) });
		const HolderDto = Mapper.defineRecord('HolderDto', { inner: field.record(InnerDto), label: field.string() });
		const nested: MapResult[] = [];

		const mapper: StructMapper = Mapper.configure({
			failOnMissingSourceField: false,
			customMappers: [
				(source, sourceShape, dest, destShape) => {
					if (sourceShape !== Inner || destShape !== InnerDto) {
						return false;
					}
					nested.push(mapper.map(typed(Inner, source), typed(InnerDto, dest.get())));
					return true;
				}
			]
		});
		const dest = HolderDto.zero();

		const result = mapper.map(typed(Holder, { inner: { value: 3 } }), typed(HolderDto, dest));

		expect(dest).toEqual({ inner: { value: 3, note: '' }, label: '' });
		expect(result.missingSourceFields).toEqual(['label']);
		expect(nested.map((inner) => inner.missingSourceFields)).toEqual([['note']]);
	});
});
