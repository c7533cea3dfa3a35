import { renderItems } from './renderItems';

describe('renderItems', () => {
	test.each(['', '   ', '\t\n'])('when the rendered text is blank (%p), it returns undefined', (rendered) => {
		// Act
		const result = renderItems(rendered);

		// Assert
		expect(result).toBeUndefined();
	});

	test('when the text is a JSON list of objects, every property becomes an item', () => {
		// Arrange
		const rendered = '[{"session":"abc123"},{"theme":"dark","count":3},{"empty":null,"nested":{"a":1}}]';

		// Act
		const result = renderItems(rendered);

		// Assert
		expect(result).toEqual([
			{ key: 'session', value: 'abc123' },
			{ key: 'theme', value: 'dark' },
			{ key: 'count', value: '3' },
			{ key: 'empty', value: null },
			{ key: 'nested', value: '{"a":1}' },
		]);
	});

	test('when the text looks like a JSON list but does not parse, it returns an empty list', () => {
		// Act
		const result = renderItems('[{"session":}]');

		// Assert
		expect(result).toEqual([]);
	});

	test('when the text is a key/value list, it splits it into items', () => {
		// Arrange
		const rendered = '"User-Agent"="curl/8.4.0", "Accept"="*/*"';

		// Act
		const result = renderItems(rendered);

		// Assert
		expect(result).toEqual([
			{ key: 'User-Agent', value: 'curl/8.4.0' },
			{ key: 'Accept', value: '*/*' },
		]);
	});

	test('when a key/value segment has no value, the item value is null', () => {
		// Act
		const result = renderItems('"debug", "page"="2"');

		// Assert
		expect(result).toEqual([
			{ key: 'debug', value: null },
			{ key: 'page', value: '2' },
		]);
	});

	test('when a key is blank, the segment is skipped', () => {
		// Act
		const result = renderItems('""="orphan", "page"="2"');

		// Assert
		expect(result).toEqual([{ key: 'page', value: '2' }]);
	});

	test('when the text is a single unquoted word, it becomes a key with a null value', () => {
		// Act
		const result = renderItems('anonymous');

		// Assert
		expect(result).toEqual([{ key: 'anonymous', value: null }]);
	});

	test('when a value contains a second separator, the text after it is dropped', () => {
		// Act
		const result = renderItems('"a"="1"="2"');

		// Assert
		expect(result).toEqual([{ key: 'a', value: '1' }]);
	});
});
