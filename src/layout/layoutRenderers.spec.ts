import os from 'node:os';
import { Layout } from './Layout';
import { LogEventInfo } from './LogEventInfo';

function render(text: string, event: LogEventInfo): string {
	const result = Layout.parse(text);
	if (result.isErr()) throw result.error;
	return result.value.render(event);
}

describe('layoutRenderers', () => {
	const requestEvent = new LogEventInfo({
		req: {
			method: 'POST',
			url: '/orders/42?expand=items&page=2',
			headers: {
				host: 'shop.example.com',
				cookie: 'session=abc123; theme=dark%20mode',
				'user-agent': 'jest',
			},
			body: { quantity: 3, sku: 'A-1' },
		},
		res: { statusCode: 502 },
	});

	describe('request renderers', () => {
		test.each([
			['${request-host}', 'shop.example.com'],
			['${request-method}', 'POST'],
			['${request-url}', '/orders/42'],
			['${response-statuscode}', '502'],
			['${request-cookie:outputFormat=Json}', '[{"session":"abc123"},{"theme":"dark mode"}]'],
			['${request-cookie}', '"session"="abc123", "theme"="dark mode"'],
			['${request-cookie:outputFormat=json}', '[{"session":"abc123"},{"theme":"dark mode"}]'],
			['${request-querystring:outputFormat=Json}', '[{"expand":"items"},{"page":"2"}]'],
			['${request-form:outputFormat=Json}', '[{"quantity":"3"},{"sku":"A-1"}]'],
			[
				'${request-headers:outputFormat=Json}',
				'[{"host":"shop.example.com"},{"cookie":"session=abc123; theme=dark%20mode"},{"user-agent":"jest"}]',
			],
		])('when rendering %p for a request event, it returns %p', (text, expected) => {
			// Act
			const result = render(text, requestEvent);

			// Assert
			expect(result).toBe(expected);
		});

		test.each([
			'${request-host}',
			'${request-method}',
			'${request-url}',
			'${response-statuscode}',
			'${request-cookie:outputFormat=Json}',
			'${request-querystring:outputFormat=Json}',
			'${request-form:outputFormat=Json}',
			'${request-headers:outputFormat=Json}',
		])('when rendering %p for an event without a request, it returns an empty string', (text) => {
			// Act
			const result = render(text, new LogEventInfo({ msg: 'no request here' }));

			// Assert
			expect(result).toBe('');
		});

		test('when the request has a parsed query, it is used instead of the url', () => {
			// Arrange
			const event = new LogEventInfo({ req: { url: '/search?q=ignored', query: { q: 'shoes', size: 42 } } });

			// Act
			const result = render('${request-querystring:outputFormat=Json}', event);

			// Assert
			expect(result).toBe('[{"q":"shoes"},{"size":"42"}]');
		});

		test('when a cookie value is quoted, it is unquoted and pairs without a name are skipped', () => {
			// Arrange
			const event = new LogEventInfo({ req: { headers: { cookie: 'token="x y"; =orphan; lang=en' } } });

			// Act
			const result = render('${request-cookie:outputFormat=Json}', event);

			// Assert
			expect(result).toBe('[{"token":"x y"},{"lang":"en"}]');
		});

		test('when the request url is absolute, the query is left out', () => {
			// Arrange
			const event = new LogEventInfo({ req: { url: 'https://shop.example.com/orders/42?token=abc&page=2' } });

			// Act
			const result = render('${request-url}', event);

			// Assert
			expect(result).toBe('https://shop.example.com/orders/42');
		});
	});

	describe('event renderers', () => {
		test.each([
			[{ level: 10 }, 'trace'],
			[{ level: 40 }, 'warn'],
			[{ level: 'ERROR' }, 'error'],
			[{ level: 35 }, '35'],
			[{}, ''],
		])('when the event is %p, ${level} renders %p', (properties, expected) => {
			// Act
			const result = render('${level}', new LogEventInfo(properties));

			// Assert
			expect(result).toBe(expected);
		});

		test('when the message key is configured, ${message} reads that key', () => {
			// Arrange
			const event = new LogEventInfo({ msg: 'default key', message: 'custom key' }, { messageKey: 'message', errorKey: 'err' });

			// Act
			const result = render('${message}', event);

			// Assert
			expect(result).toBe('custom key');
		});

		test('when rendering ${machinename}, it returns the OS host name', () => {
			// Act
			const result = render('${machinename}', LogEventInfo.createNullEvent());

			// Assert
			expect(result).toBe(os.hostname());
		});

		test.each([
			[{ order: { id: 42, paid: true } }, '"id"="42", "paid"="true"'],
			[{ order: ['a', 1] }, '["a",1]'],
			[{ order: new Date('2024-02-03T04:05:06.007Z') }, '2024-02-03T04:05:06.007Z'],
			[{ order: null }, ''],
			[{ order: 12n }, '12'],
		])('when the property is %p, ${event-properties} renders %p', (properties, expected) => {
			// Act
			const result = render('${event-properties:order}', new LogEventInfo(properties));

			// Assert
			expect(result).toBe(expected);
		});

		test.each(['constructor', 'toString', 'hasOwnProperty'])(
			'when the item names the inherited member %p, ${event-properties} renders an empty string',
			(item) => {
				// Act
				const result = render(`\${event-properties:${item}}`, new LogEventInfo({ msg: 'plain' }));

				// Assert
				expect(result).toBe('');
			}
		);
	});
});
