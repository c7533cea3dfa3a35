import os from 'node:os';
import { parse as parseCookie } from 'cookie';
import { Dictionary, isDictionary } from '../common/utils/utils';
import { formatJsonItems, formatKeyValuePairs, formatValue } from './formatValue';
import { LogEventInfo } from './LogEventInfo';

export interface RendererArgs {
	// rendered option value, undefined when the option wasn't given
	option(name: string): string | undefined;
}

export interface LayoutRenderer {
	name: string;
	// option a bare value sets, e.g. `${event-properties:hostname}` sets `item`
	defaultOption?: string;
	options: string[];
	render(event: LogEventInfo, args: RendererArgs): string;
}

export const OutputFormatValues = ['Json', 'KeyValue'];

function renderEntries(entries: [string, unknown][], args: RendererArgs): string {
	return (args.option('outputFormat') || '').toLowerCase() === 'json'
		? formatJsonItems(entries)
		: formatKeyValuePairs(entries);
}

function requestHeaders(event: LogEventInfo): Dictionary {
	const headers = event.request?.headers;
	return isDictionary(headers) ? headers : {};
}

function cookieEntries(header: string): [string, string][] {
	return Object.entries(parseCookie(header)).filter(([name]) => name !== '');
}

function eventProperty(event: LogEventInfo, name: string): unknown {
	return Object.prototype.hasOwnProperty.call(event.properties, name) ? event.properties[name] : undefined;
}

function queryEntries(event: LogEventInfo): [string, unknown][] {
	const query = event.request?.query;
	if (isDictionary(query) && Object.keys(query).length > 0) return Object.entries(query);

	const url = event.request?.url;
	if (typeof url !== 'string' || !url.includes('?')) return [];
	return [...new URLSearchParams(url.slice(url.indexOf('?') + 1)).entries()];
}

const renderers: LayoutRenderer[] = [
	{
		name: 'event-properties',
		defaultOption: 'item',
		options: ['item'],
		render: (event, args) => {
			const item = args.option('item');
			return item ? formatValue(eventProperty(event, item)) : '';
		},
	},
	{
		name: 'logger',
		options: [],
		render: (event) => event.loggerName || '',
	},
	{
		name: 'level',
		options: [],
		render: (event) => event.levelLabel,
	},
	{
		name: 'message',
		options: [],
		render: (event) => event.message || '',
	},
	{
		name: 'machinename',
		options: [],
		render: () => os.hostname(),
	},
	{
		name: 'environment-user',
		options: [],
		render: () => {
			try {
				return os.userInfo().username;
			} catch (e) {
				// no passwd entry for the process uid (some containers)
				return '';
			}
		},
	},
	{
		name: 'environment',
		defaultOption: 'variable',
		options: ['variable'],
		render: (_event, args) => {
			const variable = args.option('variable');
			return variable ? process.env[variable] || '' : '';
		},
	},
	{
		name: 'request-host',
		options: [],
		render: (event) => formatValue(requestHeaders(event).host),
	},
	{
		name: 'request-method',
		options: [],
		render: (event) => formatValue(event.request?.method),
	},
	{
		name: 'request-url',
		options: [],
		// path only; the query goes to request-querystring
		render: (event) => {
			const url = formatValue(event.request?.url);
			const queryStart = url.indexOf('?');
			return queryStart < 0 ? url : url.slice(0, queryStart);
		},
	},
	{
		name: 'request-headers',
		options: ['outputFormat'],
		render: (event, args) => renderEntries(Object.entries(requestHeaders(event)), args),
	},
	{
		name: 'request-cookie',
		options: ['outputFormat'],
		render: (event, args) => {
			const cookie = requestHeaders(event).cookie;
			return typeof cookie === 'string' ? renderEntries(cookieEntries(cookie), args) : '';
		},
	},
	{
		name: 'request-querystring',
		options: ['outputFormat'],
		render: (event, args) => renderEntries(queryEntries(event), args),
	},
	{
		name: 'request-form',
		options: ['outputFormat'],
		render: (event, args) => {
			const body = event.request?.body;
			return isDictionary(body) ? renderEntries(Object.entries(body), args) : '';
		},
	},
	{
		name: 'response-statuscode',
		options: [],
		render: (event) => formatValue(event.response?.statusCode),
	},
];

export const layoutRenderers: ReadonlyMap<string, LayoutRenderer> = new Map(
	renderers.map((renderer) => [renderer.name, renderer])
);
