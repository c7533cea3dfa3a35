import { isDate } from 'util/types';
import { isDictionary } from '../common/utils/utils';

function safeJsonStringify(value: unknown): string {
	try {
		return JSON.stringify(value) ?? '';
	} catch (e) {
		return String(value);
	}
}

/**
 * Text form of a property value inside a layout. Plain objects use the key/value list format so
 * `renderItems` can turn them back into items.
 */
export function formatValue(value: unknown): string {
	if (value === null || value === undefined) return '';
	if (typeof value === 'string') return value;
	if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') return String(value);
	if (isDate(value)) return isNaN(value.valueOf()) ? '' : value.toISOString();
	if (Array.isArray(value)) return safeJsonStringify(value);
	if (isDictionary(value)) return formatKeyValuePairs(Object.entries(value));
	return String(value);
}

// "key"="value", "key2"="value2"
export function formatKeyValuePairs(entries: [string, unknown][]): string {
	return entries.map(([key, value]) => `"${key}"="${formatValue(value)}"`).join(', ');
}

// [{"key":"value"},{"key2":"value2"}]
export function formatJsonItems(entries: [string, unknown][]): string {
	if (entries.length === 0) return '';
	return JSON.stringify(entries.map(([key, value]) => ({ [key]: formatValue(value) })));
}

/**
 * Value stored in a message's `data` list: strings unchanged, everything else JSON.
 */
export function formatDataValue(value: unknown): string {
	if (typeof value === 'string') return value;
	if (typeof value === 'bigint') return String(value);
	if (isDate(value)) return formatValue(value);
	return safeJsonStringify(value);
}
