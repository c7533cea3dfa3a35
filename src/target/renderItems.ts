import { Item } from '../elmahio-client/ElmahioTypes';
import { isBlank, isDictionary, safeJsonParse } from '../common/utils/utils';

function trimQuotes(s: string): string {
	let start = 0;
	let end = s.length;
	while (start < end && s[start] === '"') start++;
	while (end > start && s[end - 1] === '"') end--;
	return s.slice(start, end);
}

function itemValue(value: unknown): string | null {
	if (value === null || value === undefined) return null;
	return typeof value === 'object' ? JSON.stringify(value) : String(value);
}

function itemsFromJson(rendered: string): Item[] {
	const parsed = safeJsonParse(rendered);
	if (!Array.isArray(parsed)) return [];

	const items: Item[] = [];
	for (const entry of parsed) {
		if (!isDictionary(entry)) continue;
		for (const [key, value] of Object.entries(entry)) {
			items.push({ key, value: itemValue(value) });
		}
	}
	return items;
}

function itemsFromKeyValuePairs(rendered: string): Item[] {
	const items: Item[] = [];
	for (const keyAndValue of rendered.split('", "')) {
		if (keyAndValue === '') continue;
		const [rawKey, ...rest] = keyAndValue.split('"="');
		const key = trimQuotes(rawKey);
		if (isBlank(key)) continue;
		// text after a second "=" separator is dropped
		items.push({ key, value: rest.length > 0 ? trimQuotes(rest[0]) : null });
	}
	return items;
}

/**
 * Turns a rendered cookies/form/query string/headers layout into items.
 *
 * Request renderers write `[{"name":"value"},...]`; event properties holding an object render as
 * `"name"="value", "name2"="value2"`. Blank text means the field is left out of the message.
 */
export function renderItems(rendered: string): Item[] | undefined {
	if (isBlank(rendered)) return undefined;
	if (rendered.startsWith('[{') && rendered.endsWith('}]')) return itemsFromJson(rendered);
	return itemsFromKeyValuePairs(rendered);
}
