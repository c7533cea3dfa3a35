import { isDate } from 'util/types';

export type Dictionary = { [index: string]: unknown };

export function isDictionary(value: unknown): value is Dictionary {
	return typeof value === 'object' && value !== null && !Array.isArray(value) && !isDate(value);
}

// pino writes time as epoch ms by default, as a string with stdTimeFunctions.isoTime
export function dateOrUndefinedAsDate(date: unknown): Date | undefined {
	if (isDate(date) && !isNaN(date.valueOf())) {
		return new Date(date);
	}
	if (typeof date === 'number' && Number.isFinite(date)) {
		return new Date(date);
	}
	if (typeof date === 'string' && !isNaN(Date.parse(date))) {
		return new Date(date);
	}
	return undefined;
}

export function delay(ms: number): Promise<string> {
	return new Promise((resolve) =>
		setTimeout(() => {
			resolve('ok');
		}, ms)
	);
}

export function isTest(): boolean {
	return process.env.JEST_WORKER_ID !== undefined;
}

export function isBlank(s: string | undefined | null): boolean {
	return s === undefined || s === null || s.trim().length === 0;
}

export function safeJsonParse(s: string): unknown {
	try {
		return JSON.parse(s);
	} catch (e) {
		return { unparseableJson: s };
	}
}
