import { Dictionary, isDictionary } from '../common/utils/utils';

export interface LogEventKeys {
	messageKey: string;
	errorKey: string;
}

export const DEFAULT_LOG_EVENT_KEYS: LogEventKeys = { messageKey: 'msg', errorKey: 'err' };

const pinoLevelLabels = new Map([
	[10, 'trace'],
	[20, 'debug'],
	[30, 'info'],
	[40, 'warn'],
	[50, 'error'],
	[60, 'fatal'],
]);

/**
 * One parsed pino log line plus the keys pino was configured with.
 */
export class LogEventInfo {
	public readonly properties: Dictionary;
	public readonly keys: LogEventKeys;

	constructor(properties: Dictionary, keys: LogEventKeys = DEFAULT_LOG_EVENT_KEYS) {
		this.properties = properties;
		this.keys = keys;
	}

	// used to render options (api key, log id) that don't depend on an event
	public static createNullEvent(): LogEventInfo {
		return new LogEventInfo({});
	}

	public get loggerName(): string | undefined {
		return typeof this.properties.name === 'string' ? this.properties.name : undefined;
	}

	public get level(): number | string | undefined {
		const level = this.properties.level;
		return typeof level === 'number' || typeof level === 'string' ? level : undefined;
	}

	/**
	 * Level label whether pino wrote the number (default) or the label (`formatters.level`).
	 * Custom numeric levels come back as the number.
	 */
	public get levelLabel(): string {
		const level = this.level;
		if (typeof level === 'string') return level.toLowerCase();
		if (level === undefined) return '';
		return pinoLevelLabels.get(level) || String(level);
	}

	public get message(): string | undefined {
		const message = this.properties[this.keys.messageKey];
		return typeof message === 'string' ? message : undefined;
	}

	public get error(): Dictionary | undefined {
		const error = this.properties[this.keys.errorKey];
		return isDictionary(error) ? error : undefined;
	}

	public get time(): unknown {
		return this.properties.time;
	}

	// pino-http / pino.stdSerializers.req shape: { method, url, query, headers, ... }
	public get request(): Dictionary | undefined {
		return isDictionary(this.properties.req) ? this.properties.req : undefined;
	}

	public get response(): Dictionary | undefined {
		return isDictionary(this.properties.res) ? this.properties.res : undefined;
	}
}
