import { Guard } from '../common/core/Guard';
import { err, ok, Result } from '../common/core/Result';
import { InputError } from '../common/infrastructure/InfrastructureErrors';
import { dateOrUndefinedAsDate, Dictionary, isBlank, isDictionary } from '../common/utils/utils';
import { ElmahioClient } from '../elmahio-client/ElmahioClient';
import { CreateMessage, Item, SeverityType, SeverityValues } from '../elmahio-client/ElmahioTypes';
import { IElmahioClient } from '../elmahio-client/IElmahioClient';
import { internalLogger } from '../infrastructure/logging/internalLogger';
import { formatDataValue } from '../layout/formatValue';
import { Layout } from '../layout/Layout';
import { DEFAULT_LOG_EVENT_KEYS, LogEventInfo, LogEventKeys } from '../layout/LogEventInfo';
import {
	DEFAULT_BATCH_SIZE,
	DEFAULT_QUEUE_LIMIT,
	DEFAULT_TASK_DELAY_MS,
	defaultLayouts,
	ElmahioTargetOptions,
	LayoutOptionName,
	layoutOptionNames,
} from './ElmahioTargetOptions';
import { renderItems } from './renderItems';

interface ContextProperty {
	name: string;
	layout: Layout;
}

interface ElmahioTargetInit {
	logId: string;
	client: IElmahioClient;
	layouts: Map<LayoutOptionName, Layout>;
	titleLayout?: Layout;
	contextProperties: ContextProperty[];
	includeEventProperties: boolean;
	keys: LogEventKeys;
	batchSize: number;
	taskDelayMs: number;
	queueLimit: number;
	options: ElmahioTargetOptions;
}

function parseOptionLayout(text: string, optionName: string): Result<Layout, InputError> {
	const result = Layout.parse(text);
	if (result.isErr()) {
		return err(new InputError(`${optionName} | ${result.error.message}`, { ...result.error.errorData, optionName }));
	}
	return ok(result.value);
}

// api key and log id are templates rendered once, against an empty event
function renderOnce(text: string, optionName: string): Result<string, InputError> {
	const layoutResult = parseOptionLayout(text, optionName);
	if (layoutResult.isErr()) return err(layoutResult.error);
	return ok(layoutResult.value.render(LogEventInfo.createNullEvent()).trim());
}

function normalizeGuid(guid: string): string {
	const hex = guid.replace(/[{}-]/g, '').toLowerCase();
	return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
}

function checkInteger(value: number | undefined, min: number, optionName: string): Result<null, InputError> {
	if (value === undefined || (Number.isInteger(value) && value >= min)) return ok(null);
	return err(new InputError(`${optionName} must be an integer >= ${min}`, { optionName, value }));
}

function innermostError(error: Dictionary | undefined): Dictionary | undefined {
	let current = error;
	while (current && isDictionary(current.cause)) {
		current = current.cause;
	}
	return current;
}

function stringOrUndefined(value: unknown): string | undefined {
	return typeof value === 'string' && !isBlank(value) ? value : undefined;
}

function parseAbsoluteUrl(url: string): URL | undefined {
	try {
		return new URL(url);
	} catch (e) {
		return undefined;
	}
}

function isValidRelativeUrl(url: string): boolean {
	try {
		new URL(url, 'http://localhost');
		return true;
	} catch (e) {
		return false;
	}
}

/**
 * Absolute URLs are reduced to their path; relative ones are kept as written.
 */
export function toMessageUrl(url: string): string | undefined {
	if (isBlank(url)) return undefined;
	const absolute = parseAbsoluteUrl(url);
	if (absolute) return absolute.pathname;
	return isValidRelativeUrl(url) ? url : undefined;
}

export function toStatusCode(statusCode: string): number | undefined {
	if (!/^\s*[+-]?\d+\s*$/.test(statusCode)) return undefined;
	const value = parseInt(statusCode, 10);
	return value >= -2147483648 && value <= 2147483647 ? value : undefined;
}

export function levelToSeverity(event: LogEventInfo): SeverityType {
	switch (event.levelLabel) {
		case 'trace':
			return SeverityValues.Verbose;
		case 'debug':
			return SeverityValues.Debug;
		case 'warn':
		case 'warning':
			return SeverityValues.Warning;
		case 'error':
			return SeverityValues.Error;
		case 'fatal':
			return SeverityValues.Fatal;
		default:
			return SeverityValues.Information;
	}
}

/**
 * Maps pino log events to elmah.io messages and sends them, one API call per batch.
 */
export class ElmahioTarget {
	private readonly _logId: string;
	private readonly _client: IElmahioClient;
	private readonly _layouts: Map<LayoutOptionName, Layout>;
	private readonly _titleLayout?: Layout;
	private readonly _contextProperties: ContextProperty[];
	private readonly _includeEventProperties: boolean;
	private readonly _keys: LogEventKeys;
	private readonly _excludedDataKeys: Set<string>;
	private readonly _batchSize: number;
	private readonly _taskDelayMs: number;
	private readonly _queueLimit: number;
	private readonly _onFilter?: (message: CreateMessage) => boolean;

	private constructor(init: ElmahioTargetInit) {
		this._logId = init.logId;
		this._client = init.client;
		this._layouts = init.layouts;
		this._titleLayout = init.titleLayout;
		this._contextProperties = init.contextProperties;
		this._includeEventProperties = init.includeEventProperties;
		this._keys = init.keys;
		this._excludedDataKeys = new Set([init.keys.messageKey, init.keys.errorKey, 'level', 'time']);
		this._batchSize = init.batchSize;
		this._taskDelayMs = init.taskDelayMs;
		this._queueLimit = init.queueLimit;
		this._onFilter = init.options.onFilter;

		const { onMessage, onError } = init.options;
		this._client.on('message', (message) => {
			if (onMessage) onMessage(message);
		});
		this._client.on('messageFail', (message, error) => {
			internalLogger.error({ err: error, title: message.title }, `ElmahioTarget(logId=${this._logId}): Error - ${error.message}`);
			if (onError) onError(message, error);
		});
	}

	/**
	 * Validates options and parses every layout. When `client` is omitted, an `ElmahioClient` is built
	 * from `apiKey`, `baseUrl` and `timeoutMs`.
	 */
	public static create(options: ElmahioTargetOptions, client?: IElmahioClient): Result<ElmahioTarget, InputError> {
		const guardResult = Guard.againstNullOrUndefinedBulk([
			{ arg: options, argName: 'options' },
			{ arg: options?.apiKey, argName: 'apiKey' },
			{ arg: options?.logId, argName: 'logId' },
		]);
		if (guardResult.isErr()) return err(new InputError(guardResult.error.message, guardResult.error));

		const apiKeyResult = renderOnce(options.apiKey, 'apiKey');
		if (apiKeyResult.isErr()) return err(apiKeyResult.error);
		if (!apiKeyResult.value) return err(new InputError('apiKey is empty', { argName: 'apiKey' }));

		const logIdResult = renderOnce(options.logId, 'logId');
		if (logIdResult.isErr()) return err(logIdResult.error);
		const guidResult = Guard.isValidGuid(logIdResult.value, 'logId');
		if (guidResult.isErr()) return err(new InputError(guidResult.error.message, guidResult.error));

		for (const integerCheck of [
			checkInteger(options.batchSize, 1, 'batchSize'),
			checkInteger(options.taskDelayMs, 0, 'taskDelayMs'),
			checkInteger(options.queueLimit, 1, 'queueLimit'),
			checkInteger(options.timeoutMs, 1, 'timeoutMs'),
		]) {
			if (integerCheck.isErr()) return err(integerCheck.error);
		}

		const layouts = new Map<LayoutOptionName, Layout>();
		for (const name of layoutOptionNames) {
			const configured = name === 'applicationLayout' ? options[name] ?? options.application : options[name];
			const layoutResult = parseOptionLayout(configured ?? defaultLayouts[name], name);
			if (layoutResult.isErr()) return err(layoutResult.error);
			layouts.set(name, layoutResult.value);
		}

		let titleLayout: Layout | undefined;
		if (options.layout !== undefined) {
			const titleResult = parseOptionLayout(options.layout, 'layout');
			if (titleResult.isErr()) return err(titleResult.error);
			titleLayout = titleResult.value;
		}

		const contextProperties: ContextProperty[] = [];
		for (const [name, text] of Object.entries(options.properties || {})) {
			const propertyResult = parseOptionLayout(text, `properties.${name}`);
			if (propertyResult.isErr()) return err(propertyResult.error);
			contextProperties.push({ name, layout: propertyResult.value });
		}

		return ok(
			new ElmahioTarget({
				logId: normalizeGuid(logIdResult.value),
				client:
					client ||
					new ElmahioClient({ apiKey: apiKeyResult.value, baseUrl: options.baseUrl, timeoutMs: options.timeoutMs }),
				layouts,
				titleLayout,
				contextProperties,
				includeEventProperties: options.includeEventProperties ?? true,
				keys: {
					messageKey: options.messageKey || DEFAULT_LOG_EVENT_KEYS.messageKey,
					errorKey: options.errorKey || DEFAULT_LOG_EVENT_KEYS.errorKey,
				},
				batchSize: options.batchSize ?? DEFAULT_BATCH_SIZE,
				taskDelayMs: options.taskDelayMs ?? DEFAULT_TASK_DELAY_MS,
				queueLimit: options.queueLimit ?? DEFAULT_QUEUE_LIMIT,
				options,
			})
		);
	}

	public get logId(): string {
		return this._logId;
	}

	public get batchSize(): number {
		return this._batchSize;
	}

	public get taskDelayMs(): number {
		return this._taskDelayMs;
	}

	public get queueLimit(): number {
		return this._queueLimit;
	}

	public toLogEvent(properties: Dictionary): LogEventInfo {
		return new LogEventInfo(properties, this._keys);
	}

	public buildMessage(event: LogEventInfo): CreateMessage {
		const error = event.error;
		const title = this._titleLayout
			? this._titleLayout.render(event)
			: event.message || stringOrUndefined(error?.message) || '';

		return {
			title,
			titleTemplate: title,
			severity: levelToSeverity(event),
			dateTime: (dateOrUndefinedAsDate(event.time) ?? new Date()).toISOString(),
			detail: stringOrUndefined(error?.stack) ?? stringOrUndefined(error?.message),
			data: this.propertiesToData(event),
			source: this.source(event),
			hostname: this.renderField('hostnameLayout', event),
			application: this.renderField('applicationLayout', event),
			user: this.renderField('userLayout', event),
			method: this.renderField('methodLayout', event),
			version: this.renderField('versionLayout', event),
			url: toMessageUrl(this.renderRaw('urlLayout', event)),
			type: this.type(event),
			statusCode: toStatusCode(this.renderRaw('statusCodeLayout', event)),
			serverVariables: renderItems(this.renderRaw('headersLayout', event)),
			cookies: renderItems(this.renderRaw('cookieLayout', event)),
			form: renderItems(this.renderRaw('formLayout', event)),
			queryString: renderItems(this.renderRaw('queryStringLayout', event)),
		};
	}

	/**
	 * Sends a batch: one event uses the single message call, more use the bulk call. Failures are
	 * reported through `onError`, so this only rejects if a hook or the filter throws.
	 */
	public async write(events: LogEventInfo[]): Promise<void> {
		const messages: CreateMessage[] = [];
		for (const event of events) {
			const message = this.buildMessage(event);
			if (this._onFilter && this._onFilter(message)) continue;

			if (events.length === 1) {
				await this._client.createAndNotify(this._logId, message);
				return;
			}
			messages.push(message);
		}

		if (messages.length > 0) {
			await this._client.createBulkAndNotify(this._logId, messages);
		}
	}

	private renderRaw(name: LayoutOptionName, event: LogEventInfo): string {
		const layout = this._layouts.get(name);
		return layout ? layout.render(event) : '';
	}

	private renderField(name: LayoutOptionName, event: LogEventInfo): string | undefined {
		return stringOrUndefined(this.renderRaw(name, event));
	}

	private source(event: LogEventInfo): string | undefined {
		const source = this.renderField('sourceLayout', event);
		if (source) return source;
		const baseError = innermostError(event.error);
		if (!baseError) return event.loggerName;
		return stringOrUndefined(baseError.source);
	}

	private type(event: LogEventInfo): string | undefined {
		const type = this.renderField('typeLayout', event);
		if (type) return type;
		return stringOrUndefined(innermostError(event.error)?.type);
	}

	private propertiesToData(event: LogEventInfo): Item[] | undefined {
		if (!this._includeEventProperties && this._contextProperties.length === 0) return undefined;

		const items: Item[] = [];
		if (this._includeEventProperties) {
			for (const [key, value] of Object.entries(event.properties)) {
				if (this._excludedDataKeys.has(key) || value === null || value === undefined) continue;
				items.push({ key, value: formatDataValue(value) });
			}
		}
		for (const { name, layout } of this._contextProperties) {
			const value = layout.render(event);
			if (value !== '') items.push({ key: name, value });
		}
		return items;
	}
}
