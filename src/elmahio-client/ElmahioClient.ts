import { EventEmitter } from 'events';
import { readFileSync } from 'node:fs';
import path from 'node:path';
import got, { Got } from 'got';
import { err, ok, Result } from '../common/core/Result';
import { SDKError } from '../common/infrastructure/InfrastructureErrors';
import { isDictionary } from '../common/utils/utils';
import { CreateBulkMessageResult, CreatedMessage, CreateMessage } from './ElmahioTypes';
import { IElmahioClient, MessageFailListener, MessageListener } from './IElmahioClient';

export const DEFAULT_BASE_URL = 'https://api.elmah.io';
export const DEFAULT_TIMEOUT_MS = 5000;

export interface ElmahioClientOptions {
	apiKey: string;
	baseUrl?: string;
	timeoutMs?: number;
	// replaces the got instance built from the options above
	http?: Got;
}

// src/ and dist/ are both one level below package.json
function readPackageVersion(): string {
	try {
		const packageJson: unknown = JSON.parse(readFileSync(path.join(__dirname, '..', '..', 'package.json'), 'utf8'));
		return isDictionary(packageJson) && typeof packageJson.version === 'string' ? packageJson.version : 'unknown';
	} catch (e) {
		return 'unknown';
	}
}

export const userAgent = `pino-elmahio/${readPackageVersion()}`;

export declare interface ElmahioClient {
	on(event: 'message', listener: MessageListener): this;
	on(event: 'messageFail', listener: MessageFailListener): this;
}

export class ElmahioClient extends EventEmitter implements IElmahioClient {
	private _http: Got;

	constructor(opts: ElmahioClientOptions) {
		super();
		const baseUrl = opts.baseUrl || DEFAULT_BASE_URL;
		this._http =
			opts.http ||
			got.extend({
				prefixUrl: baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`,
				timeout: opts.timeoutMs || DEFAULT_TIMEOUT_MS,
				retry: { limit: 0 },
				headers: { 'user-agent': userAgent },
				searchParams: { api_key: opts.apiKey },
			});
	}

	/**
	 * Sends one message. `message` listeners run before the request, so they can still change the message.
	 */
	public async createAndNotify(logId: string, message: CreateMessage): Promise<Result<CreatedMessage, SDKError>> {
		this.emit('message', message);

		try {
			const res = await this._http.post(`v3/messages/${encodeURIComponent(logId)}`, { json: message });
			return ok({ location: res.headers.location || '', statusCode: res.statusCode });
		} catch (e) {
			const error = this.toSdkError(e, logId, 1);
			this.emit('messageFail', message, error);
			return err(error);
		}
	}

	public async createBulkAndNotify(
		logId: string,
		messages: CreateMessage[]
	): Promise<Result<CreateBulkMessageResult[], SDKError>> {
		for (const message of messages) {
			this.emit('message', message);
		}

		try {
			const res = await this._http.post(`v3/messages/${encodeURIComponent(logId)}/_bulk`, {
				json: messages,
				responseType: 'json',
			});
			return ok(Array.isArray(res.body) ? res.body.filter(isBulkResult) : []);
		} catch (e) {
			const error = this.toSdkError(e, logId, messages.length);
			for (const message of messages) {
				this.emit('messageFail', message, error);
			}
			return err(error);
		}
	}

	private toSdkError(e: unknown, logId: string, messageCount: number): SDKError {
		const errorData: Record<string, unknown> = { logId, messageCount };
		if (!(e instanceof Error)) {
			return new SDKError(`elmah.io request failed | ${String(e)}`, errorData);
		}

		errorData.name = e.name;
		if ('code' in e && typeof e.code === 'string') errorData.code = e.code;
		if ('response' in e && isDictionary(e.response) && typeof e.response.statusCode === 'number') {
			errorData.statusCode = e.response.statusCode;
		}
		return new SDKError(e.message, errorData);
	}
}

function isBulkResult(value: unknown): value is CreateBulkMessageResult {
	return isDictionary(value) && typeof value.statusCode === 'number';
}
