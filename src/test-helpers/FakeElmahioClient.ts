import { EventEmitter } from 'events';
import { err, ok, Result } from '../common/core/Result';
import { SDKError } from '../common/infrastructure/InfrastructureErrors';
import { CreateBulkMessageResult, CreatedMessage, CreateMessage } from '../elmahio-client/ElmahioTypes';
import { IElmahioClient } from '../elmahio-client/IElmahioClient';

/**
 * In-process stand-in for the elmah.io API client. Emits the same notifications as ElmahioClient;
 * set `failWith` to make every call fail.
 */
export class FakeElmahioClient extends EventEmitter implements IElmahioClient {
	public failWith: SDKError | undefined;

	public readonly createAndNotify = jest.fn(
		async (logId: string, message: CreateMessage): Promise<Result<CreatedMessage, SDKError>> => {
			this.emit('message', message);
			if (this.failWith) {
				this.emit('messageFail', message, this.failWith);
				return err(this.failWith);
			}
			return ok({ location: `/v3/messages/${logId}/1`, statusCode: 201 });
		}
	);

	public readonly createBulkAndNotify = jest.fn(
		async (logId: string, messages: CreateMessage[]): Promise<Result<CreateBulkMessageResult[], SDKError>> => {
			messages.forEach((message) => this.emit('message', message));
			const failWith = this.failWith;
			if (failWith) {
				messages.forEach((message) => this.emit('messageFail', message, failWith));
				return err(failWith);
			}
			return ok(messages.map((_message, i) => ({ location: `/v3/messages/${logId}/${i + 1}`, statusCode: 201 })));
		}
	);

	// every message passed to either call, in order
	public get sentMessages(): CreateMessage[] {
		return [
			...this.createAndNotify.mock.calls.map((call) => call[1]),
			...this.createBulkAndNotify.mock.calls.flatMap((call) => call[1]),
		];
	}
}
