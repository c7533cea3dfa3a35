import { Result } from '../common/core/Result';
import { SDKError } from '../common/infrastructure/InfrastructureErrors';
import { CreateBulkMessageResult, CreatedMessage, CreateMessage } from './ElmahioTypes';

export type MessageListener = (message: CreateMessage) => void;
export type MessageFailListener = (message: CreateMessage, error: SDKError) => void;

export interface IElmahioClient {
	createAndNotify(logId: string, message: CreateMessage): Promise<Result<CreatedMessage, SDKError>>;
	createBulkAndNotify(
		logId: string,
		messages: CreateMessage[]
	): Promise<Result<CreateBulkMessageResult[], SDKError>>;
	on(event: 'message', listener: MessageListener): this;
	on(event: 'messageFail', listener: MessageFailListener): this;
}
