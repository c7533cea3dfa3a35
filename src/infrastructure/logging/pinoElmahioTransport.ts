import { Transform } from 'stream';
import build from 'pino-abstract-transport';
import { isDictionary } from '../../common/utils/utils';
import { IElmahioClient } from '../../elmahio-client/IElmahioClient';
import { LogEventInfo } from '../../layout/LogEventInfo';
import { ElmahioTarget } from '../../target/ElmahioTarget';
import { ElmahioTargetOptions } from '../../target/ElmahioTargetOptions';
import { EventBatcher } from './EventBatcher';

export type PinoElmahioTransportOptions = ElmahioTargetOptions;

/**
 * pino transport entry point. Works as a `pino.transport()` target and as an in-process
 * destination: `pino({}, buildTransport({ apiKey, logId }))`.
 *
 * @throws InputError when the options are invalid
 */
export default function buildTransport(opts: PinoElmahioTransportOptions, client?: IElmahioClient): Transform {
	const targetResult = ElmahioTarget.create(opts, client);
	if (targetResult.isErr()) throw targetResult.error;
	const target = targetResult.value;

	const batcher = new EventBatcher<LogEventInfo>({
		name: `ElmahioTarget(logId=${target.logId})`,
		batchSize: target.batchSize,
		batchWaitMs: target.taskDelayMs,
		queueLimit: target.queueLimit,
		writeBatch: (events) => target.write(events),
	});

	return build(
		async function (source) {
			for await (const obj of source) {
				// pino-abstract-transport yields whatever JSON.parse returned for the line
				if (isDictionary(obj)) batcher.addEvent(target.toLogEvent(obj));
			}
		},
		{
			async close() {
				await batcher.close();
			},
		}
	);
}
