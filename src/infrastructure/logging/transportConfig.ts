import { Guard, IGuardError } from '../../common/core/Guard';
import { err, ok, Result } from '../../common/core/Result';
import { EnvironmentError } from '../../common/infrastructure/InfrastructureErrors';
import { isBlank } from '../../common/utils/utils';
import { PinoElmahioTransportOptions } from './pinoElmahioTransport';

type EnvLike = Record<string, string | undefined>;

const integerEnv = {
	ELMAHIO_BATCH_SIZE: 'batchSize',
	ELMAHIO_TASK_DELAY_MS: 'taskDelayMs',
	ELMAHIO_TIMEOUT_MS: 'timeoutMs',
	ELMAHIO_QUEUE_LIMIT: 'queueLimit',
} as const;

/**
 * Transport options for the CLI, read from the environment.
 */
export function getTransportOptionsFromEnv(env: EnvLike): Result<PinoElmahioTransportOptions, EnvironmentError> {
	for (const envName of ['ELMAHIO_API_KEY', 'ELMAHIO_LOG_ID']) {
		if (isBlank(env[envName])) {
			return err(new EnvironmentError({ message: 'Invalid environment value', env: envName }));
		}
	}

	const opts: PinoElmahioTransportOptions = {
		apiKey: env.ELMAHIO_API_KEY || '',
		logId: env.ELMAHIO_LOG_ID || '',
	};
	if (!isBlank(env.ELMAHIO_APPLICATION)) opts.application = env.ELMAHIO_APPLICATION;
	if (!isBlank(env.ELMAHIO_BASE_URL)) opts.baseUrl = env.ELMAHIO_BASE_URL;

	for (const [envName, optionName] of Object.entries(integerEnv)) {
		const value = env[envName];
		if (isBlank(value)) continue;

		// taskDelayMs may be 0
		const checkResult: Result<null, IGuardError> =
			optionName === 'taskDelayMs' && value?.trim() === '0' ? ok(null) : Guard.isPositiveInteger(value, envName);
		if (checkResult.isErr()) {
			return err(new EnvironmentError({ message: 'Invalid environment value', env: envName, value }));
		}
		opts[optionName] = parseInt(value || '', 10);
	}

	return ok(opts);
}
