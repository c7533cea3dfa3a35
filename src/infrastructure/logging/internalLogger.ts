import pino from 'pino';
import SonicBoom from 'sonic-boom';
import { isTest } from '../../common/utils/utils';

// stdout may be the pipe this transport is reading from in CLI mode, so diagnostics go to stderr
const stderr = new SonicBoom({ dest: 2, sync: false });

const pinoOptions = {
	name: 'pino-elmahio',
	level: process.env.ELMAHIO_INTERNAL_LOG_LEVEL || 'warn',
	timestamp: pino.stdTimeFunctions.isoTime,
};

if (isTest()) pinoOptions.level = 'fatal';

export const internalLogger = pino(pinoOptions, stderr);
