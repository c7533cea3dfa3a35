#!/usr/bin/env node
import dotenv from 'dotenv';
import pump from 'pump';
import buildTransport from './pinoElmahioTransport';
import { internalLogger } from './internalLogger';
import { getTransportOptionsFromEnv } from './transportConfig';

// usage: node app.js | pino-elmahio
dotenv.config({ path: process.env.ELMAHIO_ENV_FILE || '.env' });

const optsResult = getTransportOptionsFromEnv(process.env);
if (optsResult.isErr()) throw optsResult.error;

const transport = buildTransport(optsResult.value);
pump(process.stdin, transport, (err?: Error) => {
	if (err) internalLogger.error({ err }, 'pino-elmahio: input stream failed');
});
