import buildTransport from './infrastructure/logging/pinoElmahioTransport';

export default buildTransport;
export { buildTransport };
export type { PinoElmahioTransportOptions } from './infrastructure/logging/pinoElmahioTransport';
export { getTransportOptionsFromEnv } from './infrastructure/logging/transportConfig';
export { EventBatcher } from './infrastructure/logging/EventBatcher';
export type { EventBatcherOptions } from './infrastructure/logging/EventBatcher';
export { ElmahioTarget, levelToSeverity } from './target/ElmahioTarget';
export { defaultLayouts } from './target/ElmahioTargetOptions';
export type { ElmahioTargetOptions, LayoutOptionName } from './target/ElmahioTargetOptions';
export { renderItems } from './target/renderItems';
export { Layout } from './layout/Layout';
export { LogEventInfo } from './layout/LogEventInfo';
export { ElmahioClient } from './elmahio-client/ElmahioClient';
export type { ElmahioClientOptions } from './elmahio-client/ElmahioClient';
export type { IElmahioClient } from './elmahio-client/IElmahioClient';
export { SeverityValues } from './elmahio-client/ElmahioTypes';
export type { CreateMessage, Item, SeverityType } from './elmahio-client/ElmahioTypes';
export { InputError, EnvironmentError, SDKError } from './common/infrastructure/InfrastructureErrors';
