import { CreateMessage } from '../elmahio-client/ElmahioTypes';

export const layoutOptionNames = [
	'hostnameLayout',
	'cookieLayout',
	'formLayout',
	'queryStringLayout',
	'headersLayout',
	'sourceLayout',
	'applicationLayout',
	'userLayout',
	'methodLayout',
	'versionLayout',
	'urlLayout',
	'typeLayout',
	'statusCodeLayout',
] as const;

export type LayoutOptionName = (typeof layoutOptionNames)[number];

// well-known property names first (common casings), then what pino-http or the OS can tell us
export const defaultLayouts: Record<LayoutOptionName, string> = {
	hostnameLayout:
		'${event-properties:hostname:whenEmpty=${event-properties:Hostname:whenEmpty=${event-properties:HostName:whenEmpty=${request-host:whenEmpty=${machinename}}}}}',
	cookieLayout:
		'${event-properties:cookies:whenEmpty=${event-properties:Cookies:whenEmpty=${request-cookie:outputFormat=Json}}}',
	formLayout: '${event-properties:form:whenEmpty=${event-properties:Form:whenEmpty=${request-form:outputFormat=Json}}}',
	queryStringLayout:
		'${event-properties:querystring:whenEmpty=${event-properties:queryString:whenEmpty=${event-properties:QueryString:whenEmpty=${request-querystring:outputFormat=Json}}}}',
	headersLayout:
		'${event-properties:servervariables:whenEmpty=${event-properties:serverVariables:whenEmpty=${event-properties:ServerVariables:whenEmpty=${request-headers:outputFormat=Json}}}}',
	sourceLayout: '${event-properties:source:whenEmpty=${event-properties:Source:whenEmpty=${logger}}}',
	applicationLayout: '${event-properties:application:whenEmpty=${event-properties:Application}}',
	userLayout: '${event-properties:user:whenEmpty=${event-properties:User:whenEmpty=${environment-user}}}',
	methodLayout: '${event-properties:method:whenEmpty=${event-properties:Method:whenEmpty=${request-method}}}',
	versionLayout: '${event-properties:version:whenEmpty=${event-properties:Version}}',
	urlLayout:
		'${event-properties:url:whenEmpty=${event-properties:Url:whenEmpty=${event-properties:URL:whenEmpty=${request-url}}}}',
	typeLayout: '${event-properties:type:whenEmpty=${event-properties:Type}}',
	statusCodeLayout:
		'${event-properties:statuscode:whenEmpty=${event-properties:Statuscode:whenEmpty=${event-properties:statusCode:whenEmpty=${event-properties:StatusCode:whenEmpty=${response-statuscode}}}}}',
};

export const DEFAULT_BATCH_SIZE = 50;
export const DEFAULT_TASK_DELAY_MS = 250;
export const DEFAULT_QUEUE_LIMIT = 10000;

/**
 * Options for the elmah.io target. Everything except the three hooks is plain data, so the same
 * object works as `pino.transport({ target, options })` options. Hooks only take effect when the
 * transport runs in-process.
 *
 * Layout options are templates, e.g. `${event-properties:tenant:whenEmpty=${logger}}`.
 */
export interface ElmahioTargetOptions extends Partial<Record<LayoutOptionName, string>> {
	// templates rendered once, so `${environment:ELMAHIO_API_KEY}` works
	apiKey: string;
	logId: string;
	// used as applicationLayout when that isn't set
	application?: string;
	// title layout; the event message when not set
	layout?: string;
	includeEventProperties?: boolean;
	// extra data items added to every message: name -> layout
	properties?: Record<string, string>;
	messageKey?: string;
	errorKey?: string;
	batchSize?: number;
	taskDelayMs?: number;
	// events waiting to be sent beyond this are discarded
	queueLimit?: number;
	timeoutMs?: number;
	baseUrl?: string;
	// runs before a message is sent and may change it
	onMessage?: (message: CreateMessage) => void;
	onError?: (message: CreateMessage, error: Error) => void;
	// return true to drop the message
	onFilter?: (message: CreateMessage) => boolean;
}
