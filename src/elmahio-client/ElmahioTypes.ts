export const SeverityValues = {
	Verbose: 'Verbose',
	Debug: 'Debug',
	Information: 'Information',
	Warning: 'Warning',
	Error: 'Error',
	Fatal: 'Fatal',
} as const;

export type SeverityType = (typeof SeverityValues)[keyof typeof SeverityValues];

export interface Item {
	key: string;
	value: string | null;
}

/**
 * Body of the elmah.io create message API; omitted fields are left to the API's defaults.
 */
export interface CreateMessage {
	title: string;
	titleTemplate?: string;
	severity?: SeverityType;
	dateTime?: string;
	detail?: string;
	source?: string;
	hostname?: string;
	application?: string;
	user?: string;
	method?: string;
	version?: string;
	url?: string;
	type?: string;
	statusCode?: number;
	data?: Item[];
	serverVariables?: Item[];
	cookies?: Item[];
	form?: Item[];
	queryString?: Item[];
}

export interface CreatedMessage {
	location: string;
	statusCode: number;
}

export interface CreateBulkMessageResult {
	location?: string;
	statusCode: number;
}
