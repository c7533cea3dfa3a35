export abstract class BaseError extends Error {
	// inherited from Error
	//   message: string
	//   name: string
	//   stack: string
	public readonly errorData: object;
	public code: string;

	constructor(messageOrErrorData: string | object, errorData?: object) {
		super(typeof messageOrErrorData === 'string' ? messageOrErrorData : JSON.stringify(messageOrErrorData));
		this.name = this.constructor.name;
		this.code = this.name.toLowerCase().endsWith('error') ? this.name.slice(0, this.name.length - 5) : this.name;
		this.errorData = typeof messageOrErrorData === 'object' ? messageOrErrorData : errorData || {};
	}
}
