interface IResult<OkType, ErrType> {
	/**
	 * @returns `true` if the `Result` is an `Ok`
	 *
	 * @example `if (result.isOk()) { send(result.value); }`
	 */
	isOk(): this is Ok<OkType, ErrType>;

	/**
	 * @returns `true` if the `Result` is an `Err`
	 *
	 * @example `if (result.isErr()) { throw result.error; }`
	 */
	isErr(): this is Err<OkType, ErrType>;
}

export class Ok<OkType, ErrType> implements IResult<OkType, ErrType> {
	constructor(readonly value: OkType) {}

	isOk(): this is Ok<OkType, ErrType> {
		return true;
	}

	isErr(): this is Err<OkType, ErrType> {
		return false;
	}
}

export class Err<OkType, ErrType> implements IResult<OkType, ErrType> {
	constructor(readonly error: ErrType) {}

	isOk(): this is Ok<OkType, ErrType> {
		return false;
	}

	isErr(): this is Err<OkType, ErrType> {
		return true;
	}
}

export type Result<OkType, ErrType> = Ok<OkType, ErrType> | Err<OkType, ErrType>;

export const ok = <OkType, ErrType = never>(value: OkType): Ok<OkType, ErrType> => new Ok(value);

export const err = <OkType = never, ErrType = unknown>(error: ErrType): Err<OkType, ErrType> => new Err(error);
