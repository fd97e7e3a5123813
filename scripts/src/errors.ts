import { types } from "util";

export type ErrorReport = {
	code: number;
	error: string;
	message: string;
};

/**
 * Code additions (/postfix) to be added to the family code per error.
 * The concatenation is done in the ClientError ctor.
 */
const CODES = {
	Connection: {
		code: 10,
		types: {
			ConnectFailed: 1,
		}
	},
	Transmission: {
		code: 20,
		types: {
			SendFailed: 1,
			ConnectionClosed: 2,
		}
	},
	Config: {
		code: 30,
		types: {
			InvalidPort: 1,
			InvalidAddress: 2,
			InvalidConfigFile: 3,
		}
	},
};

export class ClientError extends Error {
	public readonly title: string;
	public readonly family: number;
	public readonly code: number; // our own internal codes

	constructor(family: number, index: number, title: string, message: string, cause?: Error) {
		super(message, cause ? { cause } : undefined);
		this.code = Number(family + "" + index);
		this.family = family;
		this.title = title;
	}

	public toJson(): ErrorReport {
		return {
			code: this.code,
			error: this.title,
			message: this.message
		};
	}

	public toString(): string {
		return JSON.stringify(this.toJson());
	}
}

export class ConnectionError extends ClientError {
	public target?: string; // HOST:PORT that was dialed
}

export class TransmissionError extends ClientError {
}

export class ConfigError extends ClientError {
}

/**
 * Errors from the net layer may come from another realm, so they are not
 * `instanceof Error` here.
 */
function isError(cause: unknown): cause is Error {
	return types.isNativeError(cause);
}

/**
 * Dialing a name with several addresses (e.g "localhost" on ::1 and 127.0.0.1)
 * fails with an AggregateError that has an empty message.
 */
export function causeMessage(cause: unknown): string {
	if (!isError(cause)) {
		return String(cause);
	}
	if (cause.message) {
		return cause.message;
	}
	const inner: string[] = "errors" in cause && Array.isArray(cause.errors) ? cause.errors.map(causeMessage).filter(Boolean) : [];
	if (inner.length) {
		return inner.join("; ");
	}
	return "code" in cause && typeof cause.code === "string" ? cause.code : cause.name;
}

function asError(cause: unknown): Error {
	return isError(cause) ? cause : new Error(String(cause));
}

function connectionError(key: keyof typeof CODES.Connection.types, message: string, cause?: unknown) {
	return new ConnectionError(CODES.Connection.code, CODES.Connection.types[key], "Connection Error", message, cause === undefined ? undefined : asError(cause));
}

export function ConnectFailed(host: string, port: number, cause: unknown) {
	const error = connectionError("ConnectFailed", causeMessage(cause), cause);
	error.target = `${ host }:${ port }`;
	return error;
}

function transmissionError(key: keyof typeof CODES.Transmission.types, message: string, cause?: unknown) {
	return new TransmissionError(CODES.Transmission.code, CODES.Transmission.types[key], "Transmission Error", message, cause === undefined ? undefined : asError(cause));
}

export function SendFailed(cause: unknown) {
	return transmissionError("SendFailed", causeMessage(cause), cause);
}

export function ConnectionClosed() {
	return transmissionError("ConnectionClosed", "connection closed by peer");
}

function configError(key: keyof typeof CODES.Config.types, message: string) {
	return new ConfigError(CODES.Config.code, CODES.Config.types[key], "Invalid Config", message);
}

export function InvalidPort(value: unknown) {
	return configError("InvalidPort", `Invalid port (expected an integer in 1-65535): ${ String(value) }`);
}

export function InvalidAddress(value: string) {
	return configError("InvalidAddress", `Invalid address (expected HOST:PORT): ${ value }`);
}

export function InvalidConfigFile(path: string, reason: string) {
	return configError("InvalidConfigFile", `Invalid config file ${ path }: ${ reason }`);
}
