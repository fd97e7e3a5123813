import { InvalidAddress, InvalidPort } from "../errors";

export type Nothing = null | undefined;

export function isNothing(obj: unknown): obj is Nothing {
	return obj === null || obj === undefined;
}

export type Address = {
	host: string;
	port: number;
};

const ADDRESS_PATTERN = /^([\w.-]+):(\d{1,5})$/;

export function isValidPort(port: unknown): port is number {
	return typeof port === "number" && Number.isInteger(port) && port >= 1 && port <= 65535;
}

export function parsePort(value: string | number): number {
	const port = typeof value === "number" ? value : Number(value);
	if (value === "" || !isValidPort(port)) {
		throw InvalidPort(value);
	}
	return port;
}

// "HOST:PORT", e.g "localhost:8080" or "10.0.0.7:9000"
export function parseAddress(value: string): Address {
	const match = ADDRESS_PATTERN.exec(value.trim());
	if (!match) {
		throw InvalidAddress(value);
	}
	const [, host, port] = match;
	return { host, port: parsePort(port) };
}

export function formatAddress(address: Address): string {
	return `${ address.host }:${ address.port }`;
}

export function delay(ms: number) {
	return new Promise<void>(resolve => setTimeout(resolve, ms));
}
