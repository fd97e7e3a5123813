import * as fs from "fs";
import "source-map-support/register";

import { path } from "./utils/path";
import { Address, isNothing, parseAddress, parsePort } from "./utils/utils";
import { causeMessage, InvalidConfigFile } from "./errors";

import { LogTarget } from "./logging";

export interface Config {
	host: string;
	port: number;
	loggers: LogTarget[];
}

export const DEFAULT_CONFIG: Readonly<Config> = {
	host: "localhost",
	port: 8080,
	loggers: [],
};

export type ConfigSources = {
	file?: string; // JSON file, see config/client.default.json
	env?: NodeJS.ProcessEnv;
	address?: string; // HOST:PORT given on the command line
};

type FileConfig = Partial<Config>;

function isObject(value: unknown): value is { [key: string]: unknown } {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readConfigFile(filePath: string): FileConfig {
	const fullPath = path(filePath);
	let parsed: unknown;
	try {
		parsed = JSON.parse(fs.readFileSync(fullPath, "utf8"));
	} catch (e) {
		throw InvalidConfigFile(fullPath, causeMessage(e));
	}

	if (!isObject(parsed)) {
		throw InvalidConfigFile(fullPath, "expected a JSON object");
	}

	const result: FileConfig = {};
	if (!isNothing(parsed.host)) {
		if (typeof parsed.host !== "string" || !parsed.host) {
			throw InvalidConfigFile(fullPath, "host must be a non empty string");
		}
		result.host = parsed.host;
	}
	if (!isNothing(parsed.port)) {
		if (typeof parsed.port !== "number" && typeof parsed.port !== "string") {
			throw InvalidConfigFile(fullPath, "port must be a number");
		}
		result.port = parsePort(parsed.port);
	}
	if (!isNothing(parsed.loggers)) {
		if (!Array.isArray(parsed.loggers) || !parsed.loggers.every(isLogTarget)) {
			throw InvalidConfigFile(fullPath, "loggers must be a list of log targets");
		}
		result.loggers = parsed.loggers;
	}

	return result;
}

function isLogTarget(value: unknown): value is LogTarget {
	return isObject(value) &&
		typeof value.name === "string" &&
		(value.type === "console" || (value.type === "file" && typeof value.file === "string" && value.file !== "")) &&
		typeof value.level === "string";
}

/**
 * Builds the client config, later sources win:
 * defaults < config file < env (APP_HOST, APP_PORT) < command line address.
 */
export function loadConfig(sources: ConfigSources = {}): Config {
	const env: NodeJS.ProcessEnv = sources.env || {};
	const config: Config = { ...DEFAULT_CONFIG, loggers: [...DEFAULT_CONFIG.loggers] };

	if (sources.file) {
		Object.assign(config, readConfigFile(sources.file));
	}

	config.host = env.APP_HOST || config.host;
	if (env.APP_PORT) {
		config.port = parsePort(env.APP_PORT);
	}

	if (sources.address) {
		const address: Address = parseAddress(sources.address);
		config.host = address.host;
		config.port = address.port;
	}

	return config;
}
