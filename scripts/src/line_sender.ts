#!/usr/bin/env node
import { ArgumentParser } from "argparse";
import { Readable, Writable } from "stream";

import { Config, loadConfig } from "./config";
import { ClientError } from "./errors";
import { initLogger, setLogContext } from "./logging";
import { ConnectorLoop, TerminalState } from "./connector_loop";
import { OperatorInput } from "./operator_input";
import { formatAddress } from "./utils/utils";

const VERSION = "1.0.0";

type Args = {
	address?: string;
	config?: string;
};

export function initArgsParser(argv: string[] = process.argv.slice(2)): Args {
	const parser = new ArgumentParser({
		prog: "line-sender",
		add_help: true,
		description: "Connects to HOST:PORT over TCP and sends every line typed at the prompt, until 'exit'. " +
			"Ctrl-C closes the connection; so does the end of input (Ctrl-D or the end of a pipe).",
	});
	parser.add_argument("-v", "--version", { action: "version", version: VERSION });
	parser.add_argument("address", {
		nargs: "?",
		metavar: "HOST:PORT",
		help: "Server to connect to (default: localhost:8080, or APP_HOST / APP_PORT)",
	});
	parser.add_argument("-c", "--config", {
		help: "Location of a JSON config file (host, port, loggers)",
	});

	const parsed: { [key: string]: unknown } = parser.parse_args(argv);
	return {
		address: typeof parsed.address === "string" ? parsed.address : undefined,
		config: typeof parsed.config === "string" ? parsed.config : undefined,
	};
}

export type RunResult = TerminalState | "invalid_config";

export type ClientIO = {
	input: Readable;
	output: Writable;
	env: NodeJS.ProcessEnv;
	terminal: boolean; // line editing and Ctrl-C handled by readline
};

function processIO(): ClientIO {
	return {
		input: process.stdin,
		output: process.stdout,
		env: process.env,
		terminal: Boolean(process.stdin.isTTY && process.stdout.isTTY),
	};
}

export async function main(argv?: string[], io: ClientIO = processIO()): Promise<RunResult> {
	const args = initArgsParser(argv);

	let config: Config;
	try {
		config = loadConfig({ file: args.config, env: io.env, address: args.address });
	} catch (e) {
		if (e instanceof ClientError) {
			console.error(e.message);
			return "invalid_config";
		}
		throw e;
	}

	const logger = initLogger(...config.loggers);
	setLogContext({ target: formatAddress(config) });

	const interrupt = new AbortController();
	const onInterrupt = () => interrupt.abort();
	process.once("SIGINT", onInterrupt);

	const input = new OperatorInput({
		input: io.input,
		output: io.output,
		terminal: io.terminal,
		onInterrupt,
	});

	const loop = new ConnectorLoop({ config, input, output: io.output, signal: interrupt.signal, logger });
	try {
		const state = await loop.run();
		logger.debug("client finished", { state });
		return state;
	} finally {
		process.removeListener("SIGINT", onInterrupt);
	}
}

if (require.main === module) {
	main()
		.then(result => {
			if (result === "invalid_config") {
				process.exitCode = 1;
			}
		})
		.catch(error => {
			console.error(error);
			process.exitCode = 1;
		});
}
