import { Writable } from "stream";

import { Config } from "./config";
import { Connection, connect } from "./connection";
import { BasicLogger, getDefaultLogger } from "./logging";
import { OperatorInput } from "./operator_input";
import { CancelReason, Outcome, raceInterrupt } from "./outcome";

export const PROMPT = "Enter message to send (or 'exit' to quit): ";
export const EXIT_COMMAND = "exit";

export const Notices = {
	connected: (host: string, port: number) => `Connected to ${ host }:${ port }`,
	connectFailed: (message: string) => `Error connecting to server: ${ message }`,
	exiting: "Exiting...",
	interrupted: "Interrupted by user, closing connection.",
	inputClosed: "Input closed, closing connection.",
	sendFailed: (message: string) => `Error sending data: ${ message }`,
};

export type ClientState =
	"connecting"
	| "awaiting_input"
	| "sending"
	| "closed_normal"
	| "closed_error"
	| "closed_interrupted"
	| "connect_failed";

export type TerminalState = Extract<ClientState, "closed_normal" | "closed_error" | "closed_interrupted" | "connect_failed">;

const TRANSITIONS: { [S in ClientState]: ClientState[] } = {
	connecting: ["awaiting_input", "connect_failed", "closed_interrupted"],
	awaiting_input: ["sending", "closed_normal", "closed_interrupted"],
	sending: ["awaiting_input", "closed_error", "closed_interrupted"],
	closed_normal: [],
	closed_error: [],
	closed_interrupted: [],
	connect_failed: [],
};

export function isExitCommand(line: string): boolean {
	return line.trim().toLowerCase() === EXIT_COMMAND;
}

export type ConnectorLoopOptions = {
	config: Pick<Config, "host" | "port">;
	input: OperatorInput;
	output: Writable;
	signal?: AbortSignal;
	logger?: BasicLogger;
};

/**
 * Connects once, then forwards every operator line to the peer until
 * "exit", end of input, a failed send or an interrupt.
 */
export class ConnectorLoop {
	private readonly logger: BasicLogger;
	private current: ClientState = "connecting";

	constructor(private readonly options: ConnectorLoopOptions) {
		this.logger = options.logger || getDefaultLogger();
	}

	public get state(): ClientState {
		return this.current;
	}

	public async connect(): Promise<Outcome<Connection>> {
		const { host, port } = this.options.config;
		const outcome = await connect({ host, port }, this.options.signal, this.logger);

		switch (outcome.kind) {
			case "success":
				this.print(Notices.connected(host, port));
				this.transition("awaiting_input");
				break;
			case "failure":
				this.print(Notices.connectFailed(outcome.error.message));
				this.transition("connect_failed");
				break;
			case "cancelled":
				this.print(Notices.interrupted);
				this.transition("closed_interrupted");
				break;
		}

		return outcome;
	}

	public async runLoop(connection: Connection): Promise<TerminalState> {
		while (true) {
			const line = await raceInterrupt(this.options.input.nextLine(PROMPT), this.options.signal);
			if (line.kind !== "success") {
				return this.interrupted(connection, line.kind === "cancelled" ? line.reason : "end_of_input");
			}

			if (isExitCommand(line.value)) {
				this.print(Notices.exiting);
				await connection.close();
				return this.finish("closed_normal");
			}

			this.transition("sending");
			const sent = await raceInterrupt(connection.send(line.value), this.options.signal);
			switch (sent.kind) {
				case "success":
					this.transition("awaiting_input");
					break;
				case "failure":
					this.print(Notices.sendFailed(sent.error.message));
					connection.destroy();
					return this.finish("closed_error");
				case "cancelled":
					return this.interrupted(connection, sent.reason);
			}
		}
	}

	/**
	 * connect, then the loop. The operator input is closed whatever the ending.
	 */
	public async run(): Promise<TerminalState> {
		try {
			const connected = await this.connect();
			if (connected.kind !== "success") {
				return connected.kind === "failure" ? "connect_failed" : "closed_interrupted";
			}
			return await this.runLoop(connected.value);
		} finally {
			this.options.input.close();
		}
	}

	private interrupted(connection: Connection, reason: CancelReason): TerminalState {
		this.logger.info("loop interrupted", { reason });
		this.print(reason === "end_of_input" ? Notices.inputClosed : Notices.interrupted);
		connection.destroy();
		return this.finish("closed_interrupted");
	}

	private finish(state: TerminalState): TerminalState {
		this.transition(state);
		return state;
	}

	private transition(next: ClientState) {
		if (!TRANSITIONS[this.current].includes(next)) {
			throw new Error(`illegal state transition: ${ this.current } -> ${ next }`);
		}
		this.logger.debug("state transition", { from: this.current, to: next });
		this.current = next;
	}

	private print(message: string) {
		this.options.output.write(message + "\n");
	}
}
