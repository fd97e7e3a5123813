import * as readline from "readline";
import { Readable, Writable } from "stream";

import { cancelled, Outcome, success } from "./outcome";

export type OperatorInputOptions = {
	input: Readable;
	output: Writable;
	terminal?: boolean;
	onInterrupt?: () => void; // Ctrl-C while reading from a TTY
};

type Waiter = (outcome: Outcome<string>) => void;

/**
 * Line source for the operator. Lines that arrive before they are asked for
 * are queued, so piped input is never lost between prompts.
 */
export class OperatorInput {
	private readonly lines: string[] = [];
	private readonly waiters: Waiter[] = [];
	private readonly rl: readline.Interface;
	private readonly output: Writable;
	private ended = false;

	constructor(options: OperatorInputOptions) {
		this.output = options.output;
		this.rl = readline.createInterface({
			input: options.input,
			output: options.output,
			terminal: options.terminal === undefined ? false : options.terminal,
		});

		this.rl.on("line", line => this.push(line));
		this.rl.on("close", () => this.end());
		this.rl.on("SIGINT", () => {
			if (options.onInterrupt) {
				options.onInterrupt();
			}
		});
	}

	public get isClosed(): boolean {
		return this.ended;
	}

	/**
	 * Shows the prompt and waits for the next line.
	 * Ends as cancelled("end_of_input") once the input stream is closed.
	 */
	public nextLine(prompt: string): Promise<Outcome<string>> {
		const queued = this.lines.shift();
		this.showPrompt(prompt);
		if (queued !== undefined) {
			return Promise.resolve(success(queued));
		}
		if (this.ended) {
			return Promise.resolve(cancelled("end_of_input"));
		}

		return new Promise<Outcome<string>>(resolve => this.waiters.push(resolve));
	}

	public close(): void {
		if (!this.ended) {
			this.rl.close();
		}
	}

	private showPrompt(prompt: string) {
		if (this.ended) {
			this.output.write(prompt);
			return;
		}
		this.rl.setPrompt(prompt);
		this.rl.prompt();
	}

	private push(line: string) {
		const waiter = this.waiters.shift();
		if (waiter) {
			waiter(success(line));
		} else {
			this.lines.push(line);
		}
	}

	private end() {
		this.ended = true;
		let waiter = this.waiters.shift();
		while (waiter) {
			waiter(cancelled("end_of_input"));
			waiter = this.waiters.shift();
		}
	}
}
