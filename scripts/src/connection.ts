import * as net from "net";

import { BasicLogger, getDefaultLogger } from "./logging";
import { ConnectFailed, ConnectionClosed, SendFailed } from "./errors";
import { Address, formatAddress } from "./utils/utils";
import { cancelled, failure, Outcome, success } from "./outcome";

export const ENCODING = "utf8";

/**
 * The single, exclusively owned socket of the client.
 * Only ever written to; whatever the peer sends is drained and dropped.
 */
export class Connection {
	private released = false;
	private peerClosed = false;
	private lastError?: Error;

	constructor(private readonly socket: net.Socket,
				public readonly host: string,
				public readonly port: number,
				private readonly logger: BasicLogger = getDefaultLogger()) {
		socket.on("error", error => {
			this.lastError = error;
			logger.warn("socket error", { error: error.message, target: this.target });
		});
		socket.on("end", () => {
			this.peerClosed = true;
			logger.debug("peer ended the connection", { target: this.target });
		});
		socket.on("close", () => {
			this.peerClosed = this.peerClosed || !this.released;
			logger.debug("socket closed", { target: this.target });
		});
		socket.resume();
	}

	public get target(): string {
		return formatAddress(this);
	}

	public get isOpen(): boolean {
		return !this.released && !this.peerClosed && !this.socket.destroyed && this.socket.writable;
	}

	/**
	 * Writes exactly the UTF-8 bytes of the text, no terminator added.
	 * Resolves once the whole buffer was handed to the OS or the write failed.
	 */
	public send(text: string): Promise<Outcome<number>> {
		if (this.lastError) {
			return Promise.resolve(failure(SendFailed(this.lastError)));
		}
		if (!this.isOpen) {
			return Promise.resolve(failure(ConnectionClosed()));
		}

		const data = Buffer.from(text, ENCODING);
		return new Promise<Outcome<number>>(resolve => {
			this.socket.write(data, error => {
				if (error) {
					this.lastError = error;
					resolve(failure(SendFailed(error)));
				} else {
					this.logger.debug("sent message", { bytes: data.length, target: this.target });
					resolve(success(data.length));
				}
			});
		});
	}

	/**
	 * Graceful close: flushes pending bytes, sends FIN and releases the socket.
	 */
	public close(): Promise<void> {
		if (this.released) {
			return Promise.resolve();
		}
		this.released = true;

		return new Promise<void>(resolve => {
			if (this.socket.destroyed) {
				resolve();
				return;
			}
			this.socket.once("close", () => resolve());
			this.socket.end(() => this.socket.destroy());
		});
	}

	/**
	 * Immediate release, used on the error and interrupt paths.
	 */
	public destroy(): void {
		this.released = true;
		if (!this.socket.destroyed) {
			this.socket.destroy();
		}
	}
}

/**
 * Opens the TCP connection. Never throws for network errors: they come back as a failure.
 * An interrupt while connecting destroys the half open socket.
 */
export function connect(address: Address, signal?: AbortSignal, logger: BasicLogger = getDefaultLogger()): Promise<Outcome<Connection>> {
	if (signal && signal.aborted) {
		return Promise.resolve(cancelled("interrupt"));
	}

	return new Promise<Outcome<Connection>>(resolve => {
		const target = formatAddress(address);
		const socket = net.connect({ host: address.host, port: address.port });

		const settle = (outcome: Outcome<Connection>) => {
			socket.removeListener("error", onError);
			socket.removeListener("connect", onConnect);
			if (signal) {
				signal.removeEventListener("abort", onAbort);
			}
			resolve(outcome);
		};
		const onError = (error: Error) => {
			socket.destroy();
			logger.error("failed to connect", { error: error.message, target });
			settle(failure(ConnectFailed(address.host, address.port, error)));
		};
		const onConnect = () => {
			logger.info("connected", { target });
			settle(success(new Connection(socket, address.host, address.port, logger)));
		};
		const onAbort = () => {
			socket.destroy();
			logger.info("interrupted while connecting", { target });
			settle(cancelled("interrupt"));
		};

		socket.once("error", onError);
		socket.once("connect", onConnect);
		if (signal) {
			signal.addEventListener("abort", onAbort, { once: true });
		}
	});
}
