import * as net from "net";
import { PassThrough, Writable } from "stream";

import { OperatorInput } from "../operator_input";
import { delay } from "../utils/utils";

export const LOCALHOST = "127.0.0.1";

export class PeerConnection {
	public readonly chunks: Buffer[] = [];
	public ended = false;
	public closed = false;

	constructor(public readonly socket: net.Socket) {
		socket.on("data", chunk => this.chunks.push(chunk));
		socket.on("end", () => this.ended = true);
		socket.on("close", () => this.closed = true);
		socket.on("error", () => this.closed = true);
	}

	public received(): Buffer {
		return Buffer.concat(this.chunks);
	}
}

/**
 * In process TCP listener on an ephemeral port, records everything it receives.
 */
export class Peer {
	public readonly connections: PeerConnection[] = [];
	private readonly server: net.Server;

	private constructor() {
		this.server = net.createServer(socket => this.connections.push(new PeerConnection(socket)));
	}

	public static async start(): Promise<Peer> {
		const peer = new Peer();
		await new Promise<void>((resolve, reject) => {
			peer.server.once("error", reject);
			peer.server.listen(0, LOCALHOST, () => resolve());
		});
		return peer;
	}

	public get port(): number {
		const address = this.server.address();
		if (!address || typeof address === "string") {
			throw new Error("peer is not listening");
		}
		return address.port;
	}

	public async connection(): Promise<PeerConnection> {
		await waitFor(() => this.connections.length > 0);
		return this.connections[0];
	}

	public close(): Promise<void> {
		this.connections.forEach(connection => connection.socket.destroy());
		return new Promise<void>(resolve => this.server.close(() => resolve()));
	}
}

// a port nothing listens on: bind to an ephemeral port, then release it
export async function unusedPort(): Promise<number> {
	const peer = await Peer.start();
	const port = peer.port;
	await peer.close();
	return port;
}

export class OutputCapture extends Writable {
	private readonly chunks: string[] = [];

	public _write(chunk: Buffer | string, encoding: BufferEncoding, callback: (error?: Error | null) => void) {
		this.chunks.push(chunk.toString());
		callback();
	}

	public get text(): string {
		return this.chunks.join("");
	}
}

export function operatorInput(output: Writable, ...lines: string[]) {
	const stream = new PassThrough();
	if (lines.length) {
		stream.write(lines.map(line => line + "\n").join(""));
	}
	return { stream, input: new OperatorInput({ input: stream, output }) };
}

export async function waitFor(predicate: () => boolean, timeout = 2000) {
	const started = Date.now();
	while (!predicate()) {
		if (Date.now() - started > timeout) {
			throw new Error("timed out waiting for condition");
		}
		await delay(5);
	}
}
