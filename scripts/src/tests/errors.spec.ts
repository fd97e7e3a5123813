import * as vm from "vm";

import {
	causeMessage,
	ClientError,
	ConfigError,
	ConnectFailed,
	ConnectionClosed,
	ConnectionError,
	InvalidAddress,
	InvalidConfigFile,
	InvalidPort,
	SendFailed,
	TransmissionError
} from "../errors";

describe("errors", () => {
	test("connection errors carry the dialed target and the cause", () => {
		const cause = new Error("connect ECONNREFUSED 127.0.0.1:8080");
		const error = ConnectFailed("127.0.0.1", 8080, cause);

		expect(error).toBeInstanceOf(ConnectionError);
		expect(error).toBeInstanceOf(ClientError);
		expect(error.code).toBe(101);
		expect(error.family).toBe(10);
		expect(error.target).toBe("127.0.0.1:8080");
		expect(error.cause).toBe(cause);
		expect(error.message).toBe("connect ECONNREFUSED 127.0.0.1:8080");
	});

	test("transmission errors", () => {
		const sendFailed = SendFailed(new Error("write EPIPE"));
		expect(sendFailed).toBeInstanceOf(TransmissionError);
		expect(sendFailed.code).toBe(201);
		expect(sendFailed.message).toBe("write EPIPE");

		const closed = ConnectionClosed();
		expect(closed.code).toBe(202);
		expect(closed.cause).toBeUndefined();
	});

	test("config errors", () => {
		expect(InvalidPort("x")).toBeInstanceOf(ConfigError);
		expect(InvalidPort("x").code).toBe(301);
		expect(InvalidAddress("x").code).toBe(302);
		expect(InvalidConfigFile("/etc/client.json", "bad").message).toBe("Invalid config file /etc/client.json: bad");
	});

	test("toJson and toString", () => {
		const error = ConnectionClosed();
		expect(error.toJson()).toEqual({ code: 202, error: "Transmission Error", message: "connection closed by peer" });
		expect(error.toString()).toBe('{"code":202,"error":"Transmission Error","message":"connection closed by peer"}');
	});

	describe("causeMessage", () => {
		test("uses the error message", () => {
			expect(causeMessage(new Error("connect ETIMEDOUT"))).toBe("connect ETIMEDOUT");
			expect(causeMessage("plain")).toBe("plain");
		});

		test("joins the inner errors of an aggregate error without a message", () => {
			const aggregate = new AggregateError([
				new Error("connect ECONNREFUSED ::1:8080"),
				new Error("connect ECONNREFUSED 127.0.0.1:8080")
			], "");

			expect(causeMessage(aggregate)).toBe("connect ECONNREFUSED ::1:8080; connect ECONNREFUSED 127.0.0.1:8080");
		});

		test("reads errors created in another realm", () => {
			const cause: unknown = vm.runInNewContext("new Error('connect ECONNREFUSED 127.0.0.1:8080')");

			expect(causeMessage(cause)).toBe("connect ECONNREFUSED 127.0.0.1:8080");
			const error = ConnectFailed("127.0.0.1", 8080, cause);
			expect(error.message).toBe("connect ECONNREFUSED 127.0.0.1:8080");
			expect(error.cause).toBe(cause);
		});

		test("falls back to the error code", () => {
			const error = Object.assign(new Error(""), { code: "ECONNRESET" });
			expect(causeMessage(error)).toBe("ECONNRESET");
		});
	});
});
