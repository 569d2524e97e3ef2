// ---------------------------------------------------------------------------
// Message sinks: where SCHEMA / RECORD / STATE messages are written
// ---------------------------------------------------------------------------

import { once } from "node:events";
import type { Writable } from "node:stream";
import stableStringify from "fast-json-stable-stringify";
import type { Message } from "./types";

/**
 * Ordered output channel for interchange messages.
 *
 * Callers await each write, so a slow consumer naturally pauses the
 * producing stream instead of letting pages pile up in memory.
 */
export interface MessageSink {
	write(message: Message): Promise<void>;
}

/**
 * Serialise a message as a single line of JSON.
 *
 * Keys are sorted, so identical rows always produce identical bytes.
 */
export function serializeMessage(message: Message): string {
	return stableStringify(message);
}

/** Writes newline-delimited JSON to a Node writable (stdout by default). */
export class WritableMessageSink implements MessageSink {
	private readonly out: Writable;

	constructor(out: Writable = process.stdout) {
		this.out = out;
	}

	async write(message: Message): Promise<void> {
		const flushed = this.out.write(`${serializeMessage(message)}\n`);
		if (!flushed) {
			await once(this.out, "drain");
		}
	}
}

/**
 * A sink that forwards every message to a user-supplied callback.
 * Useful for tests and for embedding the connector in another process.
 */
export class CallbackMessageSink implements MessageSink {
	private readonly onMessage: (message: Message) => void | Promise<void>;

	constructor(onMessage: (message: Message) => void | Promise<void>) {
		this.onMessage = onMessage;
	}

	async write(message: Message): Promise<void> {
		await this.onMessage(message);
	}
}
