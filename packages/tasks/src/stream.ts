/**
 * Task event streaming for WebSocket clients and the CLI.
 */

import type { TaskManager } from "./task-manager.js";
import {
	isTerminal,
	isTerminalEvent,
	type SnapshotMessage,
	type StreamMessage,
	summarizeResult,
	type TaskInfo,
} from "./types.js";

export const DEFAULT_POLL_INTERVAL_MS = 250;

export interface StreamOptions {
	/** How long to wait for an event before re-checking the task state */
	pollIntervalMs?: number;
	/** Stops the reader; the task keeps running */
	signal?: AbortSignal;
}

export function buildSnapshot(info: TaskInfo): SnapshotMessage {
	return {
		type: "snapshot",
		taskId: info.taskId,
		status: info.status,
		progress: info.progress,
		results: info.results.map(summarizeResult),
	};
}

/**
 * A snapshot of the task, then its events in order until a terminal event.
 *
 * A task that has already finished yields its terminal event once, if no
 * earlier reader consumed it. An unknown task yields a single error message.
 */
export async function* streamTaskEvents(
	manager: TaskManager,
	taskId: string,
	options: StreamOptions = {},
): AsyncGenerator<StreamMessage> {
	const { pollIntervalMs = DEFAULT_POLL_INTERVAL_MS, signal } = options;
	const info = manager.getTask(taskId);
	const queue = manager.eventQueue(taskId);

	if (!info || !queue) {
		yield { type: "error", error: `Task '${taskId}' not found.` };
		return;
	}

	yield buildSnapshot(info);

	if (isTerminal(info.status)) {
		const terminal = queue.drain().find(isTerminalEvent);
		if (terminal) {
			yield terminal;
		}
		return;
	}

	while (!signal?.aborted) {
		const event = await queue.next(pollIntervalMs, signal);

		if (event === undefined) {
			const current = manager.getTask(taskId);
			if (!current || isTerminal(current.status)) {
				yield* queue.drain();
				return;
			}
			continue;
		}

		yield event;
		if (isTerminalEvent(event)) {
			return;
		}
	}
}
