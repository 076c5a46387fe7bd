import type { FetchLike } from "../credential.js";
import { DispatchCancelledError } from "../errors.js";
import type { Scheduler } from "../scheduler.js";

export const T0 = 1_700_000_000_000;

export interface FakeScheduler extends Scheduler {
	sleeps: number[];
	/** Runs after each sleep has advanced the clock */
	onSleep?: () => void;
}

/** Clock that jumps forward instead of waiting */
export function fakeScheduler(start = T0): FakeScheduler {
	let now = start;
	const scheduler: FakeScheduler = {
		sleeps: [],
		now: () => now,
		async sleep(ms, signal) {
			scheduler.sleeps.push(ms);
			now += ms;
			scheduler.onSleep?.();
			if (signal?.aborted) throw new DispatchCancelledError(signal.reason);
		}
	};
	return scheduler;
}

export interface RecordedCall {
	url: string;
	token: string | null;
	accept: string | null;
}

export type Route = (url: URL, call: RecordedCall) => Response | Promise<Response>;

export interface FakeFetch {
	fetch: FetchLike;
	calls: RecordedCall[];
}

export function fakeFetch(route: Route): FakeFetch {
	const calls: RecordedCall[] = [];
	const fetch: FetchLike = async (input, init) => {
		const headers = new Headers(init.headers);
		const call: RecordedCall = {
			url: input,
			token: headers.get("authorization"),
			accept: headers.get("accept")
		};
		calls.push(call);
		return route(new URL(input), call);
	};
	return { fetch, calls };
}

/** Answers each call with the next response in line */
export function sequence(...responses: Array<() => Response>): Route {
	let i = 0;
	return () => {
		const next = responses[Math.min(i, responses.length - 1)];
		i++;
		return next();
	};
}

export function json(
	body: unknown,
	init: { status?: number; headers?: Record<string, string> } = {}
): Response {
	return new Response(JSON.stringify(body), {
		status: init.status ?? 200,
		headers: { "content-type": "application/json; charset=utf-8", ...init.headers }
	});
}

export function status(code: number, headers: Record<string, string> = {}): Response {
	return json({ message: `status ${code}` }, { status: code, headers });
}

/** Headers arrive at once; the body sends a fragment and never finishes */
export function stalledBody(): Response {
	const stream = new ReadableStream<Uint8Array>({
		start(controller) {
			controller.enqueue(new TextEncoder().encode("[1"));
		}
	});
	return new Response(stream, {
		status: 200,
		headers: { "content-type": "application/json" }
	});
}
