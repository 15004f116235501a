import { type Mock, vi } from "vitest";
import type { FetchLike } from "../../src/transport/types.js";

export interface CannedResponse {
  status?: number;
  /** Serialized with JSON.stringify unless it is already a string */
  body?: unknown;
  headers?: Record<string, string>;
}

/** A canned response, a thrown error, or a custom handler */
export type FetchStep = CannedResponse | Error | ((url: string, init: RequestInit) => Promise<Response>);

export interface RecordedCall {
  url: string;
  method: string;
  body: string | undefined;
}

export interface FakeFetch {
  fetch: Mock<FetchLike>;
  calls: RecordedCall[];
  enqueue(...steps: FetchStep[]): void;
}

export function jsonResponse(step: CannedResponse): Response {
  const body = typeof step.body === "string" ? step.body : JSON.stringify(step.body ?? {});
  const status = step.status ?? 200;
  const init: ResponseInit = step.headers ? { status, headers: step.headers } : { status };
  return new Response(body, init);
}

/** Gateway success envelope */
export function ok(data: unknown): CannedResponse {
  return { status: 200, body: { data, error: "", code: "successful" } };
}

/** Gateway error envelope */
export function fail(status: number, error: string, code?: string): CannedResponse {
  return { status, body: code === undefined ? { error } : { error, code } };
}

/** What undici throws when a socket cannot be opened */
export function connectionError(code = "ECONNREFUSED"): Error {
  const cause = Object.assign(new Error(`connect ${code} 127.0.0.1:8085`), { code });
  return new TypeError("fetch failed", { cause });
}

/** In-process stand-in for fetch: answers calls from a queue of steps, in order */
export function createFakeFetch(...initial: FetchStep[]): FakeFetch {
  const queue: FetchStep[] = [...initial];
  const calls: RecordedCall[] = [];

  const fetch = vi.fn(async (url: string, init: RequestInit): Promise<Response> => {
    calls.push({
      url,
      method: init.method ?? "GET",
      body: typeof init.body === "string" ? init.body : undefined,
    });
    const step = queue.shift();
    if (step === undefined) throw new Error(`Unexpected request: ${init.method ?? "GET"} ${url}`);
    if (step instanceof Error) throw step;
    if (typeof step === "function") return step(url, init);
    return jsonResponse(step);
  });

  return {
    fetch,
    calls,
    enqueue: (...steps) => {
      queue.push(...steps);
    },
  };
}
