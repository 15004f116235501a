import { GatewayError, GatewayErrorKind } from "./errors.js";

function cancelled(): GatewayError {
  return new GatewayError(GatewayErrorKind.CANCELLED, "Operation cancelled");
}

/** Wait `ms`; rejects with CANCELLED as soon as `signal` aborts */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(cancelled());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(cancelled());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/** Join a base URL and a relative path with exactly one slash */
export function joinUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`;
}
