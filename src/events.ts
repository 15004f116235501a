import { EventEmitter } from "node:events";
import type { GatewayError } from "./errors.js";
import type { HttpMethod } from "./transport/types.js";

/** Lifecycle events emitted by the proxy, poller and simulator adapter */
export enum GatewayEvent {
  REQUEST = "request",
  RESPONSE = "response",
  RETRYING = "retrying",
  SENT = "sent",
  POLLING = "polling",
  FINALIZED = "finalized",
  BLOCKS_GENERATED = "blocks_generated",
}

export interface GatewayEventMap {
  [GatewayEvent.REQUEST]: { method: HttpMethod; path: string; attempt: number };
  [GatewayEvent.RESPONSE]: { method: HttpMethod; path: string; status: number; latencyMs: number };
  [GatewayEvent.RETRYING]: { operation: string; attempt: number; maxAttempts: number; error: GatewayError; delayMs: number };
  [GatewayEvent.SENT]: { hash: string; sender: string };
  [GatewayEvent.POLLING]: { hash: string; attempt: number; status: string };
  [GatewayEvent.FINALIZED]: { hash: string; state: string; attempts: number };
  [GatewayEvent.BLOCKS_GENERATED]: { count: number };
}

/** Type-safe event emitter for gateway lifecycle events. Subscribe via `.on(GatewayEvent.*, handler)`. */
export class TypedEventEmitter extends EventEmitter {
  override emit<K extends GatewayEvent>(event: K, data: GatewayEventMap[K]): boolean {
    return super.emit(event, data);
  }

  override on<K extends GatewayEvent>(event: K, listener: (data: GatewayEventMap[K]) => void): this {
    return super.on(event, listener);
  }

  override once<K extends GatewayEvent>(event: K, listener: (data: GatewayEventMap[K]) => void): this {
    return super.once(event, listener);
  }
}
