import type { HttpMethod } from "../transport/types.js";

/** API revision a catalog is built for */
export type ApiVersion = "v1" | "v2";

export const API_VERSIONS: readonly ApiVersion[] = ["v1", "v2"];

/** Logical gateway operations the catalog can resolve */
export enum GatewayOperation {
  GET_NETWORK_CONFIG = "getNetworkConfig",
  GET_NETWORK_ECONOMICS = "getNetworkEconomics",
  GET_NETWORK_STATUS = "getNetworkStatus",
  GET_ACCOUNT = "getAccount",
  GET_ACCOUNT_TOKEN_BALANCE = "getAccountTokenBalance",
  GET_TOKEN = "getToken",
  SEND_TRANSACTION = "sendTransaction",
  SEND_TRANSACTIONS = "sendTransactions",
  GET_TRANSACTION = "getTransaction",
  GET_TRANSACTION_STATUS = "getTransactionStatus",
  GET_HYPER_BLOCK_BY_NONCE = "getHyperBlockByNonce",
  GET_HYPER_BLOCK_BY_HASH = "getHyperBlockByHash",

  SIMULATOR_GENERATE_BLOCKS = "simulatorGenerateBlocks",
  SIMULATOR_GENERATE_BLOCKS_UNTIL_EPOCH = "simulatorGenerateBlocksUntilEpoch",
  SIMULATOR_GENERATE_BLOCKS_UNTIL_TX_PROCESSED = "simulatorGenerateBlocksUntilTxProcessed",
  SIMULATOR_SEND_USER_FUNDS = "simulatorSendUserFunds",
}

export type EndpointParamValue = string | number | boolean | undefined;
export type EndpointParams = Readonly<Record<string, EndpointParamValue>>;

export interface RouteDefinition {
  method: HttpMethod;
  /** Path relative to the gateway base URL; `{name}` segments are filled from params */
  template: string;
  /** Params appended as a query string when set */
  query?: readonly string[];
}

export type RouteTable = Readonly<Partial<Record<GatewayOperation, RouteDefinition>>>;

export interface ResolvedEndpoint {
  operation: GatewayOperation;
  method: HttpMethod;
  path: string;
}

export interface EndpointCatalogOptions {
  /** Adds the chain simulator control routes. Never set against a production gateway. */
  simulator?: boolean;
}
