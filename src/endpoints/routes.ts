import { GatewayOperation, type ApiVersion, type RouteTable } from "./types.js";

const V1_ROUTES: RouteTable = {
  [GatewayOperation.GET_NETWORK_CONFIG]: { method: "GET", template: "network/config" },
  [GatewayOperation.GET_NETWORK_ECONOMICS]: { method: "GET", template: "network/economics" },
  [GatewayOperation.GET_NETWORK_STATUS]: { method: "GET", template: "network/status/{shard}" },
  [GatewayOperation.GET_ACCOUNT]: { method: "GET", template: "address/{address}" },
  [GatewayOperation.GET_ACCOUNT_TOKEN_BALANCE]: { method: "GET", template: "address/{address}/dcdt/{identifier}" },
  [GatewayOperation.GET_TOKEN]: { method: "GET", template: "network/dcdt/token/{identifier}" },
  [GatewayOperation.SEND_TRANSACTION]: { method: "POST", template: "transaction/send" },
  [GatewayOperation.SEND_TRANSACTIONS]: { method: "POST", template: "transaction/send-multiple" },
  [GatewayOperation.GET_TRANSACTION]: { method: "GET", template: "transaction/{hash}", query: ["withResults"] },
  [GatewayOperation.GET_TRANSACTION_STATUS]: { method: "GET", template: "transaction/{hash}/status" },
  [GatewayOperation.GET_HYPER_BLOCK_BY_NONCE]: { method: "GET", template: "hyperblock/by-nonce/{nonce}" },
  [GatewayOperation.GET_HYPER_BLOCK_BY_HASH]: { method: "GET", template: "hyperblock/by-hash/{hash}" },
};

// v2 gateways report the processing outcome (including smart contract results) on a dedicated route
const V2_ROUTES: RouteTable = {
  ...V1_ROUTES,
  [GatewayOperation.GET_TRANSACTION_STATUS]: { method: "GET", template: "transaction/{hash}/process-status" },
};

export const ROUTE_TABLES: Readonly<Record<ApiVersion, RouteTable>> = {
  v1: V1_ROUTES,
  v2: V2_ROUTES,
};

export const SIMULATOR_ROUTES: RouteTable = {
  [GatewayOperation.SIMULATOR_GENERATE_BLOCKS]: { method: "POST", template: "simulator/generate-blocks/{count}" },
  [GatewayOperation.SIMULATOR_GENERATE_BLOCKS_UNTIL_EPOCH]: {
    method: "POST",
    template: "simulator/generate-blocks-until-epoch-reached/{epoch}",
  },
  [GatewayOperation.SIMULATOR_GENERATE_BLOCKS_UNTIL_TX_PROCESSED]: {
    method: "POST",
    template: "simulator/generate-blocks-until-transaction-processed/{hash}",
  },
  [GatewayOperation.SIMULATOR_SEND_USER_FUNDS]: { method: "POST", template: "transaction/send-user-funds" },
};
