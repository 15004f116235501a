export { EndpointCatalog } from "./catalog.js";
export { API_VERSIONS, GatewayOperation } from "./types.js";
export type {
  ApiVersion,
  EndpointCatalogOptions,
  EndpointParams,
  EndpointParamValue,
  ResolvedEndpoint,
  RouteDefinition,
  RouteTable,
} from "./types.js";
