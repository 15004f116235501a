import { GatewayError, GatewayErrorKind } from "../errors.js";
import { ROUTE_TABLES, SIMULATOR_ROUTES } from "./routes.js";
import {
  API_VERSIONS,
  type ApiVersion,
  type EndpointCatalogOptions,
  type EndpointParams,
  GatewayOperation,
  type ResolvedEndpoint,
  type RouteDefinition,
} from "./types.js";

const PLACEHOLDER = /\{(\w+)\}/g;
const OPERATIONS: ReadonlySet<string> = new Set(Object.values(GatewayOperation));

function isGatewayOperation(value: string): value is GatewayOperation {
  return OPERATIONS.has(value);
}

/**
 * Maps logical operations to `(method, path)` for one API version.
 * Pure: no I/O, no base URL. Simulator routes exist only in catalogs built with `simulator: true`.
 */
export class EndpointCatalog {
  private readonly routes: ReadonlyMap<GatewayOperation, RouteDefinition>;

  constructor(
    readonly version: ApiVersion = "v1",
    options?: EndpointCatalogOptions,
  ) {
    if (!API_VERSIONS.includes(version)) {
      throw new GatewayError(GatewayErrorKind.FATAL, `Unsupported API version "${version}"`, {
        context: { supported: API_VERSIONS },
      });
    }

    const routes = new Map<GatewayOperation, RouteDefinition>();
    const tables = options?.simulator ? [ROUTE_TABLES[version], SIMULATOR_ROUTES] : [ROUTE_TABLES[version]];
    for (const table of tables) {
      for (const operation of Object.values(GatewayOperation)) {
        const route = table[operation];
        if (route) routes.set(operation, route);
      }
    }
    this.routes = routes;
  }

  get simulatorEnabled(): boolean {
    return this.routes.has(GatewayOperation.SIMULATOR_GENERATE_BLOCKS);
  }

  supports(operation: string): boolean {
    return isGatewayOperation(operation) && this.routes.has(operation);
  }

  resolve(operation: string, params: EndpointParams = {}): ResolvedEndpoint {
    const route = isGatewayOperation(operation) ? this.routes.get(operation) : undefined;
    if (!isGatewayOperation(operation) || !route) {
      throw new GatewayError(GatewayErrorKind.FATAL, `Unknown operation "${operation}" for API ${this.version}`, {
        context: { operation, version: this.version, simulator: this.simulatorEnabled },
      });
    }

    const path = route.template.replace(PLACEHOLDER, (_, name: string) => {
      const value = params[name];
      if (value === undefined || value === "") {
        throw new GatewayError(GatewayErrorKind.FATAL, `Missing path parameter "${name}" for ${operation}`, {
          context: { operation },
        });
      }
      return encodeURIComponent(String(value));
    });

    const query = new URLSearchParams();
    for (const name of route.query ?? []) {
      const value = params[name];
      if (value !== undefined) query.set(name, String(value));
    }
    const search = query.toString();

    return { operation, method: route.method, path: search ? `${path}?${search}` : path };
  }
}
