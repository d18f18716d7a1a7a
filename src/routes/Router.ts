import { logDebug, logError } from "../logging";

export type RouteHandler<TResult> = (...args: never[]) => TResult;

/**
 * Lookup table keyed by HTTP method and `route` query value. A handler runs only
 * when the caller passes exactly as many arguments as it declares.
 */
export class Router<TResult> {
  private readonly routes = new Map<string, Map<string, RouteHandler<TResult>>>();

  registerRoute(method: string, route: string, handler: RouteHandler<TResult>): void {
    const key = method.toUpperCase();
    const methodRoutes = this.routes.get(key) ?? new Map<string, RouteHandler<TResult>>();
    methodRoutes.set(route, handler);
    this.routes.set(key, methodRoutes);
  }

  handleRoute(method: string, route: string | undefined, ...args: unknown[]): TResult | undefined {
    logDebug("[GIT-DOC-ROUTER]", `${this.constructor.name} handling: Method [${method}] route [${route}]`);

    const handler = route === undefined ? undefined : this.routes.get(method.toUpperCase())?.get(route);
    if (!handler) {
      this.routeNotFound(method, route);
      return undefined;
    }

    const expectedParams = handler.length;
    const providedParams = args.length;
    if (expectedParams !== providedParams) {
      logError(
        "[GIT-DOC-ROUTER]",
        `Function signature mismatch for [${method}] [${route}]; got [${providedParams}] expected [${expectedParams}]`
      );
      return undefined;
    }

    // Only the argument count is checked; the argument types are the caller's contract.
    return Reflect.apply(handler, this, args) as TResult;
  }

  protected routeNotFound(method: string, route: string | undefined): void {
    logError("[GIT-DOC-ROUTER]", `No route found; unable to process request for method [${method}] route [${route}]`);
  }
}
