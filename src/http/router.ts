import { RouteNotFoundError } from '../errors';
import { errorResponse, optionsResponse } from './responses';
import type { HttpResponse, ParsedRequest, RequestContext, RequestHandler } from './types';

type RouteKey = `${string} ${string}`;

function routeKey(method: string, path: string): RouteKey {
  return `${method.toUpperCase()} ${path}`;
}

/**
 * Exact-match (method, path) table. OPTIONS on any path answers the CORS
 * preflight; anything else unmatched is a JSON 404.
 */
export class Router {
  private readonly routes = new Map<RouteKey, RequestHandler>();

  register(method: string, path: string, handler: RequestHandler): this {
    this.routes.set(routeKey(method, path), handler);
    return this;
  }

  get(path: string, handler: RequestHandler): this {
    return this.register('GET', path, handler);
  }

  post(path: string, handler: RequestHandler): this {
    return this.register('POST', path, handler);
  }

  async handle(request: ParsedRequest, context: RequestContext): Promise<HttpResponse> {
    if (request.method === 'OPTIONS') {
      return optionsResponse();
    }
    const handler = this.routes.get(routeKey(request.method, request.path));
    if (!handler) {
      return errorResponse(new RouteNotFoundError(request.method, request.path));
    }
    return handler(request, context);
  }

  /** Bound `handle`, in the shape the listener takes. */
  handler(): RequestHandler {
    return (request, context) => this.handle(request, context);
  }
}
