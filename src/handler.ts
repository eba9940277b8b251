import { ConfigurationError } from './errors'
import { bindBody, extractPathVariables } from './binder'
import type { BodyDecoders, BodyType, Params } from './binder'
import type { RoutePattern } from './path'
import type { HttpResponse, ResponseSink } from './response'

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE'

export const HTTP_METHODS: readonly HttpMethod[] = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE']

export type Context = {
  req: Request
  res: ResponseSink
  url: URL
  params: Params
}

type Returned = HttpResponse | Promise<HttpResponse>

export type ContextHandler = {
  kind: 'context'
  handle: (ctx: Context) => Returned
}

export type BodyHandler<B extends object> = {
  kind: 'body'
  bodyType: BodyType<B>
  handle: (ctx: Context, body: B) => Returned
}

export type RouteHandler<B extends object = object> = ContextHandler | BodyHandler<B>

export type BodyRequirement =
  | { present: false }
  | { present: true, bodyType: BodyType<object> }

/**
 * A bound request, ready to call its handler.
 */
export type Invocation = () => Returned

export type HandlerEntry = Readonly<{
  method: HttpMethod
  pattern: RoutePattern
  body: BodyRequirement
  /**
   * Resolves path variables and, when the route takes one, the request body.
   * Rejects with `BindError`.
   */
  bind(req: Request, res: ResponseSink, path: string, decoders: BodyDecoders): Promise<Invocation>
}>

export function withContext(handle: (ctx: Context) => Returned): ContextHandler {
  return { kind: 'context', handle }
}

export function withBody<B extends object>(
  bodyType: BodyType<B>,
  handle: (ctx: Context, body: B) => Returned
): BodyHandler<B> {
  return { kind: 'body', bodyType, handle }
}

export function isHttpMethod(method: string): method is HttpMethod {
  return HTTP_METHODS.some(known => known === method)
}

export function isBodyable(method: string): boolean {
  switch (method) {
    case 'POST':
    case 'PUT':
    case 'PATCH':
    case 'DELETE':
      return true
  }
  return false
}

/**
 * Registration-time checks for callers the compiler cannot vouch for.
 * Returns the first problem found.
 */
export function validateHandler<B extends object>(
  method: string,
  handler: RouteHandler<B> | null | undefined
): ConfigurationError | null {

  if (handler == null) {
    return new ConfigurationError(`${method} handler must not be null`)
  }
  if (handler.kind !== 'context' && handler.kind !== 'body') {
    return new ConfigurationError(`${method} handler must be created with withContext() or withBody()`)
  }
  if (typeof handler.handle !== 'function') {
    return new ConfigurationError(`${method} handler must be a function`)
  }

  const bodyable = isBodyable(method)

  if (bodyable && handler.kind === 'context') {
    return new ConfigurationError(`${method} handler must take a request body - use withBody()`)
  }
  if (!bodyable && handler.kind === 'body') {
    return new ConfigurationError(`${method} handler must not take a request body - use withContext()`)
  }
  if (handler.kind === 'body' && typeof handler.bodyType !== 'function') {
    return new ConfigurationError(`${method} handler body type must be a constructible class`)
  }

  const expected = handler.kind === 'body' ? 2 : 1
  if (handler.handle.length > expected) {
    return new ConfigurationError(
      `${method} handler must declare at most ${expected} parameter(s) but declared ${handler.handle.length}`
    )
  }

  return null
}

export function createEntry<B extends object>(
  method: HttpMethod,
  pattern: RoutePattern,
  handler: RouteHandler<B>
): HandlerEntry {

  const context = (req: Request, res: ResponseSink, path: string): Context => ({
    req,
    res,
    url: new URL(req.url),
    params: extractPathVariables(path, pattern.variables)
  })

  if (handler.kind === 'context') {
    const { handle } = handler
    const entry: HandlerEntry = {
      method,
      pattern,
      body: { present: false },
      bind: async (req, res, path) => {
        const ctx = context(req, res, path)
        return () => handle(ctx)
      }
    }
    return Object.freeze(entry)
  }

  const { bodyType, handle } = handler
  const entry: HandlerEntry = {
    method,
    pattern,
    body: { present: true, bodyType },
    bind: async (req, res, path, decoders) => {
      const ctx = context(req, res, path)
      const body = await bindBody(req, bodyType, decoders)
      return () => handle(ctx, body)
    }
  }
  return Object.freeze(entry)
}
