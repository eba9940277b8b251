import { ConfigurationError, InvalidPathError } from './errors'
import { createEntry, isHttpMethod, validateHandler } from './handler'
import type { HandlerEntry, HttpMethod, RouteHandler } from './handler'
import { compilePath, isValidPath } from './path'

export type Registration =
  | { ok: true, entry: HandlerEntry }
  | { ok: false, error: ConfigurationError }

type Route<R extends Routes> = <B extends object>(template: string, handler: RouteHandler<B>) => R

/**
 * Handlers per method, in registration order. Lookup takes the first pattern
 * that accepts the path, so a broad pattern registered early shadows narrower
 * ones registered after it.
 */
export class Routes {

  private _methods = new Map<HttpMethod, HandlerEntry[]>()
  private _sealed = false

  get sealed(): boolean {
    return this._sealed
  }

  seal(): this {
    this._sealed = true
    return this
  }

  register<B extends object>(method: string, template: string, handler: RouteHandler<B>): Registration {

    if (this._sealed) {
      return { ok: false, error: new ConfigurationError(`cannot add ${method} ${template} - routes are sealed`) }
    }
    if (!isHttpMethod(method)) {
      return { ok: false, error: new ConfigurationError(`unsupported HTTP method '${method}' for ${template}`) }
    }
    if (!isValidPath(template)) {
      return { ok: false, error: new InvalidPathError(template) }
    }

    const error = validateHandler(method, handler)
    if (error != null) return { ok: false, error }

    const entry = createEntry(method, compilePath(template), handler)
    const entries = this._methods.get(method)
    if (entries == null) this._methods.set(method, [entry])
    else entries.push(entry)

    return { ok: true, entry }
  }

  on<B extends object>(method: HttpMethod, template: string, handler: RouteHandler<B>): this {
    const registration = this.register(method, template, handler)
    if (!registration.ok) throw registration.error
    return this
  }

  lookup(method: string, path: string): HandlerEntry | null {
    if (!isHttpMethod(method)) return null
    return this.entries(method).find(({ pattern }) => pattern.matcher.test(path)) ?? null
  }

  entries(method: HttpMethod): readonly HandlerEntry[] {
    return this._methods.get(method) ?? []
  }

  get: Route<this> = (template, handler) => this.on('GET', template, handler)
  put: Route<this> = (template, handler) => this.on('PUT', template, handler)
  post: Route<this> = (template, handler) => this.on('POST', template, handler)
  patch: Route<this> = (template, handler) => this.on('PATCH', template, handler)
  delete: Route<this> = (template, handler) => this.on('DELETE', template, handler)

}
