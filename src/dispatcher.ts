import { BindError, RouteNotFoundError } from './errors'
import { defaultDecoders } from './binder'
import type { BodyDecoders } from './binder'
import { Filters, runFilters } from './filters'
import type { Filter } from './filters'
import type { Invocation } from './handler'
import { noopLogger } from './logger'
import { requestPath } from './path'
import type { Logger } from './logger'
import type { Routes } from './routes'
import { isHttpResponse } from './response'
import type { ResponseSink } from './response'

export type DispatcherOptions = {
  logger?: Logger
  /**
   * Extra body decoders by exact content type, merged over the defaults.
   */
  decoders?: BodyDecoders
}

/**
 * - `not-found`: no route matched, a bare 404 status was set
 * - `rejected`: a pre-filter returned `false`
 * - `unbound`: the body could not be bound, nothing was written
 * - `completed`: the handler's response was written and post-filters ran
 */
export type DispatchOutcome = 'not-found' | 'rejected' | 'unbound' | 'completed'

export class Dispatcher {

  readonly logger: Logger

  private readonly _routes: Routes
  private readonly _pre: readonly Filter[]
  private readonly _post: readonly Filter[]
  private readonly _decoders: BodyDecoders

  constructor(routes: Routes, filters: Filters = new Filters(), options: DispatcherOptions = {}) {
    this._routes = routes.seal()
    filters.seal()
    this._pre = Object.freeze([...filters.pre])
    this._post = Object.freeze([...filters.post])
    this._decoders = new Map([...defaultDecoders, ...options.decoders ?? []])
    this.logger = options.logger ?? noopLogger
  }

  handle = async (req: Request, res: ResponseSink): Promise<DispatchOutcome> => {

    const path = requestPath(req.url)
    const entry = this._routes.lookup(req.method, path)

    if (entry == null) {
      this.logger.debug(new RouteNotFoundError(req.method, path).message)
      res.status(404)
      return 'not-found'
    }

    this.logger.debug('dispatching request', { method: req.method, path, template: entry.pattern.template })

    if (!await runFilters(this._pre, res, req)) return 'rejected'

    let invoke: Invocation
    try {
      invoke = await entry.bind(req, res, path, this._decoders)
    } catch (err) {
      if (!(err instanceof BindError)) throw err
      // the request is left unanswered; the host decides how the client sees that
      this.logger.debug(err.message, { method: req.method, path, error: err.cause })
      return 'unbound'
    }

    const response = await invoke()

    if (isHttpResponse(response)) {
      await response.write(res, this.logger)
    } else {
      this.logger.error('handler did not return a response', { method: req.method, path })
    }

    await runFilters(this._post, res, req)

    return 'completed'
  }

}
