import { ConfigurationError } from './errors'
import type { ResponseSink } from './response'

/**
 * Returns `false` to stop the chain. A filter that stops a request is
 * responsible for anything the client should receive.
 */
export type Filter = (res: ResponseSink, req: Request) => boolean | Promise<boolean>

export class Filters {

  private _pre: Filter[] = []
  private _post: Filter[] = []
  private _sealed = false

  get pre(): readonly Filter[] {
    return this._pre
  }

  get post(): readonly Filter[] {
    return this._post
  }

  get sealed(): boolean {
    return this._sealed
  }

  seal(): this {
    this._sealed = true
    return this
  }

  addPreFilter(filter: Filter): this {
    this._pre.push(this._checked('pre', filter))
    return this
  }

  addPostFilter(filter: Filter): this {
    this._post.push(this._checked('post', filter))
    return this
  }

  private _checked(phase: 'pre' | 'post', filter: Filter): Filter {
    if (this._sealed) throw new ConfigurationError(`cannot add ${phase}-filter - filters are sealed`)
    if (typeof filter !== 'function') throw new ConfigurationError(`${phase}-filter must be a function`)
    return filter
  }

}

export async function runFilters(filters: readonly Filter[], res: ResponseSink, req: Request): Promise<boolean> {
  for (const filter of filters) {
    if (!await filter(res, req)) return false
  }
  return true
}
