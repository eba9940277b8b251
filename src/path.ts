import { InvalidPathError } from './errors'

export type PathVariable = Readonly<{
  position: number
  name: string
}>

export type RoutePattern = Readonly<{
  template: string
  matcher: RegExp
  variables: readonly PathVariable[]
}>

const SEGMENT = '[a-z0-9]+(?:-?[a-z0-9]+)*'

const IS_VALID_PATH = new RegExp(`^(?:/(?:\\{${SEGMENT}\\}|${SEGMENT}))+$`)

const VARIABLE = /\{([^/]+?)\}/g

const VARIABLE_VALUE = '[a-zA-Z0-9_-]+'

/**
 * Valid templates:
 *
 *   /
 *   /path1
 *   /path1/pa-th-2/3
 *   /path1/{pa-th-2}/3
 */
export function isValidPath(template: string): boolean {
  return template === '/' || IS_VALID_PATH.test(template)
}

export function compilePath(template: string): RoutePattern {

  if (!isValidPath(template)) throw new InvalidPathError(template)

  const variables = template
    .split('/')
    .reduce<PathVariable[]>((variables, slug, index) => {
      if (slug.startsWith('{')) {
        variables.push(Object.freeze({ position: index - 1, name: slug.slice(1, -1) }))
      }
      return variables
    }, [])

  const matcher = new RegExp(`^${template.replace(VARIABLE, VARIABLE_VALUE)}$`)

  return Object.freeze({
    template,
    matcher,
    variables: Object.freeze(variables)
  })
}

/**
 * The decoded path of a request URL, the form route patterns match against.
 * A path with a malformed escape is returned as sent.
 */
export function requestPath(url: string): string {
  const { pathname } = new URL(url)
  try {
    return decodeURIComponent(pathname)
  } catch (err) {
    if (err instanceof URIError) return pathname
    throw err
  }
}
