import { XMLParser, XMLValidator } from 'fast-xml-parser'
import { BindError } from './errors'
import type { PathVariable } from './path'

export type Params = Record<string, string>

/**
 * Turns a raw request payload into a field record. Throws when the payload
 * is not valid for its format.
 */
export type BodyDecoder = (text: string) => unknown

export type BodyDecoders = ReadonlyMap<string, BodyDecoder>

export type BodyType<B extends object> = new () => B

// text stays text; fields are coerced against the body type when bound
const parser = new XMLParser({ parseTagValue: false })

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

export const decodeJson: BodyDecoder = text => JSON.parse(text)

// fields are the children of the root element; its name is not checked
export const decodeXml: BodyDecoder = text => {
  const valid = XMLValidator.validate(text)
  if (valid !== true) throw new SyntaxError(valid.err.msg)
  const document: unknown = parser.parse(text)
  const roots = isRecord(document)
    ? Object.entries(document).filter(([name]) => !name.startsWith('?'))
    : []
  if (roots.length !== 1) throw new SyntaxError(`expected a single root element but found ${roots.length}`)
  const [[, fields]] = roots
  return fields === '' ? {} : fields
}

export const defaultDecoders: BodyDecoders = new Map([
  ['application/xml', decodeXml]
])

export function selectDecoder(contentType: string | null, decoders: BodyDecoders): BodyDecoder {
  return (contentType != null ? decoders.get(contentType) : undefined) ?? decodeJson
}

/**
 * Safe only for a path the pattern's matcher accepted: the concrete path then
 * has the same segments as the template.
 */
export function extractPathVariables(path: string, variables: readonly PathVariable[]): Params {
  const route = path.split('/')
  return variables.reduce<Params>((params, { position, name }) => {
    params[name] = route[position + 1]
    return params
  }, Object.create(null))
}

export async function bindBody<B extends object>(req: Request, bodyType: BodyType<B>, decoders: BodyDecoders): Promise<B> {

  let text: string
  try {
    text = await req.text()
  } catch (cause) {
    throw new BindError('could not read request body', { cause })
  }

  const contentType = req.headers.get('content-type')
  let fields: unknown
  try {
    fields = selectDecoder(contentType, decoders)(text)
  } catch (cause) {
    throw new BindError(`could not decode ${contentType ?? 'untyped'} request body`, { cause })
  }

  const body = new bodyType()
  if (fields === null) return body
  if (!isRecord(fields)) {
    throw new BindError(`request body must decode to an object but was ${kindOf(fields)}`)
  }

  // only fields the body type declares are bound; anything else is dropped
  for (const key of Object.keys(body)) {
    if (!Object.hasOwn(fields, key)) continue
    Reflect.set(body, key, coerce(key, Reflect.get(body, key), fields[key]))
  }
  return body
}

const kindOf = (value: unknown): string =>
  value === null ? 'null' : Array.isArray(value) ? 'an array' : typeof value

/**
 * Fits a decoded value to the type of the field's default. Strings are
 * parsed into numbers and booleans, since text formats carry no types.
 */
function coerce(key: string, current: unknown, value: unknown): unknown {

  const mismatch = () =>
    new BindError(`field '${key}' must be ${kindOf(current)} but was ${kindOf(value)}`)

  switch (typeof current) {
    case 'string':
      if (typeof value !== 'string') throw mismatch()
      return value
    case 'number':
      if (typeof value === 'number') return value
      if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) {
        return Number(value)
      }
      throw mismatch()
    case 'boolean':
      if (typeof value === 'boolean') return value
      if (value === 'true' || value === 'false') return value === 'true'
      throw mismatch()
  }

  if (Array.isArray(current)) {
    // a single repeated xml element decodes as a scalar
    return Array.isArray(value) ? value : [value]
  }

  return value
}
