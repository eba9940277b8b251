import { XMLBuilder } from 'fast-xml-parser'
import { SerializationError } from './errors'
import type { Logger } from './logger'
import { requestPath } from './path'

/**
 * The writable half of an exchange. Host adapters implement it over their
 * own response object; headers are expected to be set before the first
 * `write`.
 */
export interface ResponseSink {
  readonly headersSent: boolean
  status(code: number): void
  setHeader(name: string, value: string): void
  write(chunk: Uint8Array | string): void | Promise<void>
}

export type CustomHeaders = Record<string, string>

export interface HttpResponse {
  write(res: ResponseSink, logger: Logger): Promise<void>
}

type Marshal = (body: unknown) => string

class MarshalResponse implements HttpResponse {

  constructor(
    private readonly statusCode: number,
    private readonly contentType: string,
    private readonly body: unknown,
    private readonly marshal: Marshal,
    private readonly headers: CustomHeaders = {}
  ) { }

  async write(res: ResponseSink, logger: Logger): Promise<void> {
    res.status(this.statusCode)
    res.setHeader('Content-Type', this.contentType)
    for (const [name, value] of Object.entries(this.headers)) res.setHeader(name, value)
    try {
      await res.write(this.marshal(this.body))
    } catch (cause) {
      const err = new SerializationError(`could not write ${this.contentType} body`, { cause })
      logger.error(err.message, { error: cause })
    }
  }

}

class TextResponse implements HttpResponse {

  constructor(
    private readonly statusCode: number,
    private readonly body: string,
    private readonly headers: CustomHeaders = {}
  ) { }

  async write(res: ResponseSink, logger: Logger): Promise<void> {
    res.status(this.statusCode)
    res.setHeader('Content-Type', 'text/plain')
    for (const [name, value] of Object.entries(this.headers)) res.setHeader(name, value)
    try {
      await res.write(this.body)
    } catch (cause) {
      const err = new SerializationError('could not write text body', { cause })
      logger.error(err.message, { error: cause })
    }
  }

}

class FileResponse implements HttpResponse {

  constructor(
    private readonly statusCode: number,
    private readonly contentType: string,
    private readonly contentDisposition: string,
    private readonly contentLength: number,
    private readonly file: AsyncIterable<Uint8Array | string>
  ) { }

  async write(res: ResponseSink, logger: Logger): Promise<void> {
    res.status(this.statusCode)
    res.setHeader('Content-Type', this.contentType)
    res.setHeader('Content-Disposition', this.contentDisposition)
    if (this.contentLength > 0) res.setHeader('Content-Length', String(this.contentLength))
    try {
      for await (const chunk of this.file) await res.write(chunk)
    } catch (cause) {
      const err = new SerializationError('could not copy file to response', { cause })
      logger.error(err.message, { error: cause })
    }
  }

}

class NoContentResponse implements HttpResponse {

  async write(res: ResponseSink): Promise<void> {
    res.status(204)
  }

}

/**
 * Body of the error envelopes. Built by handlers on their own error paths,
 * never by the dispatcher. Field and class names are the wire names.
 */
export class ErrorResponse {

  Date: string
  Message: string
  Method: string
  Path: string

  constructor(req: Request, message: string) {
    this.Date = new Date().toISOString()
    this.Message = message
    this.Method = req.method
    this.Path = requestPath(req.url)
  }

}

const builder = new XMLBuilder({ suppressEmptyNode: true })

const toJson: Marshal = body => JSON.stringify(body) ?? 'null'

// root element takes the body's class name
const toXml: Marshal = body => {
  const name = typeof body === 'object' && body !== null ? body.constructor?.name : undefined
  const root = name == null || name === '' || name === 'Object' ? 'response' : name
  return builder.build({ [root]: body })
}

export function isHttpResponse(value: unknown): value is HttpResponse {
  return typeof value === 'object' &&
    value !== null &&
    'write' in value &&
    typeof value.write === 'function'
}

export function jsonResponse(statusCode: number, body: unknown, headers?: CustomHeaders): HttpResponse {
  return new MarshalResponse(statusCode, 'application/json', body, toJson, headers)
}

export function xmlResponse(statusCode: number, body: unknown, headers?: CustomHeaders): HttpResponse {
  return new MarshalResponse(statusCode, 'application/xml', body, toXml, headers)
}

export function jsonErrorResponse(statusCode: number, req: Request, message: string): HttpResponse {
  return new MarshalResponse(statusCode, 'application/json', new ErrorResponse(req, message), toJson)
}

export function xmlErrorResponse(statusCode: number, req: Request, message: string): HttpResponse {
  return new MarshalResponse(statusCode, 'application/xml', new ErrorResponse(req, message), toXml)
}

export function textResponse(statusCode: number, body: string, headers?: CustomHeaders): HttpResponse {
  return new TextResponse(statusCode, body, headers)
}

export function fileResponse(
  statusCode: number,
  contentType: string,
  contentDisposition: string,
  contentLength: number,
  file: AsyncIterable<Uint8Array | string>
): HttpResponse {
  return new FileResponse(statusCode, contentType, contentDisposition, contentLength, file)
}

export function noContentResponse(): HttpResponse {
  return new NoContentResponse()
}
