import type { Dispatcher } from './dispatcher'
import type { ResponseSink } from './response'

const NULL_BODY_STATUS = [101, 204, 205, 304]

class BufferedSink implements ResponseSink {

  code = 200
  headers = new Headers()
  chunks: Buffer[] = []

  get headersSent(): boolean {
    return this.chunks.length !== 0
  }

  status(code: number): void {
    if (!this.headersSent) this.code = code
  }

  setHeader(name: string, value: string): void {
    if (!this.headersSent) this.headers.set(name, value)
  }

  write(chunk: Uint8Array | string): void {
    this.chunks.push(Buffer.from(chunk))
  }

  toResponse(): Response {
    const body = this.chunks.length === 0 || NULL_BODY_STATUS.includes(this.code)
      ? null
      : Buffer.concat(this.chunks)
    return new Response(body, { status: this.code, headers: this.headers })
  }

}

export default function fetchHandler(dispatcher: Dispatcher): (req: Request) => Promise<Response> {
  return async req => {
    const sink = new BufferedSink()
    const outcome = await dispatcher.handle(req, sink)
    if (outcome === 'unbound') return Response.error()
    return sink.toResponse()
  }
}
