import { Readable } from 'stream'
import type { IncomingMessage, RequestListener, ServerResponse } from 'http'
import type { Dispatcher } from './dispatcher'
import type { ResponseSink } from './response'

export type NodeHttpOptions = {
  onError?: (err: unknown, req: IncomingMessage) => void
}

class ServerResponseSink implements ResponseSink {

  constructor(private res: ServerResponse) { }

  get headersSent(): boolean {
    return this.res.headersSent
  }

  status(code: number): void {
    if (!this.res.headersSent) this.res.statusCode = code
  }

  setHeader(name: string, value: string): void {
    if (!this.res.headersSent) this.res.setHeader(name, value)
  }

  async write(chunk: Uint8Array | string): Promise<void> {
    if (this.res.destroyed) throw new Error('response closed before the body was written')
    if (this.res.write(chunk)) return
    // the client may leave while the body is backed up; 'drain' never comes then
    await new Promise<void>((resolve, reject) => {
      const settle = (err?: Error) => {
        this.res.off('drain', onDrain)
        this.res.off('close', onClose)
        if (err == null) resolve()
        else reject(err)
      }
      const onDrain = () => settle()
      const onClose = () => settle(new Error('response closed before the body was written'))
      this.res.once('drain', onDrain)
      this.res.once('close', onClose)
    })
  }

}

export default function nodeHttp(dispatcher: Dispatcher, options: NodeHttpOptions = {}): RequestListener {

  const onError = options.onError ?? ((err: unknown) => {
    dispatcher.logger.error('request failed', { error: err })
  })

  return (req, res) => {
    onRequest(req, res).catch(err => {
      res.destroy()
      onError(err, req)
    })
  }

  async function onRequest(nodeReq: IncomingMessage, nodeRes: ServerResponse): Promise<void> {
    const outcome = await dispatcher.handle(createWebRequest(nodeReq), new ServerResponseSink(nodeRes))
    // an unbound request gets no answer, only a closed connection
    if (outcome === 'unbound') return void nodeRes.destroy()
    nodeRes.end()
  }

}

export function createWebRequest(req: IncomingMessage): Request {

  const {
    host = 'localhost',
    'x-forwarded-proto': protocol = 'http'
  } = req.headers
  const url = new URL(`${protocol}://${host}${req.url ?? '/'}`)
  const method = req.method ?? 'GET'
  const headers = new Headers()

  for (let i = 0; i < req.rawHeaders.length; i += 2) {
    headers.append(req.rawHeaders[i], req.rawHeaders[i + 1])
  }

  const body = method === 'GET' || method === 'HEAD'
    ? undefined
    : Readable.toWeb(req)

  return new Request(url, { method, headers, body, duplex: 'half' })
}
