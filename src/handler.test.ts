import { expect } from 'chai'
import { ConfigurationError } from './errors'
import { createEntry, isBodyable, isHttpMethod, validateHandler, withBody, withContext } from './handler'
import type { Context } from './handler'
import { compilePath } from './path'
import { defaultDecoders } from './binder'
import { textResponse } from './response'
import { RecordingSink, send } from './index.test'

class Note {
  title = ''
}

const ok = () => textResponse(200, 'ok')

describe('isBodyable(method: string)', () => {

  it('is false for an empty method', () => {
    expect(isBodyable('')).to.equal(false)
  })

  it('is false for GET', () => {
    expect(isBodyable('GET')).to.equal(false)
  })

  it('is true for POST, PUT, PATCH and DELETE', () => {
    expect(['POST', 'PUT', 'PATCH', 'DELETE'].map(isBodyable)).to.deep.equal([true, true, true, true])
  })

})

describe('isHttpMethod(method: string)', () => {

  it('recognises the routable methods only', () => {
    expect(isHttpMethod('PATCH')).to.equal(true)
    expect(isHttpMethod('HEAD')).to.equal(false)
    expect(isHttpMethod('get')).to.equal(false)
  })

})

describe('validateHandler(method, handler)', () => {

  it('accepts a context handler for GET', () => {
    expect(validateHandler('GET', withContext(ok))).to.equal(null)
  })

  it('accepts a body handler for every bodyable method', () => {
    for (const method of ['POST', 'PUT', 'PATCH', 'DELETE']) {
      expect(validateHandler(method, withBody(Note, ok))).to.equal(null)
    }
  })

  it('rejects a missing handler', () => {
    const err = validateHandler('GET', null)
    expect(err).to.be.an.instanceOf(ConfigurationError)
      .with.property('message', 'GET handler must not be null')
  })

  it('rejects a context handler for a bodyable method', () => {
    for (const method of ['POST', 'PUT', 'PATCH', 'DELETE']) {
      const err = validateHandler(method, withContext(ok))
      expect(err).to.be.an.instanceOf(ConfigurationError)
        .with.property('message', `${method} handler must take a request body - use withBody()`)
    }
  })

  it('rejects a body handler for GET', () => {
    const err = validateHandler('GET', withBody(Note, ok))
    expect(err).to.be.an.instanceOf(ConfigurationError)
      .with.property('message', 'GET handler must not take a request body - use withContext()')
  })

  it('rejects a handler declaring extra parameters', () => {
    const handle = (_ctx: Context, _extra?: string) => ok()
    const err = validateHandler('GET', withContext(handle))
    expect(err).to.be.an.instanceOf(ConfigurationError)
      .with.property('message', 'GET handler must declare at most 1 parameter(s) but declared 2')
  })

})

describe('createEntry(method, pattern, handler)', () => {

  it('records that a context handler takes no body', () => {
    const entry = createEntry('GET', compilePath('/notes'), withContext(ok))
    expect(entry.body).to.deep.equal({ present: false })
    expect(entry).to.be.frozen
  })

  it('records the body type of a body handler', () => {
    const entry = createEntry('POST', compilePath('/notes'), withBody(Note, ok))
    expect(entry.body).to.deep.equal({ present: true, bodyType: Note })
  })

  it('binds path variables and body before invoking', async () => {
    let seen: [Record<string, string>, Note] | undefined
    const entry = createEntry('PUT', compilePath('/notes/{id}'), withBody(Note, ({ params }, note) => {
      seen = [{ ...params }, note]
      return ok()
    }))
    const req = send('PUT', 'host/notes/7', '{"title":"eggs"}')
    const invoke = await entry.bind(req, new RecordingSink(), '/notes/7', defaultDecoders)
    expect(seen).to.equal(undefined)
    await invoke()
    expect(seen).to.deep.equal([{ id: '7' }, Object.assign(new Note(), { title: 'eggs' })])
  })

})
