import { expect } from 'chai'
import { BindError } from './errors'
import { bindBody, decodeJson, decodeXml, defaultDecoders, extractPathVariables, selectDecoder } from './binder'
import { compilePath } from './path'
import { rejection, send } from './index.test'

class Note {
  title = ''
  done = false
}

class Order {
  quantity = 0
  paid = false
  items: string[] = []
}

describe('extractPathVariables(path, variables)', () => {

  it('reads each variable at its segment position', () => {
    const { variables } = compilePath('/a/{mo-ck1}/bbb/{m-o-ck2}/a-b-c1/{mock3}')
    const params = extractPathVariables('/a/111111/bbb/222222/a-b-c1/333333', variables)
    expect({ ...params }).to.deep.equal({
      'mo-ck1': '111111',
      'm-o-ck2': '222222',
      mock3: '333333'
    })
  })

  it('returns no params for a literal pattern', () => {
    const { variables } = compilePath('/a/b')
    expect(Object.keys(extractPathVariables('/a/b', variables))).to.deep.equal([])
  })

})

describe('selectDecoder(contentType, decoders)', () => {

  it('selects xml for exactly application/xml', () => {
    expect(selectDecoder('application/xml', defaultDecoders)).to.equal(decodeXml)
  })

  it('falls back to json for a missing content type', () => {
    expect(selectDecoder(null, defaultDecoders)).to.equal(decodeJson)
  })

  it('falls back to json for unknown or parameterised content types', () => {
    expect(selectDecoder('text/plain', defaultDecoders)).to.equal(decodeJson)
    expect(selectDecoder('application/xml; charset=utf-8', defaultDecoders)).to.equal(decodeJson)
  })

  it('selects a registered decoder', () => {
    const decodeCsv = (text: string) => ({ fields: text.split(',') })
    const decoders = new Map(defaultDecoders).set('text/csv', decodeCsv)
    expect(selectDecoder('text/csv', decoders)).to.equal(decodeCsv)
  })

})

describe('decodeXml(text)', () => {

  it('reads the children of the root element as text', () => {
    const fields = decodeXml('<?xml version="1.0"?><note><title>007</title><done>true</done></note>')
    expect(fields).to.deep.equal({ title: '007', done: 'true' })
  })

  it('reads an empty root element as no fields', () => {
    expect(decodeXml('<note></note>')).to.deep.equal({})
  })

  it('throws on malformed xml', () => {
    expect(() => decodeXml('<note><title>milk</note>')).to.throw(SyntaxError)
  })

})

describe('bindBody(req, bodyType, decoders)', () => {

  it('binds a json body onto a new instance', async () => {
    const req = send('POST', '/notes', '{"title":"milk","done":true}')
    const note = await bindBody(req, Note, defaultDecoders)
    expect(note).to.be.an.instanceOf(Note)
    expect(note).to.deep.equal(Object.assign(new Note(), { title: 'milk', done: true }))
  })

  it('keeps defaults for fields the body leaves out', async () => {
    const req = send('POST', '/notes', '{"title":"milk"}')
    const note = await bindBody(req, Note, defaultDecoders)
    expect(note.done).to.equal(false)
  })

  it('binds an xml body', async () => {
    const req = send('PUT', '/notes/1', '<note><title>eggs</title></note>', 'application/xml')
    const note = await bindBody(req, Note, defaultDecoders)
    expect(note).to.be.an.instanceOf(Note)
    expect(note.title).to.equal('eggs')
  })

  it('keeps numeric-looking xml text in a string field', async () => {
    const req = send('POST', '/notes', '<note><title>007</title></note>', 'application/xml')
    const note = await bindBody(req, Note, defaultDecoders)
    expect(note.title).to.equal('007')
  })

  it('parses xml text into number, boolean and list fields', async () => {
    const xml = '<order><quantity>3</quantity><paid>true</paid><items>milk</items></order>'
    const order = await bindBody(send('POST', '/orders', xml, 'application/xml'), Order, defaultDecoders)
    expect(order).to.deep.equal(Object.assign(new Order(), { quantity: 3, paid: true, items: ['milk'] }))
  })

  it('drops fields the body type does not declare', async () => {
    const req = send('POST', '/notes', '{"title":"milk","extra":"y"}')
    const note = await bindBody(req, Note, defaultDecoders)
    expect(note).not.to.have.property('extra')
    expect(Object.keys(note)).to.deep.equal(['title', 'done'])
  })

  it('keeps the body type when the payload carries a __proto__ key', async () => {
    const req = send('POST', '/notes', '{"__proto__":{"admin":true},"title":"x"}')
    const note = await bindBody(req, Note, defaultDecoders)
    expect(note).to.be.an.instanceOf(Note)
    expect(note).not.to.have.property('admin')
    expect(note.title).to.equal('x')
  })

  it('fails to bind a field of the wrong type', async () => {
    const req = send('POST', '/notes', '{"title":5}')
    const err = await rejection(bindBody(req, Note, defaultDecoders))
    expect(err).to.be.an.instanceOf(BindError)
      .with.property('message', "field 'title' must be string but was number")
  })

  it('fails to bind xml text that is not a number', async () => {
    const req = send('POST', '/orders', '<order><quantity>many</quantity></order>', 'application/xml')
    const err = await rejection(bindBody(req, Order, defaultDecoders))
    expect(err).to.be.an.instanceOf(BindError)
      .with.property('message', "field 'quantity' must be number but was string")
  })

  it('binds a json null as a default instance', async () => {
    const req = send('POST', '/notes', 'null')
    expect(await bindBody(req, Note, defaultDecoders)).to.deep.equal(new Note())
  })

  it('fails to bind malformed json', async () => {
    const req = send('POST', '/notes', '{"title":')
    const err = await rejection(bindBody(req, Note, defaultDecoders))
    expect(err).to.be.an.instanceOf(BindError)
      .with.property('message', 'could not decode application/json request body')
    expect(err).to.have.property('cause').that.is.an.instanceOf(SyntaxError)
  })

  it('fails to bind a body that is not an object', async () => {
    const req = send('POST', '/notes', '[1, 2]')
    const err = await rejection(bindBody(req, Note, defaultDecoders))
    expect(err).to.be.an.instanceOf(BindError)
      .with.property('message', 'request body must decode to an object but was an array')
  })

  it('fails to bind a body that cannot be read', async () => {
    const body = new ReadableStream({
      start(controller) {
        controller.error(new Error('connection reset'))
      }
    })
    const req = new Request('test://host/notes', { method: 'POST', body, duplex: 'half' })
    const err = await rejection(bindBody(req, Note, defaultDecoders))
    expect(err).to.be.an.instanceOf(BindError)
      .with.property('message', 'could not read request body')
  })

})
