export { Routes } from './src/routes'
export type { Registration } from './src/routes'
export { Filters, runFilters } from './src/filters'
export type { Filter } from './src/filters'
export { Dispatcher } from './src/dispatcher'
export type { DispatchOutcome, DispatcherOptions } from './src/dispatcher'
export { compilePath, isValidPath, requestPath } from './src/path'
export type { PathVariable, RoutePattern } from './src/path'
export {
  HTTP_METHODS,
  createEntry,
  isBodyable,
  isHttpMethod,
  validateHandler,
  withBody,
  withContext
} from './src/handler'
export type {
  BodyHandler,
  BodyRequirement,
  Context,
  ContextHandler,
  HandlerEntry,
  HttpMethod,
  Invocation,
  RouteHandler
} from './src/handler'
export {
  bindBody,
  decodeJson,
  decodeXml,
  defaultDecoders,
  extractPathVariables,
  selectDecoder
} from './src/binder'
export type { BodyDecoder, BodyDecoders, BodyType, Params } from './src/binder'
export {
  ErrorResponse,
  fileResponse,
  isHttpResponse,
  jsonErrorResponse,
  jsonResponse,
  noContentResponse,
  textResponse,
  xmlErrorResponse,
  xmlResponse
} from './src/response'
export type { CustomHeaders, HttpResponse, ResponseSink } from './src/response'
export {
  BindError,
  ConfigurationError,
  InvalidPathError,
  RestError,
  RouteNotFoundError,
  SerializationError
} from './src/errors'
export { consoleLogger, noopLogger } from './src/logger'
export type { LogData, LogLevel, Logger } from './src/logger'
export { default as nodeHttp, createWebRequest } from './src/node-http'
export type { NodeHttpOptions } from './src/node-http'
export { default as fetchHandler } from './src/web'
