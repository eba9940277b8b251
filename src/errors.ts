export class RestError extends Error {

  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = new.target.name
  }

}

/**
 * A route or filter was registered in a way that can never be served.
 * Raised before the dispatcher accepts requests.
 */
export class ConfigurationError extends RestError { }

export class InvalidPathError extends ConfigurationError {

  constructor(public readonly template: string) {
    super(`invalid path '${template}' - segments may only contain lowercase letters, digits, inner dashes, and {variables} of the same`)
  }

}

export class RouteNotFoundError extends RestError {

  constructor(public readonly method: string, public readonly path: string) {
    super(`route does not exist - method: '${method}' | path: '${path}'`)
  }

}

/**
 * The request body could not be read or decoded into the handler's body type.
 */
export class BindError extends RestError { }

/**
 * A response body could not be marshalled or copied to the sink.
 */
export class SerializationError extends RestError { }
