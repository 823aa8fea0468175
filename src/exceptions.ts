function createErrorClass(name: string) {
  return class extends ProfileDecoderError {
    constructor(message: string) {
      super(message)
      this.name = name
      Object.setPrototypeOf(this, new.target.prototype)
    }
  }
}

export class ProfileDecoderError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ProfileDecoderError'
    Object.setPrototypeOf(this, ProfileDecoderError.prototype)
  }
}

export class ConfigurationError extends createErrorClass('ConfigurationError') {}
export class InvalidSearchHitError extends createErrorClass(
  'InvalidSearchHitError',
) {}

export class DocumentReadError extends ProfileDecoderError {
  constructor(
    message: string,
    public readonly filePath: string,
  ) {
    super(message)
    this.name = 'DocumentReadError'
    Object.setPrototypeOf(this, DocumentReadError.prototype)
  }
}
