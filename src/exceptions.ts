export class ScraperError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ScraperError'
    Object.setPrototypeOf(this, ScraperError.prototype)
  }
}

function createErrorClass(name: string) {
  return class extends ScraperError {
    constructor(message: string) {
      super(message)
      this.name = name
      Object.setPrototypeOf(this, new.target.prototype)
    }
  }
}

export class AuthenticationError extends createErrorClass(
  'AuthenticationError',
) {}
export class ElementNotFoundError extends createErrorClass(
  'ElementNotFoundError',
) {}
export class InvalidUrlError extends createErrorClass('InvalidUrlError') {}
export class NavigationError extends createErrorClass('NavigationError') {}
export class WaitTimeoutError extends createErrorClass('WaitTimeoutError') {}

export class RateLimitError extends ScraperError {
  constructor(
    message: string,
    public suggestedWaitTime: number = 300,
  ) {
    super(message)
    this.name = 'RateLimitError'
    Object.setPrototypeOf(this, RateLimitError.prototype)
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message || error.name
  if (typeof error === 'string') return error
  return String(error)
}
