// Errors raised while decoding or encoding CIFP records

export class CifpFieldError extends Error {
  readonly field: string
  readonly value: string

  constructor(field: string, value: string, reason: string) {
    super(`Invalid ${field} "${value}": ${reason}`)
    this.name = 'CifpFieldError'
    this.field = field
    this.value = value
  }
}

export class CifpFormatError extends Error {
  readonly lineNumber: number
  readonly line: string

  constructor(message: string, lineNumber: number, line: string, options?: { cause?: unknown }) {
    super(`Line ${lineNumber}: ${message}`, options)
    this.name = 'CifpFormatError'
    this.lineNumber = lineNumber
    this.line = line
  }
}

// Raised when an uploaded file does not look like CIFP data at all
export class CifpValidationError extends Error {
  readonly errors: string[]

  constructor(fileName: string, errors: string[]) {
    super(`${fileName} is not a valid CIFP file: ${errors.join('; ')}`)
    this.name = 'CifpValidationError'
    this.errors = errors
  }
}
