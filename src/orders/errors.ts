export class InvalidOrderDateError extends Error {
  constructor(value: string) {
    super(`Invalid order date: "${value}"`)
    this.name = 'InvalidOrderDateError'
  }
}

export class MissingColumnError extends Error {
  constructor(column: string, source: string) {
    super(`Missing required column "${column}" in ${source}`)
    this.name = 'MissingColumnError'
  }
}

export class CsvFormatError extends Error {
  constructor(message: string, source: string) {
    super(`Could not read ${source}: ${message}`)
    this.name = 'CsvFormatError'
  }
}
