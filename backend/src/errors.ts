export class DecodeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'DecodeError'
  }
}

/** A well-formed WAV whose codec the in-process decoder does not handle */
export class UnsupportedWavEncodingError extends DecodeError {
  constructor(readonly formatTag: number, readonly bitsPerSample: number) {
    super(`Unsupported WAV encoding (format tag 0x${formatTag.toString(16)}, ${bitsPerSample}-bit)`)
    this.name = 'UnsupportedWavEncodingError'
  }
}

export class TempoEstimationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'TempoEstimationError'
  }
}

export class CatalogError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'CatalogError'
  }
}

export class UnsupportedFormatError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UnsupportedFormatError'
  }
}
