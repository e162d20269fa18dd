export class InvalidCryptoExchangeError extends Error {
  public code: string

  constructor (message = 'Invalid crypto exchange') {
    super(message);
    this.name = 'InvalidCryptoExchangeError';
    this.code = InvalidCryptoExchangeError.code;
  }

  static get code (): string {
    return 'ERR_INVALID_CRYPTO_EXCHANGE';
  }
}

export class TransportError extends Error {
  public code: string
  public readonly closed: boolean

  constructor (message = 'Transport failure', options?: { closed?: boolean, cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'TransportError';
    this.code = TransportError.code;
    this.closed = options?.closed ?? false;
  }

  static get code (): string {
    return 'ERR_TRANSPORT';
  }
}

export class FrameTooLargeError extends TransportError {
  constructor (length: number, maxLength: number) {
    super(`frame of ${length} bytes exceeds maximum of ${maxLength} bytes`);
    this.name = 'FrameTooLargeError';
    this.code = FrameTooLargeError.code;
  }

  static get code (): string {
    return 'ERR_FRAME_TOO_LARGE';
  }
}

export class DecryptionError extends Error {
  public code: string

  constructor (message = 'Failed to validate decrypted chunk') {
    super(message);
    this.name = 'DecryptionError';
    this.code = DecryptionError.code;
  }

  static get code (): string {
    return 'ERR_DECRYPTION';
  }
}

export class SerializationError extends Error {
  public code: string

  constructor (message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'SerializationError';
    this.code = SerializationError.code;
  }

  static get code (): string {
    return 'ERR_SERIALIZATION';
  }
}

export class InvalidStateError extends Error {
  public code: string

  constructor (message: string) {
    super(message);
    this.name = 'InvalidStateError';
    this.code = InvalidStateError.code;
  }

  static get code (): string {
    return 'ERR_INVALID_STATE';
  }
}

export class RemoteCallError extends Error {
  public code: string
  public readonly serviceMethod: string

  constructor (serviceMethod: string, message: string) {
    super(message);
    this.name = 'RemoteCallError';
    this.code = RemoteCallError.code;
    this.serviceMethod = serviceMethod;
  }

  static get code (): string {
    return 'ERR_REMOTE_CALL';
  }
}

export function toError (err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
