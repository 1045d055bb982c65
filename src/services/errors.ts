/**
 * Structured Error Handling for the wallet ledger
 *
 * Provides consistent error types, codes, and handling across the library.
 * Codes follow the JSON-RPC numbering convention so they can be surfaced
 * unchanged over an RPC boundary.
 */

export const ErrorCodes = {
  // JSON-RPC standard errors
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,

  // Application-specific errors (-32000 to -32099)
  GENERIC_ERROR: -32000,
  INVALID_PASSWORD: -32001,
  INCOMPATIBLE_WALLET: -32002,
  TRANSACTION_REMOVAL: -32003,
  DERIVATION_EXHAUSTED: -32004,
  DEVICE_UNAVAILABLE: -32005,
  INVALID_TRANSACTION_STATE: -32006,
  TRANSACTION_NOT_FOUND: -32007,
  INVALID_KEYSTORE_TEXT: -32008,
  DATABASE_ERROR: -32009,
  DECRYPTION_ERROR: -32010,
  UNKNOWN_ACCOUNT: -32011,
  UNKNOWN_KEYINSTANCE: -32012,
  TIMEOUT_ERROR: -32013,
  CANCELLED: -32014,
} as const

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes]

/**
 * Application error with structured code and context
 */
export class AppError extends Error {
  public readonly code: ErrorCode
  public readonly context?: Record<string, unknown>
  public readonly timestamp: number

  constructor(
    message: string,
    code: ErrorCode = ErrorCodes.GENERIC_ERROR,
    context?: Record<string, unknown>
  ) {
    super(message)
    this.name = 'AppError'
    this.code = code
    this.context = context
    this.timestamp = Date.now()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AppError)
    }
  }

  /**
   * Convert to JSON-RPC error format
   */
  toJSON(): { code: number; message: string; data?: unknown } {
    return {
      code: this.code,
      message: this.message,
      ...(this.context && { data: this.context })
    }
  }

  /**
   * Create error from unknown caught value
   */
  static fromUnknown(error: unknown, defaultCode: ErrorCode = ErrorCodes.GENERIC_ERROR): AppError {
    if (error instanceof AppError) {
      return error
    }

    if (error instanceof Error) {
      return new AppError(error.message, defaultCode, { originalError: error.name })
    }

    if (typeof error === 'string') {
      return new AppError(error, defaultCode)
    }

    return new AppError('An unknown error occurred', defaultCode)
  }
}

export class WalletError extends AppError {
  constructor(message: string, code: ErrorCode = ErrorCodes.GENERIC_ERROR, context?: Record<string, unknown>) {
    super(message, code, context)
    this.name = 'WalletError'
  }
}

/**
 * The supplied password does not decrypt a keystore secret.
 */
export class InvalidPasswordError extends WalletError {
  constructor(context?: Record<string, unknown>) {
    super('Invalid password', ErrorCodes.INVALID_PASSWORD, context)
    this.name = 'InvalidPasswordError'
  }
}

/**
 * The operation does not apply to this keystore or account variant.
 */
export class IncompatibleWalletError extends WalletError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCodes.INCOMPATIBLE_WALLET, context)
    this.name = 'IncompatibleWalletError'
  }
}

export class TransactionRemovalError extends WalletError {
  constructor(txHash: string, spentBy: string[]) {
    super(
      `Transaction ${txHash} has outputs spent by live transactions`,
      ErrorCodes.TRANSACTION_REMOVAL,
      { txHash, spentBy }
    )
    this.name = 'TransactionRemovalError'
  }
}

export class DerivationExhaustedError extends WalletError {
  constructor(pathPrefix: string, nextIndex: number) {
    super(
      `No non-hardened indexes left under ${pathPrefix}`,
      ErrorCodes.DERIVATION_EXHAUSTED,
      { pathPrefix, nextIndex }
    )
    this.name = 'DerivationExhaustedError'
  }
}

export class DeviceUnavailableError extends WalletError {
  constructor(hwType: string, cause?: unknown) {
    super(
      `Signing device ${hwType} is unavailable`,
      ErrorCodes.DEVICE_UNAVAILABLE,
      cause instanceof Error ? { hwType, cause: cause.message } : { hwType }
    )
    this.name = 'DeviceUnavailableError'
  }
}

export class InvalidTransactionStateError extends WalletError {
  constructor(txHash: string, flags: number, action: string) {
    super(
      `Cannot ${action} transaction ${txHash} in its current state`,
      ErrorCodes.INVALID_TRANSACTION_STATE,
      { txHash, flags, action }
    )
    this.name = 'InvalidTransactionStateError'
  }
}

export class TransactionNotFoundError extends WalletError {
  constructor(txHash: string) {
    super(`Transaction not found: ${txHash}`, ErrorCodes.TRANSACTION_NOT_FOUND, { txHash })
    this.name = 'TransactionNotFoundError'
  }
}

export class InvalidKeystoreTextError extends WalletError {
  constructor(textType: string, reason: string) {
    super(`Unable to use ${textType} text: ${reason}`, ErrorCodes.INVALID_KEYSTORE_TEXT, { textType })
    this.name = 'InvalidKeystoreTextError'
  }
}

export class UnknownAccountError extends WalletError {
  constructor(accountId: number) {
    super(`Unknown account: ${accountId}`, ErrorCodes.UNKNOWN_ACCOUNT, { accountId })
    this.name = 'UnknownAccountError'
  }
}

export class UnknownKeyInstanceError extends WalletError {
  constructor(keyinstanceId: number) {
    super(`Unknown key instance: ${keyinstanceId}`, ErrorCodes.UNKNOWN_KEYINSTANCE, { keyinstanceId })
    this.name = 'UnknownKeyInstanceError'
  }
}

export class DatabaseError extends AppError {
  constructor(message: string, operation?: string) {
    super(message, ErrorCodes.DATABASE_ERROR, operation ? { operation } : undefined)
    this.name = 'DatabaseError'
  }
}

export class DecryptionError extends AppError {
  constructor(message: string = 'Decryption failed - invalid password or corrupted data') {
    super(message, ErrorCodes.DECRYPTION_ERROR)
    this.name = 'DecryptionError'
  }
}

export class TimeoutError extends AppError {
  constructor(operation: string, timeoutMs: number) {
    super(
      `Operation timed out: ${operation}`,
      ErrorCodes.TIMEOUT_ERROR,
      { operation, timeoutMs }
    )
    this.name = 'TimeoutError'
  }
}

/**
 * Type guard to check if a value is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError
}
