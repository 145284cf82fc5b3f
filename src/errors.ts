/**
 * Consolidated error system for quota-keeper.
 *
 * All error classes extend QuotaKeeperError, which carries a typed error code.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const QuotaKeeperErrorCode = {
  // Schedule validation
  INVALID_FORMAT: 'INVALID_FORMAT',
  DUPLICATE_TARGET: 'DUPLICATE_TARGET',
  CONFLICT: 'CONFLICT',

  // Configuration
  INVALID_CONFIG: 'INVALID_CONFIG',
  UNSUPPORTED_PLATFORM: 'UNSUPPORTED_PLATFORM',

  // Trigger action
  ACTION_FAILED: 'ACTION_FAILED',
  CANCELLED: 'CANCELLED',
} as const

export type QuotaKeeperErrorCode = (typeof QuotaKeeperErrorCode)[keyof typeof QuotaKeeperErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class QuotaKeeperError extends Error {
  readonly code: QuotaKeeperErrorCode

  constructor(code: QuotaKeeperErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'QuotaKeeperError'
    this.code = code
  }
}

// ============================================================================
// Schedule Validation Errors
// ============================================================================

export class InvalidFormatError extends QuotaKeeperError {
  readonly input: string

  constructor(input: string, message?: string) {
    super(QuotaKeeperErrorCode.INVALID_FORMAT, message ?? `Invalid time format, expected HH:MM: '${input}'`)
    this.name = 'InvalidFormatError'
    this.input = input
  }
}

export class DuplicateTargetError extends QuotaKeeperError {
  readonly targetTime: string

  constructor(targetTime: string) {
    super(QuotaKeeperErrorCode.DUPLICATE_TARGET, `Duplicate target time: ${targetTime}`)
    this.name = 'DuplicateTargetError'
    this.targetTime = targetTime
  }
}

/** Diagnostic payload describing two targets whose quota windows overlap */
export type ConflictDetail = {
  /** Target whose trigger falls inside the other window */
  target: string
  targetTrigger: string
  /** Target that opened the window */
  other: string
  otherTrigger: string
  windowStart: string
  windowEnd: string
  intervalHours: number
}

export class ConflictError extends QuotaKeeperError {
  readonly detail: ConflictDetail

  constructor(detail: ConflictDetail) {
    super(
      QuotaKeeperErrorCode.CONFLICT,
      `Conflicting target times: ${detail.target} and ${detail.other}\n` +
        `  Trigger for ${detail.target} would be at ${detail.targetTrigger}\n` +
        `  Trigger for ${detail.other} would be at ${detail.otherTrigger}\n` +
        `  The trigger for ${detail.target} falls within the quota window of ${detail.other} ` +
        `[${detail.windowStart}, ${detail.windowEnd})\n` +
        `  Target times must be at least ${detail.intervalHours} hours apart`
    )
    this.name = 'ConflictError'
    this.detail = detail
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

export class ConfigError extends QuotaKeeperError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(QuotaKeeperErrorCode.INVALID_CONFIG, message, options)
    this.name = 'ConfigError'
  }
}

export class UnsupportedPlatformError extends QuotaKeeperError {
  readonly type: string

  constructor(type: string, supported: readonly string[]) {
    super(
      QuotaKeeperErrorCode.UNSUPPORTED_PLATFORM,
      `Platform type '${type}' is not supported (supported: ${supported.join(', ')})`
    )
    this.name = 'UnsupportedPlatformError'
    this.type = type
  }
}

// ============================================================================
// Trigger Action Errors
// ============================================================================

export class ActionFailedError extends QuotaKeeperError {
  readonly attempts: number

  constructor(attempts: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(QuotaKeeperErrorCode.ACTION_FAILED, `Trigger failed after ${attempts} attempts: ${reason}`, { cause })
    this.name = 'ActionFailedError'
    this.attempts = attempts
  }
}

export class CancelledError extends QuotaKeeperError {
  constructor(message = 'Operation cancelled') {
    super(QuotaKeeperErrorCode.CANCELLED, message)
    this.name = 'CancelledError'
  }
}
