/**
 * Consolidated error system for timescan.
 *
 * All error classes extend TimescanError, which carries a typed error code.
 * Errors are thrown only while building parsers and scanners; scan() itself
 * never throws.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const TimescanErrorCode = {
  // Configuration
  VALIDATION: 'VALIDATION',

  // Language modules
  INVALID_LANGUAGE_MODULE: 'INVALID_LANGUAGE_MODULE',
  DUPLICATE_LANGUAGE: 'DUPLICATE_LANGUAGE',

  // Rule application
  RULE_FAILED: 'RULE_FAILED',
} as const

export type TimescanErrorCode = (typeof TimescanErrorCode)[keyof typeof TimescanErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class TimescanError extends Error {
  readonly code: TimescanErrorCode

  constructor(code: TimescanErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'TimescanError'
    this.code = code
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

export class ValidationError extends TimescanError {
  constructor(message: string) {
    super(TimescanErrorCode.VALIDATION, message)
    this.name = 'ValidationError'
  }
}

// ============================================================================
// Language Module Errors
// ============================================================================

export class InvalidLanguageModuleError extends TimescanError {
  constructor(message: string) {
    super(TimescanErrorCode.INVALID_LANGUAGE_MODULE, message)
    this.name = 'InvalidLanguageModuleError'
  }
}

export class DuplicateLanguageError extends TimescanError {
  constructor(message: string) {
    super(TimescanErrorCode.DUPLICATE_LANGUAGE, message)
    this.name = 'DuplicateLanguageError'
  }
}

// ============================================================================
// Rule Errors
// ============================================================================

/** A resolver threw instead of declining. The candidate it was resolving is dropped. */
export class RuleFailedError extends TimescanError {
  readonly language: string
  readonly ruleIndex: number

  constructor(language: string, ruleIndex: number, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause)
    super(TimescanErrorCode.RULE_FAILED, `Rule ${ruleIndex} of language '${language}' failed: ${detail}`, { cause })
    this.name = 'RuleFailedError'
    this.language = language
    this.ruleIndex = ruleIndex
  }
}
