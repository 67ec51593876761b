/**
 * Consolidated error system for course-timetabler.
 *
 * All error classes extend TimetableError, which carries a typed error code.
 * An incomplete search is not an error: it is returned as a SearchIncomplete value.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const TimetableErrorCode = {
  // Model building
  CONSTRUCTION: 'CONSTRUCTION',

  // Domain construction
  EMPTY_DOMAIN: 'EMPTY_DOMAIN',

  // Solve configuration
  VALIDATION: 'VALIDATION',

  // Time parsing
  PARSE_ERROR: 'PARSE_ERROR',
} as const

export type TimetableErrorCode = (typeof TimetableErrorCode)[keyof typeof TimetableErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class TimetableError extends Error {
  readonly code: TimetableErrorCode

  constructor(code: TimetableErrorCode, message: string) {
    super(message)
    this.name = 'TimetableError'
    this.code = code
  }
}

// ============================================================================
// Model Errors
// ============================================================================

export type ConstructionEntity = 'course' | 'instructor' | 'room' | 'timeslot' | 'section'

/**
 * A catalog record references a missing entity or carries an unparseable
 * required field. Model building stops at the first one.
 */
export class ConstructionError extends TimetableError {
  readonly entity: ConstructionEntity
  readonly entityId: string
  readonly field: string

  constructor(entity: ConstructionEntity, entityId: string, field: string, message: string) {
    super(TimetableErrorCode.CONSTRUCTION, message)
    this.name = 'ConstructionError'
    this.entity = entity
    this.entityId = entityId
    this.field = field
  }
}

export class EmptyDomainError extends TimetableError {
  readonly variableKey: string

  constructor(variableKey: string, message: string) {
    super(TimetableErrorCode.EMPTY_DOMAIN, message)
    this.name = 'EmptyDomainError'
    this.variableKey = variableKey
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

export class ValidationError extends TimetableError {
  constructor(message: string) {
    super(TimetableErrorCode.VALIDATION, message)
    this.name = 'ValidationError'
  }
}

// ============================================================================
// Time Errors
// ============================================================================

export class ParseError extends TimetableError {
  constructor(message: string) {
    super(TimetableErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}
