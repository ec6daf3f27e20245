export type SessionResolverErrorCode = 'RULES_CONFIG_ERROR' | 'PATTERN_EXHAUSTED'

/**
 * Failures of the resolver itself. Both codes point at the rules data
 * (operator side), never at the athlete's input.
 */
export class SessionResolverError extends Error {
  constructor(
    readonly code: SessionResolverErrorCode,
    message: string,
    readonly details: Record<string, unknown> = {},
  ) {
    super(message)
    this.name = new.target.name
  }
}

/** A selection, protocol level or library entry needed for a reachable combination is missing or invalid */
export class RulesConfigError extends SessionResolverError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('RULES_CONFIG_ERROR', message, details)
  }
}

/** Every MAIN candidate resolved to SKIP for the current state */
export class PatternExhaustionError extends SessionResolverError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('PATTERN_EXHAUSTED', message, details)
  }
}
