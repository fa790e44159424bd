/**
 * Error codes for all callflow errors.
 * Used to identify error types programmatically.
 */
export enum CallflowErrorCode {
  // Scanning
  LEX_ERROR = 'LEX_ERROR',
  TRUNCATED_LITERAL = 'TRUNCATED_LITERAL',

  // Input
  UNREADABLE_INPUT = 'UNREADABLE_INPUT',
  INVALID_INPUT = 'INVALID_INPUT',

  // Configuration
  CONFIG_INVALID = 'CONFIG_INVALID',
}
