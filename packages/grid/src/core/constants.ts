/**
 * Core Constants
 */

// =============================================================================
// ENVIRONMENT
// =============================================================================

/** Development builds emit `console.warn` diagnostics for suspicious calls */
export const DEV_MODE = process.env.NODE_ENV !== "production";

// =============================================================================
// FORMATTING
// =============================================================================

/** Indentation of each row in the diagnostic text form */
export const FORMAT_ROW_INDENT = "  ";
