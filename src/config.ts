// Default paths and constants

/** Maximum number of days allowed between calibrations. */
export const CALIBRATION_INTERVAL_DAYS = 365;

/** Planner rounds allowed per instruction before the loop is stopped. */
export const DEFAULT_MAX_ITERATIONS = 15;

/** Directory holding the directive corpus (.md / .txt files). */
export const DEFAULT_DIRECTIVES_DIR = 'data/directives';

export const DIRECTIVE_SEARCH_TOP_K = 3;
export const DIRECTIVE_SOURCES_SHOWN = 2;
export const DIRECTIVE_SEARCH_TIMEOUT_MS = 10_000;

export const DATE_FORMAT = 'yyyy-MM-dd';

export const EXAMPLE_INSTRUCTIONS = [
    'List all facilities',
    'Audit facility FAC-AB-001 for Directive 017 compliance',
    'Check calibration compliance at FAC-AB-001 and email results to safety@example.com',
    'What are the calibration requirements in Directive 017?',
    'Perform full audit of FAC-AB-002 and schedule maintenance if needed',
];
