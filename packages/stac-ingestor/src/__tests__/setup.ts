/**
 * Global Test Setup
 *
 * Keeps test output quiet; modules read LOG_LEVEL when first imported.
 */

process.env.LOG_LEVEL ??= 'error';
