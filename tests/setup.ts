/**
 * Test setup file
 * Runs before all tests. Env vars are set at import time so that the
 * module-level config and logger see them.
 */

process.env.NODE_ENV = "test";
process.env.LOG_CONSOLE = "false";
process.env.URI_ALLOWED_SCHEMES = "http,https";
