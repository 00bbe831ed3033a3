/**
 * Jest environment setup: keep structured logs quiet and make sure no test
 * picks up a real API key from the developer's shell.
 */

process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'silent';
process.env.OPENAI_API_KEY = '';
