/**
 * Jest environment: quiet logs, no narrator credentials.
 */

process.env.LOG_LEVEL ??= 'silent';
delete process.env.OPENAI_API_KEY;
