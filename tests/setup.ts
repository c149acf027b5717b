/**
 * Jest test setup file
 * Runs before each test file
 */

// Set test environment variables
process.env.NODE_ENV = 'test';

// No test reaches a real service: drop any credentials from the shell
delete process.env.ANTHROPIC_API_KEY;
delete process.env.NOTION_API_KEY;
delete process.env.GMAIL_ACCESS_TOKEN;
delete process.env.CLAY_FIRM_WEBHOOK_URL;
delete process.env.CLAY_PERSON_WEBHOOK_URL;
