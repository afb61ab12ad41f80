/**
 * Jest Setup File
 *
 * Runs before every test file. Unit tests never reach AWS: clients are mocked
 * or injected, so placeholder credentials and a region are enough for the SDK
 * to construct without walking the default provider chain.
 */

process.env.AWS_REGION = process.env.AWS_REGION || 'us-east-1';
process.env.AWS_ACCESS_KEY_ID = 'test-key';
process.env.AWS_SECRET_ACCESS_KEY = 'test-secret';
delete process.env.AWS_ENDPOINT_URL;
delete process.env.LOG_LEVEL;

// Suppress console output during tests to avoid "● Console" blocks in Jest output.
// Tests that assert on console (e.g. Logger.test.ts) use jest.spyOn, which overrides this noop.
const noop = (): void => undefined;
console.warn = noop;
console.log = noop;
console.error = noop;
