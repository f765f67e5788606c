/**
 * Jest setup file.
 * Keeps pino quiet and provides a global fetch mock so tests can stub it.
 */

declare const global: { fetch?: typeof fetch };

process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'silent';

if (!global.fetch) {
  global.fetch = (jest.fn() as unknown) as typeof fetch;
}

export {};
