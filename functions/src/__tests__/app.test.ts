import { resolveAllowedOrigins } from '../app';
import { createTestContext } from './helpers/context';

describe('resolveAllowedOrigins', () => {
  it('adds the front-end origin and local development origins', () => {
    const { context } = createTestContext({ config: { corsAllowedOrigins: ['https://admin.example.test'] } });

    expect(resolveAllowedOrigins(context)).toEqual([
      'https://admin.example.test',
      'https://app.example.test',
      'http://localhost:3000',
      'http://localhost:5173',
      'http://localhost:8080',
    ]);
  });

  it('drops development origins in production', () => {
    const { context } = createTestContext({ config: { isProduction: true } });

    expect(resolveAllowedOrigins(context)).toEqual(['https://app.example.test']);
  });

  it('keeps a wildcard as-is', () => {
    const { context } = createTestContext({ config: { corsAllowedOrigins: '*' } });

    expect(resolveAllowedOrigins(context)).toBe('*');
  });
});
