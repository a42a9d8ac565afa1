import { describe, expect, it } from 'vitest';
import { createOriginPolicy } from '../config/cors.js';

describe('createOriginPolicy', () => {
  it('admits configured origins and their loopback aliases', () => {
    const policy = createOriginPolicy('http://localhost:5173, https://advisor.example.org', false);

    expect(policy.allowedOrigins).toEqual([
      'http://localhost:5173',
      'http://127.0.0.1:5173',
      'http://[::1]:5173',
      'https://advisor.example.org'
    ]);
    expect(policy.isOriginAllowed('http://127.0.0.1:5173')).toBe(true);
    expect(policy.isOriginAllowed('HTTPS://Advisor.Example.org')).toBe(true);
    expect(policy.isOriginAllowed('http://localhost:3000')).toBe(false);
  });

  it('allows requests without an origin', () => {
    expect(createOriginPolicy('https://advisor.example.org', false).isOriginAllowed(undefined)).toBe(true);
  });

  it('admits any loopback port only when asked to', () => {
    const policy = createOriginPolicy('https://advisor.example.org', true);

    expect(policy.isOriginAllowed('http://localhost:4000')).toBe(true);
    expect(policy.isOriginAllowed('https://evil.example.com')).toBe(false);
  });
});
