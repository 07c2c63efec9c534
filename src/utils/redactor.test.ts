import { describe, expect, it } from 'vitest';
import { Redactor, isSensitiveKey, maskSensitive } from './redactor.ts';

describe('Redactor', () => {
  const redactor = new Redactor({
    api_key: 'test-secret-1',
    password: 'hunter22',
    region: 'eu-west-1',
  });

  it('should redact secret values from a string', () => {
    expect(redactor.redact('key=test-secret-1 pw=hunter22')).toBe(
      'key=***REDACTED*** pw=***REDACTED***'
    );
  });

  it('should leave short values under non-sensitive keys alone', () => {
    expect(redactor.redact('region eu-west-1')).toBe('region eu-west-1');
  });

  it('should redact longer secrets first', () => {
    const overlapping = new Redactor({}, { forcedSecrets: ['abc', 'abc-longer'] });
    expect(overlapping.redact('Value: abc-longer')).toBe('Value: ***REDACTED***');
  });

  it('should escape regex characters in secrets', () => {
    const special = new Redactor({ token: 'a.b*c+d?e' });
    expect(special.redact('got a.b*c+d?e')).toBe('got ***REDACTED***');
  });

  it('should ignore blocklisted words', () => {
    const blocked = new Redactor({ token: 'default' });
    expect(blocked.active).toBe(false);
    expect(blocked.redact('default')).toBe('default');
  });

  it('should redact nested values', () => {
    expect(redactor.redactValue({ list: ['hunter22', 'ok'], n: 3 })).toEqual({
      list: ['***REDACTED***', 'ok'],
      n: 3,
    });
  });
});

describe('maskSensitive', () => {
  it('should detect sensitive key names', () => {
    expect(isSensitiveKey('GITHUB_TOKEN')).toBe(true);
    expect(isSensitiveKey('Authorization')).toBe(true);
    expect(isSensitiveKey('apiKey')).toBe(true);
    expect(isSensitiveKey('username')).toBe(false);
  });

  it('should mask values under sensitive keys at any depth', () => {
    const input = { user: 'ada', auth: { password: 'x' }, items: [{ api_key: 'y', id: 1 }] };
    expect(maskSensitive(input)).toEqual({
      user: 'ada',
      auth: '***MASKED***',
      items: [{ api_key: '***MASKED***', id: 1 }],
    });
    expect(input.items[0].api_key).toBe('y');
  });
});
