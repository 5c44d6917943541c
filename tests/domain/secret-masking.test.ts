/**
 * Secret masking keeps the platform token and bind password out of logs
 * and owner messages.
 */

import { maskSecret, maskSecretsInMessage } from '../../src/domain/errors';

describe('maskSecret', () => {
  it('masks all but last 4 characters for long secrets', () => {
    const secret = 'test-secret-token';
    expect(maskSecret(secret)).toBe('*'.repeat(secret.length - 4) + 'oken');
  });

  it('fully masks secrets shorter than 8 characters', () => {
    expect(maskSecret('short')).toBe('****');
    expect(maskSecret('1234567')).toBe('****');
  });

  it('preserves last 4 characters for 8-character secrets', () => {
    expect(maskSecret('12345678')).toBe('****5678');
  });

  it('handles empty string', () => {
    expect(maskSecret('')).toBe('****');
  });
});

describe('maskSecretsInMessage', () => {
  it('masks every occurrence of every secret', () => {
    const result = maskSecretsInMessage('bind as svc with test-password failed; retry test-password', [
      'test-password',
      'test-secret',
    ]);
    expect(result).toBe('bind as svc with *********word failed; retry *********word');
  });

  it('treats regex characters literally', () => {
    expect(maskSecretsInMessage('token a.b*c+d$e leaked', ['a.b*c+d$e'])).toBe('token *****+d$e leaked');
  });

  it('ignores empty secrets', () => {
    expect(maskSecretsInMessage('nothing to hide', [''])).toBe('nothing to hide');
  });
});
