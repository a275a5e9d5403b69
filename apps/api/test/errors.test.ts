import { describe, expect, it } from 'vitest';
import { AppError, errorMessage, InvalidInputError, ProviderUnavailableError } from '../src/errors.js';

describe('errorMessage', () => {
  it('reads the message of an Error', () => {
    expect(errorMessage(new URIError('URI malformed'))).toBe('URI malformed');
  });

  it('stringifies anything else', () => {
    expect(errorMessage('socket closed')).toBe('socket closed');
    expect(errorMessage(42)).toBe('42');
  });
});

describe('AppError subclasses', () => {
  it('carry their code and status', () => {
    const invalid = new InvalidInputError('Target property is missing an address', 'address');
    expect(invalid).toBeInstanceOf(AppError);
    expect([invalid.name, invalid.code, invalid.status, invalid.field]).toEqual([
      'InvalidInputError',
      'INVALID_INPUT',
      400,
      'address'
    ]);

    const unavailable = new ProviderUnavailableError('mashvisor', 'mashvisor request failed (503): ', {
      upstreamStatus: 503
    });
    expect([unavailable.code, unavailable.status, unavailable.provider, unavailable.upstreamStatus]).toEqual([
      'PROVIDER_UNAVAILABLE',
      502,
      'mashvisor',
      503
    ]);
  });
});
