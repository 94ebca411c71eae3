import { describe, it, expect } from 'vitest';
import { toErrorDisplay, getHintForCode } from './error-display.js';
import {
  ConfigError,
  InvalidSearchConfigError,
  InvalidTitleError,
  TransportError,
} from '../../../shared/errors.js';

describe('toErrorDisplay', () => {
  it('exits with 2 for configuration errors', () => {
    const display = toErrorDisplay(
      new InvalidSearchConfigError('queryLimit must not exceed 500 (got 501)'),
    );

    expect(display).toMatchObject({
      message: 'queryLimit must not exceed 500 (got 501)',
      code: 'INVALID_SEARCH_CONFIG',
      exitCode: 2,
    });
    expect(toErrorDisplay(new ConfigError('bad json')).exitCode).toBe(2);
  });

  it('exits with 1 for other wikiladder errors and carries the cause', () => {
    const display = toErrorDisplay(
      new TransportError('Request failed after 3 attempt(s)', 503, new Error('HTTP 503')),
    );

    expect(display).toMatchObject({
      code: 'TRANSPORT_ERROR',
      cause: 'HTTP 503',
      exitCode: 1,
      hint: getHintForCode('TRANSPORT_ERROR'),
    });
  });

  it('hints at the forbidden title characters', () => {
    const display = toErrorDisplay(new InvalidTitleError('a{b', 'contains one of { } < > [ ] |'));

    expect(display.hint).toBe('Titles must not be empty or contain any of { } < > [ ] |.');
  });

  it('falls back to the message of a plain Error', () => {
    expect(toErrorDisplay(new Error('boom'))).toMatchObject({ message: 'boom' });
    expect(toErrorDisplay(42)).toEqual({ message: '42' });
  });
});
