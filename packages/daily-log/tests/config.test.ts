// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { describe, it, expect } from 'vitest';
import { localIsoDate } from '../src/clock.js';
import { isIsoDate, parseStoreConfig } from '../src/config.js';
import {
  DailyLogError,
  InvalidConfigError,
  InvalidDateError,
  classifyIoError,
  describeError,
  type IoErrorKind,
} from '../src/errors.js';

describe('parseStoreConfig', () => {
  it('defaults the directory to the working directory', () => {
    expect(parseStoreConfig({})).toEqual({ directory: '.' });
  });

  it('keeps a valid date', () => {
    expect(parseStoreConfig({ directory: 'logs', date: '2020-07-04' })).toEqual({
      directory: 'logs',
      date: '2020-07-04',
    });
  });

  it('lists every invalid field', () => {
    let caught: unknown;
    try {
      parseStoreConfig({ directory: '', date: '2020-7-4' });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(InvalidConfigError);
    expect(caught).toMatchObject({
      code: 'INVALID_CONFIG',
      details: [
        'directory: String must contain at least 1 character(s)',
        'date: must be an ISO 8601 date (YYYY-MM-DD)',
      ],
    });
  });
});

describe('isIsoDate', () => {
  it.each(['2020-07-04', '1999-12-31', '2024-02-30'])('accepts %s', (value) => {
    expect(isIsoDate(value)).toBe(true);
  });

  it.each(['2020-07-4', '2020/07/04', '2020-07-04T00:00:00Z', ''])('rejects %j', (value) => {
    expect(isIsoDate(value)).toBe(false);
  });
});

describe('localIsoDate', () => {
  it('pads month and day', () => {
    expect(localIsoDate(new Date(2020, 6, 4, 12))).toBe('2020-07-04');
  });
});

describe('errors', () => {
  it('keeps the prototype chain for subclasses', () => {
    const error = new InvalidDateError('nope');
    expect(error).toBeInstanceOf(DailyLogError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('InvalidDateError');
    expect(error.code).toBe('INVALID_DATE');
    expect(error.message).toBe('Date "nope" is invalid (should be YYYY-MM-DD).');
  });

  it.each<[string, IoErrorKind]>([
    ['EACCES', 'access_denied'],
    ['EPERM', 'access_denied'],
    ['ENOENT', 'not_found'],
    ['ENOSPC', 'general_failure'],
  ])('classifies %s as %s', (code, kind) => {
    const error = Object.assign(new Error('io'), { code });
    expect(classifyIoError(error)).toBe(kind);
  });

  it('classifies values without an errno code as general failures', () => {
    expect(classifyIoError('boom')).toBe('general_failure');
    expect(classifyIoError({ code: 13 })).toBe('general_failure');
  });

  it('describes thrown values', () => {
    expect(describeError(new Error('disk full'))).toBe('disk full');
    expect(describeError(42)).toBe('42');
  });
});
