import { InvalidArgumentError } from 'commander';
import { describe, expect, it } from 'vitest';

import {
  buildConfigInput,
  parseHeaders,
  parseNumberOption,
  parsePayload,
} from '../src/cli-options';
import { InvalidConfigurationError } from '../src/errors';

describe('cli-options', () => {
  describe('parseHeaders', () => {
    it('should split each header at its first colon and trim both sides', () => {
      expect(
        parseHeaders(['X-Trace : abc', 'Referer: http://localhost:3000/page']),
      ).toEqual({
        'X-Trace': 'abc',
        Referer: 'http://localhost:3000/page',
      });
    });

    it('should allow an empty value', () => {
      expect(parseHeaders(['X-Empty:'])).toEqual({ 'X-Empty': '' });
    });

    it.each(['no-colon', ':value', '  : value'])(
      'should reject the malformed header %j',
      (header) => {
        expect(() => parseHeaders([header])).toThrow(InvalidConfigurationError);
      },
    );
  });

  describe('parsePayload', () => {
    it('should parse JSON objects and arrays', () => {
      expect(parsePayload('{"name":"item"}')).toEqual({ name: 'item' });
      expect(parsePayload('[1,2]')).toEqual([1, 2]);
    });

    it('should keep anything else as the raw string', () => {
      expect(parsePayload('name=item')).toBe('name=item');
      expect(parsePayload('42')).toBe('42');
      expect(parsePayload('"quoted"')).toBe('"quoted"');
    });
  });

  describe('parseNumberOption', () => {
    it('should parse numbers', () => {
      expect(parseNumberOption('2.5')).toBe(2.5);
    });

    it('should reject text', () => {
      expect(() => parseNumberOption('fast')).toThrow(InvalidArgumentError);
      expect(() => parseNumberOption('')).toThrow(InvalidArgumentError);
    });
  });

  describe('buildConfigInput', () => {
    it('should build a configuration from flags alone', () => {
      expect(
        buildConfigInput('http://localhost:8080/items', {
          qps: 20,
          method: 'post',
          headers: ['X-Trace:abc'],
          payload: '{"name":"item"}',
          verbose: true,
        }),
      ).toEqual({
        url: 'http://localhost:8080/items',
        qps: 20,
        method: 'post',
        headers: { 'X-Trace': 'abc' },
        payload: { name: 'item' },
        verbose: true,
      });
    });

    it('should let flags override the config file and merge headers', () => {
      const fileConfig = {
        url: 'http://localhost:8080/health',
        qps: 5,
        duration: 30,
        headers: { 'X-Trace': 'file', Accept: 'application/json' },
      };

      expect(
        buildConfigInput(
          undefined,
          { qps: 50, headers: ['X-Trace: flag'] },
          fileConfig,
        ),
      ).toEqual({
        url: 'http://localhost:8080/health',
        qps: 50,
        duration: 30,
        headers: { 'X-Trace': 'flag', Accept: 'application/json' },
      });
    });

    it('should reject a config file that is not an object', () => {
      expect(() => buildConfigInput(undefined, {}, [1, 2])).toThrow(
        InvalidConfigurationError,
      );
    });
  });
});
