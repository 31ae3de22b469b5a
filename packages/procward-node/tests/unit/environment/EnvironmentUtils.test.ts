/**
 * EnvironmentUtils tests
 */

import { describe, it, expect, vi } from 'vitest';
import { ConfigurationError } from '@procward/core';
import {
  addVariableToEnvironment,
  getProcEnvironment,
} from '../../../src/environment/EnvironmentUtils.js';

describe('EnvironmentUtils', () => {
  describe('getProcEnvironment', () => {
    it('should copy the current environment', () => {
      vi.stubEnv('PROCWARD_TEST_VALUE', 'copied');

      const env = getProcEnvironment();
      env.PROCWARD_TEST_VALUE = 'changed';

      expect(process.env.PROCWARD_TEST_VALUE).toBe('copied');
      expect(Object.values(env).every((value) => typeof value === 'string')).toBe(true);
    });
  });

  describe('addVariableToEnvironment', () => {
    it('should add a variable without touching the original', () => {
      const original = { PATH: '/usr/bin' };

      const env = addVariableToEnvironment(original, 'GREETING=hello');

      expect(env).toEqual({ PATH: '/usr/bin', GREETING: 'hello' });
      expect(original).toEqual({ PATH: '/usr/bin' });
    });

    it('should split on the first equals sign only', () => {
      expect(addVariableToEnvironment({}, 'OPTS=a=1,b=2')).toEqual({ OPTS: 'a=1,b=2' });
    });

    it('should allow an empty value and replace an existing one', () => {
      expect(addVariableToEnvironment({ EMPTY: 'x' }, 'EMPTY=')).toEqual({ EMPTY: '' });
    });

    it.each(['NO_EQUALS', '=value'])('should reject %s', (keyAndValue) => {
      expect(() => addVariableToEnvironment({}, keyAndValue)).toThrow(ConfigurationError);
    });
  });
});
