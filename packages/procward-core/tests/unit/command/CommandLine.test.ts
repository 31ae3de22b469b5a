/**
 * CommandLine tests
 */

import { describe, it, expect } from 'vitest';
import { CommandLine } from '../../../src/command/CommandLine.js';
import { ConfigurationError } from '../../../src/shared/utils/errors.js';

describe('CommandLine', () => {
  describe('of', () => {
    it('should keep the executable and arguments', () => {
      const command = CommandLine.of('git', 'status', '--short');

      expect(command.getExecutable()).toBe('git');
      expect(command.getArguments()).toEqual(['status', '--short']);
      expect(command.toStrings()).toEqual(['git', 'status', '--short']);
    });

    it('should reject a blank executable', () => {
      expect(() => CommandLine.of('  ')).toThrow(ConfigurationError);
    });
  });

  describe('parse', () => {
    it('should split on whitespace', () => {
      const command = CommandLine.parse('  ls   -la\t/tmp ');

      expect(command.toStrings()).toEqual(['ls', '-la', '/tmp']);
    });

    it('should group quoted text into one argument', () => {
      const command = CommandLine.parse(`echo "hello world" 'single quoted' mixed"quo"ted ""`);

      expect(command.getArguments()).toEqual([
        'hello world',
        'single quoted',
        'mixedquoted',
        '',
      ]);
    });

    it('should keep the other quote character inside a quoted argument', () => {
      const command = CommandLine.parse(`echo "it's" 'say "hi"'`);

      expect(command.getArguments()).toEqual(["it's", 'say "hi"']);
    });

    it('should reject unbalanced quotes', () => {
      expect(() => CommandLine.parse('echo "unterminated')).toThrow('Unbalanced quotes');
    });

    it('should reject an empty line', () => {
      expect(() => CommandLine.parse('   ')).toThrow('Command line can not be empty');
    });
  });

  describe('substitution', () => {
    it('should expand placeholders in executable and arguments', () => {
      const command = CommandLine.parse('${tool} --file ${file}.txt', {
        tool: 'cat',
        file: 'notes',
      });

      expect(command.toStrings()).toEqual(['cat', '--file', 'notes.txt']);
    });

    it('should leave unknown placeholders untouched', () => {
      const command = CommandLine.of('echo', '${missing}').withSubstitutionMap({ other: 'x' });

      expect(command.getArguments()).toEqual(['${missing}']);
    });

    it('should ignore inherited object keys', () => {
      const command = CommandLine.of('echo', '${toString}').withSubstitutionMap({});

      expect(command.getArguments()).toEqual(['${toString}']);
    });

    it('should copy the substitution map', () => {
      const map: Record<string, string> = { name: 'first' };
      const command = CommandLine.of('echo', '${name}').withSubstitutionMap(map);
      map.name = 'second';

      expect(command.getArguments()).toEqual(['first']);
      expect(command.getSubstitutionMap()).toEqual({ name: 'first' });
    });
  });

  it('should return new instances when adding arguments', () => {
    const base = CommandLine.of('node');
    const extended = base.withArguments('-e', 'process.exit(0)');

    expect(base.getArguments()).toEqual([]);
    expect(extended.getArguments()).toEqual(['-e', 'process.exit(0)']);
  });

  it('should quote tokens containing whitespace when rendered', () => {
    const command = CommandLine.of('echo', 'hello world', '', 'plain');

    expect(command.toString()).toBe('echo "hello world" "" plain');
  });
});
