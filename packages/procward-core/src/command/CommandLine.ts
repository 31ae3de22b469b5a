/**
 * CommandLine - immutable executable + arguments with `${name}` substitution
 */

import { ConfigurationError } from '../shared/utils/errors.js';

export type SubstitutionMap = Readonly<Record<string, string>>;

const PLACEHOLDER = /\$\{([^}]+)\}/g;

export class CommandLine {
  private constructor(
    private readonly executable: string,
    private readonly args: readonly string[],
    private readonly substitutionMap: SubstitutionMap | null
  ) {}

  /**
   * Build a command from an executable and its arguments
   */
  static of(executable: string, ...args: string[]): CommandLine {
    if (executable.trim() === '') {
      throw new ConfigurationError('Executable can not be empty');
    }
    return new CommandLine(executable, [...args], null);
  }

  /**
   * Split a command line on whitespace. Single and double quotes group
   * characters into one token and are removed.
   */
  static parse(line: string, substitutionMap: SubstitutionMap | null = null): CommandLine {
    const [executable, ...args] = tokenize(line);
    if (executable === undefined) {
      throw new ConfigurationError('Command line can not be empty');
    }
    return CommandLine.of(executable, ...args).withSubstitutionMap(substitutionMap);
  }

  withArguments(...args: string[]): CommandLine {
    return new CommandLine(this.executable, [...this.args, ...args], this.substitutionMap);
  }

  withSubstitutionMap(substitutionMap: SubstitutionMap | null): CommandLine {
    return new CommandLine(
      this.executable,
      this.args,
      substitutionMap ? { ...substitutionMap } : null
    );
  }

  getSubstitutionMap(): SubstitutionMap | null {
    return this.substitutionMap;
  }

  getExecutable(): string {
    return this.expand(this.executable);
  }

  getArguments(): string[] {
    return this.args.map((arg) => this.expand(arg));
  }

  /**
   * Executable followed by arguments, placeholders expanded
   */
  toStrings(): string[] {
    return [this.getExecutable(), ...this.getArguments()];
  }

  toString(): string {
    return this.toStrings()
      .map((token) => (token === '' || /\s/.test(token) ? `"${token}"` : token))
      .join(' ');
  }

  private expand(value: string): string {
    const map = this.substitutionMap;
    if (!map) {
      return value;
    }
    // Unknown placeholders stay literal
    return value.replace(PLACEHOLDER, (match: string, name: string) =>
      Object.hasOwn(map, name) ? map[name] : match
    );
  }
}

function tokenize(line: string): string[] {
  const tokens: string[] = [];
  let current = '';
  let inToken = false;
  let quote: '"' | "'" | null = null;

  for (const char of line) {
    if (quote !== null) {
      if (char === quote) {
        quote = null;
      } else {
        current += char;
      }
      continue;
    }

    if (char === '"' || char === "'") {
      quote = char;
      inToken = true;
    } else if (/\s/.test(char)) {
      if (inToken) {
        tokens.push(current);
        current = '';
        inToken = false;
      }
    } else {
      current += char;
      inToken = true;
    }
  }

  if (quote !== null) {
    throw new ConfigurationError(`Unbalanced quotes in ${line}`);
  }
  if (inToken) {
    tokens.push(current);
  }
  return tokens;
}
