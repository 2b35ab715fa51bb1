import { err, ok, validationError, type Result } from '../errors.js';

/** Positional arguments and option values handed over by the argument parser. */
export interface LeafInput {
  args: string[];
  options: Record<string, unknown>;
}

/** Removes repeats, keeping the first occurrence of each value. */
export function orderedSet(values: string[]): string[] {
  return [...new Set(values)];
}

/**
 * Reads typed parameters out of a {@link LeafInput}, collecting every
 * problem so that one ValidationError reports all of them.
 */
export class ParamReader {
  private problems: string[] = [];

  constructor(private readonly input: LeafInput) {}

  argument(index: number, label: string): string {
    const value = this.input.args[index];
    if (typeof value !== 'string' || value.trim() === '') {
      this.problems.push(`Missing argument <${label}>`);
      return '';
    }
    return value;
  }

  optional(key: string): string | undefined {
    const value = this.input.options[key];
    return typeof value === 'string' ? value : undefined;
  }

  required(key: string, flag: string): string {
    const value = this.optional(key);
    if (value === undefined || value.trim() === '') {
      this.problems.push(`Missing option ${flag}`);
      return '';
    }
    return value;
  }

  /** Values of a repeatable option, deduplicated in input order. */
  list(key: string, flag: string, min = 0): string[] {
    const raw = this.input.options[key];
    const values = Array.isArray(raw) ? raw.filter((item): item is string => typeof item === 'string') : [];
    const unique = orderedSet(values.map((item) => item.trim()).filter((item) => item !== ''));
    if (unique.length < min) {
      this.problems.push(`At least ${min} ${flag} value${min === 1 ? ' is' : 's are'} required`);
    }
    return unique;
  }

  flag(key: string): boolean {
    return this.input.options[key] === true;
  }

  /** A boolean pair such as --dhcp-enabled/--dhcp-disabled that may be absent. */
  toggle(key: string): boolean | undefined {
    const value = this.input.options[key];
    return typeof value === 'boolean' ? value : undefined;
  }

  integer(key: string, flag: string): number | undefined {
    const value = this.optional(key);
    if (value === undefined) {
      return undefined;
    }
    if (!/^\d+$/.test(value.trim())) {
      this.problems.push(`${flag} must be a whole number, got '${value}'`);
      return undefined;
    }
    return Number(value.trim());
  }

  result<P>(build: () => P): Result<P> {
    if (this.problems.length > 0) {
      return err(validationError(this.problems.join('; ')));
    }
    return ok(build());
  }
}
