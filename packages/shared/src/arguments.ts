/**
 * Tool Arguments
 *
 * Typed access to the untyped argument map of a tools/call request.
 * Each accessor either returns a value of the requested type or throws an
 * ArgumentError naming the offending parameter.
 */

import { z } from 'zod';
import { ArgumentError } from './errors.js';

const ArgumentMap = z.record(z.unknown());
export type ArgumentMap = z.infer<typeof ArgumentMap>;

const StringArgument = z.string();

// JSON numbers, or strings holding exactly one ("42", "-1.5"); surrounding
// whitespace is not stripped, so " 1" is a mismatch
const NumericString = z.string().regex(/^\S(?:.*\S)?$/);
const NumberArgument = z.union([z.number(), NumericString.pipe(z.coerce.number())]);

export class ToolArguments {
  private readonly values: ArgumentMap;

  constructor(values: ArgumentMap = {}) {
    this.values = values;
  }

  /**
   * Wrap whatever arrived as `params.arguments`. Anything but a plain object
   * is treated as an empty map, so every required argument reports missing.
   */
  static from(input: unknown): ToolArguments {
    const parsed = ArgumentMap.safeParse(input);
    return new ToolArguments(parsed.success ? parsed.data : {});
  }

  /**
   * Whether the argument was sent at all. An explicit `null` is present and
   * fails the type check instead.
   */
  has(name: string): boolean {
    return this.values[name] !== undefined;
  }

  requireString(name: string): string {
    return this.require(name, StringArgument, 'string');
  }

  requireNumber(name: string): number {
    return this.require(name, NumberArgument, 'number');
  }

  private require<T>(name: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, typeName: string): T {
    if (!this.has(name)) {
      throw new ArgumentError('MissingArgument', name, `required argument "${name}" not found`);
    }

    const result = schema.safeParse(this.values[name]);
    if (!result.success) {
      throw new ArgumentError('TypeMismatch', name, `argument "${name}" is not a ${typeName}`);
    }

    return result.data;
  }
}
