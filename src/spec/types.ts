/**
 * Types for raw and compiled command-line specifications.
 *
 * A raw specification is an ordered list of key/value entries supplied by the
 * caller. Compilation turns it into a frozen {@link CommandSpec} tree.
 *
 * @packageDocumentation
 */

/**
 * Outcome of a custom value parser.
 */
export type ParseOutcome<T> =
  | { readonly success: true; readonly value: T }
  | { readonly success: false; readonly error: string };

/**
 * Custom value parser attached to an argument or option.
 */
export type ValueParserFn = (raw: string) => ParseOutcome<unknown>;

/**
 * Built-in parser names.
 */
export type BuiltinParser = 'string' | 'integer' | 'float';

/**
 * Parser used by the matching engine to convert a raw value.
 */
export type ValueParser = BuiltinParser | ValueParserFn;

/**
 * Scalar values allowed in a raw specification.
 */
export type RawScalar = string | number | boolean | null | undefined;

/**
 * Any value that may appear in a raw specification.
 */
export type RawValue = RawScalar | ValueParserFn | RawSpec;

/**
 * A single key/value entry of a raw specification.
 */
export type RawEntry = readonly [key: string, value: RawValue];

/**
 * Ordered key/value mapping describing one command level, or the properties
 * of one argument, flag or option.
 *
 * @example
 * ```typescript
 * const raw: RawSpec = [
 *   ['name', 'deploy'],
 *   ['flags', [['verbose', [['short', 'v'], ['global', true]]]]],
 * ];
 * ```
 */
export type RawSpec = readonly RawEntry[];

/**
 * Kinds of items a command declares.
 */
export type ItemKind = 'argument' | 'flag' | 'option';

/**
 * Names of the item lists in a raw specification.
 */
export type ItemListName = 'args' | 'flags' | 'options';

/**
 * A positional argument.
 */
export interface ArgumentSpec {
  readonly name: string;
  /** Placeholder shown for the value (defaults to the upper-cased name). */
  readonly valueName: string;
  readonly help: string;
  /** Defaults to `true`. */
  readonly required: boolean;
  readonly parser: ValueParser;
}

/**
 * A boolean switch such as `-v` or `--verbose`.
 */
export interface FlagSpec {
  readonly name: string;
  /** Short form without the leading dash. */
  readonly short?: string;
  /** Long form without the leading dashes. */
  readonly long?: string;
  readonly help: string;
  readonly multiple: boolean;
  /** Inherited, hidden, by every nested subcommand. */
  readonly global: boolean;
  readonly hide: boolean;
}

/**
 * A named option taking a value, such as `--output FILE`.
 */
export interface OptionSpec {
  readonly name: string;
  readonly valueName: string;
  readonly short?: string;
  readonly long?: string;
  readonly help: string;
  readonly multiple: boolean;
  readonly required: boolean;
  readonly default?: string | number | boolean;
  readonly parser: ValueParser;
  readonly global: boolean;
  readonly hide: boolean;
}

/**
 * Compiled specification of one command level.
 */
export interface CommandSpec {
  readonly name?: string;
  readonly description?: string;
  readonly version?: string;
  readonly author?: string;
  readonly about?: string;
  /** Explicit summary, or the first paragraph of {@link CommandSpec.about}. */
  readonly summary?: string;
  readonly allowUnknownArgs: boolean;
  readonly parseDoubleDash: boolean;
  readonly args: readonly ArgumentSpec[];
  readonly flags: readonly FlagSpec[];
  readonly options: readonly OptionSpec[];
  readonly subcommands: readonly CommandSpec[];
  /** Key this level was declared under in its parent; unset at the root. */
  readonly subcommandKey?: string;
}

/**
 * Global flags and options threaded down through subcommand compilation.
 */
export interface GlobalAccumulator {
  readonly flags: readonly FlagSpec[];
  readonly options: readonly OptionSpec[];
}
