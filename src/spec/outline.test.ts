import { describe, expect, it } from 'vitest';
import { compileSpecOrThrow } from './compiler.js';
import { renderOutline, toPlainObject } from './outline.js';
import { parseRawSpec } from './parser.js';
import type { RawSpec } from './types.js';

const SAMPLE = `
name = "tool"
about = """Builds things.

Longer text."""

[flags.verbose]
short = "v"
long = "verbose"
global = true

[options.output]
short = "o"

[subcommands.build.args.target]

[subcommands.build.args.extra]
required = false

[subcommands.build.flags.force]
long = "force"
`;

describe('Outline', () => {
  describe('renderOutline', () => {
    it('should render the command tree', () => {
      const spec = compileSpecOrThrow(parseRawSpec(SAMPLE));

      expect(renderOutline(spec)).toBe(
        [
          'tool - Builds things.',
          '  flags: -v/--verbose',
          '  options: -o=OUTPUT',
          '  build',
          '    args: <TARGET> [EXTRA]',
          '    flags: --force, -v/--verbose (hidden)',
        ].join('\n')
      );
    });

    it('should honor the indent width', () => {
      const spec = compileSpecOrThrow([['subcommands', [['run', []]]]]);

      expect(renderOutline(spec, 4)).toBe('(unnamed)\n    run');
    });

    it('should show a key that differs from the name', () => {
      const spec = compileSpecOrThrow([['subcommands', [['ls', [['name', 'list']]]]]]);

      expect(renderOutline(spec)).toBe('(unnamed)\n  list [ls]');
    });
  });

  describe('toPlainObject', () => {
    it('should replace custom parsers with a marker', () => {
      const raw: RawSpec = [
        [
          'args',
          [
            ['port', [['parser', (value: string) => ({ success: true as const, value: Number(value) })]]],
            ['host', []],
          ],
        ],
      ];

      const plain = toPlainObject(compileSpecOrThrow(raw));

      expect(plain.args.map((arg) => arg.parser)).toEqual(['custom', 'string']);
    });

    it('should produce JSON-safe output', () => {
      const spec = compileSpecOrThrow(parseRawSpec(SAMPLE));

      const roundTripped: unknown = JSON.parse(JSON.stringify(toPlainObject(spec)));

      expect(roundTripped).toEqual(toPlainObject(spec));
    });
  });
});
