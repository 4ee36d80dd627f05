/**
 * Error suggestion system tests.
 *
 * Verifies that errors are classified and formatted with the suggestions
 * of their type.
 */

import { describe, it, expect, vi } from 'vitest';
import { ConfigValidationError, EnvCoercionError } from '../config/index.js';
import {
  DuplicateDeclarationError,
  UnrepresentableCycleError,
} from '../pipeline/errors.js';
import { CrateLoadError } from '../syntax/index.js';
import {
  CliUsageError,
  displayErrorWithSuggestions,
  errorHeadline,
  errorTypeOf,
  formatErrorWithSuggestions,
  getSuggestions,
  isReportableError,
} from './errors.js';

/**
 * Strips ANSI escape sequences from a string.
 */
function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1b\[[0-9;]*m/g, '');
}

describe('Error suggestion system', () => {
  const plainOptions = { colors: false };
  const colorOptions = { colors: true };

  describe('errorTypeOf', () => {
    it('uses the kind of pipeline errors', () => {
      const error = new UnrepresentableCycleError('Types contain each other by value: A, B', 'ordering', 'A');
      expect(errorTypeOf(error)).toBe('UnrepresentableCycle');
      expect(errorTypeOf(new DuplicateDeclarationError('twice', 'ir-builder', 'Config'))).toBe(
        'DuplicateDeclaration'
      );
    });

    it('classifies usage, config and input errors', () => {
      expect(errorTypeOf(new CliUsageError('No crate dump given'))).toBe('usage');
      expect(errorTypeOf(new EnvCoercionError('HEADERGEN_TAB_WIDTH', 'wide', 'number'))).toBe('config');
      expect(errorTypeOf(new ConfigValidationError('Invalid configuration', []))).toBe('config');
      expect(errorTypeOf(new CrateLoadError('Invalid JSON in crate dump', 'lib.json'))).toBe('input');
    });

    it('treats anything else as unknown', () => {
      expect(errorTypeOf(new Error('boom'))).toBe('unknown');
      expect(errorTypeOf('boom')).toBe('unknown');
      expect(isReportableError(new Error('boom'))).toBe(false);
      expect(isReportableError(new CliUsageError('bad'))).toBe(true);
    });
  });

  describe('getSuggestions', () => {
    it('offers at least one suggestion for every type', () => {
      const types = [
        'DuplicateDeclaration',
        'UnresolvedType',
        'MangledNameCollision',
        'UnboundedSpecialization',
        'UnrepresentableCycle',
        'usage',
        'config',
        'input',
        'unknown',
      ] as const;
      for (const type of types) {
        expect(getSuggestions(type).length).toBeGreaterThan(0);
      }
    });
  });

  describe('errorHeadline', () => {
    it('uses the diagnostic line for pipeline errors', () => {
      const error = new DuplicateDeclarationError('declared twice', 'ir-builder', 'Config');
      expect(errorHeadline(error)).toBe('error[DuplicateDeclaration] stage=ir-builder entity=Config: declared twice');
    });

    it('prefixes other messages', () => {
      expect(errorHeadline(new CliUsageError("Unknown option '--fast'"))).toBe("Error: Unknown option '--fast'");
      expect(errorHeadline(42)).toBe('Error: 42');
    });
  });

  describe('formatErrorWithSuggestions', () => {
    it('lists numbered suggestions with their actions', () => {
      const error = new UnrepresentableCycleError('msg', 'ordering', 'Bad');

      expect(formatErrorWithSuggestions(error, plainOptions)).toBe(
        [
          'error[UnrepresentableCycle] stage=ordering entity=Bad: msg',
          '',
          'Suggestions:',
          '  1. Put a pointer or Box between the types that contain each other',
          '  2. Or declare one of the types opaque',
          '    [export] opaque = ["<name>"]',
        ].join('\n')
      );
    });

    it('formats usage errors', () => {
      expect(formatErrorWithSuggestions(new CliUsageError('No crate dump given'), plainOptions)).toBe(
        [
          'Error: No crate dump given',
          '',
          'Suggestions:',
          '  1. Check the command line',
          '    ffi-headergen help generate',
        ].join('\n')
      );
    });

    it('colors only when asked', () => {
      const error = new CliUsageError('No crate dump given');
      const colored = formatErrorWithSuggestions(error, colorOptions);

      expect(colored).toContain('\x1b[31mError: No crate dump given\x1b[0m');
      expect(stripAnsi(colored)).toBe(formatErrorWithSuggestions(error, plainOptions));
      expect(formatErrorWithSuggestions(error, plainOptions)).not.toContain('\x1b[');
    });
  });

  describe('displayErrorWithSuggestions', () => {
    it('writes the formatted error to stderr', () => {
      const consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      const error = new CrateLoadError('Cannot read crate dump: missing', 'lib.json');

      displayErrorWithSuggestions(error, plainOptions);

      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
      expect(consoleErrorSpy).toHaveBeenCalledWith(
        [
          'Error: Cannot read crate dump: missing',
          '',
          'Suggestions:',
          '  1. Regenerate the crate dump with the front-end',
          '  2. Check the dump against schemas/crate.schema.json',
        ].join('\n')
      );

      consoleErrorSpy.mockRestore();
    });
  });
});
