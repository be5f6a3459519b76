/**
 * Type Rules Tests
 *
 * - Normalization of type text
 * - Widening allow-list
 * - Supported / unsupported type changes with messages
 */
import { describe, it, expect } from 'vitest';
import { baseType, checkTypeChange, isWidening, normalizeType } from '../schema/type-rules';

describe('Type Rules', () => {
  describe('normalizeType', () => {
    it('uppercases and strips whitespace', () => {
      expect(normalizeType('decimal(10, 2)')).toBe('DECIMAL(10,2)');
      expect(normalizeType(' string ')).toBe('STRING');
    });

    it('baseType drops the parameter list', () => {
      expect(baseType('decimal(10,2)')).toBe('DECIMAL');
      expect(baseType('BIGINT')).toBe('BIGINT');
    });
  });

  describe('isWidening', () => {
    it.each([
      ['TINYINT', 'SMALLINT'],
      ['TINYINT', 'INT'],
      ['TINYINT', 'BIGINT'],
      ['SMALLINT', 'INT'],
      ['SMALLINT', 'BIGINT'],
      ['INT', 'BIGINT'],
      ['FLOAT', 'DOUBLE'],
    ])('%s → %s is widening', (from, to) => {
      expect(isWidening(from, to)).toBe(true);
    });

    it('is case-insensitive', () => {
      expect(isWidening('int', 'bigint')).toBe(true);
    });

    it('rejects narrowing and identity', () => {
      expect(isWidening('BIGINT', 'INT')).toBe(false);
      expect(isWidening('INT', 'INT')).toBe(false);
      expect(isWidening('STRING', 'BIGINT')).toBe(false);
    });
  });

  describe('checkTypeChange', () => {
    it('supports exact matches regardless of case and spacing', () => {
      expect(checkTypeChange('decimal(10, 2)', 'DECIMAL(10,2)')).toEqual({ supported: true });
    });

    it('supports widening', () => {
      expect(checkTypeChange('INT', 'BIGINT')).toEqual({ supported: true });
    });

    it('rejects narrowing with a message', () => {
      expect(checkTypeChange('BIGINT', 'INT')).toEqual({
        supported: false,
        errorMessage: 'Type change from BIGINT to INT is not supported. Only widening conversions are allowed.',
      });
    });

    it('rejects decimal reparameterization', () => {
      const result = checkTypeChange('DECIMAL(10,2)', 'DECIMAL(12,2)');
      expect(result.supported).toBe(false);
      expect(result.errorMessage).toBe(
        'Type change from DECIMAL(10,2) to DECIMAL(12,2) is not supported. ' +
          'Changing the parameters of DECIMAL requires recreating the column.'
      );
    });
  });
});
