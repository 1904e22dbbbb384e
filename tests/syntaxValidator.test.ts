/**
 * Tests for syntax validator
 */

import {
  describeSyntaxProblem,
  editDistance,
  parseAddress,
  suggestDomain,
  validateSyntax,
  SyntaxValidationResult,
} from '../src/validators/syntaxValidator';
import { AddressSyntaxError } from '../src/utils/errors';
import { EmailAddress } from '../src/types/email';

function valid(result: SyntaxValidationResult): EmailAddress {
  if (!result.syntaxValid) {
    throw new Error(`expected valid syntax, got ${result.problem}`);
  }
  return result.email;
}

function problemOf(result: SyntaxValidationResult): string {
  if (result.syntaxValid) {
    throw new Error('expected invalid syntax');
  }
  return result.problem;
}

describe('SyntaxValidator', () => {
  describe('Valid emails', () => {
    it('should validate standard email addresses', () => {
      const email = valid(validateSyntax('user@example.com'));
      expect(email).toEqual({ address: 'user@example.com', localPart: 'user', domain: 'example.com' });
    });

    it('should validate email with subdomain', () => {
      expect(valid(validateSyntax('user@mail.example.com')).domain).toBe('mail.example.com');
    });

    it('should lowercase the domain and keep the local part as typed', () => {
      const email = valid(validateSyntax('User@Example.COM'));
      expect(email.domain).toBe('example.com');
      expect(email.localPart).toBe('User');
      expect(email.address).toBe('User@example.com');
    });

    it('should handle plus addressing', () => {
      expect(valid(validateSyntax('user+tag@example.com')).localPart).toBe('user+tag');
    });

    it('should handle dots in local part', () => {
      expect(valid(validateSyntax('first.last@example.com')).localPart).toBe('first.last');
    });

    it('should freeze the parsed address', () => {
      expect(Object.isFrozen(valid(validateSyntax('user@example.com')))).toBe(true);
    });
  });

  describe('Invalid emails', () => {
    it.each([
      ['userexample.com', 'missing_at_sign'],
      ['user@@example.com', 'multiple_at_signs'],
      ['', 'empty'],
      ['   ', 'empty'],
      ['@example.com', 'empty_local_part'],
      ['user@', 'empty_domain'],
      ['user name@example.com', 'invalid_format'],
      ['user@example', 'invalid_format'],
    ])('should reject %j as %s', (input, problem) => {
      expect(problemOf(validateSyntax(input))).toBe(problem);
    });

    it('should reject dots at the edges of the local part', () => {
      expect(validateSyntax('.user@example.com').syntaxValid).toBe(false);
      expect(validateSyntax('user.@example.com').syntaxValid).toBe(false);
    });

    it('should reject consecutive dots', () => {
      expect(validateSyntax('user..name@example.com').syntaxValid).toBe(false);
    });

    it('should keep the parts it could split for reporting', () => {
      const result = validateSyntax('user@example');
      expect(result).toEqual({ syntaxValid: false, localPart: 'user', domain: 'example', problem: 'invalid_format' });
    });
  });

  describe('Edge cases', () => {
    it('should trim whitespace', () => {
      const email = valid(validateSyntax('  user@example.com  '));
      expect(email.localPart).toBe('user');
      expect(email.domain).toBe('example.com');
    });
  });
});

describe('parseAddress', () => {
  it('should return the parsed address', () => {
    expect(parseAddress('someone@Example.com').domain).toBe('example.com');
  });

  it('should throw AddressSyntaxError with the problem text', () => {
    expect(() => parseAddress('nobody')).toThrow(AddressSyntaxError);
    expect(() => parseAddress('nobody')).toThrow(describeSyntaxProblem('missing_at_sign'));
  });
});

describe('suggestDomain', () => {
  it('should suggest the closest provider domain', () => {
    expect(suggestDomain('gmial.com')).toBe('gmail.com');
    expect(suggestDomain('hotmial.com')).toBe('hotmail.com');
    expect(suggestDomain('Yahooo.com')).toBe('yahoo.com');
  });

  it('should not suggest for known providers or distant domains', () => {
    expect(suggestDomain('gmail.com')).toBeUndefined();
    expect(suggestDomain('example.com')).toBeUndefined();
    expect(suggestDomain('')).toBeUndefined();
  });
});

describe('editDistance', () => {
  it('should count insertions, deletions and substitutions', () => {
    expect(editDistance('kitten', 'sitting')).toBe(3);
    expect(editDistance('', 'abc')).toBe(3);
    expect(editDistance('same', 'same')).toBe(0);
  });
});
