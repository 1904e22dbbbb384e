/**
 * Tests for role account validator
 */

import { validateRole, getRolePrefixesCount, isRoleAccount } from '../src/validators/roleValidator';

describe('RoleValidator', () => {
  it('should detect common role accounts', () => {
    const roleAccounts = [
      'admin',
      'support',
      'info',
      'sales',
      'contact',
      'hello',
      'noreply',
      'postmaster',
      'webmaster',
      'billing',
    ];

    roleAccounts.forEach(local => {
      expect(validateRole(local)).toEqual({ roleAccount: true, matchedRole: local });
    });
  });

  it('should accept personal email addresses', () => {
    const personalAccounts = [
      'john.doe',
      'jane.smith',
      'user123',
      'myemail',
      'firstname.lastname',
    ];

    personalAccounts.forEach(local => {
      expect(validateRole(local)).toEqual({ roleAccount: false });
    });
  });

  it('should detect role accounts with numbers', () => {
    expect(validateRole('support1').matchedRole).toBe('support');
    expect(validateRole('admin123').matchedRole).toBe('admin');
  });

  it('should detect role accounts with separators', () => {
    expect(validateRole('support-team').matchedRole).toBe('support');
    expect(validateRole('admin_user').matchedRole).toBe('admin');
    expect(validateRole('info.desk').matchedRole).toBe('info');
  });

  it('should ignore plus-address tags', () => {
    expect(validateRole('sales+newsletter')).toEqual({ roleAccount: true, matchedRole: 'sales' });
  });

  it('should not match a role name embedded in a word', () => {
    expect(isRoleAccount('salesforce')).toBe(false);
    expect(isRoleAccount('information-age')).toBe(true);
  });

  it('should be case-insensitive', () => {
    expect(isRoleAccount('ADMIN')).toBe(true);
    expect(isRoleAccount('Admin')).toBe(true);
    expect(isRoleAccount('admin')).toBe(true);
  });

  it('should have a substantial list of role prefixes', () => {
    expect(getRolePrefixesCount()).toBeGreaterThan(30);
  });
});
