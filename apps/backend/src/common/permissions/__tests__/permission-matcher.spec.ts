import { hasPermission, missingPermissions } from '../permission-matcher';

describe('hasPermission', () => {
  const granted = new Set(['students.read', 'reports.*', 'admin.users.*']);

  it.each([
    ['students.read', true],
    ['students.write', false],
    ['reports.academic', true],
    ['reports.academic.export', true],
    ['reports', false],
    ['admin.users.create', true],
    ['admin.roles.create', false],
  ])('%s -> %s', (required, expected) => {
    expect(hasPermission(required, granted)).toBe(expected);
  });

  it('treats a null or blank requirement as public', () => {
    expect(hasPermission(null, new Set())).toBe(true);
    expect(hasPermission('   ', new Set())).toBe(true);
  });

  it('lets the global wildcard cover everything', () => {
    expect(hasPermission('anything.at.all', new Set(['*']))).toBe(true);
  });

  it('lists uncovered codes', () => {
    expect(missingPermissions(['students.read', 'students.write'], granted)).toEqual([
      'students.write',
    ]);
  });
});
