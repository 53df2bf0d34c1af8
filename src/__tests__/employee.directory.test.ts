import { describe, expect, it } from 'vitest';

import { SeedEmployeeDirectory } from '@core/repositories/employee.repo.js';

const directory = new SeedEmployeeDirectory();

const arjunMehta = { employeeId: '10002', name: 'Arjun Mehta', project: 'Billing Revamp' };
const arjunRao = { employeeId: '10004', name: 'Arjun Rao', project: 'Policy Automation' };

describe('SeedEmployeeDirectory', () => {
  it('finds employees by id with or without the E prefix', async () => {
    expect(await directory.resolveEmployee('10002')).toEqual({ kind: 'found', employee: arjunMehta });
    expect(await directory.resolveEmployee('e10002')).toEqual({ kind: 'found', employee: arjunMehta });
    expect(await directory.resolveEmployee('99999')).toEqual({ kind: 'not_found', reference: '99999' });
  });

  it('finds employees by full or partial name', async () => {
    expect(await directory.resolveEmployee('arjun rao')).toEqual({ kind: 'found', employee: arjunRao });
    expect(await directory.resolveEmployee('Mehta')).toEqual({ kind: 'found', employee: arjunMehta });
  });

  it('returns every candidate when a name is shared', async () => {
    expect(await directory.resolveEmployee('Arjun')).toEqual({
      kind: 'ambiguous',
      reference: 'Arjun',
      candidates: [arjunMehta, arjunRao],
    });
  });

  it('looks up and lists employees', async () => {
    expect(await directory.getEmployee('E10004')).toEqual(arjunRao);
    expect(await directory.getEmployee('nobody')).toBeNull();
    expect((await directory.listEmployees()).map((e) => e.employeeId)).toEqual([
      '10001',
      '10002',
      '10003',
      '10004',
    ]);
  });
});
