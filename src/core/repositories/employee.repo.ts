import { loadSeed, type SeedFile } from '@config/data.loader.js';

import type { Employee, EmployeeDirectory, EmployeeResolution } from '@core/interfaces/index.js';

function normalizeId(value: string): string {
  return value.trim().toLowerCase().replace(/^e(?=\d)/, '');
}

function tokens(name: string): string[] {
  return name.toLowerCase().split(/\s+/).filter(Boolean);
}

/** Read-only employee directory backed by `config/seed.json`. */
export class SeedEmployeeDirectory implements EmployeeDirectory {
  private readonly employees: Employee[];

  constructor(seed: SeedFile = loadSeed()) {
    this.employees = seed.employees.map(({ employeeId, name, project }) => ({
      employeeId,
      name,
      ...(project ? { project } : {}),
    }));
  }

  async resolveEmployee(reference: string): Promise<EmployeeResolution> {
    const ref = reference.trim();
    if (!ref) return { kind: 'not_found', reference };

    if (/^[Ee]?\d+$/.test(ref)) {
      const id = normalizeId(ref);
      const match = this.employees.find((e) => normalizeId(e.employeeId) === id);
      return match ? { kind: 'found', employee: { ...match } } : { kind: 'not_found', reference };
    }

    const wanted = tokens(ref);
    const exact = this.employees.filter((e) => tokens(e.name).join(' ') === wanted.join(' '));
    const matches = exact.length
      ? exact
      : this.employees.filter((e) => {
          const nameTokens = tokens(e.name);
          return wanted.every((t) => nameTokens.includes(t));
        });

    if (matches.length === 1) return { kind: 'found', employee: { ...matches[0] } };
    if (matches.length > 1) {
      return { kind: 'ambiguous', reference, candidates: matches.map((e) => ({ ...e })) };
    }
    return { kind: 'not_found', reference };
  }

  async getEmployee(employeeId: string): Promise<Employee | null> {
    const id = normalizeId(employeeId);
    const match = this.employees.find((e) => normalizeId(e.employeeId) === id);
    return match ? { ...match } : null;
  }

  async listEmployees(): Promise<Employee[]> {
    return this.employees.map((e) => ({ ...e }));
  }
}
