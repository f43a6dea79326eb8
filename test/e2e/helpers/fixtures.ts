import type { InMemoryDirectoryGateway } from '@app/infrastructure/directory/inmemory/inmemory-directory.gateway';

/**
 * Fixture factories for E2E tests.
 */

export interface TicketFixture {
  firstName?: string;
  lastName?: string;
  title?: string;
  manager?: string;
  division?: string;
  phone?: string;
  department?: string;
  /** Lines under the office header. */
  office?: string[];
  /** Lines under the groups header. */
  groups?: string[];
}

/** A ticket as the help desk system exports it, preamble included. */
export function ticketText(overrides: TicketFixture = {}): string {
  const t: Required<TicketFixture> = {
    firstName: 'John',
    lastName: 'Doe',
    title: 'CNC Machinist',
    manager: 'Jane Doe <jane@example.com>',
    division: 'Manufacturing',
    phone: '(555) 123-4567',
    department: 'Engineering',
    office: ['Other', '> Plant 2'],
    groups: ['Engineering Team, CNC Group'],
    ...overrides,
  };

  const section = (label: string, lines: string[]): string[] => [`### ${label}`, ...lines];

  return [
    'New hire request #4821',
    'Submitted by: HR Onboarding',
    '',
    ...section('First Name', t.firstName ? [t.firstName] : []),
    ...section('Last Name', t.lastName ? [t.lastName] : []),
    ...section('Job Title', [t.title]),
    ...section('Manager', [t.manager]),
    ...section('Division', [t.division]),
    ...section('Personal Phone', [t.phone]),
    ...section('Department', [t.department]),
    ...section('Office Location', t.office),
    ...section('Groups / Distribution Lists', t.groups),
    ...section('Additional Notes', ['Starts Monday.']),
    '',
  ].join('\n');
}

/** Manager, groups and SKUs the default ticket refers to. */
export function seedTenant(directory: InMemoryDirectoryGateway): void {
  directory.seedUser({ id: 'mgr-jane', displayName: 'Jane Doe', userPrincipalName: 'Jane.Doe@example.com' });

  for (const displayName of ['Engineering Team', 'All Staff', 'Shop Floor Announcements']) {
    directory.seedGroup({ displayName, groupTypes: [], mailEnabled: false, securityEnabled: true });
  }
  directory.seedGroup({ displayName: 'CNC Group', groupTypes: ['Unified'], mailEnabled: true, securityEnabled: false });

  directory.seedSku({ skuId: 'sku-f1', skuPartNumber: 'SPE_F1', consumedUnits: 3, prepaidUnits: { enabled: 10 } });
  directory.seedSku({ skuId: 'sku-visio', skuPartNumber: 'VISIOCLIENT', consumedUnits: 2, prepaidUnits: { enabled: 2 } });
}
