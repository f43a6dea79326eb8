/**
 * InMemoryDirectoryGateway: IDirectoryGateway backed by in-memory maps.
 *
 * Mirrors the directory semantics this tool relies on: case-insensitive
 * equality filters, unique principal names, idempotent membership adds and
 * seat accounting on license assignment. Suitable for tests and dry runs.
 */
import { Injectable } from '@nestjs/common';
import { randomUUID } from 'node:crypto';

import type { IDirectoryGateway } from '../../../domain/directory/directory-gateway.interface';
import { createProvisioningError, PROVISIONING_ERROR_KIND } from '../../../domain/errors/provisioning-error';
import type {
  CreateDirectoryUserInput,
  DirectoryGroup,
  DirectoryUser,
  PhoneMethod,
  SubscribedSku,
} from '../../../domain/models/directory.model';

interface StoredUser extends DirectoryUser {
  input?: CreateDirectoryUserInput;
  managerId?: string;
  phoneMethods: PhoneMethod[];
  assignedSkuIds: string[];
}

const sameText = (a: string | null | undefined, b: string): boolean =>
  typeof a === 'string' && a.toLowerCase() === b.toLowerCase();

function fault(status: number, detail: string): Error {
  return createProvisioningError({ kind: PROVISIONING_ERROR_KIND.TRANSPORT_FAULT, detail, status });
}

@Injectable()
export class InMemoryDirectoryGateway implements IDirectoryGateway {
  private readonly users: Map<string, StoredUser> = new Map();
  private readonly groups: Map<string, DirectoryGroup> = new Map();
  private readonly members: Map<string, Set<string>> = new Map();
  private readonly skus: Map<string, SubscribedSku> = new Map();

  // ─── Seeding / inspection ─────────────────────────────────────────

  seedUser(user: Omit<DirectoryUser, 'id'> & { id?: string }): DirectoryUser {
    const stored: StoredUser = { ...user, id: user.id ?? randomUUID(), phoneMethods: [], assignedSkuIds: [] };
    this.users.set(stored.id, stored);
    return this.toUser(stored);
  }

  seedGroup(group: Omit<DirectoryGroup, 'id'> & { id?: string }): DirectoryGroup {
    const stored: DirectoryGroup = { ...group, id: group.id ?? randomUUID() };
    this.groups.set(stored.id, stored);
    this.members.set(stored.id, new Set());
    return { ...stored };
  }

  seedSku(sku: SubscribedSku): SubscribedSku {
    this.skus.set(sku.skuId, { ...sku, prepaidUnits: { ...sku.prepaidUnits } });
    return sku;
  }

  getCreateInput(userId: string): CreateDirectoryUserInput | undefined {
    return this.users.get(userId)?.input;
  }

  getManagerId(userId: string): string | undefined {
    return this.users.get(userId)?.managerId;
  }

  getPhoneMethods(userId: string): PhoneMethod[] {
    return [...(this.users.get(userId)?.phoneMethods ?? [])];
  }

  getAssignedSkuIds(userId: string): string[] {
    return [...(this.users.get(userId)?.assignedSkuIds ?? [])];
  }

  getGroupMembers(groupId: string): string[] {
    return [...(this.members.get(groupId) ?? [])];
  }

  // ─── IDirectoryGateway ────────────────────────────────────────────

  async findUsersByPrincipalName(userPrincipalName: string): Promise<DirectoryUser[]> {
    return this.filterUsers((u) => sameText(u.userPrincipalName, userPrincipalName));
  }

  async findUsersByDisplayName(displayName: string): Promise<DirectoryUser[]> {
    return this.filterUsers((u) => sameText(u.displayName, displayName));
  }

  async createUser(input: CreateDirectoryUserInput): Promise<DirectoryUser> {
    if (Array.from(this.users.values()).some((u) => sameText(u.userPrincipalName, input.userPrincipalName))) {
      throw fault(400, 'Another object with the same value for property userPrincipalName already exists.');
    }
    const stored: StoredUser = {
      id: randomUUID(),
      displayName: input.displayName,
      userPrincipalName: input.userPrincipalName,
      officeLocation: input.officeLocation || null,
      input: { ...input, passwordProfile: { ...input.passwordProfile } },
      phoneMethods: [],
      assignedSkuIds: [],
    };
    this.users.set(stored.id, stored);
    return this.toUser(stored);
  }

  async addMobilePhoneMethod(userId: string, phoneNumber: string): Promise<PhoneMethod> {
    const user = this.requireUser(userId);
    const method = { phoneNumber };
    user.phoneMethods.push(method);
    return { ...method };
  }

  async setManager(userId: string, managerId: string): Promise<void> {
    const user = this.requireUser(userId);
    this.requireUser(managerId);
    user.managerId = managerId;
  }

  async findGroupsByMail(address: string): Promise<DirectoryGroup[]> {
    return this.filterGroups((g) => sameText(g.mail, address));
  }

  async findGroupsByDisplayName(displayName: string): Promise<DirectoryGroup[]> {
    return this.filterGroups((g) => sameText(g.displayName, displayName));
  }

  async addGroupMember(groupId: string, userId: string): Promise<void> {
    const members = this.members.get(groupId);
    if (!members) throw fault(404, `Group ${groupId} does not exist.`);
    this.requireUser(userId);
    members.add(userId);
  }

  async listSubscribedSkus(): Promise<SubscribedSku[]> {
    return Array.from(this.skus.values()).map((s) => ({ ...s, prepaidUnits: { ...s.prepaidUnits } }));
  }

  async assignLicenses(userId: string, skuIds: string[]): Promise<DirectoryUser> {
    const user = this.requireUser(userId);
    const toAssign = skuIds.filter((id) => !user.assignedSkuIds.includes(id));
    for (const skuId of toAssign) {
      const sku = this.skus.get(skuId);
      if (!sku) throw fault(400, `License ${skuId} does not correspond to a valid company License.`);
      if (sku.consumedUnits >= sku.prepaidUnits.enabled) {
        throw fault(400, `Subscription for ${sku.skuPartNumber} has no available licenses.`);
      }
    }
    for (const skuId of toAssign) {
      const sku = this.skus.get(skuId);
      if (sku) sku.consumedUnits += 1;
      user.assignedSkuIds.push(skuId);
    }
    return this.toUser(user);
  }

  /** Remove all users, groups and SKUs. */
  clear(): void {
    this.users.clear();
    this.groups.clear();
    this.members.clear();
    this.skus.clear();
  }

  private requireUser(userId: string): StoredUser {
    const user = this.users.get(userId);
    if (!user) throw fault(404, `Resource '${userId}' does not exist or one of its queried reference-property objects are not present.`);
    return user;
  }

  private filterUsers(predicate: (u: StoredUser) => boolean): DirectoryUser[] {
    return Array.from(this.users.values()).filter(predicate).map((u) => this.toUser(u));
  }

  private filterGroups(predicate: (g: DirectoryGroup) => boolean): DirectoryGroup[] {
    return Array.from(this.groups.values())
      .filter(predicate)
      .map((g) => ({ ...g, groupTypes: [...g.groupTypes] }));
  }

  private toUser(user: StoredUser): DirectoryUser {
    return {
      id: user.id,
      displayName: user.displayName,
      userPrincipalName: user.userPrincipalName,
      officeLocation: user.officeLocation ?? null,
    };
  }
}
