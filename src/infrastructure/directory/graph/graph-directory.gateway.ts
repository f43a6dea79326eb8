import { Inject, Injectable } from '@nestjs/common';
import { Client, GraphError } from '@microsoft/microsoft-graph-client';

import type { IDirectoryGateway } from '../../../domain/directory/directory-gateway.interface';
import {
  createProvisioningError,
  describeError,
  PROVISIONING_ERROR_KIND,
} from '../../../domain/errors/provisioning-error';
import type {
  CreateDirectoryUserInput,
  DirectoryGroup,
  DirectoryUser,
  PhoneMethod,
  SubscribedSku,
} from '../../../domain/models/directory.model';
import { LogCategory } from '../../../modules/logging/log-levels';
import { ProvisioningLogger } from '../../../modules/logging/provisioning-logger.service';
import { equalsFilter } from './odata-filter';
import { toCollection, toDirectoryGroup, toDirectoryUser, toPhoneMethod, toSubscribedSku } from './graph-mappers';

/** Injection token for the configured Microsoft Graph client. */
export const GRAPH_CLIENT = 'GRAPH_CLIENT';

export const GRAPH_BASE_URL = 'https://graph.microsoft.com/v1.0';

const USER_SELECT = 'id,displayName,userPrincipalName,officeLocation';
const GROUP_SELECT = 'id,displayName,mail,groupTypes,mailEnabled,securityEnabled';

/** Graph answers a duplicate member add with 400 and this text. */
const ALREADY_MEMBER_PATTERN = /added object references already exist/i;

/**
 * GraphDirectoryGateway: IDirectoryGateway over Microsoft Graph v1.0.
 *
 * Each call is issued once; failures surface as TransportFault carrying the
 * HTTP status when Graph reported one.
 */
@Injectable()
export class GraphDirectoryGateway implements IDirectoryGateway {
  constructor(
    @Inject(GRAPH_CLIENT) private readonly client: Client,
    private readonly logger: ProvisioningLogger,
  ) {}

  async findUsersByPrincipalName(userPrincipalName: string): Promise<DirectoryUser[]> {
    const response: unknown = await this.call('find users by principal name', () =>
      this.client.api('/users').filter(equalsFilter('userPrincipalName', userPrincipalName)).select(USER_SELECT).get(),
    );
    return toCollection(response).map(toDirectoryUser);
  }

  async findUsersByDisplayName(displayName: string): Promise<DirectoryUser[]> {
    const response: unknown = await this.call('find users by display name', () =>
      this.client.api('/users').filter(equalsFilter('displayName', displayName)).select(USER_SELECT).get(),
    );
    return toCollection(response).map(toDirectoryUser);
  }

  async createUser(input: CreateDirectoryUserInput): Promise<DirectoryUser> {
    // Graph rejects '' for optional string properties; leave them out instead.
    const body = Object.fromEntries(Object.entries(input).filter(([, value]) => value !== ''));
    const response: unknown = await this.call('create user', () => this.client.api('/users').post(body));
    return toDirectoryUser(response);
  }

  async addMobilePhoneMethod(userId: string, phoneNumber: string): Promise<PhoneMethod> {
    const response: unknown = await this.call('add phone method', () =>
      this.client.api(`/users/${userId}/authentication/phoneMethods`).post({ phoneNumber, phoneType: 'mobile' }),
    );
    return toPhoneMethod(response);
  }

  async setManager(userId: string, managerId: string): Promise<void> {
    await this.call('set manager', () =>
      this.client.api(`/users/${userId}/manager/$ref`).put({ '@odata.id': `${GRAPH_BASE_URL}/users/${managerId}` }),
    );
  }

  async findGroupsByMail(address: string): Promise<DirectoryGroup[]> {
    const response: unknown = await this.call('find groups by mail', () =>
      this.client.api('/groups').filter(equalsFilter('mail', address)).select(GROUP_SELECT).get(),
    );
    return toCollection(response).map(toDirectoryGroup);
  }

  async findGroupsByDisplayName(displayName: string): Promise<DirectoryGroup[]> {
    const response: unknown = await this.call('find groups by display name', () =>
      this.client.api('/groups').filter(equalsFilter('displayName', displayName)).select(GROUP_SELECT).get(),
    );
    return toCollection(response).map(toDirectoryGroup);
  }

  async addGroupMember(groupId: string, userId: string): Promise<void> {
    try {
      await this.client
        .api(`/groups/${groupId}/members/$ref`)
        .post({ '@odata.id': `${GRAPH_BASE_URL}/directoryObjects/${userId}` });
    } catch (err) {
      if (err instanceof GraphError && err.statusCode === 400 && ALREADY_MEMBER_PATTERN.test(err.message)) {
        this.logger.debug(LogCategory.DIRECTORY, 'User already a member', { groupId, userId });
        return;
      }
      throw this.toTransportFault('add group member', err);
    }
  }

  async listSubscribedSkus(): Promise<SubscribedSku[]> {
    const response: unknown = await this.call('list subscribed SKUs', () =>
      this.client.api('/subscribedSkus').select('skuId,skuPartNumber,consumedUnits,prepaidUnits').get(),
    );
    return toCollection(response).map(toSubscribedSku);
  }

  async assignLicenses(userId: string, skuIds: string[]): Promise<DirectoryUser> {
    const response: unknown = await this.call('assign licenses', () =>
      this.client.api(`/users/${userId}/microsoft.graph.assignLicense`).post({
        addLicenses: skuIds.map((skuId) => ({ skuId, disabledPlans: [] })),
        removeLicenses: [],
      }),
    );
    return toDirectoryUser(response);
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    this.logger.trace(LogCategory.DIRECTORY, `Graph: ${operation}`);
    try {
      return await fn();
    } catch (err) {
      throw this.toTransportFault(operation, err);
    }
  }

  private toTransportFault(operation: string, err: unknown): Error {
    const status = err instanceof GraphError && err.statusCode > 0 ? err.statusCode : undefined;
    this.logger.error(LogCategory.DIRECTORY, `Graph call failed: ${operation}`, err, { status });
    return createProvisioningError({
      kind: PROVISIONING_ERROR_KIND.TRANSPORT_FAULT,
      detail: `Directory call "${operation}" failed${status ? ` (HTTP ${status})` : ''}: ${describeError(err)}`,
      status,
      cause: err,
    });
  }
}
