/**
 * IDirectoryGateway: port for the directory-service REST contract.
 *
 * Implementations:
 *   - GraphDirectoryGateway    (Microsoft Graph v1.0)
 *   - InMemoryDirectoryGateway (tests / dry runs)
 *
 * Every method either resolves or rejects with a ProvisioningError of kind
 * TransportFault. Searches resolve to an empty array when nothing matches.
 */
import type {
  CreateDirectoryUserInput,
  DirectoryGroup,
  DirectoryUser,
  PhoneMethod,
  SubscribedSku,
} from '../models/directory.model';

export interface IDirectoryGateway {
  /** `GET users?$filter=userPrincipalName eq '{upn}'` */
  findUsersByPrincipalName(userPrincipalName: string): Promise<DirectoryUser[]>;

  /** `GET users?$filter=displayName eq '{name}'` */
  findUsersByDisplayName(displayName: string): Promise<DirectoryUser[]>;

  /** `POST users` */
  createUser(input: CreateDirectoryUserInput): Promise<DirectoryUser>;

  /** `POST users/{id}/authentication/phoneMethods` with phoneType "mobile" */
  addMobilePhoneMethod(userId: string, phoneNumber: string): Promise<PhoneMethod>;

  /** `PUT users/{id}/manager/$ref` */
  setManager(userId: string, managerId: string): Promise<void>;

  /** `GET groups?$filter=mail eq '{address}'` */
  findGroupsByMail(address: string): Promise<DirectoryGroup[]>;

  /** `GET groups?$filter=displayName eq '{name}'` */
  findGroupsByDisplayName(displayName: string): Promise<DirectoryGroup[]>;

  /**
   * `POST groups/{id}/members/$ref`.
   * Adding an existing member resolves like a fresh add.
   */
  addGroupMember(groupId: string, userId: string): Promise<void>;

  /** `GET subscribedSkus` */
  listSubscribedSkus(): Promise<SubscribedSku[]>;

  /** `POST users/{id}/assignLicense` with no removals */
  assignLicenses(userId: string, skuIds: string[]): Promise<DirectoryUser>;
}
