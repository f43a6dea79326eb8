/**
 * Directory-side shapes, trimmed to the attributes this tool reads or writes.
 */
export interface DirectoryUser {
  id: string;
  displayName: string;
  userPrincipalName: string;
  officeLocation?: string | null;
}

export interface DirectoryGroup {
  id: string;
  displayName: string;
  mail?: string | null;
  groupTypes: string[];
  mailEnabled: boolean;
  securityEnabled: boolean;
}

export interface SubscribedSku {
  skuId: string;
  skuPartNumber: string;
  consumedUnits: number;
  prepaidUnits: {
    enabled: number;
  };
}

export interface CreateDirectoryUserInput {
  accountEnabled: boolean;
  givenName: string;
  surname: string;
  displayName: string;
  mailNickname: string;
  userPrincipalName: string;
  officeLocation: string;
  department: string;
  jobTitle: string;
  usageLocation: string;
  passwordProfile: {
    password: string;
    forceChangePasswordNextSignIn: boolean;
  };
}

export interface PhoneMethod {
  phoneNumber: string;
}
