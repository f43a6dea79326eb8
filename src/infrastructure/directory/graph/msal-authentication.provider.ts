import type { AuthenticationProvider } from '@microsoft/microsoft-graph-client';
import { ConfidentialClientApplication } from '@azure/msal-node';

export const GRAPH_DEFAULT_SCOPE = 'https://graph.microsoft.com/.default';

export interface GraphCredentials {
  tenantId: string;
  clientId: string;
  clientSecret: string;
}

/**
 * App-only (client credential) token source for the Graph client. MSAL caches
 * tokens and refreshes them when they near expiry.
 */
export class MsalAuthenticationProvider implements AuthenticationProvider {
  private readonly msalClient: ConfidentialClientApplication;

  constructor(credentials: GraphCredentials) {
    this.msalClient = new ConfidentialClientApplication({
      auth: {
        clientId: credentials.clientId,
        clientSecret: credentials.clientSecret,
        authority: `https://login.microsoftonline.com/${credentials.tenantId}`,
      },
    });
  }

  async getAccessToken(): Promise<string> {
    const result = await this.msalClient.acquireTokenByClientCredential({ scopes: [GRAPH_DEFAULT_SCOPE] });
    if (!result?.accessToken) {
      throw new Error('Failed to acquire a Graph access token: empty token response.');
    }
    return result.accessToken;
  }
}
