/**
 * DirectoryModule: dynamic module that provides IDirectoryGateway.
 *
 * Selects the directory backend via the DIRECTORY_BACKEND environment variable:
 *   - "graph"    (default) → GraphDirectoryGateway over Microsoft Graph
 *   - "inmemory"           → InMemoryDirectoryGateway
 *
 * Usage:
 *   imports: [DirectoryModule.register()]
 */
import { Module, type DynamicModule } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Client } from '@microsoft/microsoft-graph-client';

import { DIRECTORY_GATEWAY } from '../../domain/directory/directory.tokens';
import { createProvisioningError, PROVISIONING_ERROR_KIND } from '../../domain/errors/provisioning-error';
import { GraphDirectoryGateway, GRAPH_CLIENT } from './graph/graph-directory.gateway';
import { MsalAuthenticationProvider } from './graph/msal-authentication.provider';
import { InMemoryDirectoryGateway } from './inmemory/inmemory-directory.gateway';

export function createGraphClient(config: ConfigService): Client {
  const tenantId = config.get<string>('GRAPH_TENANT_ID');
  const clientId = config.get<string>('GRAPH_CLIENT_ID');
  const clientSecret = config.get<string>('GRAPH_CLIENT_SECRET');

  const missing = [
    ['GRAPH_TENANT_ID', tenantId],
    ['GRAPH_CLIENT_ID', clientId],
    ['GRAPH_CLIENT_SECRET', clientSecret],
  ]
    .filter(([, value]) => !value)
    .map(([name]) => name);

  if (!tenantId || !clientId || !clientSecret) {
    throw createProvisioningError({
      kind: PROVISIONING_ERROR_KIND.CONFIGURATION,
      detail: `Graph backend requires ${missing.join(', ')}.`,
    });
  }

  return Client.initWithMiddleware({
    authProvider: new MsalAuthenticationProvider({ tenantId, clientId, clientSecret }),
  });
}

@Module({})
export class DirectoryModule {
  static register(): DynamicModule {
    const backend = (process.env.DIRECTORY_BACKEND ?? 'graph').toLowerCase();

    if (backend === 'inmemory') {
      return {
        module: DirectoryModule,
        global: true,
        providers: [
          InMemoryDirectoryGateway,
          { provide: DIRECTORY_GATEWAY, useExisting: InMemoryDirectoryGateway },
        ],
        exports: [DIRECTORY_GATEWAY, InMemoryDirectoryGateway],
      };
    }

    if (backend !== 'graph') {
      throw createProvisioningError({
        kind: PROVISIONING_ERROR_KIND.CONFIGURATION,
        detail: `Unknown DIRECTORY_BACKEND "${backend}"; expected "graph" or "inmemory".`,
      });
    }

    return {
      module: DirectoryModule,
      global: true,
      providers: [
        { provide: GRAPH_CLIENT, useFactory: createGraphClient, inject: [ConfigService] },
        { provide: DIRECTORY_GATEWAY, useClass: GraphDirectoryGateway },
      ],
      exports: [DIRECTORY_GATEWAY],
    };
  }
}
