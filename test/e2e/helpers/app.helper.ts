import { Test, type TestingModule } from '@nestjs/testing';

import { AppModule, type AppModuleOptions } from '@app/modules/app/app.module';
import { TicketRunner } from '@app/modules/app/ticket-runner.service';
import { InMemoryDirectoryGateway } from '@app/infrastructure/directory/inmemory/inmemory-directory.gateway';

export interface TestContext {
  moduleRef: TestingModule;
  runner: TicketRunner;
  directory: InMemoryDirectoryGateway;
}

const BASE_ENV: Record<string, string> = {
  NODE_ENV: 'test',
  DIRECTORY_BACKEND: 'inmemory',
  DIRECTORY_DOMAIN: 'example.com',
  INITIAL_PASSWORD: 'test-password',
  PROPAGATION_DELAY_MS: '0',
  PACING_DELAY_MS: '0',
  LOG_LEVEL: 'OFF',
};

/**
 * Bootstraps the full application module against the in-memory directory.
 *
 * - `env` is layered over a deterministic base environment
 * - Keys set here are removed again by `closeTestContext()`
 */
export async function createTestContext(
  env: Record<string, string> = {},
  options: AppModuleOptions = {},
): Promise<TestContext> {
  Object.assign(process.env, BASE_ENV, env);

  const moduleRef = await Test.createTestingModule({
    imports: [AppModule.register(options)],
  }).compile();
  await moduleRef.init();

  return {
    moduleRef,
    runner: moduleRef.get(TicketRunner),
    directory: moduleRef.get(InMemoryDirectoryGateway),
  };
}

export async function closeTestContext(ctx: TestContext, env: Record<string, string> = {}): Promise<void> {
  await ctx.moduleRef.close();
  for (const key of [...Object.keys(BASE_ENV), ...Object.keys(env)]) {
    delete process.env[key];
  }
}
