import { Module, type DynamicModule } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { DirectoryModule } from '../../infrastructure/directory/directory.module';
import { ProvisioningConfigModule } from '../config/provisioning-config.module';
import { LoggingModule } from '../logging/logging.module';
import { ProvisioningModule } from '../provisioning/provisioning.module';
import { ReportModule } from '../report/report.module';
import { TicketModule } from '../ticket/ticket.module';
import { TicketRunner } from './ticket-runner.service';

export interface AppModuleOptions {
  /** Allow the operator prompt to read an answer from stdin. */
  interactive?: boolean;
}

/**
 * Root module. Built through `register()` so the directory backend is read
 * from the environment at bootstrap rather than at import.
 */
@Module({})
export class AppModule {
  static register(options: AppModuleOptions = {}): DynamicModule {
    return {
      module: AppModule,
      imports: [
        ConfigModule.forRoot({ isGlobal: true }),
        LoggingModule,
        ProvisioningConfigModule,
        DirectoryModule.register(),
        TicketModule,
        ProvisioningModule.register({ interactive: options.interactive }),
        ReportModule
      ],
      providers: [TicketRunner],
      exports: [TicketRunner]
    };
  }
}
