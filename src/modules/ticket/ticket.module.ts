import { Module } from '@nestjs/common';

import { PolicyModule } from '../policy/policy.module';
import { TicketIntakeService } from './ticket-intake.service';

@Module({
  imports: [PolicyModule],
  providers: [TicketIntakeService],
  exports: [TicketIntakeService],
})
export class TicketModule {}
