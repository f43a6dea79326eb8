import { Injectable } from '@nestjs/common';

import { describeError } from '../../domain/errors/provisioning-error';
import { LogCategory } from '../logging/log-levels';
import { ProvisioningLogger } from '../logging/provisioning-logger.service';
import { ProvisioningOrchestrator } from '../provisioning/provisioning-orchestrator.service';
import { ReportService } from '../report/report.service';
import { TicketIntakeService } from '../ticket/ticket-intake.service';

export const EXIT_CODE = {
  COMPLETE: 0,
  FATAL: 1,
  ABORTED: 2,
} as const;

export type ExitCode = typeof EXIT_CODE[keyof typeof EXIT_CODE];

export interface TicketRunOutcome {
  exitCode: ExitCode;
  /** Report text for stdout. */
  report: string;
}

/**
 * One ticket, start to finish: intake → orchestrate → report.
 */
@Injectable()
export class TicketRunner {
  constructor(
    private readonly intake: TicketIntakeService,
    private readonly orchestrator: ProvisioningOrchestrator,
    private readonly reports: ReportService,
    private readonly logger: ProvisioningLogger,
  ) {}

  async run(ticketText: string): Promise<TicketRunOutcome> {
    try {
      const record = this.intake.intake(ticketText);
      const run = await this.orchestrator.run(record);
      return {
        exitCode: run.status === 'complete' ? EXIT_CODE.COMPLETE : EXIT_CODE.ABORTED,
        report: this.reports.render(run),
      };
    } catch (err) {
      this.logger.fatal(LogCategory.GENERAL, `Provisioning failed: ${describeError(err)}`, err);
      return { exitCode: EXIT_CODE.FATAL, report: this.reports.renderFailure(err) };
    }
  }
}
