import { Injectable } from '@nestjs/common';

import { isProvisioningError, describeError } from '../../domain/errors/provisioning-error';
import type { ProvisioningRun, StepStatus } from '../../domain/models/provisioning-result.model';

const STATUS_MARK: Record<StepStatus, string> = {
  succeeded: '[ok]  ',
  failed: '[FAIL]',
  skipped: '[skip]',
};

const mark = (succeeded: boolean): string => (succeeded ? STATUS_MARK.succeeded : STATUS_MARK.failed);

/**
 * Plain-text rendering of a finished run, written to stdout by the CLI.
 */
@Injectable()
export class ReportService {
  render(run: ProvisioningRun): string {
    return run.status === 'aborted' ? this.renderAborted(run) : this.renderComplete(run);
  }

  /** One-line summary of a fatal fault. */
  renderFailure(error: unknown): string {
    const kind = isProvisioningError(error) ? error.kind : 'Error';
    return `Provisioning failed (${kind}): ${describeError(error)}\n`;
  }

  private renderComplete(run: ProvisioningRun): string {
    const { result } = run;
    const lines: string[] = [
      `Provisioning complete: ${result.displayName}`,
      `  Principal name : ${result.userPrincipalName}`,
      `  Directory id   : ${result.directoryId}`,
      `  Office         : ${result.officeLocation || '-'}`,
      `  Auth phone     : ${result.assignedAuthPhone || '-'}`,
      '',
      'Steps',
      ...result.steps.map((s) => `  ${STATUS_MARK[s.status]} ${s.step.padEnd(8)} ${s.detail}`),
    ];

    if (result.groupOutcomes.length > 0) {
      lines.push('', 'Groups');
      for (const g of result.groupOutcomes) {
        lines.push(`  ${mark(g.succeeded)} ${g.groupName}${g.succeeded ? '' : `: ${g.reason}`}`);
      }
    }

    if (result.licenseOutcomes.length > 0) {
      lines.push('', 'Licenses');
      for (const l of result.licenseOutcomes) {
        lines.push(`  ${mark(l.succeeded)} ${l.skuLabel}${l.succeeded ? '' : `: ${l.reason}`}`);
      }
    }

    const failed = result.steps.filter((s) => s.status === 'failed').map((s) => s.step);
    if (failed.length > 0) {
      lines.push('', `Finish manually: ${failed.join(', ')}`);
    }

    return lines.join('\n') + '\n';
  }

  private renderAborted(run: ProvisioningRun): string {
    const lines = [
      'Provisioning aborted: the principal name is already in use by',
      ...run.conflicts.map((u) => `  - ${u.displayName} <${u.userPrincipalName}>`),
      'No user was created.',
    ];
    return lines.join('\n') + '\n';
  }
}
