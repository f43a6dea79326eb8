import { Inject, Injectable } from '@nestjs/common';
import { createInterface } from 'node:readline/promises';

import type { DirectoryUser } from '../../domain/models/directory.model';
import { PROVISIONING_CONFIG, type ProvisioningConfig } from '../config/provisioning-config';
import { LogCategory } from '../logging/log-levels';
import { ProvisioningLogger } from '../logging/provisioning-logger.service';

/** Injection token for the OperatorPrompt used at the duplicate-name decision. */
export const OPERATOR_PROMPT = 'OPERATOR_PROMPT';

export interface DuplicateNameQuestion {
  userPrincipalName: string;
  alternatePrincipalName: string;
  conflicts: DirectoryUser[];
}

/**
 * The single operator decision point of a run: a principal name is taken,
 * should the alternate be used instead?
 */
export interface OperatorPrompt {
  confirmAlternateName(question: DuplicateNameQuestion): Promise<boolean>;
}

/** Asks on the terminal. Output goes to stderr so stdout carries only the report. */
@Injectable()
export class ConsoleOperatorPrompt implements OperatorPrompt {
  async confirmAlternateName(question: DuplicateNameQuestion): Promise<boolean> {
    const rl = createInterface({ input: process.stdin, output: process.stderr });
    try {
      const taken = question.conflicts.map((u) => `  - ${u.displayName} <${u.userPrincipalName}>`).join('\n');
      const answer = await rl.question(
        `${question.userPrincipalName} is already in use:\n${taken}\n` +
          `Create the user as ${question.alternatePrincipalName} instead? [y/N] `,
      );
      return /^y(es)?$/i.test(answer.trim());
    } finally {
      rl.close();
    }
  }
}

/** Answers from ALTERNATE_NAME_DECISION; declines when none is configured. */
@Injectable()
export class ConfiguredOperatorPrompt implements OperatorPrompt {
  constructor(
    @Inject(PROVISIONING_CONFIG) private readonly config: ProvisioningConfig,
    private readonly logger: ProvisioningLogger,
  ) {}

  async confirmAlternateName(question: DuplicateNameQuestion): Promise<boolean> {
    const decision = this.config.alternateNameDecision;
    if (decision === undefined) {
      this.logger.warn(LogCategory.ORCHESTRATOR, 'No operator available and ALTERNATE_NAME_DECISION unset; declining', {
        userPrincipalName: question.userPrincipalName,
      });
      return false;
    }
    this.logger.info(LogCategory.ORCHESTRATOR, `Alternate name decision from configuration: ${decision}`, {
      alternatePrincipalName: question.alternatePrincipalName,
    });
    return decision === 'accept';
  }
}

/**
 * The terminal prompt is used only when the caller says stdin is still free for
 * an answer (see `canPromptOperator` in the CLI) and no decision is configured.
 */
export function selectOperatorPrompt(
  config: ProvisioningConfig,
  logger: ProvisioningLogger,
  interactive = false,
): OperatorPrompt {
  if (config.alternateNameDecision === undefined && interactive) {
    return new ConsoleOperatorPrompt();
  }
  return new ConfiguredOperatorPrompt(config, logger);
}
