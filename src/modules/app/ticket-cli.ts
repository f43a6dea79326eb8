import { NestFactory } from '@nestjs/core';
import { Command, CommanderError } from 'commander';
import * as fs from 'node:fs';
import * as path from 'node:path';

import { describeError } from '../../domain/errors/provisioning-error';
import { AppModule, type AppModuleOptions } from './app.module';
import { EXIT_CODE, TicketRunner, type ExitCode } from './ticket-runner.service';

export const CLI_NAME = 'provision-ticket';

export interface CliStreams {
  stdin: NodeJS.ReadableStream & { isTTY?: boolean };
  stdout: Pick<NodeJS.WritableStream, 'write'>;
  stderr: Pick<NodeJS.WritableStream, 'write'>;
}

export interface RunnerHandle {
  runner: Pick<TicketRunner, 'run'>;
  close(): Promise<void>;
}

export type RunnerFactory = (options: AppModuleOptions) => Promise<RunnerHandle>;

/** Boots the application context. Nest's own logger is kept to warnings and errors. */
export const createRunner: RunnerFactory = async (options) => {
  const app = await NestFactory.createApplicationContext(AppModule.register(options), {
    logger: ['error', 'warn'],
  });
  return { runner: app.get(TicketRunner), close: () => app.close() };
};

const STDIN_ARGUMENT = '-';

/**
 * The operator can only be asked when the ticket came from a file: a ticket
 * piped or typed into stdin leaves nothing to read an answer from.
 */
export function canPromptOperator(ticketFile: string | undefined, stdinIsTTY: boolean): boolean {
  return stdinIsTTY && ticketFile !== undefined && ticketFile !== STDIN_ARGUMENT;
}

export async function readTicket(ticketFile: string | undefined, stdin: NodeJS.ReadableStream): Promise<string> {
  if (ticketFile !== undefined && ticketFile !== STDIN_ARGUMENT) {
    try {
      return await fs.promises.readFile(ticketFile, 'utf-8');
    } catch (err) {
      throw new Error(`Could not read ticket file "${ticketFile}": ${describeError(err)}`, { cause: err });
    }
  }

  const chunks: Buffer[] = [];
  for await (const chunk of stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

function packageVersion(): string {
  const manifest: unknown = JSON.parse(
    fs.readFileSync(path.resolve(__dirname, '..', '..', '..', 'package.json'), 'utf-8'),
  );
  if (typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string') {
    return manifest.version;
  }
  return '0.0.0';
}

export function buildProgram(streams: CliStreams, action: (ticketFile: string | undefined) => Promise<void>): Command {
  return new Command()
    .name(CLI_NAME)
    .description('Create a directory user from an onboarding ticket and print a provisioning report.')
    .version(packageVersion())
    .argument('[ticket-file]', `ticket text file; read from stdin when omitted or "${STDIN_ARGUMENT}"`)
    .addHelpText(
      'after',
      '\nExit codes: 0 completed, 1 failed, 2 aborted by the operator.\n' +
        'The report goes to stdout; logs and prompts go to stderr.',
    )
    .exitOverride()
    .configureOutput({
      writeOut: (text) => streams.stdout.write(text),
      writeErr: (text) => streams.stderr.write(text),
    })
    .action(action);
}

/**
 * Process one ticket and return the exit code. The report is written to
 * `streams.stdout`; usage errors and unreadable input to `streams.stderr`.
 */
export async function runCli(
  argv: string[],
  streams: CliStreams = { stdin: process.stdin, stdout: process.stdout, stderr: process.stderr },
  runnerFactory: RunnerFactory = createRunner,
): Promise<ExitCode> {
  let exitCode: ExitCode = EXIT_CODE.COMPLETE;

  const program = buildProgram(streams, async (ticketFile) => {
    const ticketText = await readTicket(ticketFile, streams.stdin);
    const handle = await runnerFactory({ interactive: canPromptOperator(ticketFile, streams.stdin.isTTY === true) });
    try {
      const outcome = await handle.runner.run(ticketText);
      streams.stdout.write(outcome.report);
      exitCode = outcome.exitCode;
    } finally {
      await handle.close();
    }
  });

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode === 0 ? EXIT_CODE.COMPLETE : EXIT_CODE.FATAL;
    }
    streams.stderr.write(`${CLI_NAME}: ${describeError(err)}\n`);
    return EXIT_CODE.FATAL;
  }
  return exitCode;
}
