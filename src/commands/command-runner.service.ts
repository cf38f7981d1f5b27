import { Injectable, Logger } from '@nestjs/common';
import { spawn } from 'node:child_process';
import { constants } from 'node:fs';
import { access, stat } from 'node:fs/promises';
import path from 'node:path';

/**
 * Outcome of one external command.
 * A non-zero exit is reported here, not thrown; only a failure to start
 * the process at all rejects.
 */
export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface CommandOptions {
  /** Text written to the child's stdin before it is closed */
  input?: string;
}

/**
 * CommandRunner - thin wrapper around child processes
 *
 * Both collaborators of the forwarder (the kasa device CLI and
 * zabbix_sender) are driven through this service, which keeps the rest of
 * the code free of child_process details and easy to mock in tests.
 */
@Injectable()
export class CommandRunner {
  private readonly logger = new Logger(CommandRunner.name);

  /**
   * Run a binary with arguments and collect its output.
   *
   * No shell is involved, so arguments are passed through verbatim.
   */
  run(
    binary: string,
    args: string[],
    options: CommandOptions = {},
  ): Promise<CommandResult> {
    this.logger.verbose(`Running: ${binary} ${args.join(' ')}`);

    return new Promise<CommandResult>((resolve, reject) => {
      const child = spawn(binary, args, { stdio: ['pipe', 'pipe', 'pipe'] });
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];

      child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));
      child.on('error', reject);
      // the child may exit before reading its input (or never start)
      child.stdin.on('error', (error: Error) =>
        this.logger.debug(`stdin of ${binary} closed early: ${error.message}`),
      );
      child.on('close', (code: number | null) => {
        resolve({
          exitCode: code ?? 1,
          stdout: Buffer.concat(stdout).toString('utf-8'),
          stderr: Buffer.concat(stderr).toString('utf-8'),
        });
      });

      if (options.input !== undefined) {
        child.stdin.write(options.input);
      }
      child.stdin.end();
    });
  }

  /**
   * Check whether a binary can be executed, like `command -v`.
   *
   * Names containing a path separator are checked directly; bare names are
   * looked up in every PATH directory.
   */
  async isAvailable(
    binary: string,
    searchPath: string = process.env.PATH ?? '',
  ): Promise<boolean> {
    const candidates = binary.includes(path.sep)
      ? [binary]
      : searchPath
          .split(path.delimiter)
          .filter((dir) => dir !== '')
          .map((dir) => path.join(dir, binary));

    for (const candidate of candidates) {
      try {
        const info = await stat(candidate);
        if (info.isFile()) {
          await access(candidate, constants.X_OK);
          return true;
        }
      } catch {
        // not executable here, try the next directory
      }
    }
    return false;
  }
}
