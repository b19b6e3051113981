import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ChildProcess, spawn } from 'child_process';
import * as fs from 'fs-extra';
import { DEFAULT_COMMAND_TIMEOUT_MS, MAX_TIMER_DELAY_MS } from '../config/configuration';
import { errorMessage } from '../common/errors';
import { CommandResult } from './interfaces/command-result.interface';

/**
 * Runs toolchain commands (`npm install`, `pytest`, ...) inside a cloned
 * repository. The command string goes through the platform shell unescaped,
 * so callers must only pass commands they chose themselves.
 */
@Injectable()
export class CommandRunnerService {
  private readonly logger = new Logger(CommandRunnerService.name);
  private readonly timeoutMs: number;

  constructor(private readonly configService: ConfigService) {
    this.timeoutMs = this.configService.get<number>('analyzer.commandTimeoutMs', DEFAULT_COMMAND_TIMEOUT_MS);
  }

  async run(command: string, workingDir: string, timeoutMs: number = this.timeoutMs): Promise<CommandResult> {
    if (!(await this.isDirectory(workingDir))) {
      return { success: false, output: 'Error: Directory does not exist.' };
    }

    this.logger.log(`Running "${command}" in ${workingDir}`);

    return new Promise<CommandResult>((resolve) => {
      let stdout = '';
      let stderr = '';
      let settled = false;
      let timer: NodeJS.Timeout | undefined;

      const settle = (result: CommandResult) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        resolve(result);
      };

      let child: ChildProcess;
      try {
        // POSIX: own process group, so a timeout can take down everything the shell started
        child = spawn(command, {
          cwd: workingDir,
          shell: true,
          detached: process.platform !== 'win32',
          stdio: ['ignore', 'pipe', 'pipe'],
        });
      } catch (error) {
        // spawn throws synchronously on malformed arguments, e.g. a null byte in the command
        this.logger.error(`"${command}" could not be spawned: ${errorMessage(error)}`);
        settle({ success: false, output: `An unexpected error occurred: ${errorMessage(error)}` });
        return;
      }

      const delay = Math.min(Math.max(timeoutMs, 1), MAX_TIMER_DELAY_MS);
      timer = setTimeout(() => {
        this.logger.warn(`"${command}" exceeded ${delay}ms, terminating`);
        this.terminate(child);
        settle({ success: false, output: `Error: Command timed out after ${delay}ms.` });
      }, delay);

      child.stdout?.setEncoding('utf8');
      child.stderr?.setEncoding('utf8');
      child.stdout?.on('data', (chunk: string) => {
        stdout += chunk;
      });
      child.stderr?.on('data', (chunk: string) => {
        stderr += chunk;
      });

      child.on('error', (error) => {
        this.logger.error(`"${command}" could not be executed: ${error.message}`);
        settle({ success: false, output: `An unexpected error occurred: ${error.message}` });
      });

      child.on('close', (code, signal) => {
        if (code === 0) {
          this.logger.log(`"${command}" succeeded`);
          settle({ success: true, output: stdout });
          return;
        }
        this.logger.warn(`"${command}" failed with ${code !== null ? `exit code ${code}` : `signal ${signal}`}`);
        settle({ success: false, output: stderr });
      });
    });
  }

  private async isDirectory(dir: string): Promise<boolean> {
    try {
      const stats = await fs.stat(dir);
      return stats.isDirectory();
    } catch {
      return false;
    }
  }

  private terminate(child: ChildProcess): void {
    try {
      if (child.pid !== undefined && process.platform !== 'win32') {
        process.kill(-child.pid, 'SIGKILL');
      } else {
        child.kill('SIGKILL');
      }
    } catch (error) {
      // ESRCH: the group already exited between the timer firing and the kill
      this.logger.debug(`Kill of pid ${child.pid} failed: ${errorMessage(error)}`);
    }
  }
}
