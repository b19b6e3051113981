import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { errorCode, errorMessage } from '../common/errors';

const WORKSPACE_PREFIX = 'repo-analysis-';

/**
 * Hands out one private temporary directory per analysis and removes it
 * afterwards, whatever happened in between.
 */
@Injectable()
export class WorkspaceService {
  private readonly logger = new Logger(WorkspaceService.name);
  private readonly root: string;

  constructor(private readonly configService: ConfigService) {
    this.root = this.configService.get<string>('analyzer.workspaceRoot', os.tmpdir());
  }

  async withWorkspace<T>(task: (workspace: string) => Promise<T>): Promise<T> {
    const workspace = await this.acquire();
    try {
      return await task(workspace);
    } finally {
      await this.release(workspace);
    }
  }

  async acquire(): Promise<string> {
    await fs.ensureDir(this.root);
    const workspace = await fs.mkdtemp(path.join(this.root, WORKSPACE_PREFIX));
    this.logger.debug(`Created workspace ${workspace}`);
    return workspace;
  }

  /** Never throws; a failed cleanup is logged and left behind. */
  async release(workspace: string): Promise<void> {
    try {
      await this.remove(workspace);
      this.logger.log(`Cleaned up workspace: ${workspace}`);
    } catch (error) {
      this.logger.warn(`Failed to cleanup workspace ${workspace}: ${errorMessage(error)}`);
    }
  }

  private async remove(target: string): Promise<void> {
    try {
      await fs.remove(target);
    } catch (error) {
      const code = errorCode(error);
      if (code !== 'EPERM' && code !== 'EACCES') {
        throw error;
      }
      // git marks pack files read-only, which blocks deletion on Windows
      this.logger.debug(`Removal of ${target} hit ${code}, clearing read-only flags`);
      await this.makeWritable(target);
      await fs.remove(target);
    }
  }

  private async makeWritable(target: string): Promise<void> {
    const stats = await fs.lstat(target);
    if (stats.isSymbolicLink()) {
      return;
    }
    if (stats.isDirectory()) {
      await fs.chmod(target, stats.mode | 0o700);
      for (const name of await fs.readdir(target)) {
        await this.makeWritable(path.join(target, name));
      }
      return;
    }
    await fs.chmod(target, stats.mode | 0o200);
  }
}
