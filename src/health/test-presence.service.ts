import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs-extra';
import * as path from 'path';
import { errorMessage } from '../common/errors';
import { IGNORED_DIRECTORIES } from '../sampling/sampling.constants';

const TEST_DIRECTORY_NAMES: ReadonlySet<string> = new Set(['tests', 'test', '__tests__']);
const TEST_FILE_MARKERS = ['test', 'spec'];

/**
 * Looks for conventional test layouts anywhere in the tree. By default the walk
 * is unfiltered and will descend into node_modules and the like; set
 * ANALYZER_TEST_SCAN_RESPECTS_IGNORE_LIST=true to prune the sampler's ignored
 * directories instead.
 */
@Injectable()
export class TestPresenceService {
  private readonly logger = new Logger(TestPresenceService.name);
  private readonly respectIgnoreList: boolean;

  constructor(private readonly configService: ConfigService) {
    this.respectIgnoreList = this.configService.get<boolean>('analyzer.testScanRespectsIgnoreList', false);
  }

  async hasTests(repoPath: string): Promise<boolean> {
    return this.scan(repoPath);
  }

  private async scan(dir: string): Promise<boolean> {
    let entries: fs.Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (error) {
      this.logger.debug(`Skipping unreadable directory ${dir}: ${errorMessage(error)}`);
      return false;
    }
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    const subdirectories = entries.filter((entry) => entry.isDirectory());
    if (subdirectories.some((entry) => TEST_DIRECTORY_NAMES.has(entry.name))) {
      return true;
    }
    if (entries.some((entry) => !entry.isDirectory() && TEST_FILE_MARKERS.some((marker) => entry.name.includes(marker)))) {
      return true;
    }

    for (const subdirectory of subdirectories) {
      if (this.respectIgnoreList && IGNORED_DIRECTORIES.has(subdirectory.name)) {
        continue;
      }
      if (await this.scan(path.join(dir, subdirectory.name))) {
        return true;
      }
    }
    return false;
  }
}
