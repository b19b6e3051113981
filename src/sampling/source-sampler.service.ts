import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs-extra';
import * as path from 'path';
import { DEFAULT_SAMPLE_MAX_CHARS } from '../config/configuration';
import { errorMessage } from '../common/errors';
import { decodeLenient, truncateChars } from '../common/text.util';
import { IGNORED_DIRECTORIES, SOURCE_EXTENSIONS } from './sampling.constants';

export type SampledFileStatus = 'read' | 'skipped';

export interface SampledFile {
  /** Path relative to the sampled root, always with forward slashes */
  path: string;
  status: SampledFileStatus;
  reason?: string;
}

export interface SourceSample {
  text: string;
  truncated: boolean;
  files: SampledFile[];
}

const byName = (a: fs.Dirent, b: fs.Dirent) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0);

export function formatFileBlock(relativePath: string, content: string): string {
  return `--- File: ${relativePath} ---\n${content}\n\n`;
}

/**
 * Builds the source excerpt handed to the model. Files are visited
 * top-down: a directory's own files in name order, then its subdirectories in
 * name order, so the same tree always yields the same sample.
 */
@Injectable()
export class SourceSamplerService {
  private readonly logger = new Logger(SourceSamplerService.name);
  private readonly defaultMaxChars: number;

  constructor(private readonly configService: ConfigService) {
    this.defaultMaxChars = this.configService.get<number>('analyzer.sampleMaxChars', DEFAULT_SAMPLE_MAX_CHARS);
  }

  async sample(repoPath: string, maxChars: number = this.defaultMaxChars): Promise<string> {
    const { text } = await this.collect(repoPath, maxChars);
    return text;
  }

  async collect(repoPath: string, maxChars: number = this.defaultMaxChars): Promise<SourceSample> {
    const state: SourceSample = { text: '', truncated: false, files: [] };
    await this.walk(repoPath, repoPath, maxChars, state);

    const read = state.files.filter((file) => file.status === 'read').length;
    const skipped = state.files.length - read;
    this.logger.log(
      `Sampled ${read} file(s), ${state.text.length} chars${state.truncated ? ' (truncated)' : ''}` +
        (skipped > 0 ? `, ${skipped} skipped` : ''),
    );
    return state;
  }

  /** Returns true once the budget is exhausted so callers stop walking. */
  private async walk(root: string, dir: string, maxChars: number, state: SourceSample): Promise<boolean> {
    let entries: fs.Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (error) {
      this.logger.debug(`Skipping unreadable directory ${dir}: ${errorMessage(error)}`);
      return false;
    }
    entries.sort(byName);

    for (const entry of entries) {
      if (entry.isDirectory() || !SOURCE_EXTENSIONS.some((ext) => entry.name.endsWith(ext))) {
        continue;
      }
      const fullPath = path.join(dir, entry.name);
      const relativePath = path.relative(root, fullPath).split(path.sep).join('/');

      let content: string;
      try {
        content = decodeLenient(await fs.readFile(fullPath));
      } catch (error) {
        const reason = errorMessage(error);
        this.logger.debug(`Skipped ${relativePath}: ${reason}`);
        state.files.push({ path: relativePath, status: 'skipped', reason });
        continue;
      }

      state.text += formatFileBlock(relativePath, content);
      state.files.push({ path: relativePath, status: 'read' });

      if (state.text.length > maxChars) {
        state.text = truncateChars(state.text, maxChars);
        state.truncated = true;
        return true;
      }
    }

    for (const entry of entries) {
      if (!entry.isDirectory() || IGNORED_DIRECTORIES.has(entry.name)) {
        continue;
      }
      if (await this.walk(root, path.join(dir, entry.name), maxChars, state)) {
        return true;
      }
    }
    return false;
  }
}
