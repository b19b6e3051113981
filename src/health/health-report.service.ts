import { Injectable, Logger } from '@nestjs/common';
import * as fs from 'fs-extra';
import * as path from 'path';
import { errorMessage } from '../common/errors';
import { decodeLenient } from '../common/text.util';
import { CommandRunnerService } from './command-runner.service';
import { ProjectClassifierService } from './project-classifier.service';
import { TestPresenceService } from './test-presence.service';
import { CommandResult } from './interfaces/command-result.interface';
import { HealthAssessment, HealthReport } from './interfaces/health-report.interface';
import { ProjectType, Toolchain } from './interfaces/project-type.enum';

const NODE_TOOLCHAIN: Toolchain = { buildCommand: 'npm install', testCommand: 'npm test' };
const PYTHON_TOOLCHAIN: Toolchain = { buildCommand: 'pip install -r requirements.txt', testCommand: 'pytest' };

/** Unknown projects get the Python toolchain too. */
export function toolchainFor(projectType: ProjectType): Toolchain {
  return projectType === ProjectType.NodeJS ? NODE_TOOLCHAIN : PYTHON_TOOLCHAIN;
}

@Injectable()
export class HealthReportService {
  private readonly logger = new Logger(HealthReportService.name);

  constructor(
    private readonly commandRunner: CommandRunnerService,
    private readonly projectClassifier: ProjectClassifierService,
    private readonly testPresence: TestPresenceService,
  ) {}

  async build(repoPath: string): Promise<HealthReport> {
    const { report } = await this.assess(repoPath);
    return report;
  }

  /**
   * Runs every check in order. Build failure does not skip the test step, and
   * no check can throw: failures are recorded as `false`.
   */
  async assess(repoPath: string): Promise<HealthAssessment> {
    // Step 1: README. Presence is existence; the text may still be unreadable
    const readmePath = path.join(repoPath, 'README.md');
    const readmePresent = await this.pathExists(readmePath);
    const readme = readmePresent ? await this.readReadme(readmePath) : null;

    // Step 2: pick the toolchain
    const projectType = await this.detectProjectType(repoPath);
    const toolchain = toolchainFor(projectType);
    this.logger.log(`Detected project type: ${projectType}`);

    // Step 3: build
    const build = await this.runStep('Build', toolchain.buildCommand, repoPath);

    // Step 4: tests, only when something looks like a test
    let test: CommandResult | null = null;
    if (await this.detectTests(repoPath)) {
      test = await this.runStep('Test', toolchain.testCommand, repoPath);
    } else {
      this.logger.log('No tests found, skipping test command');
    }

    const report: HealthReport = {
      readme_is_present: readmePresent,
      build_successful: build.success,
      tests_found_and_passed: test !== null && test.success,
    };
    this.logger.log(`Health report: ${JSON.stringify(report)}`);

    return { report, projectType, toolchain, readme, build, test };
  }

  private async pathExists(target: string): Promise<boolean> {
    try {
      return await fs.pathExists(target);
    } catch (error) {
      this.logger.warn(`Failed to check ${target}: ${errorMessage(error)}`);
      return false;
    }
  }

  private async readReadme(readmePath: string): Promise<string | null> {
    try {
      return decodeLenient(await fs.readFile(readmePath));
    } catch (error) {
      this.logger.warn(`README.md exists but could not be read: ${errorMessage(error)}`);
      return null;
    }
  }

  private async detectProjectType(repoPath: string): Promise<ProjectType> {
    try {
      return await this.projectClassifier.detect(repoPath);
    } catch (error) {
      this.logger.warn(`Project type detection failed: ${errorMessage(error)}`);
      return ProjectType.Unknown;
    }
  }

  private async detectTests(repoPath: string): Promise<boolean> {
    try {
      return await this.testPresence.hasTests(repoPath);
    } catch (error) {
      this.logger.warn(`Test detection failed: ${errorMessage(error)}`);
      return false;
    }
  }

  private async runStep(label: string, command: string, repoPath: string): Promise<CommandResult> {
    try {
      const result = await this.commandRunner.run(command, repoPath);
      if (!result.success) {
        this.logger.warn(`${label} step failed: ${result.output.trim().slice(0, 500)}`);
      }
      return result;
    } catch (error) {
      this.logger.error(`${label} step crashed: ${errorMessage(error)}`);
      return { success: false, output: errorMessage(error) };
    }
  }
}
