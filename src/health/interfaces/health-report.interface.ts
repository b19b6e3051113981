import { CommandResult } from './command-result.interface';
import { ProjectType, Toolchain } from './project-type.enum';

/** Field names are part of the HTTP response contract. */
export interface HealthReport {
  readme_is_present: boolean;
  build_successful: boolean;
  tests_found_and_passed: boolean;
}

export interface HealthAssessment {
  report: HealthReport;
  projectType: ProjectType;
  toolchain: Toolchain;
  /** README.md content, or null when the repository has none */
  readme: string | null;
  build: CommandResult;
  /** null when no tests were detected and the test command was skipped */
  test: CommandResult | null;
}
