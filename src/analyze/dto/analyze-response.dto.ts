import { HealthReport } from '../../health/interfaces/health-report.interface';

export class HealthReportDto implements HealthReport {
  readme_is_present!: boolean;
  build_successful!: boolean;
  tests_found_and_passed!: boolean;
}

/**
 * The model's JSON object (or the parse fallback `{ error, raw_response }`)
 * with the health report merged in under `health_report`.
 */
export type AnalyzeResponseDto = Record<string, unknown> & {
  health_report: HealthReportDto;
};
