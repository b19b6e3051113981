import { Module } from '@nestjs/common';
import { CommandRunnerService } from './command-runner.service';
import { HealthReportService } from './health-report.service';
import { ProjectClassifierService } from './project-classifier.service';
import { TestPresenceService } from './test-presence.service';

@Module({
  providers: [CommandRunnerService, ProjectClassifierService, TestPresenceService, HealthReportService],
  exports: [HealthReportService],
})
export class HealthModule {}
