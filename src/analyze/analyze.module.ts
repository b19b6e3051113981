import { Module } from '@nestjs/common';
import { HealthModule } from '../health/health.module';
import { LlmModule } from '../llm/llm.module';
import { RepositoryModule } from '../repository/repository.module';
import { SamplingModule } from '../sampling/sampling.module';
import { AnalyzeController } from './analyze.controller';
import { AnalyzeService } from './analyze.service';

@Module({
  imports: [HealthModule, SamplingModule, RepositoryModule, LlmModule],
  controllers: [AnalyzeController],
  providers: [AnalyzeService],
})
export class AnalyzeModule {}
