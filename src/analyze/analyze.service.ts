import {
  BadRequestException,
  HttpException,
  Inject,
  Injectable,
  InternalServerErrorException,
  Logger,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { errorMessage } from '../common/errors';
import { HealthReportService } from '../health/health-report.service';
import { PARSE_FAILURE_MESSAGE, parseModelResponse } from '../llm/model-response.parser';
import { PromptTemplateName, isPromptTemplateName, renderPrompt } from '../llm/prompt-templates';
import { SUMMARIZER, Summarizer } from '../llm/summarizer.interface';
import { normalizeRepoUrl } from '../repository/git-cloner.service';
import { REPOSITORY_CLONER, RepositoryCloneError, RepositoryCloner } from '../repository/repository-cloner.interface';
import { WorkspaceService } from '../repository/workspace.service';
import { SourceSamplerService } from '../sampling/source-sampler.service';
import { AnalyzeRequestDto } from './dto/analyze-request.dto';
import { AnalyzeResponseDto } from './dto/analyze-response.dto';

@Injectable()
export class AnalyzeService {
  private readonly logger = new Logger(AnalyzeService.name);
  private readonly defaultTemplate: PromptTemplateName;

  constructor(
    private readonly configService: ConfigService,
    private readonly workspace: WorkspaceService,
    private readonly healthReport: HealthReportService,
    private readonly sourceSampler: SourceSamplerService,
    @Inject(REPOSITORY_CLONER) private readonly cloner: RepositoryCloner,
    @Inject(SUMMARIZER) private readonly summarizer: Summarizer,
  ) {
    const configured = this.configService.get<string>('analyzer.promptTemplate', 'contributor-guide');
    this.defaultTemplate = isPromptTemplateName(configured) ? configured : 'contributor-guide';
  }

  async analyze(request: AnalyzeRequestDto): Promise<AnalyzeResponseDto> {
    const repoUrl = normalizeRepoUrl(request.repo_url);
    const template = request.template ?? this.defaultTemplate;

    try {
      return await this.workspace.withWorkspace(async (workspace) => {
        // Step 1: Clone repository
        await this.cloner.clone(repoUrl, workspace);

        // Step 2: Health report
        this.logger.log('Building health report');
        const assessment = await this.healthReport.assess(workspace);

        // Step 3: Source sample
        const sample = await this.sourceSampler.collect(workspace);

        // Step 4: Model summary
        this.logger.log(`Summarizing with ${this.summarizer.model} using the ${template} template`);
        const prompt = renderPrompt(template, { readme: assessment.readme, sourceSample: sample.text });
        const summary = parseModelResponse(await this.summarizer.summarize(prompt));
        if (summary.error === PARSE_FAILURE_MESSAGE && 'raw_response' in summary) {
          this.logger.warn('Model response did not contain a parseable JSON object');
        }

        // The measured report comes first and replaces anything the model returned under the same key
        const modelKeys = Object.entries(summary).filter(([key]) => key !== 'health_report');
        return { health_report: assessment.report, ...Object.fromEntries(modelKeys) };
      });
    } catch (error) {
      if (error instanceof RepositoryCloneError) {
        throw new BadRequestException(
          `Failed to clone repository. Is the URL correct and public? Error: ${error.message}`,
        );
      }
      // Re-throw known exceptions as-is
      if (error instanceof HttpException) {
        throw error;
      }
      this.logger.error(`Analysis error: ${errorMessage(error)}`, error instanceof Error ? error.stack : undefined);
      throw new InternalServerErrorException(`An unexpected error occurred: ${errorMessage(error)}`);
    }
  }
}
