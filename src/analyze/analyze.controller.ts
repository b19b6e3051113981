import { Body, Controller, HttpCode, HttpStatus, Logger, Post } from '@nestjs/common';
import { AnalyzeService } from './analyze.service';
import { AnalyzeRequestDto } from './dto/analyze-request.dto';
import { AnalyzeResponseDto } from './dto/analyze-response.dto';

@Controller('analyze-repository')
export class AnalyzeController {
  private readonly logger = new Logger(AnalyzeController.name);

  constructor(private readonly analyzeService: AnalyzeService) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  async analyze(@Body() analyzeRequest: AnalyzeRequestDto): Promise<AnalyzeResponseDto> {
    this.logger.log(`Received analysis request for: ${analyzeRequest.repo_url}`);
    const result = await this.analyzeService.analyze(analyzeRequest);
    this.logger.log(`Analysis completed. Health: ${JSON.stringify(result.health_report)}`);
    return result;
  }
}
