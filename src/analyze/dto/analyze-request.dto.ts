import { IsIn, IsNotEmpty, IsOptional, IsString, IsUrl } from 'class-validator';
import { PROMPT_TEMPLATE_NAMES, PromptTemplateName } from '../../llm/prompt-templates';

export class AnalyzeRequestDto {
  @IsString()
  @IsNotEmpty()
  @IsUrl({}, { message: 'repo_url must be a valid URL' })
  repo_url!: string;

  @IsOptional()
  @IsIn(PROMPT_TEMPLATE_NAMES, { message: `template must be one of: ${PROMPT_TEMPLATE_NAMES.join(', ')}` })
  template?: PromptTemplateName;
}
