export const PROMPT_TEMPLATE_NAMES = ['contributor-guide', 'overview'] as const;

export type PromptTemplateName = (typeof PROMPT_TEMPLATE_NAMES)[number];

export interface PromptContext {
  readme: string | null;
  sourceSample: string;
}

export function isPromptTemplateName(value: string): value is PromptTemplateName {
  return PROMPT_TEMPLATE_NAMES.some((name) => name === value);
}

const renderContext = ({ readme, sourceSample }: PromptContext): string => `<CONTEXT>
<README>
${readme ? readme : 'No README provided.'}
</README>
<SOURCE_CODE>
${sourceSample}
</SOURCE_CODE>
</CONTEXT>`;

const contributorGuide = (context: PromptContext): string => `You are 'Code-Compass', an AI expert at analyzing open-source projects.
Your purpose is to provide a rich, detailed, and structured analysis in a single JSON object to guide new contributors.

${renderContext(context)}

<INSTRUCTIONS>
Generate a single JSON object with two top-level keys: "project_overview" and "contribution_guide".
1. The "project_overview" object should contain:
   - "elevator_pitch": A single, compelling sentence.
   - "detailed_description": A paragraph explaining the project's purpose and the problem it solves.
   - "target_audience": A brief description of who would use this project.
   - "tech_stack": An array of strings listing the key technologies.
2. The "contribution_guide" object should contain:
   - "current_status": A description of how complete the project is.
   - "contribution_friendliness": A score from 1-10 and a brief justification.
   - "first_good_issue": A specific, actionable task a new developer could tackle first.
   - "suggested_roadmap": An array of 3-4 major features or next steps for the project's future.

Do not include any text or markdown formatting outside of the main JSON object.
</INSTRUCTIONS>`;

const overview = (context: PromptContext): string => `You are an AI expert at summarizing open-source projects.

${renderContext(context)}

<INSTRUCTIONS>
Generate a single JSON object with one top-level key, "project_overview", containing:
- "elevator_pitch": A single, compelling sentence.
- "detailed_description": A paragraph explaining the project's purpose and the problem it solves.
- "tech_stack": An array of strings listing the key technologies.

Do not include any text or markdown formatting outside of the JSON object.
</INSTRUCTIONS>`;

const TEMPLATES: Record<PromptTemplateName, (context: PromptContext) => string> = {
  'contributor-guide': contributorGuide,
  overview,
};

export function renderPrompt(template: PromptTemplateName, context: PromptContext): string {
  return TEMPLATES[template](context);
}
