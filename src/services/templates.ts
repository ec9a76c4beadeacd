/**
 * Templates service
 *
 * Prompt templates for each snapshot section, the system prompts that frame
 * each generator, and the `{placeholder}` filling used to render them.
 */

export type SectionTemplateKey =
  | 'customer_information'
  | 'background'
  | 'solution'
  | 'engagement_details'
  | 'results_achievements'
  | 'adoption_usage'
  | 'financial_impact'
  | 'long_term_impact'
  | 'visuals'
  | 'additional_commentary'
  | 'executive_summary';

export interface SectionTemplate {
  key: SectionTemplateKey;
  name: string;
  description: string;
  arguments: string[];
  template: string;
}

export const SECTION_TEMPLATES: Record<SectionTemplateKey, SectionTemplate> = {
  customer_information: {
    key: 'customer_information',
    name: 'customer_information_section',
    description: 'Extract customer information from the transcript',
    arguments: ['transcript', 'entities'],
    template: `Using the meeting transcript below, extract the customer's details.

TRANSCRIPT:
{transcript}

IDENTIFIED ENTITIES: {entities}

Fill in each of these fields:
• Company Name:
• Industry:
• Location:
• Primary Contact:
• Position:
• Contact Information:

INSTRUCTIONS:
- Stay factual and precise
- When a field is not stated in the transcript, write "Not mentioned in transcript"
- Reasonable inferences are allowed only when marked [INFERRED]
- Give full contact details where the transcript provides them
- Call out anything ambiguous

OUTPUT FORMAT: Bulleted fields exactly as listed above
`,
  },

  background: {
    key: 'background',
    name: 'background_section',
    description: "Identify the customer's initial problems and challenges",
    arguments: ['transcript'],
    template: `From this meeting transcript, describe the problems or challenges that led the customer to look for a solution.

TRANSCRIPT:
{transcript}

Cover the following:

• Problem / Challenge:
  [The specific problem the customer was facing]

• Business Context:
  [When it started and what made a solution necessary]

• Business Impact:
  [Effect on operations, revenue, efficiency or other metrics]

• Urgency / Priority:
  [How pressing the problem was]

INSTRUCTIONS:
- Stick to pain points the speakers actually raise
- Separate stated problems from implied ones
- Quote the transcript where a quote makes the problem clearer
- Say so when several problems are described

OUTPUT FORMAT: Short narrative with bullet points
`,
  },

  solution: {
    key: 'solution',
    name: 'solution_section',
    description: 'Describe the solution that was implemented',
    arguments: ['transcript'],
    template: `Based on this transcript, describe the solution that was implemented or proposed.

TRANSCRIPT:
{transcript}

Cover the following:

• Product / Service Used:
  [The specific product or service]

• Implementation Process:
  [How it was, or will be, rolled out]

• Technical Details:
  [Specifications, integrations or configuration mentioned]

• Key Features Used:
  [The capabilities that mattered most]

INSTRUCTIONS:
- Name products, versions and service tiers precisely
- Describe the implementation approach
- Note customisations or unusual configuration

OUTPUT FORMAT: Narrative with technical detail
`,
  },

  engagement_details: {
    key: 'engagement_details',
    name: 'engagement_details_section',
    description: 'Outline the engagement timeline and milestones',
    arguments: ['transcript'],
    template: `Extract the engagement timeline and team details.

TRANSCRIPT:
{transcript}

Cover the following:

• Start Date: [When the project started]
• Key Milestones: [Important milestones, with dates where known]
• Completion Date: [Actual or expected completion]
• Post-Implementation Review: [Reviews or assessments mentioned]
• Engagement Team: [Groups involved, e.g. CSM, CSE, Pre-Sales, R&D, partners]
• Engagement Overview: [How the team was involved beyond consultants]

INSTRUCTIONS:
- Capture every date and timeline reference
- List milestones in chronological order
- Name team members and their roles

OUTPUT FORMAT: Timeline followed by structured fields
`,
  },

  results_achievements: {
    key: 'results_achievements',
    name: 'results_achievements_section',
    description: 'Extract quantifiable results and achievements',
    arguments: ['transcript'],
    template: `Identify the key achievements and measurable improvements.

TRANSCRIPT:
{transcript}

Cover the following:

• Key Achievements:
  [Main results, with metrics where available]

• Quantifiable Improvements:
  [Percentages, time saved, cost reductions]

• Testimonial / Quote:
  [Direct quotes that show a positive experience]

• Success Metrics:
  [KPIs used to judge success]

INSTRUCTIONS:
- Prefer hard numbers
- Look for before/after comparisons
- Include both immediate and downstream benefits

OUTPUT FORMAT: Metrics first, supporting narrative after
`,
  },

  adoption_usage: {
    key: 'adoption_usage',
    name: 'adoption_usage_section',
    description: 'Detail adoption and usage of the solution',
    arguments: ['transcript'],
    template: `Extract how the solution was adopted and used.

TRANSCRIPT:
{transcript}

Cover the following:

• User Adoption Rate:
  [How quickly staff took up the solution]

• Usage Metrics:
  [Usage statistics after rollout]

• User Feedback:
  [How users responded]

• Training & Onboarding:
  [Training or onboarding mentioned]

INSTRUCTIONS:
- Look for user counts, frequency of use and engagement figures
- Note whether adoption was immediate or gradual
- Describe the rollout approach

OUTPUT FORMAT: Usage-focused, showing the adoption trajectory
`,
  },

  financial_impact: {
    key: 'financial_impact',
    name: 'financial_impact_section',
    description: 'Extract financial benefits and ROI',
    arguments: ['transcript'],
    template: `Identify the financial benefits and business value.

TRANSCRIPT:
{transcript}

Cover the following:

• Cost Savings:
  [Savings achieved, with amounts where available]

• Revenue Increase:
  [Revenue attributed to the solution]

• ROI:
  [Return on investment figures or estimates]

• Efficiency Gains:
  [Cost avoidance or efficiency improvements with a financial effect]

INSTRUCTIONS:
- Prefer concrete figures
- Note direct and indirect financial effects
- Include the payback period if one is mentioned

OUTPUT FORMAT: Financial metrics with business context
`,
  },

  long_term_impact: {
    key: 'long_term_impact',
    name: 'long_term_impact_section',
    description: 'Describe strategic benefits and future plans',
    arguments: ['transcript'],
    template: `Extract the long-term strategic impact.

TRANSCRIPT:
{transcript}

Cover the following:

• Strategic Benefits:
  [Benefits beyond the immediate ROI]

• Future Plans:
  [Expansions or follow-on projects discussed]

• Competitive Advantage:
  [How the solution strengthens their position]

• Organizational Change:
  [Cultural or operational shifts it enabled]

INSTRUCTIONS:
- Focus on strategic rather than tactical benefits
- Look for planned phases and expansions

OUTPUT FORMAT: Forward-looking strategic narrative
`,
  },

  visuals: {
    key: 'visuals',
    name: 'visuals_section',
    description: 'Identify opportunities for visual elements',
    arguments: ['transcript'],
    template: `Identify information in the transcript that would work well as a visual.

TRANSCRIPT:
{transcript}

Suggest:

• Implementation Timeline Graphic:
  [A timeline that could be drawn]

• Before and After Comparisons:
  [Data for comparison charts]

• Metrics Dashboard:
  [Key metrics worth charting]

• Process Diagrams:
  [Workflows or architectures to diagram]

• Customer Logo Placement:
  [Whether the company name or logo should feature]

INSTRUCTIONS:
- Point to quantitative data suited to charts
- Suggest a timeline only if dates are available

OUTPUT FORMAT: Descriptions of the visuals to produce
`,
  },

  additional_commentary: {
    key: 'additional_commentary',
    name: 'additional_commentary_section',
    description: 'Capture relevant details that fit no other section',
    arguments: ['transcript'],
    template: `Identify important details the other sections do not cover.

TRANSCRIPT:
{transcript}

Cover the following:

• Unique Circumstances:
  [Special conditions of this engagement]

• Lessons Learned:
  [Key insights from the project]

• Partnership Dynamics:
  [Collaboration worth highlighting]

• Industry Context:
  [Relevant industry trends or pressures]

• Innovation / Differentiation:
  [Novel approaches or implementations]

INSTRUCTIONS:
- Include context that enriches the overall story
- Highlight creative problem-solving

OUTPUT FORMAT: Narrative commentary with supporting details
`,
  },

  executive_summary: {
    key: 'executive_summary',
    name: 'executive_summary_section',
    description: 'Synthesize a high-level overview from all other sections',
    arguments: ['all_sections'],
    template: `Write an executive summary from the completed snapshot sections below.

SECTION CONTENT:
{all_sections}

Structure it as:

• Opening Statement:
  [One compelling sentence]

• Customer & Challenge:
  [Who the customer is and the problem they faced]

• Solution Deployed:
  [What was implemented]

• Key Results:
  [The 3-5 strongest outcomes, with metrics]

• Strategic Value:
  [Long-term business impact]

• Conclusion:
  [A forward-looking close]

INSTRUCTIONS:
- 300-400 words at most
- Lead with the strongest results
- Write for a C-level reader, focusing on business value

OUTPUT FORMAT: Polished executive summary
`,
  },
};

export type SystemPromptKey =
  | 'analyzer'
  | 'section_generator'
  | 'customer_information'
  | 'background'
  | 'solution'
  | 'engagement'
  | 'results'
  | 'adoption'
  | 'financial'
  | 'strategic'
  | 'visuals'
  | 'commentary'
  | 'executive_summary'
  | 'validator';

export const SYSTEM_PROMPTS: Record<SystemPromptKey, string> = {
  analyzer: `You are an expert analyst of business meeting transcripts. Identify people, companies, products, key topics and the structure of the conversation, and rate how much data the transcript offers for each snapshot section. Separate explicit facts from inferences and answer in JSON.`,

  section_generator: `You are a technical writer producing one section of a Customer Success Snapshot from a meeting transcript. Be factual, mark inferences as [INFERRED], and say plainly when information is not in the transcript.`,

  customer_information: `You are a data extraction specialist focused on customer details. Extract company details, contacts and organisational information. Be precise, mark inferences clearly and keep the formatting professional.`,

  background: `You are a business analyst who identifies the challenges behind a customer's need. Extract pain points, their business impact and what triggered the search for a solution.`,

  solution: `You are a solutions architect documenting an implementation. Describe the products or services used, how they were rolled out and the technical details, concretely and accurately.`,

  engagement: `You are a project manager documenting an engagement. Extract dates, milestones, team members and phases, in chronological order.`,

  results: `You are an outcomes specialist. Extract measurable results, KPIs, improvements and customer testimonials, prioritising hard numbers.`,

  adoption: `You are a change management specialist. Describe user adoption, usage patterns, training and feedback.`,

  financial: `You are a financial analyst. Extract cost savings, revenue impact, efficiency gains and return on investment, with clear figures.`,

  strategic: `You are a strategy consultant. Describe strategic benefits, competitive advantage, organisational change and future opportunities.`,

  visuals: `You are a data visualisation specialist. Identify timelines, metrics, comparisons and processes worth visualising, and suggest chart types.`,

  commentary: `You are a business storyteller. Capture lessons learned, partnership dynamics, industry context and anything distinctive about the engagement.`,

  executive_summary: `You are a senior executive communications expert. Synthesise the snapshot into a concise, results-led overview for a C-level audience, 300-400 words, scannable and well structured.`,

  validator: `You are a quality assurance specialist reviewing a Customer Success Snapshot. Check factual consistency across sections (dates, names, metrics), completeness, tone and narrative flow, and suggest specific improvements.`,
};

export class MissingTemplateKeyError extends Error {
  readonly key: string;

  constructor(key: string) {
    super(`Missing template variable: ${key}`);
    this.name = 'MissingTemplateKeyError';
    this.key = key;
  }
}

/**
 * Replaces every `{name}` placeholder with `vars[name]`. Throws
 * MissingTemplateKeyError on the first placeholder without a value.
 */
export function fillTemplate(template: string, vars: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (_match, key: string) => {
    const value = vars[key];
    if (value === undefined) {
      throw new MissingTemplateKeyError(key);
    }
    return value;
  });
}

export function listSectionTemplates(): SectionTemplate[] {
  return Object.values(SECTION_TEMPLATES);
}

export function findTemplateByName(name: string): SectionTemplate | undefined {
  return listSectionTemplates().find((t) => t.name === name);
}
