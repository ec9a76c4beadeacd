/**
 * Field definitions
 *
 * The facts a snapshot section needs and how to ask a user for them when the
 * transcript does not supply them.
 */

import { SnapshotError } from './errors';

export type FieldType = 'string' | 'date' | 'number';

export interface FieldDefinition {
  description: string;
  type: FieldType;
  example: string;
  validation: string | null;
}

export const FIELD_DEFINITIONS: Record<string, FieldDefinition> = {
  company_name: {
    description: 'Full legal name of the customer company',
    type: 'string',
    example: 'Acme Corporation',
    validation: "^[A-Za-z0-9\\s.,&'-]{2,100}$",
  },
  industry: {
    description: 'Primary industry or sector',
    type: 'string',
    example: 'Financial Services, Healthcare, Manufacturing',
    validation: '^[A-Za-z\\s,]{2,50}$',
  },
  location: {
    description: 'Primary location (City, State/Province, Country)',
    type: 'string',
    example: 'San Francisco, California, USA',
    validation: null,
  },
  primary_contact: {
    description: 'Name of primary customer contact',
    type: 'string',
    example: 'Jane Doe',
    validation: '^[A-Za-z\\s.-]{2,50}$',
  },
  contact_position: {
    description: 'Position or title of primary contact',
    type: 'string',
    example: 'Chief Technology Officer',
    validation: null,
  },
  contact_email: {
    description: 'Email address of primary contact',
    type: 'string',
    example: 'jane.doe@example.com',
    validation: '^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\\.[a-zA-Z]{2,}$',
  },
  start_date: {
    description: 'Project start date (YYYY-MM-DD)',
    type: 'date',
    example: '2024-07-14',
    validation: '^\\d{4}-\\d{2}-\\d{2}$',
  },
  completion_date: {
    description: 'Project completion date (YYYY-MM-DD)',
    type: 'date',
    example: '2024-12-15',
    validation: '^\\d{4}-\\d{2}-\\d{2}$',
  },
  product_name: {
    description: 'Name of product or service implemented',
    type: 'string',
    example: 'Enterprise Cloud Platform',
    validation: null,
  },
  cost_savings: {
    description: 'Cost savings amount with currency',
    type: 'string',
    example: '$250,000 annually',
    validation: null,
  },
  revenue_increase: {
    description: 'Revenue increase amount or percentage',
    type: 'string',
    example: '$500,000 or 15% increase',
    validation: null,
  },
  roi_percentage: {
    description: 'Return on investment percentage',
    type: 'string',
    example: '150% over 18 months',
    validation: null,
  },
  user_count: {
    description: 'Number of users or seats',
    type: 'number',
    example: '500 users',
    validation: '^\\d+$',
  },
  adoption_rate: {
    description: 'User adoption rate percentage',
    type: 'string',
    example: '95% within 3 months',
    validation: null,
  },
  efficiency_improvement: {
    description: 'Efficiency improvement percentage or description',
    type: 'string',
    example: '40% reduction in processing time',
    validation: null,
  },
};

// Sections absent from these maps have no required or valuable fields
const REQUIRED_FIELDS: Record<string, string[]> = {
  'Customer Information': ['company_name', 'industry'],
  'Engagement Details': ['start_date'],
};

const VALUABLE_FIELDS: Record<string, string[]> = {
  'Customer Information': ['location', 'primary_contact', 'contact_position'],
  Solution: ['product_name'],
  'Engagement Details': ['completion_date'],
  'Results and Achievements': ['efficiency_improvement'],
  'Adoption and Usage': ['user_count', 'adoption_rate'],
  'Financial Impact': ['cost_savings', 'revenue_increase', 'roi_percentage'],
};

export function getFieldInfo(fieldName: string): FieldDefinition | undefined {
  return Object.prototype.hasOwnProperty.call(FIELD_DEFINITIONS, fieldName)
    ? FIELD_DEFINITIONS[fieldName]
    : undefined;
}

export function getRequiredFields(sectionName: string): string[] {
  return REQUIRED_FIELDS[sectionName] ?? [];
}

export function getValuableFields(sectionName: string): string[] {
  return VALUABLE_FIELDS[sectionName] ?? [];
}

export function isFieldRequired(sectionName: string, fieldName: string): boolean {
  return getRequiredFields(sectionName).includes(fieldName);
}

/**
 * Checks a user-supplied value against the field's pattern. Fields without a
 * pattern accept any non-empty value.
 */
export function isValidFieldValue(fieldName: string, value: string): boolean {
  const field = getFieldInfo(fieldName);
  if (!field) return false;
  if (!value.trim()) return false;
  if (!field.validation) return true;
  return new RegExp(field.validation).test(value);
}

function titleCase(fieldName: string): string {
  return fieldName
    .split('_')
    .map((word) => (word ? word[0].toUpperCase() + word.slice(1).toLowerCase() : word))
    .join(' ');
}

export function buildElicitationPrompt(fieldName: string, sectionName: string): string {
  if (!fieldName || !sectionName) {
    throw new SnapshotError('INVALID_INPUT', 'field_name and section_name are required', {
      field_name: fieldName,
      section_name: sectionName,
    });
  }

  const field = getFieldInfo(fieldName);
  if (!field) {
    throw new SnapshotError('RESOURCE_NOT_FOUND', `Field not found: ${fieldName}`, {
      field_name: fieldName,
    });
  }

  return `The ${sectionName} section is missing the following information:

**${titleCase(fieldName)}**
${field.description}

Example: ${field.example}

Could you please provide this information?`;
}
