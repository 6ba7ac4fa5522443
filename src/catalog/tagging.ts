/**
 * Catalog tag governance: definitions, schema validation, standard tags.
 */

export type TagCategory =
  | 'classification'
  | 'domain'
  | 'quality'
  | 'lifecycle'
  | 'compliance'
  | 'ownership'
  | 'technical';

export type GovernanceLevel = 'standard' | 'restricted' | 'audit';

export interface TagDefinition {
  key: string;
  category: TagCategory;
  description: string;
  /** null means freeform */
  allowedValues: string[] | null;
  required: boolean;
  defaultValue: string | null;
  governanceLevel: GovernanceLevel;
}

export interface TagInstance {
  key: string;
  value: string;
  appliedBy: string;
  appliedAt: string;
  source: 'manual' | 'automated' | 'inherited';
}

export interface TagValidation {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

export function acceptsValue(definition: TagDefinition, value: string): boolean {
  return definition.allowedValues === null || definition.allowedValues.includes(value);
}

function formatAllowed(values: string[] | null): string {
  return values === null ? 'any' : `[${values.map((v) => `'${v}'`).join(', ')}]`;
}

export class TagSchema {
  private definitions = new Map<string, TagDefinition>();
  private required = new Set<string>();

  registerTag(definition: TagDefinition): void {
    this.definitions.set(definition.key, definition);
    if (definition.required) {
      this.required.add(definition.key);
    } else {
      this.required.delete(definition.key);
    }
  }

  validateTags(tags: Record<string, string>): TagValidation {
    const errors: string[] = [];
    const warnings: string[] = [];

    for (const key of this.required) {
      if (!(key in tags)) errors.push(`Missing required tag: ${key}`);
    }

    for (const [key, value] of Object.entries(tags)) {
      const definition = this.definitions.get(key);
      if (!definition) {
        warnings.push(`Unknown tag: ${key}`);
        continue;
      }
      if (!acceptsValue(definition, value)) {
        errors.push(`Invalid value '${value}' for tag '${key}'. Allowed: ${formatAllowed(definition.allowedValues)}`);
      }
    }

    return { valid: errors.length === 0, errors, warnings };
  }

  /** Fill in defaults for optional tags that were left out. */
  applyDefaults(tags: Record<string, string>): Record<string, string> {
    const filled = { ...tags };
    for (const definition of this.definitions.values()) {
      if (definition.defaultValue !== null && !(definition.key in filled)) {
        filled[definition.key] = definition.defaultValue;
      }
    }
    return filled;
  }

  getDefinition(key: string): TagDefinition | undefined {
    return this.definitions.get(key);
  }

  getRequiredTags(): string[] {
    return Array.from(this.required);
  }

  getTagsByCategory(category: TagCategory): TagDefinition[] {
    return Array.from(this.definitions.values()).filter((d) => d.category === category);
  }
}

function tag(
  key: string,
  category: TagCategory,
  description: string,
  allowedValues: string[] | null,
  options: { required?: boolean; defaultValue?: string; governanceLevel?: GovernanceLevel } = {},
): TagDefinition {
  return {
    key,
    category,
    description,
    allowedValues,
    required: options.required ?? false,
    defaultValue: options.defaultValue ?? null,
    governanceLevel: options.governanceLevel ?? 'standard',
  };
}

export const STANDARD_TAG_DEFINITIONS: readonly TagDefinition[] = [
  tag('data_classification', 'classification', 'Data sensitivity classification',
    ['public', 'internal', 'confidential', 'restricted', 'pii', 'phi'], { required: true, governanceLevel: 'audit' }),
  tag('business_domain', 'domain', 'Business domain ownership',
    ['finance', 'hr', 'sales', 'marketing', 'operations', 'product', 'engineering'], { required: true }),
  tag('data_quality', 'quality', 'Data quality tier', ['gold', 'silver', 'bronze', 'raw'], { defaultValue: 'bronze' }),
  tag('environment', 'lifecycle', 'Environment tier',
    ['production', 'staging', 'development', 'sandbox'], { required: true, governanceLevel: 'restricted' }),
  tag('compliance_scope', 'compliance', 'Compliance requirements',
    ['gdpr', 'hipaa', 'sox', 'pci', 'none'], { governanceLevel: 'audit' }),
  tag('cost_center', 'ownership', 'Cost allocation center', null),
  tag('owner_team', 'ownership', 'Owning team', null, { required: true }),
  tag('storage_format', 'technical', 'Data storage format', ['parquet', 'delta', 'iceberg', 'json', 'csv', 'avro']),
  tag('retention_days', 'technical', 'Data retention period in days', null, { governanceLevel: 'restricted' }),
];

export function createStandardTagSchema(): TagSchema {
  const schema = new TagSchema();
  for (const definition of STANDARD_TAG_DEFINITIONS) {
    schema.registerTag(definition);
  }
  return schema;
}
