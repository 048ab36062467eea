/**
 * Prompt template utilities for consistent LLM interactions.
 */

export interface PromptTemplate {
  template: string;
  variables: string[];
}

const PLACEHOLDER = /\{(\w+)\}/g;

/**
 * Build a prompt by substituting `{name}` placeholders in one pass.
 * Values are inserted verbatim: neither `$` sequences nor `{name}` text inside a value is expanded.
 * Placeholders without a value are left as they are.
 */
export function buildPrompt(template: string, variables: Record<string, string>): string {
  return template.replace(PLACEHOLDER, (placeholder: string, key: string) =>
    Object.prototype.hasOwnProperty.call(variables, key) ? (variables[key] ?? placeholder) : placeholder,
  );
}

/**
 * Create a reusable prompt template.
 */
export function createPromptTemplate(template: string): PromptTemplate {
  const variables: string[] = [];
  for (const match of template.matchAll(PLACEHOLDER)) {
    const name = match[1];
    if (name !== undefined && !variables.includes(name)) {
      variables.push(name);
    }
  }

  return { template, variables };
}

/**
 * Execute a prompt template with given variables.
 */
export function executeTemplate(template: PromptTemplate, variables: Record<string, string>): string {
  const missingVars = template.variables.filter(
    (v) => !Object.prototype.hasOwnProperty.call(variables, v),
  );
  if (missingVars.length > 0) {
    throw new Error(`Missing template variables: ${missingVars.join(', ')}`);
  }

  return buildPrompt(template.template, variables);
}
