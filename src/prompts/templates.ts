/**
 * Canned instructions selected by category. A category the table does not know
 * resolves to the table's default entry instead of failing the call.
 */
export interface TemplateTable<K extends string = string> {
  readonly name: string;
  readonly defaultKey: K;
  readonly templates: Readonly<Record<K, string>>;
}

export const AUDIT_TYPES = ['sql_injection', 'xss', 'auth', 'general', 'input_validation'] as const;
export type AuditType = (typeof AUDIT_TYPES)[number];

export const ANALYSIS_TYPES = ['overview', 'dependencies', 'patterns', 'structure', 'coupling'] as const;
export type AnalysisType = (typeof ANALYSIS_TYPES)[number];

export const SECURITY_AUDIT_TEMPLATES: TemplateTable<AuditType> = {
  name: 'security_audit',
  defaultKey: 'general',
  templates: {
    sql_injection: 'Analyze this code for SQL injection vulnerabilities. Show how user inputs are sanitized and whether prepared statements or ORMs are used properly.',
    xss: 'Check for Cross-Site Scripting (XSS) vulnerabilities. Look for proper input sanitization and output encoding.',
    auth: 'Analyze the authentication and authorization implementation. Check for JWT handling, session management, and access controls.',
    general: 'Perform a general security audit. Look for common vulnerabilities like hardcoded secrets, insecure configurations, and improper error handling.',
    input_validation: 'Analyze input validation throughout the codebase. Check how user inputs are validated and sanitized.',
  },
};

export const ARCHITECTURE_TEMPLATES: TemplateTable<AnalysisType> = {
  name: 'architecture_analysis',
  defaultKey: 'overview',
  templates: {
    overview: 'Provide a high-level overview of this codebase architecture. Describe the main components, layers, and how they interact.',
    dependencies: 'Analyze the dependencies in this codebase. Show the dependency graph and identify any potential issues or circular dependencies.',
    patterns: "Identify the architectural patterns and design patterns used in this codebase. Explain how they're implemented.",
    structure: 'Analyze the project structure and organization. Evaluate if it follows best practices and suggest improvements.',
    coupling: 'Analyze the coupling between different modules and components. Identify tightly coupled areas that could be refactored.',
  },
};

function isTemplateKey<K extends string>(table: TemplateTable<K>, key: string): key is K {
  return Object.prototype.hasOwnProperty.call(table.templates, key);
}

export function resolveTemplate<K extends string>(table: TemplateTable<K>, category: string): string {
  return isTemplateKey(table, category) ? table.templates[category] : table.templates[table.defaultKey];
}

export function verificationPrompt(featureName: string): string {
  return `Has ${featureName} been implemented in this codebase? Show me the relevant files and functions if it exists, or confirm if it's missing.`;
}
