import {
  ANALYSIS_TYPES,
  ARCHITECTURE_TEMPLATES,
  AUDIT_TYPES,
  SECURITY_AUDIT_TEMPLATES,
  resolveTemplate,
  verificationPrompt,
} from '../../../src/prompts/templates.js';

describe('resolveTemplate', () => {
  it('has a template for every advertised category', () => {
    for (const type of AUDIT_TYPES) {
      expect(SECURITY_AUDIT_TEMPLATES.templates[type]).toBeTruthy();
    }
    for (const type of ANALYSIS_TYPES) {
      expect(ARCHITECTURE_TEMPLATES.templates[type]).toBeTruthy();
    }
  });

  it('returns the template for a known category', () => {
    expect(resolveTemplate(SECURITY_AUDIT_TEMPLATES, 'xss')).toBe(
      'Check for Cross-Site Scripting (XSS) vulnerabilities. Look for proper input sanitization and output encoding.',
    );
  });

  it('falls back to the general audit for an unknown audit type', () => {
    expect(resolveTemplate(SECURITY_AUDIT_TEMPLATES, 'csrf')).toBe(SECURITY_AUDIT_TEMPLATES.templates.general);
  });

  it('falls back to the overview for an unknown analysis type', () => {
    expect(resolveTemplate(ARCHITECTURE_TEMPLATES, 'performance')).toBe(ARCHITECTURE_TEMPLATES.templates.overview);
  });

  it('does not resolve inherited object keys', () => {
    expect(resolveTemplate(ARCHITECTURE_TEMPLATES, 'toString')).toBe(ARCHITECTURE_TEMPLATES.templates.overview);
  });
});

describe('verificationPrompt', () => {
  it('embeds the feature name', () => {
    expect(verificationPrompt('dark mode')).toBe(
      "Has dark mode been implemented in this codebase? Show me the relevant files and functions if it exists, or confirm if it's missing.",
    );
  });
});
