import { ToolRegistry } from '../../../src/tools/registry.js';

describe('ToolRegistry', () => {
  it('listTools returns the six analysis tools in a stable order', () => {
    const registry = new ToolRegistry();
    expect(registry.listTools().map(t => t.name)).toEqual([
      'gemini_analyze_files',
      'gemini_analyze_directories',
      'gemini_analyze_all_files',
      'gemini_verify_implementation',
      'gemini_security_audit',
      'gemini_architecture_analysis',
    ]);
  });

  it('listTools is idempotent and hands out a fresh array', () => {
    const registry = new ToolRegistry();
    const first = registry.listTools();
    first.pop();
    const second = registry.listTools();
    expect(second).toHaveLength(6);
    expect(second[0]).toBe(registry.listTools()[0]);
  });

  it('hands out frozen definitions', () => {
    const [first] = new ToolRegistry().listTools();
    expect(Object.isFrozen(first)).toBe(true);
  });

  it('every tool accepts an optional working_directory', () => {
    for (const tool of new ToolRegistry().listTools()) {
      const shape = tool.inputSchema.shape;
      expect(shape['working_directory']?.isOptional()).toBe(true);
    }
  });

  it('getTool finds tools by name', () => {
    const registry = new ToolRegistry();
    expect(registry.getTool('gemini_security_audit')?.description)
      .toBe('Perform security analysis of the codebase using Gemini');
    expect(registry.getTool('gemini_unknown')).toBeUndefined();
  });

  it('accepts category values outside the advertised enum', () => {
    const audit = new ToolRegistry().getTool('gemini_security_audit');
    expect(audit?.inputSchema.safeParse({ audit_type: 'csrf', paths: ['.'] }).success).toBe(true);
  });
});
