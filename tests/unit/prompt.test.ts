// ============================================================
// Tests for src/vlm/prompt.ts
// Covers: PROMPT_TEMPLATES, resolvePrompt, isAnalysisType
// ============================================================

import { describe, it, expect } from 'vitest';
import { PROMPT_TEMPLATES, isAnalysisType, resolvePrompt } from '../../src/vlm/prompt';
import { ANALYSIS_TYPES } from '@shared/constants';

describe('PROMPT_TEMPLATES', () => {
  it('should have a non-empty template for every analysis type', () => {
    for (const type of ANALYSIS_TYPES) {
      expect(PROMPT_TEMPLATES[type].trim().length).toBeGreaterThan(0);
    }
  });

  it('should have four distinct templates', () => {
    const templates = ANALYSIS_TYPES.map((type) => PROMPT_TEMPLATES[type]);
    expect(new Set(templates).size).toBe(4);
  });

  it('should be frozen', () => {
    expect(Object.isFrozen(PROMPT_TEMPLATES)).toBe(true);
  });

  it('should convey the intent of each analysis type', () => {
    expect(PROMPT_TEMPLATES.detailed).toContain('comprehensive detail');
    expect(PROMPT_TEMPLATES.story).toContain('story');
    expect(PROMPT_TEMPLATES.technical).toContain('Depth of field');
    expect(PROMPT_TEMPLATES.creative).toContain('Symbolism');
  });
});

describe('resolvePrompt', () => {
  it.each(ANALYSIS_TYPES)('should return the %s template', (type) => {
    expect(resolvePrompt(type)).toBe(PROMPT_TEMPLATES[type]);
  });

  it('should fall back to the detailed template for an unknown type', () => {
    expect(resolvePrompt('haiku')).toBe(PROMPT_TEMPLATES.detailed);
  });

  it('should fall back to the detailed template when no type is given', () => {
    expect(resolvePrompt(undefined)).toBe(PROMPT_TEMPLATES.detailed);
  });

  it('should not treat inherited object keys as analysis types', () => {
    expect(resolvePrompt('toString')).toBe(PROMPT_TEMPLATES.detailed);
  });

  it('should return a non-empty custom prompt verbatim regardless of type', () => {
    const custom = '  Count the birds in this picture.\n';
    expect(resolvePrompt('story', custom)).toBe(custom);
    expect(resolvePrompt('unknown', custom)).toBe(custom);
    expect(resolvePrompt(undefined, custom)).toBe(custom);
  });

  it('should ignore an empty custom prompt', () => {
    expect(resolvePrompt('technical', '')).toBe(PROMPT_TEMPLATES.technical);
  });
});

describe('isAnalysisType', () => {
  it('should accept the four built-in tags', () => {
    expect(ANALYSIS_TYPES.every(isAnalysisType)).toBe(true);
  });

  it('should reject other values', () => {
    expect(isAnalysisType('Detailed')).toBe(false);
    expect(isAnalysisType('')).toBe(false);
    expect(isAnalysisType(undefined)).toBe(false);
    expect(isAnalysisType(3)).toBe(false);
  });
});
