// ============================================================
// Vision Analyzer - Prompt Catalog
// Built-in instruction templates for each analysis type
// ============================================================

import { ANALYSIS_TYPES, DEFAULT_ANALYSIS_TYPE } from '@shared/constants';
import type { AnalysisType } from '@shared/types';

const DETAILED_PROMPT = `Analyze this image in comprehensive detail:
1. Main subjects, objects, and people
2. Scene setting and environment
3. Colors, lighting, shadows, and composition
4. Mood, atmosphere, and emotions conveyed
5. Any visible text or signs
6. Quality, style, and artistic elements
7. Context and possible purpose
8. Notable or unique details`;

const STORY_PROMPT = `Create a rich, engaging story based on this image:
- Describe what is happening right now
- Imagine the backstory and context
- Develop the characters or subjects
- Explore emotions and relationships
- Predict what might happen next
Use vivid descriptions and make it compelling.`;

const TECHNICAL_PROMPT = `Provide expert technical analysis of this photograph:
- Composition techniques (rule of thirds, leading lines, framing)
- Lighting setup and quality (natural or artificial, direction, softness)
- Color grading and palette
- Depth of field and focus points
- Camera settings estimation (aperture, shutter speed, ISO)
- Post-processing techniques visible
- Image quality and resolution
- Professional photography principles applied`;

const CREATIVE_PROMPT = `Deep creative analysis of this image:
- Artistic style and influences
- Symbolism and metaphors
- Cultural or historical context
- Emotional and psychological impact
- Narrative and storytelling elements
- Potential interpretations
- How it relates to art movements or genres`;

/** Analysis type to instruction template. Frozen at load. */
export const PROMPT_TEMPLATES: Readonly<Record<AnalysisType, string>> = Object.freeze({
  detailed: DETAILED_PROMPT,
  story: STORY_PROMPT,
  technical: TECHNICAL_PROMPT,
  creative: CREATIVE_PROMPT,
});

export function isAnalysisType(value: unknown): value is AnalysisType {
  return ANALYSIS_TYPES.some((type) => type === value);
}

/**
 * Resolves the prompt to send alongside the image.
 *
 * A non-empty custom prompt wins and is returned verbatim. Otherwise the
 * analysis type selects a template; unknown types get the detailed one.
 */
export function resolvePrompt(
  analysisType: string | undefined,
  customPrompt?: string,
): string {
  if (customPrompt) {
    return customPrompt;
  }
  return isAnalysisType(analysisType)
    ? PROMPT_TEMPLATES[analysisType]
    : PROMPT_TEMPLATES[DEFAULT_ANALYSIS_TYPE];
}
