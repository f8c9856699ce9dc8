// ═══════════════════════════════════════════════════════════════════════════════
// ANALYZE SCHEMAS — Request Validation for POST /analyze
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';

export const KEYWORD_MAX_LENGTH = 100;

export const KeywordSchema = z
  .string({ required_error: 'keyword is required', invalid_type_error: 'keyword must be a string' })
  .trim()
  .min(1, 'keyword must not be empty')
  .max(KEYWORD_MAX_LENGTH, `keyword must be at most ${KEYWORD_MAX_LENGTH} characters`);

export const AnalyzeRequestSchema = z.object({
  keyword: KeywordSchema,
});

export type AnalyzeRequest = z.infer<typeof AnalyzeRequestSchema>;
