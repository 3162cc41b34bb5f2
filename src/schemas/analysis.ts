import { z } from 'zod';

const FindingSchema = z.union([z.string(), z.record(z.unknown())]);

/**
 * Shape the code reviewer prompt asks the model to answer with.
 */
export const CodeAnalysisSchema = z.object({
  issues: z.array(FindingSchema),
  suggestions: z.array(FindingSchema),
  best_practices: z.array(FindingSchema),
  security_concerns: z.array(FindingSchema),
});

export type CodeAnalysis = z.infer<typeof CodeAnalysisSchema>;
