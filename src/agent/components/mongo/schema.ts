import { z } from "zod";

export const CollectionListSchema = z.array(z.string());

export const QueryAnalysisSchema = z.object({
    has_issues: z.boolean(),
    issues: z.string().optional().default(""),
    fixed_query: z.string().nullable().optional().default(null),
});

export type QueryAnalysis = z.infer<typeof QueryAnalysisSchema>;

export const QueryRequestSchema = z.object({
    query: z.string().trim().min(1, "Query is required"),
    max_results: z.number().int().positive().optional(),
});

export type QueryRequest = z.infer<typeof QueryRequestSchema>;
