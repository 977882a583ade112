/**
 * Zod schemas for catalog entries.
 *
 * Entries keep the short field names of the catalog table (`project`,
 * `params`, `hook`); `normalizeTemplate` turns them into TemplateDefinitions.
 */
import { z } from 'zod';

export const ParameterEntrySchema = z.object({
  /** Prompt kind; unknown kinds are accepted and skipped at collection time */
  type: z.string().default('text'),
  name: z.string().min(1),
  message: z.string().optional(),
  default: z.union([z.string(), z.boolean()]).optional(),
  choices: z.array(z.string()).optional(),
});

export const TemplateEntrySchema = z
  .object({
    project: z.array(z.string().min(1)),
    params: z.array(ParameterEntrySchema).default([]),
    hook: z.array(z.string().min(1)).default([]),
  })
  .superRefine((entry, ctx) => {
    const seen = new Set<string>();
    entry.params.forEach((param, index) => {
      if (seen.has(param.name)) {
        ctx.addIssue({
          code: 'custom',
          path: ['params', index, 'name'],
          message: `Duplicate parameter name: ${param.name}`,
        });
      }
      seen.add(param.name);
    });
  });

export type ParameterEntry = z.input<typeof ParameterEntrySchema>;
export type TemplateEntry = z.input<typeof TemplateEntrySchema>;
export type ParsedTemplateEntry = z.output<typeof TemplateEntrySchema>;
