/**
 * zod schemas for entity.json files
 */
import { z } from 'zod';
import { HTTP_METHODS } from './types.mjs';

const MethodSchema = z
  .string()
  .transform((value) => value.trim().toUpperCase())
  .pipe(z.enum(HTTP_METHODS));

export const CompositeStepSchema = z.object({
  name: z.string().min(1),
  endpoint: z.string().min(1),
  method: MethodSchema.default('POST'),
  dependsOn: z.union([z.string(), z.array(z.string())]).optional(),
  isArray: z.boolean().default(false),
  arrayProperty: z.string().min(1).optional(),
  sourceProperty: z.string().min(1).optional(),
  templateTransformations: z.record(z.string()).default({}),
});

export const CompositeConfigSchema = z.object({
  name: z.string().min(1).optional(),
  description: z.string().default(''),
  steps: z.array(CompositeStepSchema).min(1),
});

export const EntitySchema = z
  .object({
    url: z.string().default(''),
    methods: z.array(MethodSchema).default(['GET']),
    type: z
      .string()
      .transform((value) => value.toLowerCase())
      .pipe(z.enum(['standard', 'composite']))
      .optional(),
    isPrivate: z.boolean().default(false),
    allowedEnvironments: z.array(z.string().min(1)).optional(),
    cacheDurationSeconds: z.number().int().nonnegative().optional(),
    compositeConfig: CompositeConfigSchema.optional(),
  })
  .superRefine((entity, ctx) => {
    const isComposite = entity.type === 'composite' || (entity.type === undefined && entity.compositeConfig !== undefined);
    if (isComposite && !entity.compositeConfig) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['compositeConfig'],
        message: 'compositeConfig is required for composite endpoints',
      });
    }
    if (!isComposite && !URL.canParse(entity.url)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['url'], message: 'url must be an absolute URL' });
    }
  });

export type CompositeStepInput = z.infer<typeof CompositeStepSchema>;
export type CompositeConfigInput = z.infer<typeof CompositeConfigSchema>;
export type EntityInput = z.infer<typeof EntitySchema>;

/**
 * One line per issue: `path: message`
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}
