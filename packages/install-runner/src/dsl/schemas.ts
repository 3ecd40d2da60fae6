import { z } from 'zod';
import type { Guard } from './index.js';

const ArgvSchema = z.array(z.string().min(1)).min(1);

const EnvSchema = z.record(z.string(), z.string());

// Guard schemas are strict so that a typo'd key is rejected instead of
// silently matching another guard shape
export const GuardSchema: z.ZodType<Guard> = z.lazy(() =>
  z.union([
    z.strictObject({ flag: z.string().min(1) }),
    z.strictObject({ env: z.string().min(1), equals: z.string() }),
    z.strictObject({ env: z.string().min(1), set: z.boolean() }),
    z.strictObject({ all: z.array(GuardSchema).min(1) }),
    z.strictObject({ any: z.array(GuardSchema).min(1) }),
    z.strictObject({ not: GuardSchema }),
  ])
);

// Base step schema
const BaseStepSchema = z.object({
  id: z.string().min(1),
  description: z.string().optional(),
  guard: GuardSchema.optional(),
  continueOnError: z.boolean().optional(),
  optIn: z.boolean().optional(),
  group: z.string().min(1).optional(),
});

// Command schemas
const RunCommandSchema = z.object({
  type: z.literal('run'),
  command: ArgvSchema,
  env: EnvSchema.optional(),
  sudo: z.boolean().optional(),
});

const PipelineCommandSchema = z.object({
  type: z.literal('pipeline'),
  commands: z.array(ArgvSchema).min(2),
  env: EnvSchema.optional(),
  sudo: z.boolean().optional(),
});

export const RetryableCommandSchema = z.discriminatedUnion('type', [
  RunCommandSchema,
  PipelineCommandSchema,
]);

// Step schemas
const RunStepSchema = BaseStepSchema.extend(RunCommandSchema.shape);

const PipelineStepSchema = BaseStepSchema.extend(PipelineCommandSchema.shape);

const ChdirStepSchema = BaseStepSchema.extend({
  type: z.literal('chdir'),
  path: z.string().min(1).optional(),
  fromCommand: ArgvSchema.optional(),
  previous: z.literal(true).optional(),
});

const RetryStepSchema = BaseStepSchema.extend({
  type: z.literal('retry'),
  attempts: z.number().int().positive(),
  delayMs: z.number().int().min(0).optional(),
  step: RetryableCommandSchema,
});

const PatchStepSchema = BaseStepSchema.extend({
  type: z.literal('patch'),
  patch: z.string().min(1),
});

export const InstallStepSchema = z.discriminatedUnion('type', [
  RunStepSchema,
  PipelineStepSchema,
  ChdirStepSchema,
  RetryStepSchema,
  PatchStepSchema,
]);

export const FlagDefinitionSchema = z.object({
  env: z.string().min(1),
  default: z.boolean().optional(),
  description: z.string().optional(),
});

// Main install plan schema
export const InstallPlanSchema = z
  .object({
    name: z.string().optional(),
    description: z.string().optional(),
    env: EnvSchema.optional(),
    flags: z.record(z.string(), FlagDefinitionSchema).optional(),
    steps: z.array(InstallStepSchema),
  })
  .superRefine((plan, ctx) => {
    const seen = new Set<string>();
    plan.steps.forEach((step, index) => {
      if (seen.has(step.id)) {
        ctx.addIssue({
          code: 'custom',
          message: `Duplicate step id: ${step.id}`,
          path: ['steps', index, 'id'],
        });
      }
      seen.add(step.id);

      if (step.type === 'chdir') {
        const targets = [step.path, step.fromCommand, step.previous].filter(t => t !== undefined);
        if (targets.length !== 1) {
          ctx.addIssue({
            code: 'custom',
            message: 'chdir step needs exactly one of path, fromCommand or previous',
            path: ['steps', index],
          });
        }
      }
    });
  });

export const ReplacementSchema = z.object({
  find: z.string().min(1),
  replace: z.string(),
  all: z.boolean().optional(),
});

export const PatchArtifactSchema = z.object({
  id: z.string().min(1),
  version: z.number().int().positive(),
  description: z.string().optional(),
  appliesTo: z
    .object({
      package: z.string(),
      version: z.string().optional(),
    })
    .optional(),
  target: z.string().min(1),
  replacements: z.array(ReplacementSchema).min(1),
});
