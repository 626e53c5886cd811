/**
 * @fileoverview zod schema of the project configuration file
 *
 * Keys are snake_case as written in YAML. Flag lists take a single string
 * as well as a list, and arm variants may be written as numbers.
 */

import { z } from 'zod';

const stringList = z
  .union([z.string(), z.array(z.string())])
  .optional()
  .transform(value => (value === undefined ? [] : typeof value === 'string' ? [value] : value));

const armVariant = z.union([z.string(), z.number()]).transform(String);

const armList = z
  .union([armVariant, z.array(armVariant)])
  .optional()
  .transform(value => (value === undefined ? [] : Array.isArray(value) ? value : [value]));

const envEntry = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_]*=/, 'expected KEY=VALUE');

export const HooksSchema = z
  .object({
    pre: z.string().optional(),
    post: z.string().optional(),
  })
  .strict();

export const BuildSchema = z
  .object({
    id: z.string().min(1).optional(),
    binary: z.string().min(1).optional(),
    main: z.string().optional(),
    goos: stringList,
    goarch: stringList,
    goarm: armList,
    targets: stringList,
    flags: stringList,
    asmflags: stringList,
    gcflags: stringList,
    ldflags: stringList,
    env: z.array(envEntry).default([]),
    hooks: HooksSchema.optional(),
  })
  .strict();

export const ProjectConfigSchema = z
  .object({
    project_name: z.string().min(1).optional(),
    dist: z.string().min(1).optional(),
    env: z.array(envEntry).default([]),
    builds: z.array(BuildSchema).default([]),
  })
  .strict();

export type RawBuildConfig = z.infer<typeof BuildSchema>;
export type RawProjectConfig = z.infer<typeof ProjectConfigSchema>;

/**
 * Render zod issues as `path: message` entries
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    })
    .join('; ');
}
