import { z } from 'zod';
import { ConfigError } from '../errors';

export const ProjectConfigSchema = z.object({
  name: z.string().default('patchloop-project'),
  description: z.string().optional(),
  /** Natural-language specification the loop implements, relative to the project root */
  specPath: z.string().default('.patchloop/spec.md'),
});

export const AgentConfigSchema = z.object({
  provider: z.enum(['openai', 'fake']).default('openai'),
  model: z.string().default('gpt-5-codex'),
  apiKeyEnv: z.string().default('OPENAI_API_KEY'),
  baseUrl: z.string().url().optional(),
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().positive().optional(),
  maxIterations: z.number().int().min(1).default(15),
  generationTimeoutMs: z
    .number()
    .int()
    .min(1000)
    .default(600_000)
    .describe('Bound on a single generation call; expiry counts as an empty patch'),
  maxWallTimeMs: z.number().int().positive().optional(),
  /** Responses replayed in order by the fake provider */
  script: z.array(z.string()).optional(),
});

export const TestsConfigSchema = z.object({
  command: z.string().min(1).default('python -m pytest src/tests.py -v'),
  timeoutMs: z.number().int().min(1000).default(120_000),
  gracePeriodMs: z.number().int().min(0).default(2000),
  maxOutputBytes: z.number().int().positive().default(1_000_000),
  maxExecutionRetries: z.number().int().min(0).max(5).default(2),
  /** Project paths symlinked into the execution directory (virtualenvs, node_modules) */
  linkPaths: z.array(z.string()).default([]),
  /** Execution-directory-relative directories put in front of PATH */
  pathPrepend: z.array(z.string()).default([]),
  envAllowlist: z.array(z.string()).default([]),
  env: z.record(z.string(), z.string()).default({}),
});

export const PatchConfigSchema = z.object({
  maxEditBytes: z.number().int().positive().default(200_000),
  maxFilesChanged: z.number().int().positive().default(50),
  /** gitignore-style patterns the generator may not touch (tests, fixtures) */
  protectedPaths: z.array(z.string()).default([]),
  allowBinary: z.boolean().default(false),
});

export const ContextConfigSchema = z.object({
  maxTreeChars: z.number().int().positive().default(120_000),
  maxFeedbackChars: z.number().int().positive().default(8_000),
  maxFileBytes: z.number().int().positive().default(2_000_000),
  excludes: z.array(z.string()).default([]),
});

export const SessionConfigSchema = z.object({
  /** Write the final snapshot back into the project directory */
  checkout: z.boolean().default(true),
  /** Ask before starting each further round */
  interactive: z.boolean().default(false),
});

export const ConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  project: ProjectConfigSchema.default(ProjectConfigSchema.parse({})),
  agent: AgentConfigSchema.default(AgentConfigSchema.parse({})),
  tests: TestsConfigSchema.default(TestsConfigSchema.parse({})),
  patch: PatchConfigSchema.default(PatchConfigSchema.parse({})),
  context: ContextConfigSchema.default(ContextConfigSchema.parse({})),
  session: SessionConfigSchema.default(SessionConfigSchema.parse({})),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;
export type AgentConfig = z.infer<typeof AgentConfigSchema>;
export type TestsConfig = z.infer<typeof TestsConfigSchema>;
export type PatchConfig = z.infer<typeof PatchConfigSchema>;
export type ContextConfig = z.infer<typeof ContextConfigSchema>;

/**
 * Validates a merged raw configuration, raising a ConfigError that lists every issue.
 */
export function parseConfig(raw: unknown, source = 'configuration'): Config {
  const result = ConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`,
    );
    throw new ConfigError(`Invalid ${source}:\n${issues.map((i) => `  - ${i}`).join('\n')}`, {
      details: { issues },
    });
  }
  return result.data;
}
